/**
 * Configuration accessor with dot-path key support.
 */

import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError } from './errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class Config {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  /** Load a YAML mapping. An empty file yields an empty config. */
  static load(path: string): Config {
    if (!existsSync(path)) {
      throw new ConfigNotFoundError(path);
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(readFileSync(path, 'utf-8'));
    } catch (e) {
      throw new ConfigError(`Invalid YAML in config file: ${path}`, undefined, {
        cause: e instanceof Error ? e : undefined,
      });
    }

    if (parsed === null || parsed === undefined) return new Config();
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must be a YAML mapping: ${path}`);
    }
    return new Config(parsed);
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (isRecord(current) && part in current) {
        current = current[part];
      } else {
        return defaultValue;
      }
    }
    return current;
  }
}
