/**
 * YAML manifests declaring HTML dependencies.
 *
 * ```yaml
 * dependencies:
 *   - name: jquery
 *     version: "3.7.1"
 *     src: { file: lib/jquery, href: "https://code.jquery.com" }
 *     script: jquery.min.js
 * ```
 *
 * Relative `file` sources are resolved against the manifest's directory.
 * Versions that YAML would read as numbers (`1.0`) should be quoted.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { htmlDependency, type HtmlDependency, type SourceInput } from './descriptor.js';
import { ConfigError, ConfigNotFoundError } from './errors.js';

const StringList = Type.Union([Type.String(), Type.Array(Type.String())]);

export const DependencySpecSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  version: Type.Union([Type.String(), Type.Number()]),
  src: Type.Union([
    Type.String({ minLength: 1 }),
    Type.Object(
      {
        file: Type.Optional(Type.String({ minLength: 1 })),
        href: Type.Optional(Type.String({ minLength: 1 })),
      },
      { additionalProperties: false, minProperties: 1 },
    ),
  ]),
  meta: Type.Optional(Type.Record(Type.String(), Type.String())),
  script: Type.Optional(StringList),
  stylesheet: Type.Optional(StringList),
  head: Type.Optional(StringList),
  attachment: Type.Optional(
    Type.Union([
      Type.Array(
        Type.Union([
          Type.String(),
          Type.Object({ name: Type.Optional(Type.String({ minLength: 1 })), path: Type.String() }),
        ]),
      ),
      Type.Record(Type.String(), Type.String()),
    ]),
  ),
});

export type DependencySpec = Static<typeof DependencySpecSchema>;

function resolveFileSource(src: DependencySpec['src'], baseDir: string | undefined): SourceInput {
  if (baseDir === undefined) return src;
  const absolute = (p: string): string => (isAbsolute(p) ? p : resolve(baseDir, p));
  if (typeof src === 'string') return absolute(src);
  return src.file === undefined ? src : { ...src, file: absolute(src.file) };
}

/**
 * Validate one raw manifest entry and build its descriptor.
 *
 * @param where Prefix for error paths, e.g. `/dependencies/2`.
 */
export function parseDependencySpec(raw: unknown, baseDir?: string, where: string = ''): HtmlDependency {
  if (!Value.Check(DependencySpecSchema, raw)) {
    const errors = [...Value.Errors(DependencySpecSchema, raw)].map((e) => ({
      path: `${where}${e.path}` || '/',
      message: e.message,
    }));
    throw new ConfigError(`Invalid dependency declaration${where ? ` at ${where}` : ''}`, errors);
  }

  return htmlDependency({
    name: raw.name,
    version: raw.version,
    src: resolveFileSource(raw.src, baseDir),
    meta: raw.meta,
    script: raw.script,
    stylesheet: raw.stylesheet,
    head: raw.head,
    attachment: raw.attachment,
  });
}

export function loadManifest(manifestPath: string): HtmlDependency[] {
  if (!existsSync(manifestPath)) {
    throw new ConfigNotFoundError(manifestPath);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(manifestPath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Invalid YAML in manifest: ${manifestPath}`, undefined, {
      cause: e instanceof Error ? e : undefined,
    });
  }

  if (parsed === null || parsed === undefined) return [];
  if (typeof parsed !== 'object' || Array.isArray(parsed) || !('dependencies' in parsed)) {
    throw new ConfigError(`Manifest must be a mapping with a 'dependencies' list: ${manifestPath}`);
  }

  const entries = parsed.dependencies;
  if (!Array.isArray(entries)) {
    throw new ConfigError(`Manifest must be a mapping with a 'dependencies' list: ${manifestPath}`);
  }

  const baseDir = dirname(resolve(manifestPath));
  return entries.map((entry: unknown, i) => parseDependencySpec(entry, baseDir, `/dependencies/${i}`));
}
