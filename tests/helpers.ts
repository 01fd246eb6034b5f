/**
 * Shared test fixtures and helpers.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { htmlDependency, type HtmlDependency, type HtmlDependencyOptions } from '../src/descriptor.js';
import { Logger } from '../src/logger.js';

export function createTestDependency(options?: Partial<HtmlDependencyOptions>): HtmlDependency {
  return htmlDependency({
    name: 'foo',
    version: '1.0',
    src: { href: 'https://cdn.test/foo' },
    ...options,
  });
}

export function createBufferLogger(level: 'debug' | 'info' = 'debug'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({ level, output: { write: (s: string) => lines.push(s) } });
  return { logger, lines };
}

export function touch(root: string, relativePath: string, content = ''): string {
  const full = join(root, relativePath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
  return full;
}
