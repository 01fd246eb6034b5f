/**
 * Inlining of dependency files as data URIs.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { InvalidDescriptorError, PathNotFoundError } from './errors.js';
import type { HrefFilter } from './renderer.js';

export const DEFAULT_MIME = 'application/octet-stream';

export function makeDataUri(file: string, mime: string = DEFAULT_MIME): string {
  let content: Buffer;
  try {
    content = readFileSync(file);
  } catch (e) {
    throw new PathNotFoundError(file, { cause: e instanceof Error ? e : undefined });
  }
  return `data:${mime};base64,${content.toString('base64')}`;
}

/**
 * An `hrefFilter` that inlines each file. Only meaningful when rendering
 * `file` sources, since hrefs are decoded back to filesystem paths.
 */
export function dataUriHrefFilter(options?: { baseDir?: string }): HrefFilter {
  const baseDir = options?.baseDir ?? process.cwd();
  return (href, mime) => makeDataUri(resolve(baseDir, decodeHref(href)), mime ?? DEFAULT_MIME);
}

function decodeHref(href: string): string {
  try {
    return decodeURIComponent(href);
  } catch (e) {
    throw new InvalidDescriptorError(`Cannot decode ${href} to a file path: malformed percent-encoding`, null, {
      cause: e instanceof Error ? e : undefined,
    });
  }
}
