/**
 * URL path encoding that keeps `/` as a separator.
 */

import { InvalidDescriptorError } from './errors.js';

const ESCAPE_PATTERN = /(%[0-9A-Fa-f]{2})/;
const EXTRA_RESERVED = /[!'()*]/g;
// controls, space, "<>\^`{|}, a stray %, and everything outside ASCII
const NEVER_RAW = /[\u0000-\u0020"%<>\\^`{|}\u007F-\u{10FFFF}]/gu;

function encodeComponent(text: string): string {
  try {
    return encodeURIComponent(text);
  } catch (e) {
    throw new InvalidDescriptorError(`Cannot URL-encode ${JSON.stringify(text)}: not well-formed UTF-16`, null, {
      cause: e instanceof Error ? e : undefined,
    });
  }
}

function encodeRaw(text: string): string {
  // encodeURIComponent leaves !'()* alone; they are reserved here too
  return encodeComponent(text).replace(
    EXTRA_RESERVED,
    (c) => '%' + c.charCodeAt(0).toString(16).toUpperCase(),
  );
}

function encodeOne(path: string): string {
  const encoded = path
    .split(ESCAPE_PATTERN)
    .map((part, i) => (i % 2 === 1 ? part : encodeRaw(part)))
    .join('');
  return encoded.replace(/%2F/gi, '/');
}

/**
 * Percent-encode every character of a path outside `A-Z a-z 0-9 - . _ ~`,
 * except `/`. Existing `%XX` escapes are left as they are.
 */
export function urlEncodePath(path: string): string;
export function urlEncodePath(paths: readonly string[]): string[];
export function urlEncodePath(path: string | readonly string[]): string | string[] {
  if (typeof path === 'string') return encodeOne(path);
  return path.map(encodeOne);
}

/**
 * Escape only what may never appear raw in a URL (spaces, quotes, non-ASCII),
 * keeping reserved characters such as `[` `]` `:` `?` `#` and existing `%XX`
 * escapes. Used for `href` sources, which are taken to be encoded already.
 */
export function normalizeHref(href: string): string {
  return href
    .split(ESCAPE_PATTERN)
    .map((part, i) => (i % 2 === 1 ? part : part.replace(NEVER_RAW, encodeComponent)))
    .join('');
}

/** Encoder signature accepted by the renderer. */
export type EncodeFunc = (path: string) => string;
