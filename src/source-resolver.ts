/**
 * Source selection for HTML dependencies.
 */

import type { HtmlDependency, SourceKind } from './descriptor.js';
import { NoUsableSourceError } from './errors.js';

/** URLs first: they work without staging files next to the document. */
export const DEFAULT_SRC_TYPES: readonly SourceKind[] = Object.freeze(['href', 'file']);

export interface ResolvedSource {
  kind: SourceKind;
  location: string;
}

/**
 * Pick the first kind in `srcType` that `dep` declares.
 *
 * When `dep.src` holds several entries of that kind, the first one wins.
 */
export function resolveSource(
  dep: HtmlDependency,
  srcType: readonly SourceKind[] = DEFAULT_SRC_TYPES,
): ResolvedSource {
  for (const kind of srcType) {
    const entry = dep.src.find((e) => e.kind === kind);
    if (entry) return { kind, location: entry.location };
  }
  throw new NoUsableSourceError(dep.name, dep.version, srcType);
}

export function stripTrailingSlash(path: string): string {
  return path.endsWith('/') ? path.slice(0, -1) : path;
}
