/**
 * Rewriting absolute dependency paths relative to a base directory.
 */

import { realpathSync } from 'node:fs';
import { getSource, withSources, type HtmlDependency } from './descriptor.js';
import { NotADescendantError, NotDiskBasedError, PathNotFoundError } from './errors.js';

/**
 * The part of `file` below `dir`. Throws rather than returning a path that
 * would point somewhere else.
 */
export function relativeTo(dir: string, file: string): string {
  const prefix = dir.endsWith('/') ? dir : dir + '/';
  if (file.startsWith(prefix)) {
    return file.slice(prefix.length);
  }
  throw new NotADescendantError(file, prefix);
}

/**
 * Make a dependency's `file` source relative to `basePath`.
 *
 * The result has a single `file` source; `href` sources are dropped.
 * `NotADescendantError` is raised whatever `mustWork` says.
 */
export function makeDependencyRelative(
  dep: HtmlDependency,
  basePath: string,
  options?: { mustWork?: boolean },
): HtmlDependency {
  const mustWork = options?.mustWork ?? true;

  let base: string;
  try {
    base = realpathSync(basePath);
  } catch (e) {
    throw new PathNotFoundError(basePath, { cause: e instanceof Error ? e : undefined });
  }

  const dir = getSource(dep, 'file');
  if (dir === null) {
    if (mustWork) {
      throw new NotDiskBasedError(dep.name, dep.version, 'relativize');
    }
    return dep;
  }

  return withSources(dep, [{ kind: 'file', location: relativeTo(base, dir) }]);
}
