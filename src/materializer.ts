/**
 * Staging of disk-based dependencies into an output directory.
 */

import {
  copyFileSync,
  existsSync,
  mkdirSync,
  mkdtempSync,
  readdirSync,
  realpathSync,
  renameSync,
  rmSync,
  statSync,
} from 'node:fs';
import { join } from 'node:path';
import { dependencyKey, withSources, type HtmlDependency } from './descriptor.js';
import { CopyFailedError, NotDiskBasedError, PathNotFoundError } from './errors.js';
import { defaultLogger, type Logger } from './logger.js';

export interface CopyOptions {
  /** When false, dependencies without a `file` source are returned unchanged. */
  mustWork?: boolean;
  logger?: Logger;
}

function existsAndIsDir(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function copyTree(from: string, to: string): void {
  mkdirSync(to, { recursive: true });
  for (const name of readdirSync(from)) {
    const src = join(from, name);
    const dest = join(to, name);
    if (statSync(src).isDirectory()) {
      copyTree(src, dest);
    } else {
      copyFileSync(src, dest);
    }
  }
}

/**
 * Copy `from` into a scratch sibling of `targetDir` and rename it into place,
 * so `targetDir` only ever appears complete.
 */
function stageTree(dep: HtmlDependency, from: string, outputDir: string, targetDir: string): void {
  const scratch = mkdtempSync(join(outputDir, `.${dependencyKey(dep)}-`));
  try {
    copyTree(from, scratch);
    renameSync(scratch, targetDir);
  } catch (e) {
    rmSync(scratch, { recursive: true, force: true });
    throw new CopyFailedError(dep.name, dep.version, from, targetDir, {
      cause: e instanceof Error ? e : undefined,
    });
  }
}

/**
 * Copy a dependency's directory to `<outputDir>/<name>-<version>`.
 *
 * An existing target directory is assumed to be up to date and is not
 * touched. A failed copy leaves no target behind. Nothing guards against two
 * processes staging the same target.
 *
 * Returns a copy of `dep` whose `file` source is the target's absolute path.
 */
export function copyDependencyToDir(
  dep: HtmlDependency,
  outputDir: string,
  options?: CopyOptions,
): HtmlDependency {
  const mustWork = options?.mustWork ?? true;
  const logger = options?.logger ?? defaultLogger;

  const fileIndex = dep.src.findIndex((entry) => entry.kind === 'file');
  if (fileIndex === -1) {
    if (mustWork) {
      throw new NotDiskBasedError(dep.name, dep.version, 'copy');
    }
    return dep;
  }

  const sourceDir = dep.src[fileIndex].location;
  if (!existsAndIsDir(sourceDir)) {
    throw new PathNotFoundError(sourceDir);
  }

  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }

  const targetDir = join(outputDir, dependencyKey(dep));
  if (existsSync(targetDir)) {
    logger.debug('Target exists, skipping copy', { dependency: dep.name, version: dep.version, targetDir });
  } else {
    stageTree(dep, sourceDir, outputDir, targetDir);
    logger.debug('Copied dependency', { dependency: dep.name, version: dep.version, from: sourceDir, to: targetDir });
  }

  const src = dep.src.map((entry, i) =>
    i === fileIndex ? { kind: entry.kind, location: realpathSync(targetDir) } : entry,
  );
  return withSources(dep, src);
}

/** Stage each dependency in order; the first failure aborts the rest. */
export function copyDependenciesToDir(
  deps: readonly HtmlDependency[],
  outputDir: string,
  options?: CopyOptions,
): HtmlDependency[] {
  return deps.map((dep) => copyDependencyToDir(dep, outputDir, options));
}
