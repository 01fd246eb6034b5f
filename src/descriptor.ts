/**
 * HTML dependency descriptors: a named, versioned bundle of stylesheets,
 * scripts, meta tags, attachments and raw head markup found in a directory
 * on disk, at a URL, or both.
 */

import { InvalidDescriptorError } from './errors.js';

export const SOURCE_KINDS = ['file', 'href'] as const;

/** `file` is an absolute filesystem directory, `href` an absolute or relative URL. */
export type SourceKind = (typeof SOURCE_KINDS)[number];

export interface SourceEntry {
  readonly kind: SourceKind;
  readonly location: string;
}

export interface Attachment {
  readonly name: string | null;
  readonly path: string;
}

export interface HtmlDependency {
  readonly name: string;
  readonly version: string;
  /** Ordered; several entries of the same kind may appear and only the first is used. */
  readonly src: readonly SourceEntry[];
  readonly meta: readonly (readonly [string, string])[];
  readonly script: readonly string[];
  readonly stylesheet: readonly string[];
  readonly head: readonly string[];
  readonly attachment: readonly Attachment[];
}

export type SourceInput =
  | string
  | Partial<Record<SourceKind, string>>
  | ReadonlyArray<readonly [SourceKind | '', string]>;

export interface AttachmentSpec {
  name?: string | null;
  path: string;
}

/** Paths (identified by position), `{ id: path }`, or explicit specs. */
export type AttachmentInput = ReadonlyArray<string | AttachmentSpec> | Readonly<Record<string, string>>;

export type MetaInput = Readonly<Record<string, string>> | ReadonlyArray<readonly [string, string]>;

export interface HtmlDependencyOptions {
  name: string;
  version: string | number | { toString(): string };
  src: SourceInput;
  meta?: MetaInput;
  script?: string | readonly string[];
  stylesheet?: string | readonly string[];
  head?: string | readonly string[];
  attachment?: AttachmentInput;
}

export function isSourceKind(value: string): value is SourceKind {
  return SOURCE_KINDS.some((kind) => kind === value);
}

function isSourceList(src: SourceInput): src is ReadonlyArray<readonly [SourceKind | '', string]> {
  return Array.isArray(src);
}

function isAttachmentList(input: AttachmentInput): input is ReadonlyArray<string | AttachmentSpec> {
  return Array.isArray(input);
}

function isMetaList(meta: MetaInput): meta is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(meta);
}

function normalizeSources(name: string, src: SourceInput): SourceEntry[] {
  let pairs: Array<readonly [string, string | undefined]>;
  if (typeof src === 'string') {
    pairs = [['file', src]];
  } else if (isSourceList(src)) {
    pairs = src.map(([kind, location]) => [kind === '' ? 'file' : kind, location] as const);
  } else {
    pairs = Object.entries(src);
  }

  const entries: SourceEntry[] = [];
  for (const [kind, location] of pairs) {
    if (location === undefined) continue;
    if (!isSourceKind(kind)) {
      throw new InvalidDescriptorError(
        `Dependency ${name} has unsupported source kind '${kind}' (expected one of: ${SOURCE_KINDS.join(', ')})`,
        name,
      );
    }
    entries.push(Object.freeze({ kind, location }));
  }

  if (entries.length === 0) {
    throw new InvalidDescriptorError(`Dependency ${name} must declare at least one source`, name);
  }
  return entries;
}

function normalizeAttachments(name: string, input: AttachmentInput | undefined): Attachment[] {
  if (input === undefined) return [];

  let attachments: Attachment[];
  if (isAttachmentList(input)) {
    attachments = input.map((item) =>
      typeof item === 'string' ? { name: null, path: item } : { name: item.name ?? null, path: item.path },
    );
  } else {
    attachments = Object.entries(input).map(([id, path]) => ({ name: id, path }));
  }

  const seen = new Set<string>();
  attachments.forEach((att, i) => {
    const id = att.name ?? String(i + 1);
    if (seen.has(id)) {
      throw new InvalidDescriptorError(`Dependency ${name} has duplicate attachment identifier '${id}'`, name);
    }
    seen.add(id);
  });
  return attachments.map((att) => Object.freeze(att));
}

function toList(value: string | readonly string[] | undefined): string[] {
  if (value === undefined) return [];
  return typeof value === 'string' ? [value] : [...value];
}

/**
 * Define an HTML dependency.
 *
 * An unlabeled `src` string is a `file` source. Anything given as `version`
 * is stored in its string form.
 */
export function htmlDependency(options: HtmlDependencyOptions): HtmlDependency {
  const name = options.name;
  if (typeof name !== 'string' || name.length === 0) {
    throw new InvalidDescriptorError('Dependency name must be a non-empty string');
  }

  let meta: Array<readonly [string, string]> = [];
  if (options.meta !== undefined) {
    meta = isMetaList(options.meta) ? [...options.meta] : Object.entries(options.meta);
  }

  return freeze({
    name,
    version: String(options.version),
    src: normalizeSources(name, options.src),
    meta: meta.map(([k, v]) => Object.freeze([k, v] as const)),
    script: toList(options.script),
    stylesheet: toList(options.stylesheet),
    head: toList(options.head),
    attachment: normalizeAttachments(name, options.attachment),
  });
}

function freeze(dep: HtmlDependency): HtmlDependency {
  Object.freeze(dep.src);
  Object.freeze(dep.meta);
  Object.freeze(dep.script);
  Object.freeze(dep.stylesheet);
  Object.freeze(dep.head);
  Object.freeze(dep.attachment);
  return Object.freeze(dep);
}

/** Location of the first `kind` entry, or null. */
export function getSource(dep: HtmlDependency, kind: SourceKind): string | null {
  return dep.src.find((entry) => entry.kind === kind)?.location ?? null;
}

/** A copy of `dep` with its sources replaced. */
export function withSources(dep: HtmlDependency, src: readonly SourceEntry[]): HtmlDependency {
  if (src.length === 0) {
    throw new InvalidDescriptorError(`Dependency ${dep.name} must declare at least one source`, dep.name);
  }
  return freeze({ ...dep, src: src.map((entry) => Object.freeze({ ...entry })) });
}

export function attachmentIds(dep: HtmlDependency): string[] {
  return dep.attachment.map((att, i) => att.name ?? String(i + 1));
}

export function dependencyKey(dep: HtmlDependency): string {
  return `${dep.name}-${dep.version}`;
}
