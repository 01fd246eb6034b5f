/**
 * Markup generation for lists of HTML dependencies.
 */

import type { Config } from './config.js';
import { attachmentIds, isSourceKind, type HtmlDependency, type SourceKind } from './descriptor.js';
import { ConfigError } from './errors.js';
import { HtmlString } from './html.js';
import { defaultLogger, type Logger } from './logger.js';
import { normalizeHref, urlEncodePath, type EncodeFunc } from './path-encoder.js';
import { DEFAULT_SRC_TYPES, resolveSource, stripTrailingSlash } from './source-resolver.js';
import { htmlEscape } from './utils/html.js';

/** Rewrites a final, encoded href. `mime` is absent for attachments. */
export type HrefFilter = (href: string, mime?: string) => string;

export interface RenderOptions {
  /** Source kinds to use, most preferred first. Defaults to `['href', 'file']`. */
  srcType?: readonly SourceKind[];
  /** Encodes `file` locations and asset paths. Defaults to `urlEncodePath`. */
  encodeFunc?: EncodeFunc;
  /** Defaults to identity. */
  hrefFilter?: HrefFilter;
  escape?: (text: string) => string;
  logger?: Logger;
}

const identity: HrefFilter = (href) => href;

function renderOne(
  dep: HtmlDependency,
  srcType: readonly SourceKind[],
  encodeFunc: EncodeFunc,
  hrefFilter: HrefFilter,
  escape: (text: string) => string,
): string[] {
  const { kind, location } = resolveSource(dep, srcType);

  // href locations are taken to be encoded already
  const srcPath = stripTrailingSlash(kind === 'file' ? encodeFunc(location) : normalizeHref(location));
  const href = (path: string, mime?: string): string =>
    escape(hrefFilter(`${srcPath}/${encodeFunc(path)}`, mime));

  const html: string[] = [];

  for (const [name, content] of dep.meta) {
    html.push(`<meta name="${escape(name)}" content="${escape(content)}" />`);
  }

  for (const stylesheet of dep.stylesheet) {
    html.push(`<link href="${href(stylesheet, 'text/css')}" rel="stylesheet" />`);
  }

  for (const script of dep.script) {
    html.push(`<script src="${href(script, 'text/javascript')}"></script>`);
  }

  const ids = attachmentIds(dep);
  dep.attachment.forEach((att, i) => {
    html.push(
      `<link id="${escape(dep.name)}-${escape(ids[i])}-attachment" rel="attachment" href="${href(att.path)}"/>`,
    );
  });

  html.push(...dep.head);
  return html;
}

/**
 * Create the markup that includes `deps` in a document head.
 *
 * Fragments come out in input order and are joined with newlines. A
 * dependency without a usable source fails the whole render.
 */
export function renderDependencies(
  deps: readonly HtmlDependency[],
  options?: RenderOptions,
): HtmlString {
  const srcType = options?.srcType ?? DEFAULT_SRC_TYPES;
  const encodeFunc = options?.encodeFunc ?? urlEncodePath;
  const hrefFilter = options?.hrefFilter ?? identity;
  const escape = options?.escape ?? htmlEscape;
  const logger = options?.logger ?? defaultLogger;

  const html: string[] = [];
  for (const dep of deps) {
    const fragments = renderOne(dep, srcType, encodeFunc, hrefFilter, escape);
    logger.debug('Rendered dependency', { dependency: dep.name, version: dep.version, tags: fragments.length });
    html.push(...fragments);
  }
  return new HtmlString(html.join('\n'));
}

/** Reads `render.src_type` (a kind or list of kinds). */
export function renderOptionsFromConfig(config: Config, logger?: Logger): RenderOptions {
  const raw = config.get('render.src_type');
  const options: RenderOptions = {};
  if (logger) options.logger = logger;
  if (raw === undefined || raw === null) return options;

  const values: unknown[] = Array.isArray(raw) ? raw : [raw];
  const srcType: SourceKind[] = [];
  for (const value of values) {
    if (typeof value !== 'string' || !isSourceKind(value)) {
      throw new ConfigError(`render.src_type contains unsupported source kind: ${String(value)}`);
    }
    srcType.push(value);
  }
  options.srcType = srcType;
  return options;
}
