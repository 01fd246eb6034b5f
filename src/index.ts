/**
 * headdeps - declare HTML head dependencies and render them as markup.
 */

// Descriptors
export {
  SOURCE_KINDS,
  htmlDependency,
  isSourceKind,
  getSource,
  withSources,
  attachmentIds,
  dependencyKey,
} from './descriptor.js';
export type {
  SourceKind,
  SourceEntry,
  Attachment,
  AttachmentSpec,
  AttachmentInput,
  MetaInput,
  SourceInput,
  HtmlDependency,
  HtmlDependencyOptions,
} from './descriptor.js';
export { htmlDependencies, setHtmlDependencies, attachDependencies } from './attach.js';

// Resolution and rendering
export { urlEncodePath, normalizeHref } from './path-encoder.js';
export type { EncodeFunc } from './path-encoder.js';
export { DEFAULT_SRC_TYPES, resolveSource, stripTrailingSlash } from './source-resolver.js';
export type { ResolvedSource } from './source-resolver.js';
export { renderDependencies, renderOptionsFromConfig } from './renderer.js';
export type { RenderOptions, HrefFilter } from './renderer.js';
export { HtmlString, html, isHtml } from './html.js';
export { htmlEscape } from './utils/index.js';
export { makeDataUri, dataUriHrefFilter, DEFAULT_MIME } from './data-uri.js';

// Staging
export { copyDependencyToDir, copyDependenciesToDir } from './materializer.js';
export type { CopyOptions } from './materializer.js';
export { relativeTo, makeDependencyRelative } from './relativizer.js';

// Manifests and config
export { loadManifest, parseDependencySpec, DependencySpecSchema } from './manifest.js';
export type { DependencySpec } from './manifest.js';
export { Config } from './config.js';
export { Logger, defaultLogger } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions, WritableOutput } from './logger.js';

// Errors
export {
  DependencyError,
  ConfigNotFoundError,
  ConfigError,
  InvalidDescriptorError,
  NoUsableSourceError,
  NotDiskBasedError,
  CopyFailedError,
  NotADescendantError,
  PathNotFoundError,
  ErrorCodes,
} from './errors.js';
export type { ErrorOptions, ErrorCode } from './errors.js';

export const VERSION = '0.1.0';
