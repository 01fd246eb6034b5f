/**
 * Error hierarchy for headdeps.
 */

export interface ErrorOptions {
  cause?: Error;
  suggestion?: string | null;
}

export class DependencyError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;
  readonly suggestion: string | null;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
    suggestion?: string | null,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'DependencyError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date().toISOString();
    this.suggestion = suggestion ?? null;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    if (this.suggestion !== null) {
      obj.suggestion = this.suggestion;
    }
    return obj;
  }
}

export class ConfigNotFoundError extends DependencyError {
  constructor(configPath: string, options?: ErrorOptions) {
    super(
      'CONFIG_NOT_FOUND',
      `Configuration file not found: ${configPath}`,
      { configPath },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends DependencyError {
  constructor(message: string, errors?: Array<Record<string, unknown>>, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, errors ? { errors } : {}, options?.cause, options?.suggestion);
    this.name = 'ConfigError';
  }
}

export class InvalidDescriptorError extends DependencyError {
  constructor(message: string, name?: string | null, options?: ErrorOptions) {
    super(
      'INVALID_DESCRIPTOR',
      message,
      name != null ? { name } : {},
      options?.cause,
      options?.suggestion,
    );
    this.name = 'InvalidDescriptorError';
  }
}

export class NoUsableSourceError extends DependencyError {
  constructor(dependencyName: string, version: string, srcType: readonly string[], options?: ErrorOptions) {
    super(
      'NO_USABLE_SOURCE',
      `Dependency ${dependencyName} ${version} does not have a usable source`,
      { dependencyName, version, srcType: [...srcType] },
      options?.cause,
      options?.suggestion ?? `Declare one of: ${srcType.join(', ')}`,
    );
    this.name = 'NoUsableSourceError';
  }

  get dependencyName(): string {
    return String(this.details['dependencyName']);
  }

  get version(): string {
    return String(this.details['version']);
  }
}

export class NotDiskBasedError extends DependencyError {
  constructor(dependencyName: string, version: string, operation: 'copy' | 'relativize', options?: ErrorOptions) {
    super(
      'NOT_DISK_BASED',
      operation === 'copy'
        ? `Dependency ${dependencyName} ${version} is not disk-based`
        : `Could not make dependency ${dependencyName} ${version} relative; it is not file-based`,
      { dependencyName, version, operation },
      options?.cause,
      options?.suggestion ?? 'Pass mustWork: false to pass URL-only dependencies through',
    );
    this.name = 'NotDiskBasedError';
  }
}

export class CopyFailedError extends DependencyError {
  constructor(dependencyName: string, version: string, from: string, to: string, options?: ErrorOptions) {
    super(
      'COPY_FAILED',
      `Could not copy dependency ${dependencyName} ${version} from ${from} to ${to}`,
      { dependencyName, version, from, to },
      options?.cause,
      options?.suggestion ?? 'Check the source directory for unreadable files or broken links',
    );
    this.name = 'CopyFailedError';
  }
}

export class NotADescendantError extends DependencyError {
  constructor(path: string, baseDir: string, options?: ErrorOptions) {
    super(
      'NOT_A_DESCENDANT',
      `The path ${path} does not appear to be a descendant of ${baseDir}`,
      { path, baseDir },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'NotADescendantError';
  }

  get path(): string {
    return String(this.details['path']);
  }

  get baseDir(): string {
    return String(this.details['baseDir']);
  }
}

export class PathNotFoundError extends DependencyError {
  constructor(path: string, options?: ErrorOptions) {
    super('PATH_NOT_FOUND', `Path not found: ${path}`, { path }, options?.cause, options?.suggestion);
    this.name = 'PathNotFoundError';
  }
}

/**
 * All error codes as constants.
 */
export const ErrorCodes = Object.freeze({
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  INVALID_DESCRIPTOR: 'INVALID_DESCRIPTOR',
  NO_USABLE_SOURCE: 'NO_USABLE_SOURCE',
  NOT_DISK_BASED: 'NOT_DISK_BASED',
  COPY_FAILED: 'COPY_FAILED',
  NOT_A_DESCENDANT: 'NOT_A_DESCENDANT',
  PATH_NOT_FOUND: 'PATH_NOT_FOUND',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
