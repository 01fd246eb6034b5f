import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  ConfigNotFoundError,
  DependencyError,
  ErrorCodes,
  InvalidDescriptorError,
  NoUsableSourceError,
  NotADescendantError,
  NotDiskBasedError,
  CopyFailedError,
  PathNotFoundError,
} from '../src/errors.js';

describe('DependencyError', () => {
  it('creates with code and message', () => {
    const err = new DependencyError('TEST_CODE', 'test message');
    expect(err.code).toBe('TEST_CODE');
    expect(err.message).toBe('test message');
    expect(err.name).toBe('DependencyError');
    expect(err.details).toEqual({});
    expect(err.suggestion).toBeNull();
    expect(err.timestamp).toBeDefined();
  });

  it('toString includes code and message', () => {
    expect(new DependencyError('ERR', 'something failed').toString()).toBe('[ERR] something failed');
  });

  it('toJSON omits empty fields', () => {
    const err = new DependencyError('ERR', 'msg');
    expect(err.toJSON()).toEqual({ code: 'ERR', message: 'msg', timestamp: err.timestamp });
  });

  it('toJSON includes details, cause and suggestion', () => {
    const cause = new Error('root cause');
    const err = new DependencyError('ERR', 'msg', { key: 'val' }, cause, 'try again');
    expect(err.cause).toBe(cause);
    expect(err.toJSON()).toEqual({
      code: 'ERR',
      message: 'msg',
      details: { key: 'val' },
      cause: 'Error: root cause',
      timestamp: err.timestamp,
      suggestion: 'try again',
    });
  });
});

describe('subclasses', () => {
  it('share the base class and carry their codes', () => {
    const errors: Array<[DependencyError, string, string]> = [
      [new ConfigNotFoundError('/x.yaml'), ErrorCodes.CONFIG_NOT_FOUND, 'ConfigNotFoundError'],
      [new ConfigError('bad'), ErrorCodes.CONFIG_INVALID, 'ConfigError'],
      [new InvalidDescriptorError('bad', 'foo'), ErrorCodes.INVALID_DESCRIPTOR, 'InvalidDescriptorError'],
      [new NoUsableSourceError('foo', '1.0', ['href']), ErrorCodes.NO_USABLE_SOURCE, 'NoUsableSourceError'],
      [new NotDiskBasedError('foo', '1.0', 'copy'), ErrorCodes.NOT_DISK_BASED, 'NotDiskBasedError'],
      [new CopyFailedError('foo', '1.0', '/a', '/b'), ErrorCodes.COPY_FAILED, 'CopyFailedError'],
      [new NotADescendantError('/x', '/a/'), ErrorCodes.NOT_A_DESCENDANT, 'NotADescendantError'],
      [new PathNotFoundError('/x'), ErrorCodes.PATH_NOT_FOUND, 'PathNotFoundError'],
    ];
    for (const [err, code, name] of errors) {
      expect(err).toBeInstanceOf(DependencyError);
      expect(err).toBeInstanceOf(Error);
      expect(err.code).toBe(code);
      expect(err.name).toBe(name);
    }
  });

  it('ConfigError carries validation errors in details', () => {
    const err = new ConfigError('bad', [{ path: '/name', message: 'Required property' }]);
    expect(err.details).toEqual({ errors: [{ path: '/name', message: 'Required property' }] });
  });

  it('NoUsableSourceError suggests the accepted kinds', () => {
    expect(new NoUsableSourceError('foo', '1.0', ['href', 'file']).suggestion).toBe('Declare one of: href, file');
  });

  it('NotADescendantError exposes its paths', () => {
    const err = new NotADescendantError('/x/y', '/a/');
    expect(err.path).toBe('/x/y');
    expect(err.baseDir).toBe('/a/');
  });

  it('NotDiskBasedError names the operation', () => {
    expect(new NotDiskBasedError('foo', '1.0', 'copy').message).toBe('Dependency foo 1.0 is not disk-based');
    expect(new NotDiskBasedError('foo', '1.0', 'relativize').details['operation']).toBe('relativize');
  });
});
