/**
 * Unit tests for the error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  ErrorCode,
  ExecutionError,
  FileIOError,
  MongoConnectionError,
  MongoProbeError,
  SchemaError,
  exitCodeFor,
  toMongoProbeError,
} from '../../../src/utils/errors.js';

describe('MongoProbeError', () => {
  it('should carry its code and name', () => {
    const error = new ConfigError('bad config');
    expect(error).toBeInstanceOf(MongoProbeError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(ErrorCode.CONFIG_ERROR);
    expect(error.name).toBe('ConfigError');
  });

  it('should build a minimal error response', () => {
    expect(new SchemaError('no schema').toResponse('schema-validation')).toEqual({
      status: 'error',
      phase: 'schema-validation',
      error: { code: 'SCHEMA_ERROR', message: 'no schema' },
    });
  });

  it('should include details and the cause message', () => {
    const error = new MongoConnectionError('Failed to connect', { uri: 'mongodb://localhost:27017' }, {
      cause: new Error('ECONNREFUSED'),
    });
    expect(error.toResponse('inference')).toEqual({
      status: 'error',
      phase: 'inference',
      error: {
        code: 'MONGO_CONNECTION_ERROR',
        message: 'Failed to connect',
        details: { uri: 'mongodb://localhost:27017' },
        cause: 'Error: ECONNREFUSED',
      },
    });
  });
});

describe('toMongoProbeError', () => {
  it('should keep project errors as they are', () => {
    const error = new ExecutionError('failed');
    expect(toMongoProbeError(error)).toBe(error);
  });

  it('should wrap foreign errors and values', () => {
    const wrapped = toMongoProbeError(new TypeError('oops'));
    expect(wrapped.code).toBe(ErrorCode.GENERAL_ERROR);
    expect(wrapped.message).toBe('oops');
    expect(wrapped.cause).toBeInstanceOf(TypeError);
    expect(toMongoProbeError('plain').message).toBe('plain');
  });
});

describe('exitCodeFor', () => {
  it.each([
    [new ConfigError('x'), 2],
    [new MongoConnectionError('x'), 3],
    [new FileIOError('x'), 4],
    [new MongoProbeError(ErrorCode.INPUT_READ_ERROR, 'x'), 4],
    [new SchemaError('x'), 1],
    [new ExecutionError('x'), 1],
    [new MongoProbeError(ErrorCode.GENERAL_ERROR, 'x'), 1],
  ])('should map %s to %i', (error, code) => {
    expect(exitCodeFor(error)).toBe(code);
  });
});
