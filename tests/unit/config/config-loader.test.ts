/**
 * Unit tests for configuration resolution
 */

import { describe, it, expect } from 'vitest';
import {
  CONFIG_DEFAULTS,
  requireConnection,
  resolveConfig,
} from '../../../src/utils/config-loader.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('resolveConfig', () => {
  it('should fall back to defaults', () => {
    expect(resolveConfig({}, {}, {})).toEqual({
      source: { uri: undefined, database: undefined, collection: undefined },
      sampling: { sampleSize: 100, strategy: 'firstN' },
      validation: { maxDepth: 100 },
    });
    expect(CONFIG_DEFAULTS.sampleSize).toBe(100);
  });

  it('should read connection settings from the environment', () => {
    const config = resolveConfig({}, {}, {
      MONGODB_URI: 'mongodb://localhost:27017',
      MONGODB_DATABASE: 'shop',
    });
    expect(config.source).toEqual({
      uri: 'mongodb://localhost:27017',
      database: 'shop',
      collection: undefined,
    });
  });

  it('should ignore empty environment values', () => {
    const config = resolveConfig({}, {}, { MONGODB_URI: '  ', MONGODB_DATABASE: '' });
    expect(config.source.uri).toBeUndefined();
    expect(config.source.database).toBeUndefined();
  });

  it('should prefer the config file over the environment', () => {
    const config = resolveConfig(
      {},
      { source: { uri: 'mongodb://file-host:27017' } },
      { MONGODB_URI: 'mongodb://env-host:27017', MONGODB_DATABASE: 'envdb' },
    );
    expect(config.source.uri).toBe('mongodb://file-host:27017');
    expect(config.source.database).toBe('envdb');
  });

  it('should prefer CLI flags over everything else', () => {
    const config = resolveConfig(
      { source: { database: 'clidb' }, sampling: { sampleSize: 20 }, maxDepth: 8 },
      {
        source: { database: 'filedb', collection: 'orders' },
        sampling: { sampleSize: 50, strategy: 'random' },
        validation: { maxDepth: 30 },
      },
      { MONGODB_DATABASE: 'envdb' },
    );
    expect(config).toEqual({
      source: { uri: undefined, database: 'clidb', collection: 'orders' },
      sampling: { sampleSize: 20, strategy: 'random' },
      validation: { maxDepth: 8 },
    });
  });

  it('should reject out-of-range numbers', () => {
    expect(() => resolveConfig({ sampling: { sampleSize: 0 } }, {}, {})).toThrow(
      'Sample size must be a positive integer, got 0',
    );
    expect(() => resolveConfig({ maxDepth: 1.5 }, {}, {})).toThrow(
      'Max depth must be a positive integer, got 1.5',
    );
  });
});

describe('requireConnection', () => {
  it('should return the connection settings', () => {
    const config = resolveConfig({ source: { uri: 'mongodb://localhost:27017', database: 'shop' } }, {}, {});
    expect(requireConnection(config)).toEqual({ uri: 'mongodb://localhost:27017', database: 'shop' });
  });

  it('should name the sources of a missing URI', () => {
    const config = resolveConfig({ source: { database: 'shop' } }, {}, {});
    expect(() => requireConnection(config)).toThrow(ConfigError);
    expect(() => requireConnection(config)).toThrow(
      'Missing MongoDB URI: pass --uri, set source.uri in the config file, or set MONGODB_URI',
    );
  });

  it('should name the sources of a missing database', () => {
    const config = resolveConfig({ source: { uri: 'mongodb://localhost:27017' } }, {}, {});
    expect(() => requireConnection(config)).toThrow(
      'Missing database name: pass --db, set source.database in the config file, or set MONGODB_DATABASE',
    );
  });
});
