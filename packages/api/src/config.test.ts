// Tests for configuration loading

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONTENT_FORMAT } from '@quire/protocol';
import { ConfigError, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      databaseUrl: undefined,
      dbMaxConnections: 10,
      port: 3000,
      logLevel: 'info',
      contentFormat: DEFAULT_CONTENT_FORMAT,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      DATABASE_URL: 'postgres://localhost:5432/quire_test',
      PORT: '8080',
      LOG_LEVEL: 'debug',
      CONTENT_PREFIX: '<!doctype html>',
      THUMBNAIL_PREFIXES: 'https://, ipfs://,',
    });

    expect(config.databaseUrl).toBe('postgres://localhost:5432/quire_test');
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
    expect(config.contentFormat).toEqual({
      contentPrefix: '<!doctype html>',
      contentSuffix: '</html>',
      thumbnailPrefixes: ['https://', 'ipfs://'],
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty', LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });

  it('lists every invalid variable', () => {
    try {
      loadConfig({ PORT: '70000', LOG_LEVEL: 'loud' });
      expect.fail('expected loadConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ issues: [expect.stringMatching(/^PORT: /), expect.stringMatching(/^LOG_LEVEL: /)] });
    }
  });
});
