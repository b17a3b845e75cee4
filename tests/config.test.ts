import { describe, expect, it } from 'vitest';
import { loadSyncConfig, parseBoolean, parseExtraColumns } from '../src/config/sync.js';

const baseEnv = { DISCOGS_TOKEN: 'test-token', DISCOGS_USERNAME: 'env-user' };

describe('loadSyncConfig', () => {
  it('applies defaults', () => {
    expect(loadSyncConfig({}, baseEnv)).toEqual({
      token: 'test-token',
      userAgent: 'CollectionEtl/1.0',
      username: 'env-user',
      folderId: 0,
      perPage: 100,
      requestDelayMs: 250,
      includeFullRelease: true,
      progressInterval: 25,
      extraColumns: [],
      sink: 'json',
      dataRoot: './data',
      table: 'collection',
      skipDiffs: false,
      directus: undefined
    });
  });

  it('reads the environment', () => {
    const config = loadSyncConfig(
      {},
      {
        ...baseEnv,
        USER_AGENT: 'MyCrate/2.0',
        DISCOGS_FOLDER_ID: '3',
        REQUEST_DELAY_MS: '0',
        INCLUDE_FULL_RELEASE: 'off',
        EXTRA_COLUMNS: 'barcode',
        SKIP_DIFFS: 'yes'
      }
    );
    expect(config.userAgent).toBe('MyCrate/2.0');
    expect(config.folderId).toBe(3);
    expect(config.requestDelayMs).toBe(0);
    expect(config.includeFullRelease).toBe(false);
    expect(config.extraColumns).toEqual(['barcode']);
    expect(config.skipDiffs).toBe(true);
  });

  it('lets overrides win over the environment', () => {
    const config = loadSyncConfig(
      { username: 'cli-user', requestDelayMs: 0 },
      { ...baseEnv, REQUEST_DELAY_MS: '500' }
    );
    expect(config.username).toBe('cli-user');
    expect(config.requestDelayMs).toBe(0);
  });

  it('requires a token and a username', () => {
    expect(() => loadSyncConfig({}, { DISCOGS_USERNAME: 'env-user' })).toThrow(
      'DISCOGS_TOKEN must be configured in environment variables or on the command line.'
    );
    expect(() => loadSyncConfig({}, { DISCOGS_TOKEN: 'test-token' })).toThrow(
      'DISCOGS_USERNAME must be configured in environment variables or on the command line.'
    );
  });

  it('rejects invalid numbers', () => {
    expect(() => loadSyncConfig({}, { ...baseEnv, REQUEST_DELAY_MS: 'abc' })).toThrow(
      'REQUEST_DELAY_MS must be a non-negative number, got "abc".'
    );
    expect(() => loadSyncConfig({}, { ...baseEnv, DISCOGS_PER_PAGE: '150' })).toThrow(
      'DISCOGS_PER_PAGE must be an integer between 1 and 100.'
    );
    expect(() => loadSyncConfig({}, { ...baseEnv, PROGRESS_INTERVAL: '0' })).toThrow(
      'PROGRESS_INTERVAL must be at least 1.'
    );
  });

  it('requires Directus credentials only for the directus sink', () => {
    expect(() => loadSyncConfig({}, { ...baseEnv, SINK: 'directus' })).toThrow(
      'DIRECTUS_URL must be configured in environment variables or on the command line.'
    );
    const config = loadSyncConfig(
      {},
      { ...baseEnv, SINK: 'Directus', DIRECTUS_URL: 'http://localhost:8055', DIRECTUS_TOKEN: 'test-secret' }
    );
    expect(config.sink).toBe('directus');
    expect(config.directus).toEqual({ url: 'http://localhost:8055', token: 'test-secret' });
  });

  it('rejects an unknown sink', () => {
    expect(() => loadSyncConfig({}, { ...baseEnv, SINK: 'duckdb' })).toThrow(
      'SINK must be "json" or "directus", got "duckdb".'
    );
  });
});

describe('parseExtraColumns', () => {
  it('accepts comma separated and JSON lists', () => {
    expect(parseExtraColumns('barcode, resource_url')).toEqual(['barcode', 'resource_url']);
    expect(parseExtraColumns('["Barcode", "barcode"]')).toEqual(['barcode']);
    expect(parseExtraColumns(undefined)).toEqual([]);
  });

  it('rejects unknown columns', () => {
    expect(() => parseExtraColumns('isrc')).toThrow(
      'Unknown extra column "isrc"; expected one of barcode, resource_url.'
    );
  });
});

describe('parseBoolean', () => {
  it('parses common spellings and falls back otherwise', () => {
    expect(parseBoolean('yes', false)).toBe(true);
    expect(parseBoolean('OFF', true)).toBe(false);
    expect(parseBoolean('maybe', true)).toBe(true);
    expect(parseBoolean(undefined, false)).toBe(false);
  });
});
