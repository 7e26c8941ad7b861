import { describe, it, expect } from 'vitest';
import { loadConfig, validateConfig } from '../../../src/utils/config-loader.js';
import { DEFAULT_PIPELINE_CONFIG, DEFAULT_STORE_CONFIG } from '../../../src/types/config.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({}, {}, {})).toEqual({
      pipeline: DEFAULT_PIPELINE_CONFIG,
      store: DEFAULT_STORE_CONFIG,
    });
  });

  it('should apply CLI over file over environment', () => {
    const env = {
      RECORDLOOM_BATCH_SIZE: '50',
      RECORDLOOM_DB: 'from_env',
      RECORDLOOM_MONGO_URI: 'mongodb://env-host:27017/',
    };
    const config = loadConfig(
      { batchSize: 500 },
      { pipeline: { batchSize: 200 }, store: { database: 'from_file' } },
      env,
    );

    expect(config.pipeline.batchSize).toBe(500);
    expect(config.store.database).toBe('from_file');
    expect(config.store.uri).toBe('mongodb://env-host:27017/');
  });

  it('should read the batch size from the environment', () => {
    expect(loadConfig({}, {}, { RECORDLOOM_BATCH_SIZE: '250' }).pipeline.batchSize).toBe(250);
  });

  it('should split comma-separated field lists', () => {
    const config = loadConfig(
      { monitoredFields: 'price, stock', identifierFields: 'sku,email' },
      {},
      {},
    );
    expect(config.pipeline.monitoredFields).toEqual(['price', 'stock']);
    expect(config.pipeline.identifierFieldPriority).toEqual(['sku', 'email']);
  });

  it('should merge collection names from the file', () => {
    const config = loadConfig({}, { store: { collections: { records: 'rows' } } }, {});
    expect(config.store.collections).toEqual({
      records: 'rows',
      schemaVersions: 'schema_versions',
      changes: 'data_changes',
    });
  });

  it('should list every violation', () => {
    try {
      loadConfig({ batchSize: 0 }, { store: { uri: 'http://nope' } }, {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.details?.problems).toEqual([
        '/pipeline/batchSize must be >= 1',
        '/store/uri must match pattern "^mongodb(\\+srv)?://"',
      ]);
    }
  });

  it('should reject a non-numeric environment batch size', () => {
    expect(() => loadConfig({}, {}, { RECORDLOOM_BATCH_SIZE: 'lots' })).toThrow(ConfigError);
  });
});

describe('validateConfig', () => {
  it('should reject unknown keys', () => {
    expect(() =>
      validateConfig({
        pipeline: { ...DEFAULT_PIPELINE_CONFIG, extra: true },
        store: DEFAULT_STORE_CONFIG,
      }),
    ).toThrow(ConfigError);
  });
});
