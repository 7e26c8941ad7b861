import { describe, it, expect } from 'vitest';
import {
  SchemaVersionStore,
  schemasEqual,
  schemaFingerprint,
  projectSchema,
} from '../../../src/lib/versioning/index.js';
import type { Schema, SchemaVersion } from '../../../src/types/data-model.js';
import { SchemaVersionError, VersionRaceLostError } from '../../../src/utils/errors.js';
import { InMemoryRecordStore } from '../../helpers/memory-store.js';

const T0 = new Date('2024-05-01T10:00:00.000Z');
const T1 = new Date('2024-05-02T10:00:00.000Z');

const userSchema: Schema = {
  id: { type: 'integer', sample_values: ['1'] },
  email: { type: 'email', sample_values: ['a@example.com'] },
};

function clock(...dates: Date[]) {
  let index = 0;
  return () => dates[Math.min(index++, dates.length - 1)] ?? T0;
}

describe('schema equality', () => {
  it('should ignore field order and sample values', () => {
    const reordered: Schema = {
      email: { type: 'email', sample_values: [] },
      id: { type: 'integer', sample_values: ['99'] },
    };
    expect(schemasEqual(userSchema, reordered)).toBe(true);
    expect(schemaFingerprint(userSchema)).toBe(schemaFingerprint(reordered));
  });

  it('should distinguish type changes and extra fields', () => {
    expect(
      schemasEqual(userSchema, { ...userSchema, id: { type: 'string', sample_values: [] } }),
    ).toBe(false);
    expect(
      schemasEqual(userSchema, { ...userSchema, age: { type: 'integer', sample_values: [] } }),
    ).toBe(false);
  });

  it('should project to sorted field/type pairs', () => {
    expect(projectSchema(userSchema)).toEqual([
      ['email', 'email'],
      ['id', 'integer'],
    ]);
  });
});

describe('SchemaVersionStore', () => {
  it('should create version 1 on an empty store', async () => {
    const store = new InMemoryRecordStore();
    const versions = new SchemaVersionStore(store, { retryLimit: 3, now: () => T0 });

    const version = await versions.reconcile(userSchema, 10);

    expect(version).toEqual({
      version: 1,
      schema: userSchema,
      created_at: T0,
      last_used: T0,
      stats: { total_records: 10, total_fields: 2 },
    });
    expect(store.versions).toHaveLength(1);
  });

  it('should reuse a matching version and bump its usage', async () => {
    const store = new InMemoryRecordStore();
    const versions = new SchemaVersionStore(store, { retryLimit: 3, now: clock(T0, T1) });

    await versions.reconcile(userSchema, 10);
    const reused = await versions.reconcile(userSchema, 5);

    expect(reused.version).toBe(1);
    expect(reused.created_at).toEqual(T0);
    expect(reused.last_used).toEqual(T1);
    expect(reused.stats.total_records).toBe(15);
    expect(store.versions).toHaveLength(1);
  });

  it('should allocate increasing version numbers for new structures', async () => {
    const store = new InMemoryRecordStore();
    const versions = new SchemaVersionStore(store, { retryLimit: 3, now: () => T0 });

    const first = await versions.reconcile(userSchema, 1);
    const second = await versions.reconcile({ name: { type: 'string', sample_values: [] } }, 1);
    const again = await versions.reconcile(userSchema, 1);

    expect([first.version, second.version, again.version]).toEqual([1, 2, 1]);
    expect((await versions.list()).map((v) => v.version)).toEqual([1, 2]);
  });

  it('should retry after losing a version race', async () => {
    const store = new InMemoryRecordStore();
    const rival: SchemaVersion = {
      version: 1,
      schema: { other: { type: 'string', sample_values: [] } },
      created_at: T0,
      last_used: T0,
      stats: { total_records: 1, total_fields: 1 },
    };
    // The rival's version lands between our read and our claim
    const findSchemaVersions = store.findSchemaVersions.bind(store);
    let reads = 0;
    store.findSchemaVersions = async () => {
      const result = await findSchemaVersions();
      if (reads++ === 0) store.versions.push(rival);
      return result;
    };

    const versions = new SchemaVersionStore(store, { retryLimit: 2, now: () => T0 });
    const version = await versions.reconcile(userSchema, 4);

    expect(version.version).toBe(2);
    expect(store.versions.map((v) => v.version)).toEqual([1, 2]);
  });

  it('should give up once the retry limit is exhausted', async () => {
    const store = new InMemoryRecordStore();
    store.claimSchemaVersion = async (version) => {
      throw new VersionRaceLostError(version.version);
    };
    const versions = new SchemaVersionStore(store, { retryLimit: 2, now: () => T0 });

    await expect(versions.reconcile(userSchema, 1)).rejects.toBeInstanceOf(SchemaVersionError);
  });

  it('should let two concurrent writers agree on one version for one structure', async () => {
    const store = new InMemoryRecordStore();
    const a = new SchemaVersionStore(store, { retryLimit: 3, now: () => T0 });
    const b = new SchemaVersionStore(store, { retryLimit: 3, now: () => T0 });

    const [left, right] = await Promise.all([a.reconcile(userSchema, 2), b.reconcile(userSchema, 3)]);

    expect(left.version).toBe(1);
    expect(right.version).toBe(1);
    expect(store.versions).toHaveLength(1);
    expect(store.versions[0]?.stats.total_records).toBe(5);
  });
});
