import { describe, it, expect } from 'vitest';
import { SchemaInferrer, inferSchema } from '../../../src/lib/inferencer/index.js';

describe('SchemaInferrer', () => {
  it('should infer types and normalize records', () => {
    const { schema, records, metadata } = new SchemaInferrer().infer([
      { name: 'Ann', age: '25', joined: '2023-02-15' },
      { name: 'Ben', age: '30', joined: '2023/03/01' },
    ]);

    expect(Object.keys(schema)).toEqual(['name', 'age', 'joined']);
    expect(schema.name?.type).toBe('string');
    expect(schema.age?.type).toBe('integer');
    expect(schema.joined?.type).toBe('date');
    expect(records).toEqual([
      { name: 'Ann', age: 25, joined: '2023-02-15' },
      { name: 'Ben', age: 30, joined: '2023-03-01' },
    ]);
    expect(metadata).toEqual({ recordsAnalyzed: 2, fieldsDiscovered: 3, conflictsResolved: 0 });
  });

  it('should order fields by first appearance', () => {
    const { schema } = inferSchema([{ b: '1' }, { a: 'x', b: '2' }, { c: 'y' }]);
    expect(Object.keys(schema)).toEqual(['b', 'a', 'c']);
  });

  it('should keep absent fields absent and explicit nulls null', () => {
    const { records } = inferSchema([{ id: '1', note: 'hi' }, { id: '2', note: null }, { id: '3' }]);
    expect(records[1]).toEqual({ id: 2, note: null });
    expect(records[2]).toEqual({ id: 3 });
  });

  it('should resolve mixed numbers to float and rewrite every value', () => {
    const { schema, records } = inferSchema([{ price: '10' }, { price: '10.5' }]);
    expect(schema.price?.type).toBe('float');
    expect(records).toEqual([{ price: 10 }, { price: 10.5 }]);
  });

  it('should turn conflicting fields into strings', () => {
    const { schema, records, metadata } = inferSchema([{ code: '42' }, { code: 'A-7' }]);
    expect(schema.code?.type).toBe('string');
    expect(records).toEqual([{ code: '42' }, { code: 'A-7' }]);
    expect(metadata.conflictsResolved).toBe(1);
  });

  it('should read "1"/"0" as booleans unless other numbers appear', () => {
    expect(inferSchema([{ flag: '1' }, { flag: '0' }]).records).toEqual([
      { flag: true },
      { flag: false },
    ]);
    expect(inferSchema([{ qty: '1' }, { qty: '7' }]).records).toEqual([{ qty: 1 }, { qty: 7 }]);
  });

  it('should read "1"/"0" in identity fields as integers', () => {
    const { schema, records } = inferSchema([{ id: '1' }, { id: '0' }], { identityFields: ['id'] });
    expect(schema.id?.type).toBe('integer');
    expect(records).toEqual([{ id: 1 }, { id: 0 }]);
  });

  it('should keep the first raw samples up to the cap', () => {
    const { schema } = inferSchema(
      [{ v: 'a' }, { v: null }, { v: 'b' }, { v: 'c' }],
      { sampleValueCap: 2 },
    );
    expect(schema.v?.sample_values).toEqual(['a', null]);
  });

  it('should resolve an all-null field to null', () => {
    const { schema, records } = inferSchema([{ x: '' }, { x: 'null' }]);
    expect(schema.x?.type).toBe('null');
    expect(records).toEqual([{ x: null }, { x: null }]);
  });

  it('should return an empty schema for an empty batch', () => {
    expect(inferSchema([])).toEqual({
      schema: {},
      records: [],
      metadata: { recordsAnalyzed: 0, fieldsDiscovered: 0, conflictsResolved: 0 },
    });
  });
});
