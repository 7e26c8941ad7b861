import { describe, it, expect, beforeEach } from 'vitest';
import { DataInsights } from '../../../src/lib/insights/index.js';
import type { NormalizedRecord } from '../../../src/types/data-model.js';
import { InMemoryRecordStore } from '../../helpers/memory-store.js';

const LOADED_AT = new Date('2024-06-30T00:00:00.000Z');

describe('DataInsights', () => {
  let store: InMemoryRecordStore;
  let insights: DataInsights;

  beforeEach(() => {
    store = new InMemoryRecordStore();
    const records: NormalizedRecord[] = [
      { color: 'red', price: 10 },
      { color: 'red', price: 20 },
      { color: 'blue' },
      { price: 30 },
    ];
    for (const [index, record] of records.entries()) {
      store.rows.push({ identityKey: `key:${index}`, record, loadedAt: LOADED_AT });
    }
    insights = new DataInsights(store);
  });

  it('should list the most frequent values first, counting absent ones as null', async () => {
    expect(await insights.fieldDistribution('color')).toEqual({
      field: 'color',
      values: [
        { value: 'red', count: 2 },
        { value: 'blue', count: 1 },
        { value: null, count: 1 },
      ],
      totalUnique: 3,
    });
  });

  it('should cap the listed values', async () => {
    expect(await insights.fieldDistribution('color', 1)).toEqual({
      field: 'color',
      values: [{ value: 'red', count: 2 }],
      totalUnique: 1,
    });
  });

  it('should summarize numeric and categorical fields', async () => {
    const summary = await insights.summaryStatistics({
      color: { type: 'string', sample_values: [] },
      price: { type: 'integer', sample_values: [] },
      score: { type: 'float', sample_values: [] },
    });

    expect(summary).toEqual({
      totalRecords: 4,
      fields: {
        color: { type: 'string', uniqueValues: 2 },
        price: { type: 'integer', statistics: { avg: 20, min: 10, max: 30, count: 3 } },
      },
    });
  });
});
