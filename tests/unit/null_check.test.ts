import { describe, expect, it } from 'vitest';
import { createThresholdConfig } from '@/core/thresholds';
import { createDataset } from '@/quality/dataset';
import { computeNullStats, nullCheck } from '@/quality/checks/null_check';

const config = createThresholdConfig();

function datasetWithNulls(total: number, nulls: number) {
  return createDataset(
    Array.from({ length: total }, (_, idx) => ({
      id: idx + 1,
      bmi: idx < nulls ? null : 25 + idx,
    }))
  );
}

describe('nullCheck', () => {
  it('computes null percentage per column', () => {
    const stats = computeNullStats(datasetWithNulls(20, 5));
    expect(stats).toEqual([
      { column: 'id', null_count: 0, null_pct: 0 },
      { column: 'bmi', null_count: 5, null_pct: 25 },
    ]);
  });

  it('warns when a column sits exactly at null_pct_max', () => {
    const atLimit = createThresholdConfig({ null_pct_max: 7 });
    const dataset = datasetWithNulls(100, 7);
    const result = nullCheck.run(dataset, atLimit);

    expect(computeNullStats(dataset)[1].null_pct).toBe(7);
    expect(result.status).toBe('warning');
    expect(result.issues).toEqual([
      {
        type: 'null_values',
        column: 'bmi',
        count: 7,
        details: '7.00% null values (7 of 100 records)',
      },
    ]);
  });

  it('fails when a column exceeds null_pct_max', () => {
    const result = nullCheck.run(datasetWithNulls(20, 2), config);

    expect(result.check_name).toBe('null_check');
    expect(result.status).toBe('failed');
    expect(result.issues).toEqual([
      {
        type: 'null_values',
        column: 'bmi',
        count: 2,
        details: '10.00% null values (2 of 20 records), above limit 5.00%',
      },
    ]);
  });

  it('warns when nulls stay within the limit', () => {
    const result = nullCheck.run(datasetWithNulls(20, 1), config);

    expect(result.status).toBe('warning');
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0].details).toBe('5.00% null values (1 of 20 records)');
  });

  it('passes a complete dataset', () => {
    const result = nullCheck.run(datasetWithNulls(20, 0), config);
    expect(result.status).toBe('passed');
    expect(result.issues).toEqual([]);
  });

  it('honours a custom limit', () => {
    const strict = createThresholdConfig({ null_pct_max: 0 });
    expect(nullCheck.run(datasetWithNulls(20, 1), strict).status).toBe('failed');
  });

  it('passes an empty dataset with an empty_dataset issue', () => {
    const result = nullCheck.run(createDataset([], ['bmi']), config);
    expect(result.status).toBe('passed');
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0].type).toBe('empty_dataset');
  });
});
