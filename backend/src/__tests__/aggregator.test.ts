import { describe, it, expect } from 'vitest';
import { summarize } from '../services/aggregator.ts';
import { makeRecord, makeTable } from './helpers.ts';

describe('summarize', () => {
  it('reports no average for an empty table', () => {
    const metrics = summarize(makeTable([]));
    expect(metrics.count).toBe(0);
    expect(metrics.totalSquareFootage).toBe(0);
    expect(metrics.averageSquareFootage).toBeUndefined();
  });

  it('sums and averages square footage', () => {
    const metrics = summarize(makeTable([
      makeRecord({ squareFootage: 1000 }),
      makeRecord({ squareFootage: 3000 }),
    ]));
    expect(metrics).toEqual({ count: 2, totalSquareFootage: 4000, averageSquareFootage: 2000 });
  });

  it('keeps fractional averages', () => {
    const metrics = summarize(makeTable([
      makeRecord({ squareFootage: 1000 }),
      makeRecord({ squareFootage: 1001 }),
    ]));
    expect(metrics.averageSquareFootage).toBe(1000.5);
  });
});
