/**
 * aggregator.ts — Summary statistics over a property table
 */
import type { Metrics, PropertyTable } from '../types.ts';

export function summarize(table: PropertyTable): Metrics {
  const count = table.records.length;
  let total = 0;
  for (const r of table.records) total += r.squareFootage;
  return {
    count,
    totalSquareFootage: total,
    averageSquareFootage: count > 0 ? total / count : undefined,
  };
}
