// ═══════════════════════════════════════════════════════
// filter.ts — Filter engine (pure)
// ═══════════════════════════════════════════════════════
import type { FilterCriteria, FilterOptions, PropertyRecord, PropertyTable } from '../types.ts';

/** Square-footage slider increment */
export const SQFT_STEP = 10_000;

function matches(record: PropertyRecord, criteria: FilterCriteria): boolean {
  return criteria.cities.has(record.city)
    && record.squareFootage >= criteria.squareFootage.min
    && record.squareFootage <= criteria.squareFootage.max
    && criteria.clearHeights.has(record.clearHeightFt);
}

/**
 * Keep records matching every criterion, in their original order.
 * An empty city or height selection keeps nothing; it does not mean "all".
 */
export function applyFilters(table: PropertyTable, criteria: FilterCriteria): PropertyTable {
  return Object.freeze({
    records: Object.freeze(table.records.filter(r => matches(r, criteria))),
    columns: table.columns,
    loadedAt: table.loadedAt,
  });
}

/** Distinct sorted cities, square-footage bounds and distinct sorted heights. */
export function filterOptions(table: PropertyTable): FilterOptions {
  const { records } = table;
  const cities = [...new Set(records.map(r => r.city))].sort();
  const clearHeights = [...new Set(records.map(r => r.clearHeightFt))].sort((a, b) => a - b);

  if (records.length === 0) return { cities, squareFootage: null, clearHeights };

  let min = Infinity, max = -Infinity;
  for (const r of records) {
    if (r.squareFootage < min) min = r.squareFootage;
    if (r.squareFootage > max) max = r.squareFootage;
  }
  return { cities, squareFootage: { min, max, step: SQFT_STEP }, clearHeights };
}

/** Everything selected: the starting state of the filter controls. */
export function defaultCriteria(table: PropertyTable): FilterCriteria {
  const opts = filterOptions(table);
  return {
    cities: new Set(opts.cities),
    squareFootage: opts.squareFootage
      ? { min: opts.squareFootage.min, max: opts.squareFootage.max }
      : { min: 0, max: 0 },
    clearHeights: new Set(opts.clearHeights),
  };
}
