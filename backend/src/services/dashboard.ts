/**
 * services/dashboard.ts — One render cycle of the dashboard
 *
 * load → filter → summarize → views. Load errors propagate untouched so the
 * HTTP layer can turn them into a single user-visible message.
 */
import { applyFilters, defaultCriteria, filterOptions } from './filter.ts';
import { summarize } from './aggregator.ts';
import { buildKpis, buildMapPoints, buildTableView } from './views.ts';
import type { PropertyLoader } from './loader.ts';
import type { DashboardQuery } from '../schemas.ts';
import type { FilterCriteria, FilterOptions, KpiView, MapPoint, PropertyTable, TableView } from '../types.ts';

export const NO_DATA_WARNING = 'No data to display.';
export const NO_MATCH_WARNING = 'No properties match the selected filters.';

export interface DashboardData {
  kpis: KpiView;
  map: MapPoint[];
  table: TableView;
  filters: FilterOptions;
  criteria: {
    cities: string[];
    squareFootage: { min: number; max: number };
    clearHeights: number[];
  };
  warnings: string[];
  loadedAt: string;
}

/** Fill unspecified query parameters from the everything-selected defaults. */
export function resolveCriteria(query: DashboardQuery, table: PropertyTable): FilterCriteria {
  const defaults = defaultCriteria(table);
  return {
    cities: query.cities ? new Set(query.cities) : defaults.cities,
    squareFootage: {
      min: query.minSqft ?? defaults.squareFootage.min,
      max: query.maxSqft ?? defaults.squareFootage.max,
    },
    clearHeights: query.heights ? new Set(query.heights) : defaults.clearHeights,
  };
}

export async function buildDashboard(loader: PropertyLoader, query: DashboardQuery): Promise<DashboardData> {
  const { table, noData } = await loader.load();
  const criteria = resolveCriteria(query, table);
  const filtered = applyFilters(table, criteria);

  const warnings: string[] = [];
  if (noData) warnings.push(NO_DATA_WARNING);
  else if (filtered.records.length === 0) warnings.push(NO_MATCH_WARNING);

  return {
    kpis: buildKpis(summarize(filtered)),
    map: buildMapPoints(filtered),
    table: buildTableView(filtered),
    filters: filterOptions(table),
    criteria: {
      cities: [...criteria.cities],
      squareFootage: criteria.squareFootage,
      clearHeights: [...criteria.clearHeights],
    },
    warnings,
    loadedAt: table.loadedAt.toISOString(),
  };
}
