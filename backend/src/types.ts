// ═══════════════════════════════════════════════════════
// types.ts — Shared domain types for the property pipeline
// ═══════════════════════════════════════════════════════

// ── Geometry ──

export interface GeoPoint {
  lon: number;
  lat: number;
}

// ── Records ──

/** Column names in the order the table view shows them. */
export const DISPLAY_COLUMNS = [
  'address', 'city', 'state', 'zip_code', 'square_footage',
  'clear_height_ft', 'dock_doors', 'year_built',
  'last_sale_price', 'current_lease_rate_psf', 'is_vacant',
] as const;

export type DisplayColumn = typeof DISPLAY_COLUMNS[number];

/**
 * One row of territory_properties. Descriptive columns are optional because
 * the loaded schema may not carry them; nullable ones may be NULL in the store.
 */
export interface PropertyRecord extends GeoPoint {
  address: string;
  city: string;
  state?: string | null;
  zipCode?: string | null;
  squareFootage: number;
  clearHeightFt: number;
  dockDoors?: number | null;
  yearBuilt?: number | null;
  lastSalePrice?: number | null;
  currentLeaseRatePsf?: number | null;
  isVacant?: boolean | null;
}

export interface PropertyTable {
  readonly records: readonly PropertyRecord[];
  /** Display columns present in the loaded schema */
  readonly columns: readonly DisplayColumn[];
  readonly loadedAt: Date;
}

export interface LoadResult {
  table: PropertyTable;
  /** Store returned zero rows (advisory, not an error) */
  noData: boolean;
  /** Served from the TTL cache without querying */
  cached: boolean;
}

// ── Filtering ──

export interface NumericRange {
  min: number;
  max: number;
}

export interface FilterCriteria {
  cities: ReadonlySet<string>;
  squareFootage: NumericRange;
  clearHeights: ReadonlySet<number>;
}

export interface FilterOptions {
  cities: string[];
  squareFootage: (NumericRange & { step: number }) | null;
  clearHeights: number[];
}

// ── Aggregates & views ──

export interface Metrics {
  count: number;
  totalSquareFootage: number;
  /** undefined when count is 0 */
  averageSquareFootage: number | undefined;
}

export interface KpiView {
  totalProperties: number;
  totalSquareFootageMillions: number;
  averageSquareFootage: number | null;
  display: {
    totalProperties: string;
    totalSquareFootage: string;
    averageSquareFootage: string;
  };
}

export interface MapPoint extends GeoPoint {
  city: string;
  squareFootage: number;
  address: string;
  clearHeightFt: number;
}

export type TableCell = string | number | boolean | null;

export interface TableView {
  columns: DisplayColumn[];
  rows: Partial<Record<DisplayColumn, TableCell>>[];
}

export interface CacheInfo {
  hasValue: boolean;
  loadedAt: string | null;
  ageMs: number | null;
  ttlMs: number;
  refreshing: boolean;
}
