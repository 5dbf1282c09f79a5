import type { PropertySource, SourceRow } from '../services/dal.ts';
import { DISPLAY_COLUMNS, type DisplayColumn, type PropertyRecord, type PropertyTable } from '../types.ts';

/** Column list as SELECT *, ST_AsText(...) AS wkt_coordinates reports it. */
export const STORE_COLUMNS = ['id', ...DISPLAY_COLUMNS, 'coordinates', 'wkt_coordinates'];

export function propertyRow(overrides: SourceRow = {}): SourceRow {
  return {
    id: 1,
    address: '100 Test Way',
    city: 'Austin',
    state: 'TX',
    zip_code: '78701',
    square_footage: 100_000,
    clear_height_ft: 32,
    dock_doors: 10,
    year_built: 2001,
    last_sale_price: '1500000.00',
    current_lease_rate_psf: '8.50',
    is_vacant: false,
    wkt_coordinates: 'POINT(-97.7 30.3)',
    ...overrides,
  };
}

export interface FakeSource extends PropertySource {
  calls: number;
  fail: Error | null;
  rows: SourceRow[];
}

/** In-memory stand-in for the PostGIS source; counts queries. */
export function fakeSource(rows: SourceRow[], columns: string[] = STORE_COLUMNS): FakeSource {
  const source: FakeSource = {
    calls: 0,
    fail: null,
    rows,
    async fetchAll() {
      source.calls++;
      if (source.fail) throw source.fail;
      return { columns, rows: source.rows.map(r => ({ ...r })) };
    },
  };
  return source;
}

export function makeRecord(overrides: Partial<PropertyRecord> = {}): PropertyRecord {
  return {
    address: '100 Test Way',
    city: 'Austin',
    squareFootage: 100_000,
    clearHeightFt: 32,
    lon: -97.7,
    lat: 30.3,
    ...overrides,
  };
}

export function makeTable(records: PropertyRecord[], columns: readonly DisplayColumn[] = DISPLAY_COLUMNS): PropertyTable {
  return { records, columns, loadedAt: new Date('2026-01-01T00:00:00Z') };
}
