// ═══════════════════════════════════════════════════════
// views.ts — Display views handed to the renderer
// ═══════════════════════════════════════════════════════
import type {
  DisplayColumn, KpiView, MapPoint, Metrics, PropertyRecord, PropertyTable, TableCell, TableView,
} from '../types.ts';

const intFmt = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** Display column → record field */
const COLUMN_FIELDS: Record<DisplayColumn, keyof PropertyRecord> = {
  address: 'address',
  city: 'city',
  state: 'state',
  zip_code: 'zipCode',
  square_footage: 'squareFootage',
  clear_height_ft: 'clearHeightFt',
  dock_doors: 'dockDoors',
  year_built: 'yearBuilt',
  last_sale_price: 'lastSalePrice',
  current_lease_rate_psf: 'currentLeaseRatePsf',
  is_vacant: 'isVacant',
};

const TIE_PROBE_DIGITS = 20;
const EXACT_TIE = '5' + '0'.repeat(TIE_PROBE_DIGITS - 1);

/**
 * toFixed with exact ties rounded to the even digit (0.125 → "0.12",
 * 2500.5 → "2500"). Values that only look like ties in decimal, such as
 * 1.005, are below the tie in binary and go through toFixed unchanged.
 */
export function toFixedHalfEven(value: number, digits: number): string {
  const expanded = Math.abs(value).toFixed(digits + TIE_PROBE_DIGITS);
  if (!expanded.endsWith(EXACT_TIE)) return value.toFixed(digits);

  const kept = expanded.slice(0, -TIE_PROBE_DIGITS).replace(/\.$/, '');
  if (!/[02468]$/.test(kept)) return value.toFixed(digits);
  return value < 0 ? `-${kept}` : kept;
}

/** Count, total in millions of SF, average; display strings as the dashboard shows them. */
export function buildKpis(metrics: Metrics): KpiView {
  const millions = metrics.totalSquareFootage / 1_000_000;
  const average = metrics.averageSquareFootage ?? null;
  return {
    totalProperties: metrics.count,
    totalSquareFootageMillions: millions,
    averageSquareFootage: average,
    display: {
      totalProperties: intFmt.format(metrics.count),
      totalSquareFootage: `${toFixedHalfEven(millions, 2)} M SF`,
      averageSquareFootage: average === null ? 'N/A' : intFmt.format(Number(toFixedHalfEven(average, 0))),
    },
  };
}

export function buildMapPoints(table: PropertyTable): MapPoint[] {
  return table.records.map(r => ({
    lon: r.lon,
    lat: r.lat,
    city: r.city,
    squareFootage: r.squareFootage,
    address: r.address,
    clearHeightFt: r.clearHeightFt,
  }));
}

/**
 * Rows limited to the display allow-list. Columns the loaded schema
 * doesn't have are left out rather than reported.
 */
export function buildTableView(table: PropertyTable): TableView {
  const columns = [...table.columns];
  const rows = table.records.map(r => {
    const row: Partial<Record<DisplayColumn, TableCell>> = {};
    for (const col of columns) {
      const value: TableCell | undefined = r[COLUMN_FIELDS[col]];
      row[col] = value ?? null;
    }
    return row;
  });
  return { columns, rows };
}
