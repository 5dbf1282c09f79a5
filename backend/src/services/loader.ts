/**
 * services/loader.ts — Property table loading
 *
 * One store query per refresh. Each row is validated, its WKT point decoded,
 * and the result frozen into a PropertyTable. Any bad row fails the whole load.
 */
import { z } from 'zod';
import { childLogger } from '../shared/logger.ts';
import { loadDuration, loadsTotal, loadedProperties } from '../shared/metrics.ts';
import { decodePoint } from './geometry.ts';
import { TtlCache, type Clock } from './cache-service.ts';
import { DataSourceUnavailableError, MalformedRecordError } from './errors.ts';
import type { PropertySource, SourceRows } from './dal.ts';
import { DISPLAY_COLUMNS, type CacheInfo, type LoadResult, type PropertyRecord, type PropertyTable } from '../types.ts';

const log = childLogger({ module: 'loader' });

// ── Row schema ──

const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());
const wholeNonNegative = numeric.pipe(z.number().nonnegative()).transform(Math.trunc);
const text = z.union([z.string(), z.number()]).transform(String);

const PropertyRowSchema = z.object({
  address: z.string().min(1),
  city: z.string().min(1),
  state: text.nullish(),
  zip_code: text.nullish(),
  square_footage: wholeNonNegative,
  clear_height_ft: wholeNonNegative,
  dock_doors: numeric.pipe(z.number().int().nonnegative()).nullish(),
  year_built: numeric.pipe(z.number().int()).nullish(),
  last_sale_price: numeric.nullish(),
  current_lease_rate_psf: numeric.nullish(),
  is_vacant: z.boolean().nullish(),
  wkt_coordinates: z.string().nullish(),
});

type PropertyRow = z.infer<typeof PropertyRowSchema>;

function toRecord(row: PropertyRow): PropertyRecord {
  const { lon, lat } = decodePoint(row.wkt_coordinates);
  return Object.freeze({
    address: row.address,
    city: row.city,
    state: row.state,
    zipCode: row.zip_code,
    squareFootage: row.square_footage,
    clearHeightFt: row.clear_height_ft,
    dockDoors: row.dock_doors,
    yearBuilt: row.year_built,
    lastSalePrice: row.last_sale_price,
    currentLeaseRatePsf: row.current_lease_rate_psf,
    isVacant: row.is_vacant,
    lon,
    lat,
  });
}

/**
 * Build an immutable table from raw store rows. Throws MalformedRecordError,
 * MalformedGeometryError or UnsupportedGeometryTypeError on the first bad row.
 */
export function buildPropertyTable(source: SourceRows, loadedAt = new Date()): PropertyTable {
  const records = source.rows.map((raw, i) => {
    const parsed = PropertyRowSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedRecordError(i, parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }
    return toRecord(parsed.data);
  });

  const present = new Set(source.columns);
  return Object.freeze({
    records: Object.freeze(records),
    columns: Object.freeze(DISPLAY_COLUMNS.filter(c => present.has(c))),
    loadedAt,
  });
}

/**
 * Query the source once and build a table. Store failures become
 * DataSourceUnavailableError; decoding failures propagate as they are.
 */
export async function loadPropertyTable(source: PropertySource): Promise<PropertyTable> {
  const end = loadDuration.startTimer();
  log.info('Loading property data from store');

  let fetched: SourceRows;
  try {
    fetched = await source.fetchAll();
  } catch (err) {
    end({ status: 'error' });
    loadsTotal.inc({ status: 'error' });
    log.error({ err }, 'Property query failed');
    throw new DataSourceUnavailableError(err);
  }

  try {
    const table = buildPropertyTable(fetched);
    const status = table.records.length === 0 ? 'no_data' : 'success';
    end({ status });
    loadsTotal.inc({ status });
    loadedProperties.set(table.records.length);
    if (status === 'no_data') log.warn('No data returned from the database.');
    else log.info({ count: table.records.length }, 'Property data loaded');
    return table;
  } catch (err) {
    end({ status: 'error' });
    loadsTotal.inc({ status: 'error' });
    log.error({ err }, 'Property data failed to decode');
    throw err;
  }
}

export interface PropertyLoaderOptions {
  ttlMs: number;
  now?: Clock;
}

/**
 * Cached loader: at most one store query per TTL window.
 */
export class PropertyLoader {
  private readonly source: PropertySource;
  private readonly cache: TtlCache<PropertyTable>;

  constructor(source: PropertySource, opts: PropertyLoaderOptions) {
    this.source = source;
    this.cache = new TtlCache<PropertyTable>(opts.ttlMs, opts.now);
  }

  async load(): Promise<LoadResult> {
    const { value, hit } = await this.cache.getOrLoad(() => loadPropertyTable(this.source));
    return { table: value, noData: value.records.length === 0, cached: hit };
  }

  invalidate(): void {
    this.cache.invalidate();
  }

  cacheInfo(): CacheInfo {
    const entry = this.cache.peek();
    const now = this.cache.now();
    return {
      hasValue: entry !== null,
      loadedAt: entry ? entry.value.loadedAt.toISOString() : null,
      ageMs: entry ? now - entry.timestamp : null,
      ttlMs: this.cache.ttlMs,
      refreshing: this.cache.refreshing,
    };
  }
}
