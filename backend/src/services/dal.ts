/**
 * services/dal.ts — Data Access Layer
 *
 * The loader reads through PropertySource so the store can be swapped
 * for in-memory rows in tests.
 */
import { sql } from 'drizzle-orm';
import { getDb, type Database } from '../config/database.ts';
import { territoryProperties } from '../db/schema.ts';

export type SourceRow = Record<string, unknown>;

export interface SourceRows {
  /** Column names as the store reports them, including wkt_coordinates */
  columns: string[];
  rows: SourceRow[];
}

export interface PropertySource {
  fetchAll(): Promise<SourceRows>;
}

/**
 * PostGIS-backed source. Selects every column plus the point rendered as WKT,
 * so no binary geometry parsing happens on this side.
 */
export function createDbPropertySource(database: () => Database = getDb): PropertySource {
  return {
    async fetchAll(): Promise<SourceRows> {
      const result = await database().execute<SourceRow>(sql`
        SELECT *, ST_AsText(${territoryProperties.coordinates}) AS wkt_coordinates
        FROM ${territoryProperties}
      `);
      return {
        columns: result.fields.map(f => f.name),
        rows: result.rows,
      };
    },
  };
}

