/**
 * db/schema.ts — Drizzle ORM schema definitions
 *
 * Tables:
 *   territory_properties — industrial listings with a PostGIS point
 *
 * The table is populated by an external ingestion job; this service only reads it.
 */
import {
  pgTable, text, varchar, integer, numeric, boolean, bigint,
  index, customType,
} from 'drizzle-orm/pg-core';

/** PostGIS geometry(Point, 4326). Read back as WKT via ST_AsText. */
const geometryPoint = customType<{ data: string; driverData: string }>({
  dataType() {
    return 'geometry(Point, 4326)';
  },
});

export const territoryProperties = pgTable('territory_properties', {
  id: bigint('id', { mode: 'number' }).primaryKey().generatedAlwaysAsIdentity(),
  address: text('address').notNull(),
  city: text('city').notNull(),
  state: varchar('state', { length: 2 }),
  zipCode: varchar('zip_code', { length: 10 }),
  squareFootage: integer('square_footage').notNull(),
  clearHeightFt: integer('clear_height_ft').notNull(),
  dockDoors: integer('dock_doors'),
  yearBuilt: integer('year_built'),
  lastSalePrice: numeric('last_sale_price', { precision: 14, scale: 2 }),
  currentLeaseRatePsf: numeric('current_lease_rate_psf', { precision: 8, scale: 2 }),
  isVacant: boolean('is_vacant'),
  coordinates: geometryPoint('coordinates').notNull(),
}, (table) => ({
  cityIdx: index('idx_territory_city').on(table.city),
  sqftIdx: index('idx_territory_sqft').on(table.squareFootage),
}));
