import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../app.ts';
import { PropertyLoader } from '../services/loader.ts';
import { NO_DATA_WARNING, NO_MATCH_WARNING } from '../services/dashboard.ts';
import { DISPLAY_COLUMNS } from '../types.ts';
import { fakeSource, propertyRow, type FakeSource } from './helpers.ts';

const ROWS = [
  propertyRow({ id: 1, address: '1 Alpha Rd', city: 'Austin', square_footage: 50_000, clear_height_ft: 24, wkt_coordinates: 'POINT(-97.7 30.3)' }),
  propertyRow({ id: 2, address: '2 Bravo St', city: 'Austin', square_footage: 120_000, clear_height_ft: 32, wkt_coordinates: 'POINT(-97.6 30.4)' }),
  propertyRow({ id: 3, address: '3 Charlie Ave', city: 'San Marcos', square_footage: 200_000, clear_height_ft: 32, wkt_coordinates: 'POINT(-97.9 29.9)' }),
  propertyRow({ id: 4, address: '4 Delta Blvd', city: 'Round Rock', square_footage: 80_000, clear_height_ft: 28, wkt_coordinates: 'POINT(-97.68 30.51)' }),
];

function appFor(source: FakeSource, pingStore: () => Promise<number> = async () => 3) {
  const loader = new PropertyLoader(source, { ttlMs: 600_000 });
  return createApp({ loader, pingStore });
}

const addresses = (rows: Array<{ address?: unknown }>) => rows.map(r => r.address);

describe('GET /api/dashboard', () => {
  it('selects everything by default', async () => {
    const res = await request(appFor(fakeSource(ROWS))).get('/api/dashboard');

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    const { data } = res.body;
    expect(data.kpis).toEqual({
      totalProperties: 4,
      totalSquareFootageMillions: 0.45,
      averageSquareFootage: 112_500,
      display: { totalProperties: '4', totalSquareFootage: '0.45 M SF', averageSquareFootage: '112,500' },
    });
    expect(data.filters).toEqual({
      cities: ['Austin', 'Round Rock', 'San Marcos'],
      squareFootage: { min: 50_000, max: 200_000, step: 10_000 },
      clearHeights: [24, 28, 32],
    });
    expect(data.criteria).toEqual({
      cities: ['Austin', 'Round Rock', 'San Marcos'],
      squareFootage: { min: 50_000, max: 200_000 },
      clearHeights: [24, 28, 32],
    });
    expect(data.table.columns).toEqual([...DISPLAY_COLUMNS]);
    expect(addresses(data.table.rows)).toEqual(['1 Alpha Rd', '2 Bravo St', '3 Charlie Ave', '4 Delta Blvd']);
    expect(data.map).toHaveLength(4);
    expect(data.warnings).toEqual([]);
  });

  it('filters by city and clear height', async () => {
    const res = await request(appFor(fakeSource(ROWS))).get('/api/dashboard?cities=Austin&heights=32');

    expect(res.status).toBe(200);
    expect(res.body.data.map).toEqual([
      { lon: -97.6, lat: 30.4, city: 'Austin', squareFootage: 120_000, address: '2 Bravo St', clearHeightFt: 32 },
    ]);
    expect(res.body.data.kpis.totalProperties).toBe(1);
  });

  it('accepts comma lists and square-footage bounds', async () => {
    const res = await request(appFor(fakeSource(ROWS)))
      .get('/api/dashboard')
      .query({ cities: 'Austin,San Marcos', minSqft: 100_000, maxSqft: 200_000 });

    expect(res.status).toBe(200);
    expect(addresses(res.body.data.table.rows)).toEqual(['2 Bravo St', '3 Charlie Ave']);
  });

  it('accepts repeated list parameters', async () => {
    const res = await request(appFor(fakeSource(ROWS))).get('/api/dashboard?cities=Austin&cities=Round%20Rock');

    expect(addresses(res.body.data.table.rows)).toEqual(['1 Alpha Rd', '2 Bravo St', '4 Delta Blvd']);
  });

  it('shows nothing for an empty city selection', async () => {
    const res = await request(appFor(fakeSource(ROWS))).get('/api/dashboard?cities=');

    expect(res.status).toBe(200);
    const { data } = res.body;
    expect(data.table.rows).toEqual([]);
    expect(data.map).toEqual([]);
    expect(data.kpis.averageSquareFootage).toBeNull();
    expect(data.kpis.display.averageSquareFootage).toBe('N/A');
    expect(data.warnings).toEqual([NO_MATCH_WARNING]);
  });

  it('treats blank square-footage bounds as absent', async () => {
    const res = await request(appFor(fakeSource(ROWS))).get('/api/dashboard?minSqft=&maxSqft=');

    expect(res.status).toBe(200);
    const { data } = res.body;
    expect(data.criteria.squareFootage).toEqual({ min: 50_000, max: 200_000 });
    expect(data.kpis.totalProperties).toBe(4);
    expect(data.warnings).toEqual([]);
  });

  it('keeps a given bound when the other is blank', async () => {
    const res = await request(appFor(fakeSource(ROWS))).get('/api/dashboard?minSqft=100000&maxSqft=');

    expect(res.status).toBe(200);
    expect(res.body.data.criteria.squareFootage).toEqual({ min: 100_000, max: 200_000 });
    expect(addresses(res.body.data.table.rows)).toEqual(['2 Bravo St', '3 Charlie Ave']);
  });

  it('returns 400 on invalid parameters', async () => {
    const res = await request(appFor(fakeSource(ROWS))).get('/api/dashboard?minSqft=abc');

    expect(res.status).toBe(400);
    expect(res.body.success).toBe(false);
    expect(res.body.error).toBe('Validation failed');
  });

  it('warns when the store is empty', async () => {
    const res = await request(appFor(fakeSource([]))).get('/api/dashboard');

    expect(res.status).toBe(200);
    expect(res.body.data.warnings).toEqual([NO_DATA_WARNING]);
    expect(res.body.data.filters.squareFootage).toBeNull();
    expect(res.body.data.kpis.totalProperties).toBe(0);
  });

  it('reports an unavailable store as 503 with one message', async () => {
    const source = fakeSource(ROWS);
    source.fail = new Error('connect ECONNREFUSED');
    const res = await request(appFor(source)).get('/api/dashboard');

    expect(res.status).toBe(503);
    expect(res.body).toEqual({
      success: false,
      code: 'DATA_SOURCE_UNAVAILABLE',
      error: 'An error occurred while loading or processing data: Data source unavailable: connect ECONNREFUSED',
    });
  });

  it('reports undecodable geometry as 502', async () => {
    const source = fakeSource([...ROWS, propertyRow({ wkt_coordinates: 'LINESTRING(0 0, 1 1)' })]);
    const res = await request(appFor(source)).get('/api/dashboard');

    expect(res.status).toBe(502);
    expect(res.body.code).toBe('UNSUPPORTED_GEOMETRY_TYPE');
  });

  it('queries the store once across requests within the TTL', async () => {
    const source = fakeSource(ROWS);
    const app = appFor(source);

    await request(app).get('/api/dashboard');
    await request(app).get('/api/dashboard?cities=Austin');
    await request(app).get('/api/filters');
    expect(source.calls).toBe(1);
  });
});

describe('GET /api/filters', () => {
  it('returns the filter options', async () => {
    const res = await request(appFor(fakeSource(ROWS))).get('/api/filters');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: true,
      noData: false,
      data: {
        cities: ['Austin', 'Round Rock', 'San Marcos'],
        squareFootage: { min: 50_000, max: 200_000, step: 10_000 },
        clearHeights: [24, 28, 32],
      },
    });
  });
});

describe('health', () => {
  it('GET /api/health is alive', async () => {
    const res = await request(appFor(fakeSource(ROWS))).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('GET /api/health/ready reports store latency and cache state', async () => {
    const res = await request(appFor(fakeSource(ROWS))).get('/api/health/ready');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.checks.database).toEqual({ status: 'ok', latencyMs: 3 });
    expect(res.body.checks.cache.status).toBe('empty');
  });

  it('GET /api/health/ready is degraded when the store is down', async () => {
    const app = appFor(fakeSource(ROWS), async () => { throw new Error('connection refused'); });
    const res = await request(app).get('/api/health/ready');

    expect(res.status).toBe(503);
    expect(res.body.status).toBe('degraded');
    expect(res.body.checks.database).toEqual({ status: 'error', error: 'connection refused' });
  });
});

describe('unknown routes', () => {
  it('returns 404 JSON under the API base', async () => {
    const res = await request(appFor(fakeSource(ROWS))).get('/api/nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, error: 'Not found' });
  });
});
