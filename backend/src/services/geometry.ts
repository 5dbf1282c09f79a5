// ═══════════════════════════════════════════════════════
// geometry.ts — WKT point decoding (pure, zero dependencies)
// ═══════════════════════════════════════════════════════
import type { GeoPoint } from '../types.ts';
import { MalformedGeometryError, UnsupportedGeometryTypeError } from './errors.ts';

/** WKT geometry keywords other than POINT */
const OTHER_WKT_TYPES = new Set([
  'LINESTRING', 'POLYGON', 'MULTIPOINT', 'MULTILINESTRING', 'MULTIPOLYGON',
  'GEOMETRYCOLLECTION', 'CIRCULARSTRING', 'COMPOUNDCURVE', 'CURVEPOLYGON',
  'MULTICURVE', 'MULTISURFACE', 'CURVE', 'SURFACE', 'POLYHEDRALSURFACE',
  'TIN', 'TRIANGLE',
]);

const KEYWORD_RE = /^([A-Za-z]+)/;
const POINT_RE = /^POINT\s*\(\s*([^()]*?)\s*\)$/i;
const NUMBER_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

function parseCoordinate(input: string, token: string): number {
  if (!NUMBER_RE.test(token)) {
    throw new MalformedGeometryError(input, `non-numeric coordinate "${token}"`);
  }
  const value = Number(token);
  if (!Number.isFinite(value)) {
    throw new MalformedGeometryError(input, `coordinate "${token}" is not finite`);
  }
  return value;
}

/**
 * Decode "POINT(x y)" into { lon: x, lat: y }.
 * Throws UnsupportedGeometryTypeError for other WKT types and
 * MalformedGeometryError for anything else that doesn't fit the grammar.
 */
export function decodePoint(wkt: string | null | undefined): GeoPoint {
  const text = wkt?.trim();
  if (!text) throw new MalformedGeometryError(wkt, 'empty geometry text');

  const keyword = KEYWORD_RE.exec(text)?.[1]?.toUpperCase();
  if (!keyword) throw new MalformedGeometryError(text, 'missing geometry type');
  if (keyword !== 'POINT') {
    if (OTHER_WKT_TYPES.has(keyword)) throw new UnsupportedGeometryTypeError(keyword);
    throw new MalformedGeometryError(text, `unknown geometry type ${keyword}`);
  }

  const body = POINT_RE.exec(text)?.[1];
  if (body === undefined) throw new MalformedGeometryError(text, 'expected POINT(x y)');

  const tokens = body.split(/\s+/).filter(Boolean);
  const [x, y] = tokens;
  if (tokens.length !== 2 || x === undefined || y === undefined) {
    throw new MalformedGeometryError(text, `expected 2 coordinates, got ${tokens.length}`);
  }

  return {
    lon: parseCoordinate(text, x),
    lat: parseCoordinate(text, y),
  };
}

function formatCoordinate(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

/** Inverse of decodePoint */
export function encodePoint(point: GeoPoint): string {
  return `POINT(${formatCoordinate(point.lon)} ${formatCoordinate(point.lat)})`;
}
