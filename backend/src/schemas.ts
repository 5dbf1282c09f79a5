// ═══════════════════════════════════════════════════════
// Zod Schemas — Input validation for the API endpoints
// ═══════════════════════════════════════════════════════
import { z } from 'zod';

/**
 * A list parameter given as repeated keys (?cities=A&cities=B) or a comma
 * list (?cities=A,B). Absent → undefined (use the default);
 * present but blank (?cities=) → [] (an empty selection).
 */
const listParam = z.union([z.string(), z.array(z.string())])
  .optional()
  .transform(v => v === undefined
    ? undefined
    : (Array.isArray(v) ? v : [v]).flatMap(s => s.split(',')).map(s => s.trim()).filter(Boolean));

const intListParam = listParam.pipe(z.array(z.coerce.number().int().nonnegative()).optional());

/** Blank (?maxSqft=) counts as absent, so the slider bound falls back to the data's. */
const sqftParam = z.preprocess(
  v => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.coerce.number().int().nonnegative().optional(),
);

// ── GET /api/dashboard ──

export const DashboardQuerySchema = z.object({
  cities: listParam,
  heights: intListParam,
  minSqft: sqftParam,
  maxSqft: sqftParam,
});

export type DashboardQuery = z.infer<typeof DashboardQuerySchema>;
