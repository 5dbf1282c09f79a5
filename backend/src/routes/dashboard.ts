import express, { type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import { buildDashboard } from '../services/dashboard.ts';
import { filterOptions } from '../services/filter.ts';
import type { PropertyLoader } from '../services/loader.ts';
import { DashboardQuerySchema, type DashboardQuery } from '../schemas.ts';

// ── Zod validation middleware ──

function validate<T extends z.ZodType>(schema: T, source: 'query' | 'params' | 'body' = 'query') {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[source]);
    if (!result.success) {
      const errors = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      res.status(400).json({ success: false, error: 'Validation failed', details: errors });
      return;
    }
    res.locals.validated = result.data;
    next();
  };
}

export function createDashboardRouter(loader: PropertyLoader) {
  const router = express.Router();

  /**
   * GET /api/dashboard — KPIs, map points and table for the selected filters
   * Zod-validated: cities, heights, minSqft, maxSqft
   */
  router.get('/dashboard',
    validate(DashboardQuerySchema),
    async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const query: DashboardQuery = res.locals.validated;
        const data = await buildDashboard(loader, query);
        res.json({ success: true, data });
      } catch (err) { next(err); }
    });

  /**
   * GET /api/filters — Available filter options
   */
  router.get('/filters', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const { table, noData } = await loader.load();
      res.json({ success: true, data: filterOptions(table), noData });
    } catch (err) { next(err); }
  });

  return router;
}
