/**
 * routes/health.ts — Health check endpoints
 *
 * GET /api/health         — Quick liveness check
 * GET /api/health/ready   — Readiness check (store ping + property cache)
 */
import { Router, type Request, type Response } from 'express';
import type { PropertyLoader } from '../services/loader.ts';

interface Check {
  status: 'ok' | 'error' | 'empty';
  latencyMs?: number;
  error?: string;
  details?: unknown;
}

export interface HealthDeps {
  loader: PropertyLoader;
  /** Resolves with round-trip latency in ms */
  pingStore: () => Promise<number>;
}

export function createHealthRouter({ loader, pingStore }: HealthDeps) {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      version: process.env.npm_package_version || '1.0.0',
    });
  });

  router.get('/ready', async (_req: Request, res: Response) => {
    const checks: Record<string, Check> = {};

    try {
      checks.database = { status: 'ok', latencyMs: await pingStore() };
    } catch (err) {
      checks.database = { status: 'error', error: err instanceof Error ? err.message : String(err) };
    }

    const cache = loader.cacheInfo();
    checks.cache = { status: cache.hasValue ? 'ok' : 'empty', details: cache };

    const mem = process.memoryUsage();
    checks.memory = {
      status: 'ok',
      details: {
        heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
        rssMB: Math.round(mem.rss / 1024 / 1024),
      },
    };

    const hasError = Object.values(checks).some(c => c.status === 'error');
    res.status(hasError ? 503 : 200).json({
      status: hasError ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      checks,
    });
  });

  return router;
}
