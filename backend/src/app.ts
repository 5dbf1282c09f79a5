/**
 * app.ts — Express application factory
 *
 * server.ts wires the PostGIS source and listens; tests mount the app
 * with an in-memory property source.
 */
import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import compression from 'compression';
import { env } from './config/env.ts';
import { captureException } from './config/sentry.ts';
import { logger, requestLogger } from './shared/logger.ts';
import { metricsMiddleware, metricsEndpoint } from './shared/metrics.ts';
import { createDashboardRouter } from './routes/dashboard.ts';
import { createHealthRouter } from './routes/health.ts';
import { PipelineError } from './services/errors.ts';
import type { PropertyLoader } from './services/loader.ts';

export const LOAD_ERROR_PREFIX = 'An error occurred while loading or processing data';

export interface AppDeps {
  loader: PropertyLoader;
  pingStore: () => Promise<number>;
}

export function createApp({ loader, pingStore }: AppDeps) {
  const app = express();
  app.set('trust proxy', 1);

  // ─── Security & Performance ───

  const allowedOrigins = env.ALLOWED_ORIGINS
    ? env.ALLOWED_ORIGINS.split(',').map(s => s.trim()).filter(Boolean)
    : [];

  app.use(cors({ origin: allowedOrigins.length === 0 ? true : allowedOrigins }));
  app.use(compression({ threshold: 1024 }));
  app.use(metricsMiddleware());
  app.use(requestLogger());

  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (env.NODE_ENV === 'production') {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  // ─── API Routes ───

  app.get(`${env.API_BASE}/metrics`, metricsEndpoint);
  app.use(`${env.API_BASE}/health`, createHealthRouter({ loader, pingStore }));
  app.use(env.API_BASE, createDashboardRouter(loader));

  app.use(env.API_BASE, (_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  // ─── Errors ───

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const log = req.log ?? logger;
    if (err instanceof PipelineError) {
      log.error({ err, code: err.code }, 'Property pipeline failed');
      captureException(err, { code: err.code });
      res.status(err.status).json({
        success: false,
        code: err.code,
        error: `${LOAD_ERROR_PREFIX}: ${err.message}`,
      });
      return;
    }
    log.error({ err }, 'Unhandled error');
    captureException(err);
    res.status(500).json({ success: false, code: 'INTERNAL', error: 'Internal server error' });
  });

  return app;
}
