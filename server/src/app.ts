// ============================================================
// Shape Scatter - Express App
// ============================================================

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { createScatterRouter, type ScatterRouteDeps } from './routes/scatter';
import progressRouter from './routes/progress';
import exportRouter from './routes/export';
import sessionsRouter from './routes/sessions';

export type AppDependencies = ScatterRouteDeps;

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use('/api/scatter', createScatterRouter(deps));
  app.use('/api/progress', progressRouter);
  app.use('/api/export', exportRouter);
  app.use('/api/sessions', sessionsRouter);

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', shapes: deps.catalogue.size });
  });

  // Malformed JSON bodies and anything else a route throws
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = hasStatus(err) ? err.status : 500;
    const message = err instanceof Error ? err.message : String(err);
    if (status >= 500) {
      console.error('[server] Unhandled error:', message);
    }
    res.status(status).json({ error: message });
  });

  return app;
}

function hasStatus(err: unknown): err is { status: number } {
  return (
    typeof err === 'object' &&
    err !== null &&
    'status' in err &&
    typeof err.status === 'number'
  );
}
