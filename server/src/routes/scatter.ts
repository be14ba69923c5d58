// ============================================================
// POST /api/scatter
// Starts a scatter run in the background and returns its id;
// progress streams from /api/progress/:sessionId
// ============================================================

import { Router } from 'express';
import { z } from 'zod';
import { SURFACE_LIMITS } from '@shared/constants';
import { DEFAULT_CONFIG } from '@shared/types';
import type { Catalogue, ScatterConfig, Surface } from '@shared/types';
import { clamp, normalizeParameters, type Clock } from '../../../src/engine';
import { createRun, startRun } from '../session/manager';

export interface ScatterRouteDeps {
  catalogue: Catalogue;
  config?: Partial<ScatterConfig>;
  clock?: Clock;
}

export const ScatterRequestSchema = z
  .object({
    scale: z.number(),
    seed: z.number(),
    duration: z.number(),
    width: z.number(),
    height: z.number(),
  })
  .partial()
  .strict();

export type ScatterRequest = z.infer<typeof ScatterRequestSchema>;

/** Requested surface, clamped to SURFACE_LIMITS; missing sides fall back to `base`. */
export function resolveSurface(request: ScatterRequest, base: Surface): Surface {
  const side = (value: number | undefined, fallback: number): number =>
    value === undefined
      ? fallback
      : clamp(Math.round(value), SURFACE_LIMITS.MIN_DIMENSION, SURFACE_LIMITS.MAX_DIMENSION);
  return {
    width: side(request.width, base.width),
    height: side(request.height, base.height),
  };
}

export function createScatterRouter(deps: ScatterRouteDeps): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const parsed = ScatterRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
        .join('; ');
      return res.status(400).json({ error: `Invalid scatter request. ${detail}` });
    }

    const { width, height, ...raw } = parsed.data;
    const parameters = normalizeParameters(raw);
    const surface = resolveSurface({ width, height }, deps.config?.surface ?? DEFAULT_CONFIG.surface);

    try {
      const run = createRun({
        catalogue: deps.catalogue,
        parameters,
        config: { ...deps.config, surface },
        clock: deps.clock,
      });
      startRun(run);
      console.log(`[scatter] Started ${run.id} (seed ${parameters.seed}, ${parameters.duration}s)`);
      return res.status(202).json({ sessionId: run.id, parameters, surface });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error('[scatter] Could not start run:', message);
      return res.status(500).json({ error: message });
    }
  });

  return router;
}
