// ============================================================
// Shape Scatter - Run Parameters
// Defaults and clamping shared by the terminal prompt and the
// HTTP API. Out-of-range values are clamped, never rejected.
// ============================================================

import { PARAMETER_LIMITS } from '@shared/constants';
import type { RunParameters } from '@shared/types';

const { SCALE, SEED, DURATION, TERMINATE_DEFAULT } = PARAMETER_LIMITS;

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Fills in defaults for missing or non-finite values and clamps the rest
 * to their configured ranges. The seed is truncated to an integer.
 */
export function normalizeParameters(raw: Partial<RunParameters> = {}): RunParameters {
  return {
    scale: finiteOr(raw.scale, SCALE.DEFAULT, (v) => clamp(v, SCALE.MIN, SCALE.MAX)),
    seed: finiteOr(raw.seed, SEED.DEFAULT, (v) => clamp(Math.trunc(v), SEED.MIN, SEED.MAX)),
    duration: finiteOr(raw.duration, DURATION.DEFAULT, (v) => clamp(v, DURATION.MIN, DURATION.MAX)),
    terminate: raw.terminate ?? TERMINATE_DEFAULT,
  };
}

function finiteOr(
  value: number | undefined,
  fallback: number,
  normalize: (v: number) => number,
): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return normalize(value);
}
