// ============================================================
// Shape Scatter - Constants
// ============================================================

/** Tolerance for degenerate lengths and orientation tests */
export const EPSILON = 1e-9;

/** Clamping ranges and defaults for the run parameters */
export const PARAMETER_LIMITS = {
  SCALE: { MIN: 1, MAX: 10, DEFAULT: 1 },
  SEED: { MIN: 1, MAX: 99, DEFAULT: 1 },
  DURATION: { MIN: 5, MAX: 30, DEFAULT: 5 },
  TERMINATE_DEFAULT: false,
} as const;

/** Bounds accepted for a server-requested surface */
export const SURFACE_LIMITS = {
  MIN_DIMENSION: 100,
  MAX_DIMENSION: 4096,
} as const;

/** Server defaults */
export const SERVER = {
  DEFAULT_PORT: 3456,
  DEFAULT_SHAPES_FILE: 'shapes.txt',
  SESSION_TTL_MS: 60 * 60 * 1000,
  SESSION_SWEEP_MS: 5 * 60 * 1000,
} as const;
