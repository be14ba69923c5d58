// ============================================================
// Shape Scatter - Shared Type Definitions
// Core types used across the engine, renderer, CLI and server
// ============================================================

/** A point in the plane (template or world space) */
export interface Point {
  x: number;
  y: number;
}

/**
 * Immutable polygon template in local (unscaled, untranslated) coordinates.
 * Closed implicitly: the last vertex connects back to the first.
 */
export type Outline = readonly Point[];

/** Axis-aligned box in world space */
export interface Bounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/** Fill colors a placement can carry */
export type ShapeColor =
  | 'red'
  | 'blue'
  | 'green'
  | 'yellow'
  | 'purple'
  | 'orange'
  | 'white';

/** Shape name -> outline, as loaded from the catalogue file */
export type Catalogue = ReadonlyMap<string, Outline>;

/** One committed shape instance on the canvas */
export interface Placement {
  /** 1-based order of commitment within its scene */
  id: number;
  /** Catalogue name of the template */
  shape: string;
  /** World-space translation applied after scaling */
  anchor: Point;
  /** Shared reference to the catalogue outline */
  outline: Outline;
  scale: number;
  color: ShapeColor;
}

/** Why a placement search gave up */
export type RejectionReason = 'deadline' | 'exhausted';

export type PlacementOutcome =
  | { status: 'placed'; placement: Placement; attempts: number }
  | { status: 'rejected'; reason: RejectionReason; attempts: number };

/** Raster surface the scene is drawn on */
export interface Surface {
  width: number;
  height: number;
}

/** User-facing run parameters (after clamping) */
export interface RunParameters {
  scale: number;
  seed: number;
  /** Session length in seconds */
  duration: number;
  /** Exit right after the run instead of keeping the scene on display */
  terminate: boolean;
}

/** Engine and surface configuration */
export interface ScatterConfig {
  surface: Surface;
  /** Fraction of the surface half-extent used as the sampling domain */
  span: number;
  /** Inset applied to the canvas bounds before sampling anchors */
  margin: number;
  /** Minimum clearance between any two placed shapes */
  buffer: number;
  /** Attempt ceiling for one placement search */
  maxAttempts: number;
  colors: readonly ShapeColor[];
  background: string;
}

/** Aggregate result of one session run */
export interface SessionResult {
  /** Epoch milliseconds */
  startedAt: number;
  endedAt: number;
  placements: readonly Placement[];
  /** Candidate positions tried across all searches */
  attempts: number;
  rejections: number;
}

/** Events streamed to SSE listeners while a server session runs */
export type ProgressEvent =
  | { type: 'placed'; sessionId: string; placement: Placement; count: number }
  | { type: 'rejected'; sessionId: string; shape: string; reason: RejectionReason }
  | { type: 'complete'; sessionId: string; count: number; summary: string }
  | { type: 'error'; sessionId: string; error: string };

export const DEFAULT_CONFIG: ScatterConfig = {
  surface: { width: 1280, height: 800 },
  span: 0.8,
  margin: 50,
  buffer: 3.5,
  maxAttempts: 10_000,
  colors: ['red', 'blue', 'green', 'yellow', 'purple', 'orange', 'white'],
  background: '#000000',
};
