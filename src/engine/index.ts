// ============================================================
// Shape Scatter - Engine Entry
// Re-exports the public API surface of the placement engine.
// ============================================================

// ---- Geometry kernel ----
export {
  boundingBox,
  boxesIntersect,
  centroid,
  pointInPolygon,
  pointToSegmentDistance,
  segmentsIntersect,
  worldOutline,
} from './geometry';

// ---- Overlap oracle ----
export { overlaps, overlapsPlacement, overlapsScene } from './overlap';
export type { PlacedGeometry } from './overlap';

// ---- Placement search ----
export { anchorRange, canvasBounds, tryPlace } from './placement';
export type { Clock, PlacementRequest, SearchContext } from './placement';

// ---- Registry, session, parameters ----
export { SceneRegistry } from './registry';
export { ScatterSession } from './session';
export type { SessionOptions } from './session';
export { normalizeParameters, clamp } from './parameters';
export { createRandom, pick, uniform } from './random';
export type { RandomSource } from './random';
