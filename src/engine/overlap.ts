// ============================================================
// Shape Scatter - Overlap Oracle
// Decides whether a candidate placement touches, overlaps or
// nests with already placed shapes.
//
// Two independent passes per existing shape:
//   1. containment   - always run, never gated by the box test
//   2. exact checks  - vertex/edge proximity and buffered edge
//                      intersection, only when buffered boxes meet
// ============================================================

import { DEFAULT_CONFIG } from '@shared/types';
import type { Bounds, Placement, Point } from '@shared/types';
import {
  boundingBox,
  boxesIntersect,
  centroid,
  edges,
  pointInBox,
  pointInPolygon,
  pointToSegmentDistance,
  segmentsIntersect,
  worldOutline,
} from './geometry';
import type { SceneRegistry } from './registry';

/** The geometric part of a placement: enough to test for overlap. */
export type PlacedGeometry = Pick<Placement, 'anchor' | 'outline' | 'scale'>;

/** World-space data derived from a placement, independent of the buffer. */
interface ShapeGeometry {
  vertices: Point[];
  centroid: Point;
  box: Bounds;
}

// Committed placements are frozen, so their derived geometry can be reused
// across every later search.
const geometryCache = new WeakMap<PlacedGeometry, ShapeGeometry>();

// ------------------------------------------------------------------
// Public API
// ------------------------------------------------------------------

/**
 * Whether `candidate` violates the clearance `buffer` against one existing
 * shape. Symmetric in its two placement arguments.
 */
export function overlapsPlacement(
  candidate: PlacedGeometry,
  existing: PlacedGeometry,
  buffer: number = DEFAULT_CONFIG.buffer,
): boolean {
  const a = geometryOf(candidate);
  const b = geometryOf(existing);

  if (nests(a, b)) return true;
  if (!boxesIntersect(grow(a.box, buffer), grow(b.box, buffer))) return false;
  return violatesClearance(a, b, buffer);
}

/**
 * Whether `candidate` overlaps any shape in `others`. Containment is
 * checked against every entry before any box-gated exact test runs.
 */
export function overlaps(
  candidate: PlacedGeometry,
  others: readonly PlacedGeometry[],
  buffer: number = DEFAULT_CONFIG.buffer,
): boolean {
  const a = geometryOf(candidate);
  const existing = others.map(geometryOf);

  if (existing.some((b) => nests(a, b))) return true;

  const box = grow(a.box, buffer);
  return existing.some(
    (b) => boxesIntersect(box, grow(b.box, buffer)) && violatesClearance(a, b, buffer),
  );
}

/**
 * Registry-backed variant of `overlaps`: containment still visits every
 * committed placement, while the exact checks only visit the shortlist
 * returned by the registry's spatial index.
 */
export function overlapsScene(
  candidate: PlacedGeometry,
  registry: SceneRegistry,
  buffer: number = DEFAULT_CONFIG.buffer,
): boolean {
  const a = geometryOf(candidate);

  for (const placement of registry.all()) {
    if (nests(a, geometryOf(placement))) return true;
  }

  // Both boxes grow by `buffer`, so the query box grows by twice that.
  const shortlist = registry.search(grow(a.box, buffer * 2));
  return shortlist.some((placement) => violatesClearance(a, geometryOf(placement), buffer));
}

// ------------------------------------------------------------------
// Passes
// ------------------------------------------------------------------

/** Either centroid lies inside the other's unbuffered polygon. */
function nests(a: ShapeGeometry, b: ShapeGeometry): boolean {
  return containsCentroid(b, a.centroid) || containsCentroid(a, b.centroid);
}

function containsCentroid(shape: ShapeGeometry, point: Point): boolean {
  return pointInBox(point, shape.box) && pointInPolygon(point, shape.vertices);
}

function violatesClearance(a: ShapeGeometry, b: ShapeGeometry, buffer: number): boolean {
  return (
    verticesNearEdges(a.vertices, b.vertices, buffer) ||
    verticesNearEdges(b.vertices, a.vertices, buffer) ||
    edgesCross(a.vertices, b.vertices, buffer)
  );
}

/**
 * Any vertex of `points` closer than `buffer` to an edge of `polygon`.
 * An edge's distance never exceeds its endpoints' distance, so this also
 * covers vertex-to-vertex proximity.
 */
function verticesNearEdges(
  points: readonly Point[],
  polygon: readonly Point[],
  buffer: number,
): boolean {
  const polygonEdges = edges(polygon);
  return points.some((p) =>
    polygonEdges.some(([start, end]) => pointToSegmentDistance(p, start, end) < buffer),
  );
}

function edgesCross(a: readonly Point[], b: readonly Point[], buffer: number): boolean {
  const bEdges = edges(b);
  return edges(a).some(([p, q]) =>
    bEdges.some(([r, s]) => segmentsIntersect(p, q, r, s, buffer)),
  );
}

// ------------------------------------------------------------------
// Internal helpers
// ------------------------------------------------------------------

function geometryOf(shape: PlacedGeometry): ShapeGeometry {
  const cached = geometryCache.get(shape);
  if (cached) return cached;

  const vertices = worldOutline(shape.outline, shape.anchor, shape.scale);
  const geometry: ShapeGeometry = {
    vertices,
    centroid: centroid(vertices),
    box: boundingBox(shape.outline, shape.anchor, shape.scale),
  };

  if (Object.isFrozen(shape)) {
    geometryCache.set(shape, geometry);
  }
  return geometry;
}

function grow(box: Bounds, by: number): Bounds {
  return {
    minX: box.minX - by,
    maxX: box.maxX + by,
    minY: box.minY - by,
    maxY: box.maxY + by,
  };
}
