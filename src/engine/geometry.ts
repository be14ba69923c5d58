// ============================================================
// Shape Scatter - Geometry Kernel
// Pure predicates on points, segments and polygons. No shared
// state: every function depends only on its arguments.
// ============================================================

import { EPSILON } from '@shared/constants';
import type { Bounds, Outline, Point } from '@shared/types';

type Orientation = -1 | 0 | 1;

// ------------------------------------------------------------------
// Transforms and boxes
// ------------------------------------------------------------------

/** World-space vertices: `anchor + scale * outline[i]`. */
export function worldOutline(outline: Outline, anchor: Point, scale: number): Point[] {
  return outline.map((p) => ({
    x: anchor.x + p.x * scale,
    y: anchor.y + p.y * scale,
  }));
}

/**
 * World-space axis-aligned box of the scaled and translated outline,
 * grown by `buffer` on every side.
 */
export function boundingBox(
  outline: Outline,
  anchor: Point,
  scale: number,
  buffer: number = 0,
): Bounds {
  let minX = Infinity;
  let maxX = -Infinity;
  let minY = Infinity;
  let maxY = -Infinity;

  for (const p of outline) {
    const x = anchor.x + p.x * scale;
    const y = anchor.y + p.y * scale;
    minX = Math.min(minX, x);
    maxX = Math.max(maxX, x);
    minY = Math.min(minY, y);
    maxY = Math.max(maxY, y);
  }

  return {
    minX: minX - buffer,
    maxX: maxX + buffer,
    minY: minY - buffer,
    maxY: maxY + buffer,
  };
}

/** Closed-interval overlap on both axes (touching boxes intersect). */
export function boxesIntersect(a: Bounds, b: Bounds): boolean {
  return a.minX <= b.maxX && b.minX <= a.maxX && a.minY <= b.maxY && b.minY <= a.maxY;
}

export function pointInBox(p: Point, box: Bounds): boolean {
  return p.x >= box.minX && p.x <= box.maxX && p.y >= box.minY && p.y <= box.maxY;
}

// ------------------------------------------------------------------
// Segments
// ------------------------------------------------------------------

/**
 * Sign of the cross product (b - a) x (c - a): 1 when c lies to the left
 * of a->b, -1 to the right, 0 when the three points are colinear.
 */
export function orientation(a: Point, b: Point, c: Point): Orientation {
  const cross = (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);
  if (Math.abs(cross) < EPSILON) return 0;
  return cross > 0 ? 1 : -1;
}

/**
 * Whether segment a-b intersects segment c-d once each has been extended
 * by `buffer` along its own direction at both ends. Segments that miss
 * each other by less than the buffer along their lines register as
 * intersecting; touching counts as intersecting.
 *
 * Colinear segments intersect when the gap between them along their
 * shared line is at most `buffer`. A near-zero-length segment stands for a
 * square of half-size `buffer` around its point.
 */
export function segmentsIntersect(
  a: Point,
  b: Point,
  c: Point,
  d: Point,
  buffer: number,
): boolean {
  const half = Math.max(buffer, EPSILON);
  const abDegenerate = isDegenerate(a, b);
  const cdDegenerate = isDegenerate(c, d);

  if (abDegenerate && cdDegenerate) {
    return pointInBox(c, squareAround(a, half));
  }
  if (abDegenerate) {
    return segmentTouchesBox(c, d, squareAround(a, half));
  }
  if (cdDegenerate) {
    return segmentTouchesBox(a, b, squareAround(c, half));
  }

  const [a2, b2] = extendSegment(a, b, buffer);

  // Only one side is extended here: extending both would let colinear
  // segments reach each other across twice the buffer.
  if (
    orientation(a, b, c) === 0 &&
    orientation(a, b, d) === 0 &&
    orientation(c, d, a) === 0 &&
    orientation(c, d, b) === 0
  ) {
    return intervalsOverlap(a2.x, b2.x, c.x, d.x) && intervalsOverlap(a2.y, b2.y, c.y, d.y);
  }

  const [c2, d2] = extendSegment(c, d, buffer);
  return segmentsCross(a2, b2, c2, d2);
}

/**
 * Euclidean distance from `point` to the closest point of the finite
 * segment start-end. The projection parameter is clamped to [0, 1].
 */
export function pointToSegmentDistance(point: Point, start: Point, end: Point): number {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const lengthSq = dx * dx + dy * dy;

  if (lengthSq < EPSILON) {
    return Math.hypot(point.x - start.x, point.y - start.y);
  }

  const t = Math.max(0, Math.min(1, ((point.x - start.x) * dx + (point.y - start.y) * dy) / lengthSq));
  return Math.hypot(point.x - (start.x + t * dx), point.y - (start.y + t * dy));
}

/** Consecutive vertex pairs, including the closing edge last -> first. */
export function edges(polygon: readonly Point[]): Array<[Point, Point]> {
  const out: Array<[Point, Point]> = [];
  for (let i = 0; i < polygon.length; i++) {
    out.push([polygon[i], polygon[(i + 1) % polygon.length]]);
  }
  return out;
}

// ------------------------------------------------------------------
// Polygons
// ------------------------------------------------------------------

/**
 * Even-odd ray casting: a horizontal ray from `point` towards +x crosses
 * the boundary an odd number of times when the point is inside.
 */
export function pointInPolygon(point: Point, polygon: readonly Point[]): boolean {
  let inside = false;

  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const pi = polygon[i];
    const pj = polygon[j];

    if ((pi.y > point.y) !== (pj.y > point.y)) {
      const dy = pj.y - pi.y;
      const denom = Math.abs(dy) < EPSILON ? (dy < 0 ? -EPSILON : EPSILON) : dy;
      const crossingX = ((pj.x - pi.x) * (point.y - pi.y)) / denom + pi.x;
      if (point.x < crossingX) {
        inside = !inside;
      }
    }
  }

  return inside;
}

/**
 * Arithmetic mean of the vertices. Used as the interior sample point for
 * containment; for strongly concave outlines it may fall outside.
 */
export function centroid(polygon: readonly Point[]): Point {
  if (polygon.length === 0) return { x: 0, y: 0 };

  let sx = 0;
  let sy = 0;
  for (const p of polygon) {
    sx += p.x;
    sy += p.y;
  }
  return { x: sx / polygon.length, y: sy / polygon.length };
}

// ------------------------------------------------------------------
// Internal helpers
// ------------------------------------------------------------------

function isDegenerate(a: Point, b: Point): boolean {
  return Math.hypot(b.x - a.x, b.y - a.y) < EPSILON;
}

function extendSegment(a: Point, b: Point, buffer: number): [Point, Point] {
  const length = Math.hypot(b.x - a.x, b.y - a.y);
  const ux = ((b.x - a.x) / length) * buffer;
  const uy = ((b.y - a.y) / length) * buffer;
  return [
    { x: a.x - ux, y: a.y - uy },
    { x: b.x + ux, y: b.y + uy },
  ];
}

function squareAround(p: Point, half: number): Bounds {
  return { minX: p.x - half, maxX: p.x + half, minY: p.y - half, maxY: p.y + half };
}

/** Orientation test on unextended segments; colinear pairs fall back to interval overlap. */
function segmentsCross(a: Point, b: Point, c: Point, d: Point): boolean {
  const o1 = orientation(a, b, c);
  const o2 = orientation(a, b, d);
  const o3 = orientation(c, d, a);
  const o4 = orientation(c, d, b);

  if (o1 !== o2 && o3 !== o4) return true;

  if (o1 === 0 && o2 === 0 && o3 === 0 && o4 === 0) {
    return intervalsOverlap(a.x, b.x, c.x, d.x) && intervalsOverlap(a.y, b.y, c.y, d.y);
  }

  return false;
}

function intervalsOverlap(a1: number, a2: number, b1: number, b2: number): boolean {
  return Math.min(a1, a2) <= Math.max(b1, b2) && Math.min(b1, b2) <= Math.max(a1, a2);
}

function segmentTouchesBox(a: Point, b: Point, box: Bounds): boolean {
  if (pointInBox(a, box) || pointInBox(b, box)) return true;

  const corners: Point[] = [
    { x: box.minX, y: box.minY },
    { x: box.maxX, y: box.minY },
    { x: box.maxX, y: box.maxY },
    { x: box.minX, y: box.maxY },
  ];
  return edges(corners).some(([p, q]) => segmentsCross(a, b, p, q));
}
