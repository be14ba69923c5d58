// ============================================================
// Tests for src/engine/geometry.ts
// Covers: world transform, bounding boxes, orientation, buffered
//         segment intersection, point-segment distance,
//         point-in-polygon, centroid
// ============================================================

import { describe, it, expect } from 'vitest';
import {
  boundingBox,
  boxesIntersect,
  centroid,
  edges,
  orientation,
  pointInBox,
  pointInPolygon,
  pointToSegmentDistance,
  segmentsIntersect,
  worldOutline,
} from '../../src/engine/geometry';
import type { Point } from '../../src/shared/types';

// ------------------------------------------------------------------
// Helpers
// ------------------------------------------------------------------

function p(x: number, y: number): Point {
  return { x, y };
}

const SQUARE: Point[] = [p(0, 0), p(10, 0), p(10, 10), p(0, 10)];

// ------------------------------------------------------------------
// worldOutline / boundingBox
// ------------------------------------------------------------------

describe('worldOutline', () => {
  it('should scale about the local origin and then translate', () => {
    expect(worldOutline([p(1, 2), p(-1, 0)], p(10, 20), 3)).toEqual([p(13, 26), p(7, 20)]);
  });
});

describe('boundingBox', () => {
  it('should cover the scaled and translated outline', () => {
    expect(boundingBox(SQUARE, p(5, -5), 2)).toEqual({ minX: 5, maxX: 25, minY: -5, maxY: 15 });
  });

  it('should grow every side by the buffer', () => {
    expect(boundingBox(SQUARE, p(5, -5), 2, 1)).toEqual({ minX: 4, maxX: 26, minY: -6, maxY: 16 });
  });
});

describe('boxesIntersect', () => {
  const a = { minX: 0, maxX: 10, minY: 0, maxY: 10 };

  it('should treat touching boxes as intersecting', () => {
    expect(boxesIntersect(a, { minX: 10, maxX: 20, minY: 0, maxY: 10 })).toBe(true);
  });

  it('should reject boxes separated on one axis', () => {
    expect(boxesIntersect(a, { minX: 0, maxX: 10, minY: 10.5, maxY: 20 })).toBe(false);
  });

  it('should accept a box nested inside another', () => {
    expect(boxesIntersect(a, { minX: 2, maxX: 3, minY: 2, maxY: 3 })).toBe(true);
  });
});

describe('pointInBox', () => {
  it('should include the boundary', () => {
    expect(pointInBox(p(10, 5), { minX: 0, maxX: 10, minY: 0, maxY: 10 })).toBe(true);
    expect(pointInBox(p(10.01, 5), { minX: 0, maxX: 10, minY: 0, maxY: 10 })).toBe(false);
  });
});

// ------------------------------------------------------------------
// orientation
// ------------------------------------------------------------------

describe('orientation', () => {
  it('should return 1 for a point left of the directed line', () => {
    expect(orientation(p(0, 0), p(10, 0), p(5, 1))).toBe(1);
  });

  it('should return -1 for a point right of the directed line', () => {
    expect(orientation(p(0, 0), p(10, 0), p(5, -1))).toBe(-1);
  });

  it('should return 0 for colinear points', () => {
    expect(orientation(p(0, 0), p(10, 10), p(20, 20))).toBe(0);
  });
});

// ------------------------------------------------------------------
// segmentsIntersect
// ------------------------------------------------------------------

describe('segmentsIntersect', () => {
  it('should detect a proper crossing without any buffer', () => {
    expect(segmentsIntersect(p(0, 0), p(10, 10), p(0, 10), p(10, 0), 0)).toBe(true);
  });

  it('should ignore parallel segments further apart than the buffer', () => {
    expect(segmentsIntersect(p(0, 0), p(10, 0), p(0, 5), p(10, 5), 1)).toBe(false);
  });

  it('should catch a segment ending short of another within the buffer', () => {
    // Vertical segment stops 2 units above the horizontal one
    expect(segmentsIntersect(p(0, 0), p(10, 0), p(5, 2), p(5, 10), 3)).toBe(true);
  });

  it('should miss the same pair when the buffer is smaller than the gap', () => {
    expect(segmentsIntersect(p(0, 0), p(10, 0), p(5, 2), p(5, 10), 1)).toBe(false);
  });

  it('should use interval overlap for colinear segments', () => {
    expect(segmentsIntersect(p(0, 0), p(10, 0), p(5, 0), p(20, 0), 0)).toBe(true);
  });

  it('should join colinear segments whose gap is at most the buffer', () => {
    expect(segmentsIntersect(p(0, 0), p(10, 0), p(12, 0), p(20, 0), 2)).toBe(true);
  });

  it('should keep colinear segments apart when the gap exceeds the buffer', () => {
    // Each extended by 1.5 would meet; the reach along a shared line is one buffer
    expect(segmentsIntersect(p(0, 0), p(10, 0), p(12, 0), p(20, 0), 1.5)).toBe(false);
  });

  it('should be symmetric in its two segments', () => {
    const cases: Array<[Point, Point, Point, Point, number]> = [
      [p(0, 0), p(10, 0), p(5, 2), p(5, 10), 3],
      [p(0, 0), p(10, 0), p(5, 2), p(5, 10), 1],
      [p(0, 0), p(10, 0), p(12, 0), p(20, 0), 1.5],
      [p(0, 0), p(10, 10), p(0, 10), p(10, 0), 0],
    ];
    for (const [a, b, c, d, buffer] of cases) {
      expect(segmentsIntersect(a, b, c, d, buffer)).toBe(segmentsIntersect(c, d, a, b, buffer));
    }
  });

  it('should treat a zero-length segment as a square of half-size buffer', () => {
    expect(segmentsIntersect(p(0, 0), p(0, 0), p(2, -5), p(2, 5), 3)).toBe(true);
    expect(segmentsIntersect(p(0, 0), p(0, 0), p(2, -5), p(2, 5), 1)).toBe(false);
  });

  it('should compare two zero-length segments by their squares', () => {
    expect(segmentsIntersect(p(0, 0), p(0, 0), p(1, 0), p(1, 0), 1)).toBe(true);
    expect(segmentsIntersect(p(0, 0), p(0, 0), p(1.5, 0), p(1.5, 0), 1)).toBe(false);
  });
});

// ------------------------------------------------------------------
// pointToSegmentDistance / edges
// ------------------------------------------------------------------

describe('pointToSegmentDistance', () => {
  it('should measure perpendicular distance inside the segment span', () => {
    expect(pointToSegmentDistance(p(5, 5), p(0, 0), p(10, 0))).toBe(5);
  });

  it('should clamp to the start point', () => {
    expect(pointToSegmentDistance(p(-3, 4), p(0, 0), p(10, 0))).toBe(5);
  });

  it('should clamp to the end point', () => {
    expect(pointToSegmentDistance(p(13, 4), p(0, 0), p(10, 0))).toBe(5);
  });

  it('should measure to the point of a degenerate segment', () => {
    expect(pointToSegmentDistance(p(3, 4), p(0, 0), p(0, 0))).toBe(5);
  });
});

describe('edges', () => {
  it('should include the closing edge', () => {
    const triangle = [p(0, 0), p(1, 0), p(0, 1)];
    expect(edges(triangle)).toEqual([
      [p(0, 0), p(1, 0)],
      [p(1, 0), p(0, 1)],
      [p(0, 1), p(0, 0)],
    ]);
  });
});

// ------------------------------------------------------------------
// pointInPolygon / centroid
// ------------------------------------------------------------------

describe('pointInPolygon', () => {
  it('should find interior points of a convex polygon', () => {
    expect(pointInPolygon(p(5, 5), SQUARE)).toBe(true);
  });

  it('should reject points outside', () => {
    expect(pointInPolygon(p(15, 5), SQUARE)).toBe(false);
    expect(pointInPolygon(p(-1, 5), SQUARE)).toBe(false);
    expect(pointInPolygon(p(20, 10), SQUARE)).toBe(false);
  });

  it('should follow the even-odd rule on a concave outline', () => {
    const lShape = [p(0, 0), p(10, 0), p(10, 4), p(4, 4), p(4, 10), p(0, 10)];

    expect(pointInPolygon(p(2, 7), lShape)).toBe(true);
    expect(pointInPolygon(p(7, 2), lShape)).toBe(true);
    expect(pointInPolygon(p(7, 7), lShape)).toBe(false);
  });
});

describe('centroid', () => {
  it('should average the vertices', () => {
    expect(centroid(SQUARE)).toEqual(p(5, 5));
    expect(centroid([p(0, 0), p(6, 0), p(0, 3)])).toEqual(p(2, 1));
  });

  it('should return the origin for an empty polygon', () => {
    expect(centroid([])).toEqual(p(0, 0));
  });
});

// ------------------------------------------------------------------
// Purity
// ------------------------------------------------------------------

describe('pure geometry', () => {
  const segmentCases: Array<[Point, Point, Point, Point, number]> = [
    [p(0, 0), p(10, 10), p(0, 10), p(10, 0), 0],
    [p(0, 0), p(10, 0), p(5, 2), p(5, 10), 3],
    [p(0, 0), p(10, 0), p(12, 0), p(20, 0), 1.5],
    [p(0, 0), p(0, 0), p(2, -5), p(2, 5), 3],
  ];
  const polygonCases: Point[] = [p(5, 5), p(15, 5), p(-1, 5), p(10, 5)];
  const distanceCases: Array<[Point, Point, Point]> = [
    [p(5, 5), p(0, 0), p(10, 0)],
    [p(-3, 4), p(0, 0), p(10, 0)],
    [p(3, 4), p(0, 0), p(0, 0)],
  ];

  function evaluate(reverse: boolean): Array<boolean | number> {
    const order = <T>(items: T[]): T[] => (reverse ? [...items].reverse() : items);
    const results = [
      ...order(segmentCases).map(([a, b, c, d, buffer]) => segmentsIntersect(a, b, c, d, buffer)),
      ...order(polygonCases).map((point) => pointInPolygon(point, SQUARE)),
      ...order(distanceCases).map(([point, start, end]) => pointToSegmentDistance(point, start, end)),
    ];
    return results;
  }

  it('should give identical answers regardless of call order', () => {
    const forward = evaluate(false);
    const backward = evaluate(true);

    const restored = [
      ...backward.slice(0, 4).reverse(),
      ...backward.slice(4, 8).reverse(),
      ...backward.slice(8).reverse(),
    ];
    expect(restored).toEqual(forward);
  });

  it('should give identical answers when called twice', () => {
    expect(evaluate(false)).toEqual(evaluate(false));
  });
});
