// ============================================================
// Shape Scatter - Surface Mapping
// World origin sits at the surface centre with y pointing up.
// ============================================================

import type { Point, Surface } from '@shared/types';

/** Maps a world point to surface pixel coordinates. */
export function worldToSurface(point: Point, surface: Surface): Point {
  return {
    x: surface.width / 2 + point.x,
    y: surface.height / 2 - point.y,
  };
}
