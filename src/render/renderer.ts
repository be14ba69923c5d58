// ============================================================
// Shape Scatter - Scene Renderer
// Uses @napi-rs/canvas to draw committed placements onto a
// raster surface.
// ============================================================

import { createCanvas, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';
import { DEFAULT_CONFIG } from '@shared/types';
import type { Placement, Surface } from '@shared/types';
import { worldOutline } from '../engine/geometry';
import { worldToSurface } from './surface';

/**
 * Incremental renderer: the session calls `draw` once per committed
 * placement, and the caller exports the finished surface as PNG.
 */
export class SceneRenderer {
  readonly surface: Surface;
  private readonly canvas: Canvas;
  private readonly ctx: SKRSContext2D;
  private drawn = 0;

  constructor(surface: Surface = DEFAULT_CONFIG.surface, background: string = DEFAULT_CONFIG.background) {
    this.surface = surface;
    this.canvas = createCanvas(surface.width, surface.height);
    this.ctx = this.canvas.getContext('2d');

    this.ctx.fillStyle = background;
    this.ctx.fillRect(0, 0, surface.width, surface.height);
  }

  /** Number of placements drawn so far. */
  get count(): number {
    return this.drawn;
  }

  draw(placement: Placement): void {
    const points = worldOutline(placement.outline, placement.anchor, placement.scale).map((p) =>
      worldToSurface(p, this.surface),
    );
    if (points.length === 0) return;

    const ctx = this.ctx;
    ctx.save();
    ctx.beginPath();
    ctx.moveTo(points[0].x, points[0].y);
    for (const p of points.slice(1)) {
      ctx.lineTo(p.x, p.y);
    }
    ctx.closePath();
    ctx.fillStyle = placement.color;
    ctx.fill();
    ctx.restore();

    this.drawn++;
  }

  toPng(): Buffer {
    return this.canvas.toBuffer('image/png');
  }
}

/** Renders a whole scene in one go. */
export function renderScenePng(
  placements: readonly Placement[],
  surface: Surface = DEFAULT_CONFIG.surface,
  background: string = DEFAULT_CONFIG.background,
): Buffer {
  const renderer = new SceneRenderer(surface, background);
  for (const placement of placements) {
    renderer.draw(placement);
  }
  return renderer.toPng();
}
