// ============================================================
// Shape Scatter - Placement Search
// Samples random anchors for one shape until the first position
// that clears every committed placement, the attempt ceiling,
// or the deadline.
// ============================================================

import { DEFAULT_CONFIG } from '@shared/types';
import type {
  Bounds,
  Outline,
  Placement,
  PlacementOutcome,
  ShapeColor,
  Surface,
} from '@shared/types';
import { boundingBox } from './geometry';
import { overlapsScene } from './overlap';
import { uniform, type RandomSource } from './random';
import type { SceneRegistry } from './registry';

/** Milliseconds since the epoch, or any monotonic millisecond count. */
export type Clock = () => number;

/** What to place. */
export interface PlacementRequest {
  shape: string;
  outline: Outline;
  color: ShapeColor;
  scale: number;
  /** Canvas bounds before the margin inset */
  bounds: Bounds;
}

/** Where and under which limits to place it. */
export interface SearchContext {
  registry: SceneRegistry;
  /** Clock reading after which the search gives up */
  deadline: number;
  clock: Clock;
  random: RandomSource;
  buffer?: number;
  maxAttempts?: number;
  margin?: number;
}

/**
 * Sampling domain centred on the origin: `±width/2·span` by
 * `±height/2·span`.
 */
export function canvasBounds(surface: Surface, span: number = DEFAULT_CONFIG.span): Bounds {
  const halfWidth = (surface.width / 2) * span;
  const halfHeight = (surface.height / 2) * span;
  return { minX: -halfWidth, maxX: halfWidth, minY: -halfHeight, maxY: halfHeight };
}

/**
 * Range of anchors that keeps the whole scaled outline inside `bounds`
 * inset by `margin`. Returns null when the outline cannot fit at all.
 */
export function anchorRange(
  outline: Outline,
  scale: number,
  bounds: Bounds,
  margin: number,
): Bounds | null {
  const local = boundingBox(outline, { x: 0, y: 0 }, scale);
  const range: Bounds = {
    minX: bounds.minX + margin - local.minX,
    maxX: bounds.maxX - margin - local.maxX,
    minY: bounds.minY + margin - local.minY,
    maxY: bounds.maxY - margin - local.maxY,
  };

  if (range.minX > range.maxX || range.minY > range.maxY) return null;
  return range;
}

/**
 * First-fit search for one shape. Never mutates the registry: committing
 * the returned placement is the caller's job.
 */
export function tryPlace(request: PlacementRequest, context: SearchContext): PlacementOutcome {
  const {
    registry,
    deadline,
    clock,
    random,
    buffer = DEFAULT_CONFIG.buffer,
    maxAttempts = DEFAULT_CONFIG.maxAttempts,
    margin = DEFAULT_CONFIG.margin,
  } = context;
  const { shape, outline, color, scale, bounds } = request;

  const range = anchorRange(outline, scale, bounds, margin);
  if (!range) {
    return { status: 'rejected', reason: 'exhausted', attempts: 0 };
  }

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (clock() >= deadline) {
      return { status: 'rejected', reason: 'deadline', attempts: attempt };
    }

    const anchor = {
      x: uniform(random, range.minX, range.maxX),
      y: uniform(random, range.minY, range.maxY),
    };

    if (!overlapsScene({ anchor, outline, scale }, registry, buffer)) {
      const placement: Placement = Object.freeze({
        id: registry.size + 1,
        shape,
        anchor: Object.freeze(anchor),
        outline,
        scale,
        color,
      });
      return { status: 'placed', placement, attempts: attempt + 1 };
    }
  }

  return { status: 'rejected', reason: 'exhausted', attempts: maxAttempts };
}
