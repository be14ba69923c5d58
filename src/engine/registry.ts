// ============================================================
// Shape Scatter - Scene Registry
// Append-only record of committed placements, with an R-tree
// over their world boxes for broad-phase lookups.
// ============================================================

import RBush from 'rbush';
import type { Bounds, Placement } from '@shared/types';
import { boundingBox } from './geometry';

interface IndexedPlacement {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  placement: Placement;
}

export class SceneRegistry {
  private readonly entries: Placement[] = [];
  private readonly index = new RBush<IndexedPlacement>();

  /** Appends a committed placement. The only mutator. */
  add(placement: Placement): void {
    const box = boundingBox(placement.outline, placement.anchor, placement.scale);
    this.entries.push(placement);
    this.index.insert({ ...box, placement });
  }

  /** Placements in commit order. */
  all(): readonly Placement[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Placements whose unbuffered world box intersects `box`, in commit
   * order. Callers widen `box` by whatever clearance they need.
   */
  search(box: Bounds): Placement[] {
    return this.index
      .search(box)
      .map((item) => item.placement)
      .sort((a, b) => a.id - b.id);
  }
}
