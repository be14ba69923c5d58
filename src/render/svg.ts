// ============================================================
// Shape Scatter - SVG Export
// ============================================================

import { DEFAULT_CONFIG } from '@shared/types';
import type { Placement, Surface } from '@shared/types';
import { worldOutline } from '../engine/geometry';
import { worldToSurface } from './surface';

/** Rounds to two decimals and drops trailing zeros ("12.5", "3"). */
function fmt(value: number): string {
  return String(Math.round(value * 100) / 100);
}

export function renderSceneSvg(
  placements: readonly Placement[],
  surface: Surface = DEFAULT_CONFIG.surface,
  background: string = DEFAULT_CONFIG.background,
): string {
  const { width, height } = surface;
  const polygons = placements.map((placement) => {
    const points = worldOutline(placement.outline, placement.anchor, placement.scale)
      .map((p) => worldToSurface(p, surface))
      .map((p) => `${fmt(p.x)},${fmt(p.y)}`)
      .join(' ');
    return `<polygon points="${points}" fill="${placement.color}" data-shape="${escapeAttr(placement.shape)}"/>`;
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `  <rect width="${width}" height="${height}" fill="${background}"/>`,
    ...polygons.map((p) => `  ${p}`),
    '</svg>',
  ].join('\n');
}

function escapeAttr(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}
