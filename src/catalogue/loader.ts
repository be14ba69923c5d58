// ============================================================
// Shape Scatter - Catalogue Loader
// Parses shape definitions of the form
//   name: (x1,y1),(x2,y2),(x3,y3),...
// one per line. Bad lines and bad coordinate pairs are skipped
// individually; only a missing file or an empty result is fatal.
// ============================================================

import { readFile } from 'node:fs/promises';
import type { Catalogue, Outline, Point } from '@shared/types';

/** Fewest vertices a usable outline can have */
export const MIN_OUTLINE_VERTICES = 3;

export type CatalogueErrorCode = 'NOT_FOUND' | 'UNREADABLE' | 'EMPTY';

/**
 * Fatal catalogue failure. Carries a machine-readable code so callers can
 * tell a missing file from one without any usable shapes.
 */
export class CatalogueError extends Error {
  readonly code: CatalogueErrorCode;

  constructor(message: string, code: CatalogueErrorCode) {
    super(message);
    this.name = 'CatalogueError';
    this.code = code;
  }
}

/**
 * Parses catalogue text into a name -> outline map. Lines without a colon,
 * nameless lines and outlines with fewer than three parsed vertices are
 * dropped; a repeated name replaces the earlier definition.
 */
export function parseCatalogue(text: string): Map<string, Outline> {
  const shapes = new Map<string, Outline>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    const colon = line.indexOf(':');
    if (!line || colon === -1) continue;

    const name = line.slice(0, colon).trim();
    if (!name) continue;

    const points = parseCoordinates(line.slice(colon + 1));
    if (points.length < MIN_OUTLINE_VERTICES) continue;

    shapes.set(name, Object.freeze(points.map((p) => Object.freeze(p))));
  }

  return shapes;
}

/**
 * Extracts every parenthesised `(x,y)` pair from the text. Pairs that do
 * not hold exactly two finite numbers are skipped.
 */
export function parseCoordinates(text: string): Point[] {
  const points: Point[] = [];

  for (const match of text.matchAll(/\(([^()]*)\)/g)) {
    const parts = match[1].split(',').map((s) => s.trim());
    if (parts.length !== 2 || parts.some((s) => s === '')) continue;

    const x = Number(parts[0]);
    const y = Number(parts[1]);
    if (Number.isFinite(x) && Number.isFinite(y)) {
      points.push({ x, y });
    }
  }

  return points;
}

/**
 * Reads and parses a catalogue file.
 *
 * @throws CatalogueError when the file is missing or unreadable, or when it
 *         yields no usable outline
 */
export async function loadCatalogue(path: string): Promise<Catalogue> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new CatalogueError(`Shape catalogue not found: ${path}`, 'NOT_FOUND');
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogueError(`Could not read shape catalogue ${path}: ${reason}`, 'UNREADABLE');
  }

  const shapes = parseCatalogue(text);
  if (shapes.size === 0) {
    throw new CatalogueError(`No valid shapes could be loaded from ${path}`, 'EMPTY');
  }

  console.log(`[catalogue] Loaded ${shapes.size} shape(s) from ${path}`);
  return shapes;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
