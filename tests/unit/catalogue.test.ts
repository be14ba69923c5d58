// ============================================================
// Tests for src/catalogue/loader.ts
// Covers: line parsing, malformed input, duplicate names,
//         file loading and fatal errors
// ============================================================

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CatalogueError,
  loadCatalogue,
  parseCatalogue,
  parseCoordinates,
} from '../../src/catalogue/loader';

// ------------------------------------------------------------------
// parseCoordinates
// ------------------------------------------------------------------

describe('parseCoordinates', () => {
  it('should read every parenthesised pair', () => {
    expect(parseCoordinates('(0,0),(10, 0), ( 5 ,8.5)')).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 5, y: 8.5 },
    ]);
  });

  it('should accept negative and exponent notation', () => {
    expect(parseCoordinates('(-1.5,2e1)')).toEqual([{ x: -1.5, y: 20 }]);
  });

  it('should skip pairs that are not exactly two numbers', () => {
    expect(parseCoordinates('(1,2,3),(a,1),( ,1),(4),(7,8)')).toEqual([{ x: 7, y: 8 }]);
  });

  it('should return nothing for text without parentheses', () => {
    expect(parseCoordinates('0,0 10,0 10,10')).toEqual([]);
  });
});

// ------------------------------------------------------------------
// parseCatalogue
// ------------------------------------------------------------------

describe('parseCatalogue', () => {
  it('should keep a well-formed line and drop a line without a colon', () => {
    const shapes = parseCatalogue(['square: (0,0),(10,0),(10,10),(0,10)', 'this line has no colon'].join('\n'));

    expect([...shapes.keys()]).toEqual(['square']);
    expect(shapes.get('square')).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 10 },
    ]);
  });

  it('should skip bad pairs but keep the rest of the outline', () => {
    const shapes = parseCatalogue('tri: (0,0),(x,1),(4,0),(2,3)');

    expect(shapes.get('tri')).toEqual([
      { x: 0, y: 0 },
      { x: 4, y: 0 },
      { x: 2, y: 3 },
    ]);
  });

  it('should drop outlines with fewer than three vertices', () => {
    const shapes = parseCatalogue(['empty:', 'line: (0,0),(5,5)', 'ok: (0,0),(1,0),(0,1)'].join('\n'));

    expect([...shapes.keys()]).toEqual(['ok']);
  });

  it('should drop lines without a name', () => {
    expect(parseCatalogue(': (0,0),(1,0),(0,1)').size).toBe(0);
  });

  it('should let a repeated name replace the earlier outline', () => {
    const shapes = parseCatalogue(['a: (0,0),(1,0),(0,1)', 'a: (0,0),(2,0),(0,2)'].join('\n'));

    expect(shapes.size).toBe(1);
    expect(shapes.get('a')).toEqual([
      { x: 0, y: 0 },
      { x: 2, y: 0 },
      { x: 0, y: 2 },
    ]);
  });

  it('should handle CRLF line endings, blank lines and surrounding spaces', () => {
    const shapes = parseCatalogue('\r\n  kite : (0,0),(2,1),(0,4),(-2,1)  \r\n\r\n');

    expect([...shapes.keys()]).toEqual(['kite']);
    expect(shapes.get('kite')).toHaveLength(4);
  });

  it('should freeze the parsed outlines', () => {
    const outline = parseCatalogue('t: (0,0),(1,0),(0,1)').get('t');

    expect(Object.isFrozen(outline)).toBe(true);
    expect(outline?.every((p) => Object.isFrozen(p))).toBe(true);
  });
});

// ------------------------------------------------------------------
// loadCatalogue
// ------------------------------------------------------------------

describe('loadCatalogue', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'scatter-catalogue-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load every valid shape in a file', async () => {
    const path = join(dir, 'shapes.txt');
    await writeFile(path, 'square: (0,0),(10,0),(10,10),(0,10)\nnot a shape\ntriangle: (0,0),(6,0),(3,5)\n');

    const catalogue = await loadCatalogue(path);

    expect([...catalogue.keys()]).toEqual(['square', 'triangle']);
  });

  it('should fail with NOT_FOUND for a missing file', async () => {
    const path = join(dir, 'missing.txt');

    await expect(loadCatalogue(path)).rejects.toMatchObject({
      name: 'CatalogueError',
      code: 'NOT_FOUND',
      message: `Shape catalogue not found: ${path}`,
    });
  });

  it('should fail with EMPTY when no line yields a shape', async () => {
    const path = join(dir, 'empty.txt');
    await writeFile(path, 'nothing here\nbad: (1,1)\n');

    await expect(loadCatalogue(path)).rejects.toBeInstanceOf(CatalogueError);
    await expect(loadCatalogue(path)).rejects.toMatchObject({ code: 'EMPTY' });
  });

  it('should fail with UNREADABLE when the path is a directory', async () => {
    await expect(loadCatalogue(dir)).rejects.toMatchObject({ code: 'UNREADABLE' });
  });
});
