// ============================================================
// Shape Scatter - Seeded Random Source
// ============================================================

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

/** Mulberry32: small, fast, and reproducible for a given 32-bit seed. */
export function createRandom(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}
