/** Returns a float in [0, 1). */
export type Random = () => number;

export function mulberry32(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandom(seed?: number): Random {
  return seed === undefined ? Math.random : mulberry32(seed);
}

export function randomIndex(random: Random, length: number): number {
  if (length <= 0) throw new Error("Cannot pick from an empty list");
  return Math.min(length - 1, Math.floor(random() * length));
}

export function pick<T>(random: Random, items: readonly T[]): T {
  return items[randomIndex(random, items.length)];
}
