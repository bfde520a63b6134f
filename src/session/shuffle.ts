/**
 * @file src/session/shuffle.ts
 * @summary Seeded PRNG and seeded id ordering. Each id gets a sort key from a hash of
 * the id and the seed, so the same seed always produces the same order and any subset
 * of ids keeps the relative order it had in the full list.
 *
 * @exports
 *   - mulberry32 - 32-bit seeded PRNG returning floats in [0, 1)
 *   - seededShuffle - ids reordered for a given seed
 *   - freshSeed - new random seed for a reshuffle
 */

export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// FNV-1a over UTF-16 code units, offset by the seed.
function hashId(id: string, seed: number): number {
  let h = (0x811c9dc5 ^ seed) >>> 0;
  for (let i = 0; i < id.length; i++) {
    h ^= id.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h;
}

export function seededShuffle(ids: readonly string[], seed: number): string[] {
  const keyed = ids.map((id) => ({ id, key: mulberry32(hashId(id, seed))() }));
  keyed.sort((x, y) => x.key - y.key || (x.id < y.id ? -1 : x.id > y.id ? 1 : 0));
  return keyed.map((k) => k.id);
}

export function freshSeed(): number {
  return Math.floor(Math.random() * 2147483647);
}
