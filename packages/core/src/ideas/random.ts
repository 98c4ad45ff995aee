/**
 * Seeded randomness for idea synthesis.
 *
 * Each synthesis call builds its own generator from a seed derived from the
 * theme and the candidate index, so concurrent calls never share state and
 * the same (theme, index) pair always replays the same picks.
 */

/** A source of floats in [0, 1). */
export interface RandomSource {
  next(): number
}

export type RandomFactory = (seed: number) => RandomSource

/** 32-bit string hash (h = 31·h + c), stable across processes. */
export function hashString(text: string): number {
  let h = 0
  for (let i = 0; i < text.length; i++) {
    h = (Math.imul(31, h) + text.charCodeAt(i)) | 0
  }
  return h >>> 0
}

export function deriveSeed(theme: string, index: number): number {
  return (hashString(theme) + index) >>> 0
}

/** mulberry32: small, fast, and well mixed even for consecutive seeds. */
export class SeededRandom implements RandomSource {
  private state: number

  constructor(seed: number) {
    this.state = seed >>> 0
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0
    let t = this.state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export const seededRandom: RandomFactory = (seed) => new SeededRandom(seed)

/** Uniform pick. Callers guarantee a non-empty list (the catalog schema does). */
export function pick<T>(random: RandomSource, items: readonly T[]): T {
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length))
  return items[index]
}
