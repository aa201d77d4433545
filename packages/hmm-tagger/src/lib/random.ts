import type { RandomSource } from './types.js'

// Seeded PRNG (mulberry32) for repeatable initialization
export function createRng(seed: number): RandomSource {
  let s = seed | 0
  return function rand(): number {
    s = (s + 0x6d2b79f5) | 0
    let t = Math.imul(s ^ (s >>> 15), 1 | s)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}
