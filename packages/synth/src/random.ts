import { ConfigurationError } from './errors'

/** Uniform float source in `[0, 1)`. */
export type Rng = () => number

// Seeded random number generator (Mulberry32)
export function createRng(seed: number): Rng {
  let state = seed | 0
  return function () {
    state = (state + 0x6d2b79f5) | 0
    let t = Math.imul(state ^ (state >>> 15), 1 | state)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Independent seed per named stream, so synthesizers never share a sequence
 * and can run in any order.
 */
export function deriveSeed(seed: number, stream: string): number {
  let hash = seed | 0
  for (let i = 0; i < stream.length; i++) {
    hash = Math.imul(hash ^ stream.charCodeAt(i), 0x9e3779b1)
    hash ^= hash >>> 16
  }
  return hash | 0
}

/** Inclusive on both ends. */
export function randInt(rng: Rng, min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min
}

export function randFloat(rng: Rng, min: number, max: number): number {
  return rng() * (max - min) + min
}

export function pick<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) {
    throw new ConfigurationError('Cannot pick from an empty list')
  }
  return items[Math.floor(rng() * items.length)]
}

export function digits(rng: Rng, length: number): string {
  let out = ''
  for (let i = 0; i < length; i++) {
    out += String(randInt(rng, 0, 9))
  }
  return out
}

/** Rounds half away from zero to cents. */
export function roundMoney(value: number): number {
  return Math.sign(value) * Math.round((Math.abs(value) + Number.EPSILON) * 100) / 100
}
