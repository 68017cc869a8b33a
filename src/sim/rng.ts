// Mulberry32: seedable 32-bit PRNG.
// Returns values in [0, 1), like Math.random().

export interface RNG {
  (): number                    // Call to get next random value in [0, 1)
  getState(): number            // Get current internal state
  setState(state: number): void // Restore internal state
}

export function createRNG(seed: number): RNG {
  let s = seed | 0

  const rng = function (): number {
    s = s + 0x6D2B79F5 | 0
    let t = Math.imul(s ^ s >>> 15, 1 | s)
    t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t
    return ((t ^ t >>> 14) >>> 0) / 4294967296
  }

  return Object.assign(rng, {
    getState: () => s,
    setState: (state: number) => { s = state | 0 },
  })
}

/** Uniform integer in [0, max). */
export function randomInt(rand: RNG, max: number): number {
  return Math.floor(rand() * max)
}

/** 32-bit seed derived from the wall clock, for sessions started without one. */
export function timeSeed(): number {
  return Date.now() | 0
}
