import {
  AIR, SAND, WOOD, IRON, RUST, ROCK, WATER, ACID, OIL, LAVA,
  FIRE, ASH, SMOKE, LIFE, PLANT, DRAIN, INDESTRUCTIBLE,
  WATER_SOURCE, ACID_SOURCE, OIL_SOURCE, LAVA_SOURCE, FIRE_SOURCE,
  ELEMENT_COUNT, ELEMENT_IDS,
  type ElementId,
} from './constants'

// ---------------------------------------------------------------------------
// Element catalog: static per-element properties
// ---------------------------------------------------------------------------

/** Powder behaves as solid for every trait test; it only documents that the element falls. */
export type ElementForm = 'solid' | 'powder' | 'liquid' | 'gas' | 'special'

export interface ElementDef {
  name: string
  form: ElementForm
  strength: number        // default strength on placement (0..255)
  colorVariance: number   // > 0 draws a random variant on placement
  flammable?: true
  causesRust?: true
  growsPlant?: true
  dissolvesInAcid?: true
  emits?: ElementId       // source elements: what they keep placing below
}

export const ELEMENTS: Record<ElementId, ElementDef> = {
  [AIR]: { name: 'Air', form: 'gas', strength: 0, colorVariance: 0 },

  // Solids
  [SAND]: { name: 'Sand', form: 'powder', strength: 8, colorVariance: 0.1, dissolvesInAcid: true },
  [ASH]: { name: 'Ash', form: 'powder', strength: 2, colorVariance: 0.05, dissolvesInAcid: true },
  [RUST]: { name: 'Rust', form: 'powder', strength: 4, colorVariance: 0.2, dissolvesInAcid: true },
  [WOOD]: { name: 'Wood', form: 'solid', strength: 32, colorVariance: 0.1, flammable: true, dissolvesInAcid: true },
  [IRON]: { name: 'Iron', form: 'solid', strength: 64, colorVariance: 0.1, dissolvesInAcid: true },
  [ROCK]: { name: 'Rock', form: 'solid', strength: 128, colorVariance: 0.15, dissolvesInAcid: true },
  [PLANT]: { name: 'Plant', form: 'solid', strength: 4, colorVariance: 0.1, flammable: true, dissolvesInAcid: true },
  [LIFE]: { name: 'Life', form: 'solid', strength: 0, colorVariance: 0, dissolvesInAcid: true },

  // Liquids
  [WATER]: { name: 'Water', form: 'liquid', strength: 0, colorVariance: 0.05, causesRust: true, growsPlant: true },
  [ACID]: { name: 'Acid', form: 'liquid', strength: 8, colorVariance: 0.05 },
  [OIL]: { name: 'Oil', form: 'liquid', strength: 0, colorVariance: 0.05, flammable: true },
  [LAVA]: { name: 'Lava', form: 'liquid', strength: 80, colorVariance: 0.3 },

  // Gases
  [FIRE]: { name: 'Fire', form: 'gas', strength: 16, colorVariance: 0.3 },
  [SMOKE]: { name: 'Smoke', form: 'gas', strength: 32, colorVariance: 0.1 },

  // Special
  [DRAIN]: { name: 'Drain', form: 'special', strength: 0, colorVariance: 0 },
  [INDESTRUCTIBLE]: { name: 'Indestructible', form: 'special', strength: 0, colorVariance: 0 },
  [WATER_SOURCE]: { name: 'Water source', form: 'special', strength: 0, colorVariance: 0, emits: WATER },
  [ACID_SOURCE]: { name: 'Acid source', form: 'special', strength: 0, colorVariance: 0, emits: ACID },
  [OIL_SOURCE]: { name: 'Oil source', form: 'special', strength: 0, colorVariance: 0, emits: OIL },
  [LAVA_SOURCE]: { name: 'Lava source', form: 'special', strength: 0, colorVariance: 0, emits: LAVA },
  [FIRE_SOURCE]: { name: 'Fire source', form: 'special', strength: 0, colorVariance: 0, emits: FIRE },
}

// ---------------------------------------------------------------------------
// Element flag bits (for ELEMENT_FLAGS bitmask)
// ---------------------------------------------------------------------------

export const F_SOLID             = 1 << 0
export const F_LIQUID            = 1 << 1
export const F_GAS               = 1 << 2
export const F_FLAMMABLE         = 1 << 3
export const F_CAUSES_RUST       = 1 << 4
export const F_GROWS_PLANT       = 1 << 5
export const F_DISSOLVES_IN_ACID = 1 << 6
export const F_COLOR_VARIANCE    = 1 << 7
export const F_SOURCE            = 1 << 8

// ---------------------------------------------------------------------------
// ELEMENT_FLAGS / ELEMENT_STRENGTH -- precomputed tables for the hot loop
// ---------------------------------------------------------------------------

export const ELEMENT_FLAGS = new Uint16Array(ELEMENT_COUNT)
export const ELEMENT_STRENGTH = new Uint8Array(ELEMENT_COUNT)
for (const id of ELEMENT_IDS) {
  const e = ELEMENTS[id]
  let f = 0
  if (e.form === 'solid' || e.form === 'powder') f |= F_SOLID
  if (e.form === 'liquid')  f |= F_LIQUID
  if (e.form === 'gas')     f |= F_GAS
  if (e.flammable)          f |= F_FLAMMABLE
  if (e.causesRust)         f |= F_CAUSES_RUST
  if (e.growsPlant)         f |= F_GROWS_PLANT
  if (e.dissolvesInAcid)    f |= F_DISSOLVES_IN_ACID
  if (e.colorVariance > 0)  f |= F_COLOR_VARIANCE
  if (e.emits !== undefined) f |= F_SOURCE
  ELEMENT_FLAGS[id] = f
  ELEMENT_STRENGTH[id] = e.strength
}

export function burns(e: ElementId): boolean {
  return (ELEMENT_FLAGS[e] & F_FLAMMABLE) !== 0
}

export function causesRust(e: ElementId): boolean {
  return (ELEMENT_FLAGS[e] & F_CAUSES_RUST) !== 0
}

export function growsPlant(e: ElementId): boolean {
  return (ELEMENT_FLAGS[e] & F_GROWS_PLANT) !== 0
}

export function dissolvesInAcid(e: ElementId): boolean {
  return (ELEMENT_FLAGS[e] & F_DISSOLVES_IN_ACID) !== 0
}

export function isLiquid(e: ElementId): boolean {
  return (ELEMENT_FLAGS[e] & F_LIQUID) !== 0
}

export function isSolid(e: ElementId): boolean {
  return (ELEMENT_FLAGS[e] & F_SOLID) !== 0
}

/** Check if an element ID continuously emits another element. */
export function isSourceElement(e: ElementId): boolean {
  return (ELEMENT_FLAGS[e] & F_SOURCE) !== 0
}
