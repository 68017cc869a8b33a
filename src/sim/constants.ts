// Element numeric IDs for maximum performance
export const AIR = 0, SAND = 1, WOOD = 2, IRON = 3, RUST = 4, ROCK = 5
export const WATER = 6, ACID = 7, OIL = 8, LAVA = 9
export const FIRE = 10, ASH = 11, SMOKE = 12, LIFE = 13, PLANT = 14, DRAIN = 15
export const INDESTRUCTIBLE = 16
export const WATER_SOURCE = 17, ACID_SOURCE = 18, OIL_SOURCE = 19, LAVA_SOURCE = 20, FIRE_SOURCE = 21

export const ELEMENT_COUNT = 22

export type ElementId =
  | typeof AIR | typeof SAND | typeof WOOD | typeof IRON | typeof RUST | typeof ROCK
  | typeof WATER | typeof ACID | typeof OIL | typeof LAVA
  | typeof FIRE | typeof ASH | typeof SMOKE | typeof LIFE | typeof PLANT | typeof DRAIN
  | typeof INDESTRUCTIBLE
  | typeof WATER_SOURCE | typeof ACID_SOURCE | typeof OIL_SOURCE | typeof LAVA_SOURCE | typeof FIRE_SOURCE

/** Every ID in numeric order; indexing with a stored byte yields its typed ID. */
export const ELEMENT_IDS: readonly ElementId[] = [
  AIR, SAND, WOOD, IRON, RUST, ROCK,
  WATER, ACID, OIL, LAVA,
  FIRE, ASH, SMOKE, LIFE, PLANT, DRAIN,
  INDESTRUCTIBLE,
  WATER_SOURCE, ACID_SOURCE, OIL_SOURCE, LAVA_SOURCE, FIRE_SOURCE,
]

export function isElementId(value: number): value is ElementId {
  return Number.isInteger(value) && value >= 0 && value < ELEMENT_COUNT
}

// ── Sandbox sizes ──────────────────────────────────────────────────────
export const MIN_SANDBOX_SIZE = 2
export const MAX_SANDBOX_SIZE = 4096
export const DEFAULT_SANDBOX_SIZE = 256

// ── Physics constants ──────────────────────────────────────────────────
// Flow ranges are exclusive: lateral searches visit n = 1..RANGE-1
export const WATER_FLOW_RANGE = 16
export const ACID_FLOW_RANGE = 8
export const OIL_FLOW_RANGE = 8
/** Lava only starts cooling on its own once contact has weakened it below this. */
export const LAVA_COOLING_THRESHOLD = 64
export const PLANT_GROWTH_ROLLS = 10
export const PLANT_GROWTH_HITS = 2

// ── Toolbox ────────────────────────────────────────────────────────────
export const MIN_TOOL_SIZE = 1
export const MAX_TOOL_SIZE = 64
export const SPRAY_DENSITY = 8
