import {
  AIR, WATER, ACID, OIL, LAVA, FIRE, ROCK,
  WATER_FLOW_RANGE, ACID_FLOW_RANGE, OIL_FLOW_RANGE,
} from '../constants'
import { dissolvesInAcid, isLiquid } from '../elements'
import type { Sandbox } from '../Sandbox'

/**
 * Water: mostly straight down, rarely diagonal, then a lateral search through
 * the water it is part of. One draw in [0, 60) picks both the downward column
 * and the lateral direction.
 */
export function updateWater(x: number, y: number, s: Sandbox): boolean {
  const random = s.random(60)
  const checkX = random < 58 ? x : random === 58 ? x - 1 : x + 1
  const touched = touchWater(s, x, y, checkX, y + 1, random)
  if (touched !== null) return touched

  const dx = random < 30 ? -1 : 1
  for (let n = 1; n < WATER_FLOW_RANGE; n++) {
    const nx = x + dx * n
    if (nx < 1 || nx > s.width - 2) break
    const neighbour = s.elementAt(nx, y)
    const result = touchWater(s, x, y, nx, y, random)
    if (result !== null) return result
    if (neighbour !== WATER) break
  }
  return false
}

/**
 * What water at (wx, wy) does to the cell it touches at (ox, oy).
 * Returns null when the touched element does not react with water.
 */
export function touchWater(
  s: Sandbox, wx: number, wy: number, ox: number, oy: number, random: number
): boolean | null {
  const other = s.elementAt(ox, oy)
  if (other === AIR || other === OIL) {
    s.swap(wx, wy, ox, oy)
    return true
  }
  if (other === ACID) {
    // Water dilutes the acid; sometimes sinks through it on the way down
    s.dissolveTo(ox, oy, WATER)
    if (wy < oy && random % 2 === 0) {
      s.swap(wx, wy, ox, oy)
      return true
    }
    return false
  }
  if (other === LAVA) {
    if (s.dissolveTo(ox, oy, ROCK)) {
      s.clearCell(wx, wy)
      return true
    }
    return false
  }
  if (other === FIRE) {
    s.clearCell(wx, wy)
    s.setElement(ox, oy, WATER)
    return true
  }
  return null
}

/** Acid: falls through air and fire, turns to water on water, eats soluble matter. */
export function updateAcid(x: number, y: number, s: Sandbox): boolean {
  const random = s.random(60)
  const checkX = random < 50 ? x : random < 55 ? x - 1 : x + 1
  const below = s.elementAt(checkX, y + 1)
  if (below === AIR || below === FIRE) {
    s.swap(x, y, checkX, y + 1)
    return true
  }
  if (below === WATER) return s.dissolveTo(x, y, WATER)
  if (dissolvesInAcid(below)) {
    if (s.dissolveTo(checkX, y + 1, AIR)) {
      s.clearCell(x, y)
      return true
    }
    return false
  }

  // Sideways through air, more sluggish than water
  const dx = random < 30 ? -1 : 1
  for (let n = 1; n < ACID_FLOW_RANGE; n++) {
    const nx = x + dx * n
    if (nx < 1 || nx > s.width - 2) break
    const neighbour = s.elementAt(nx, y)
    if (neighbour === AIR) {
      s.swap(x, y, nx, y)
      return true
    }
    if (dissolvesInAcid(neighbour)) {
      if (s.dissolveTo(nx, y, AIR)) {
        s.clearCell(x, y)
        return true
      }
      return false
    }
    if (neighbour !== ACID) break
  }
  return false
}

/** Oil: floats on everything but air and acid, spreads slowly. */
export function updateOil(x: number, y: number, s: Sandbox): boolean {
  const random = s.random(500)
  const checkX = random > 50 ? x : random > 25 ? x - 1 : x + 1
  const below = s.elementAt(checkX, y + 1)
  if (below === AIR || below === ACID) {
    s.swap(x, y, checkX, y + 1)
    return true
  }

  const dx = random < 250 ? -1 : 1
  for (let n = 1; n < OIL_FLOW_RANGE; n++) {
    const nx = x + dx * n
    if (nx < 1 || nx > s.width - 2) break
    const neighbour = s.elementAt(nx, y)
    if (neighbour === AIR || (n === 1 && neighbour === ACID)) {
      s.swap(x, y, nx, y)
      return true
    }
    if (neighbour !== OIL) break
  }
  return false
}

/** Drain: swallow one liquid cell from above, left or right, in that order. */
export function updateDrain(x: number, y: number, s: Sandbox): boolean {
  if (isLiquid(s.elementAt(x, y - 1))) s.clearCell(x, y - 1)
  else if (isLiquid(s.elementAt(x - 1, y))) s.clearCell(x - 1, y)
  else if (isLiquid(s.elementAt(x + 1, y))) s.clearCell(x + 1, y)
  return false
}
