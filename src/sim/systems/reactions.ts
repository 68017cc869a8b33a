import { AIR, ACID, WATER, FIRE, ROCK, RUST, LAVA_COOLING_THRESHOLD } from '../constants'
import { burns, causesRust } from '../elements'
import type { Sandbox } from '../Sandbox'

/**
 * Lava: glows, cools into rock once weakened, throws the odd spark, and flows
 * down, then diagonally, then sideways, setting fuel alight on the way.
 */
export function updateLava(x: number, y: number, s: Sandbox): boolean {
  const random = s.random(500)
  s.setVariant(x, y, (s.variantAt(x, y) + random) % 255)

  if (random < 250 && s.strengthAt(x, y) < LAVA_COOLING_THRESHOLD && s.dissolveTo(x, y, ROCK)) {
    return true
  }

  if (random === 0 && s.elementAt(x, y - 1) === AIR) {
    s.setElement(x, y - 1, FIRE)
  }

  const down = touchLava(s, x, y, x, y + 1)
  if (down !== null) return down
  const nx = s.randomNeighbourX(x)
  const diagonal = touchLava(s, x, y, nx, y + 1)
  if (diagonal !== null) return diagonal
  const side = touchLava(s, x, y, nx, y)
  if (side !== null) return side
  return false
}

/** Returns null when lava neither moves into nor ignites the touched cell. */
export function touchLava(s: Sandbox, lx: number, ly: number, ox: number, oy: number): boolean | null {
  const element = s.elementAt(ox, oy)
  if (element === AIR || element === ACID || element === WATER || element === FIRE) {
    s.swap(lx, ly, ox, oy)
    return true
  }
  if (burns(element)) {
    s.dissolveTo(ox, oy, FIRE)
    return false
  }
  return null
}

/** Iron next to anything corrosive slowly loses strength and crumbles to rust. */
export function updateIron(x: number, y: number, s: Sandbox): boolean {
  const rustyNeighbour =
    causesRust(s.elementAt(x - 1, y)) ||
    causesRust(s.elementAt(x + 1, y)) ||
    causesRust(s.elementAt(x, y - 1)) ||
    causesRust(s.elementAt(x, y + 1))
  if (!rustyNeighbour) return false

  const random = s.random(5)
  if (random > 2 && !s.reduceStrength(x, y)) {
    s.setElement(x, y, RUST)
    return true
  }
  return false
}
