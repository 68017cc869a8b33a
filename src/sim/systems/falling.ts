import { AIR, WATER, FIRE, OIL, ACID } from '../constants'
import type { Sandbox } from '../Sandbox'

/**
 * Granular fall shared by Sand, Ash and Rust: drop through anything lighter,
 * sink through acid while it eats the grain, otherwise slide to one diagonal.
 */
export function updatePowder(x: number, y: number, s: Sandbox): boolean {
  const below = s.elementAt(x, y + 1)
  if (below === AIR || below === WATER || below === FIRE || below === OIL) {
    s.swap(x, y, x, y + 1)
    return true
  }
  if (below === ACID) return sinkInAcid(x, y, x, s)

  const nx = s.randomNeighbourX(x)
  const diagonal = s.elementAt(nx, y + 1)
  if (diagonal === AIR || diagonal === WATER) {
    s.swap(x, y, nx, y + 1)
    return true
  }
  if (diagonal === ACID) return sinkInAcid(x, y, nx, s)
  return false
}

// The grain's own strength is what the acid wears down. Once it is spent the
// grain and the acid that consumed it both turn to air; until then it keeps sinking.
function sinkInAcid(x: number, y: number, acidX: number, s: Sandbox): boolean {
  if (s.dissolveTo(x, y, AIR)) {
    s.clearCell(acidX, y + 1)
    return true
  }
  s.swap(x, y, acidX, y + 1)
  return true
}
