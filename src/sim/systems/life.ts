import { AIR, LIFE } from '../constants'
import type { Sandbox } from '../Sandbox'

// Conway's B3/S23 on the Moore neighbourhood. Counts come from the snapshot the
// sweep takes before it starts, so births and deaths earlier in the same sweep
// do not leak into later cells.

export function updateAir(x: number, y: number, s: Sandbox): boolean {
  if (s.livingNeighbours(x, y) === 3) {
    s.setElement(x, y, LIFE)
    return true
  }
  return false
}

export function updateLife(x: number, y: number, s: Sandbox): boolean {
  const n = s.livingNeighbours(x, y)
  if (n < 2 || n > 3) {
    s.setElement(x, y, AIR)
    return true
  }
  return false
}
