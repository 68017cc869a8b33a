import { PLANT, PLANT_GROWTH_ROLLS, PLANT_GROWTH_HITS } from '../constants'
import { growsPlant } from '../elements'
import type { Sandbox } from '../Sandbox'

// Orthogonal neighbour offsets: left, right, up, down
const GROWTH_OFFSETS = [-1, 0, 1, 0, 0, -1, 0, 1] as const

/**
 * Plant spreads into orthogonal neighbours that feed it. Each neighbour gets
 * its own roll, drawn whether or not it can grow.
 */
export function updatePlant(x: number, y: number, s: Sandbox): boolean {
  let grown = 0
  for (let i = 0; i < GROWTH_OFFSETS.length; i += 2) {
    const nx = x + GROWTH_OFFSETS[i], ny = y + GROWTH_OFFSETS[i + 1]
    if (s.random(PLANT_GROWTH_ROLLS) < PLANT_GROWTH_HITS && growsPlant(s.elementAt(nx, ny))) {
      s.setElement(nx, ny, PLANT)
      grown++
    }
  }
  if (grown === 0) return false
  s.setVisited(x, y)
  return true
}
