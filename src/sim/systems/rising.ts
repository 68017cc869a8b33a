import { AIR, FIRE, SMOKE, ASH } from '../constants'
import { burns, isLiquid, isSolid } from '../elements'
import type { Sandbox } from '../Sandbox'

export function updateFire(x: number, y: number, s: Sandbox): boolean {
  const random = s.random(5)
  // Burn out into smoke
  if (random > 3 && !s.reduceStrength(x, y)) {
    s.setElement(x, y, SMOKE)
    return true
  }
  // Flicker
  s.setVariant(x, y, (s.variantAt(x, y) + random * 10) % 255)

  // Wander with a pull upwards: down, right, left, then up for the remaining two draws
  let nx = x, ny = y
  if (random === 0) ny = y + 1
  else if (random === 1) nx = x + 1
  else if (random === 2) nx = x - 1
  else ny = y - 1

  const element = s.elementAt(nx, ny)
  if (element === AIR) {
    s.swap(x, y, nx, ny)
    return true
  }
  if (burns(element)) {
    // Solid fuel caught on a decay roll chars to ash instead of catching
    s.dissolveTo(nx, ny, isSolid(element) && random > 3 ? ASH : FIRE)
  }
  return false
}

export function updateSmoke(x: number, y: number, s: Sandbox): boolean {
  const random = s.random(5)
  if (random > 2 && !s.reduceStrength(x, y)) {
    s.clearCell(x, y)
    return true
  }

  let nx = x, ny = y
  if (random === 0) nx = x + 1
  else if (random === 1) nx = x - 1
  else ny = y - 1

  const neighbour = s.elementAt(nx, ny)
  if (neighbour === AIR) {
    s.swap(x, y, nx, ny)
    return true
  }
  if (neighbour === FIRE || isLiquid(neighbour)) {
    s.clearCell(x, y)
    return true
  }
  return false
}
