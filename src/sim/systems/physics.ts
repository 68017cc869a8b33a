import {
  AIR, SAND, WOOD, IRON, RUST, ROCK, WATER, ACID, OIL, LAVA,
  FIRE, ASH, SMOKE, LIFE, PLANT, DRAIN, INDESTRUCTIBLE,
  WATER_SOURCE, ACID_SOURCE, OIL_SOURCE, LAVA_SOURCE, FIRE_SOURCE,
} from '../constants'
import type { Sandbox } from '../Sandbox'
import { updatePowder } from './falling'
import { updateWater, updateAcid, updateOil, updateDrain } from './liquid'
import { updateFire, updateSmoke } from './rising'
import { updateLava, updateIron } from './reactions'
import { updatePlant } from './growing'
import { updateSource } from './spawners'
import { updateAir, updateLife } from './life'

/**
 * Run the rule for the element at (x, y). Returns true when the rule already
 * stamped the origin (it moved, or became something new).
 */
export function updateCell(x: number, y: number, s: Sandbox): boolean {
  const element = s.elementAt(x, y)
  switch (element) {
    case AIR: return updateAir(x, y, s)
    case SAND:
    case ASH:
    case RUST: return updatePowder(x, y, s)
    case WATER: return updateWater(x, y, s)
    case ACID: return updateAcid(x, y, s)
    case OIL: return updateOil(x, y, s)
    case DRAIN: return updateDrain(x, y, s)
    case FIRE: return updateFire(x, y, s)
    case LAVA: return updateLava(x, y, s)
    case SMOKE: return updateSmoke(x, y, s)
    case LIFE: return updateLife(x, y, s)
    case IRON: return updateIron(x, y, s)
    case PLANT: return updatePlant(x, y, s)
    case WATER_SOURCE: return updateSource(x, y, s, WATER)
    case ACID_SOURCE: return updateSource(x, y, s, ACID)
    case OIL_SOURCE: return updateSource(x, y, s, OIL)
    case LAVA_SOURCE: return updateSource(x, y, s, LAVA)
    case FIRE_SOURCE: return updateSource(x, y, s, FIRE)
    case WOOD:
    case ROCK:
    case INDESTRUCTIBLE: return false
    default: {
      const unhandled: never = element
      throw new Error(`No rule for element ${String(unhandled)}`)
    }
  }
}

/**
 * One bottom-up sweep over the interior. Rows run from the floor up so falling
 * matter settles in a single pass; the horizontal direction follows the parity
 * so lateral flow has no fixed bias.
 */
export function sandboxPhysicsSystem(s: Sandbox): void {
  const parity = s.toggleVisitedState()
  s.takeLifeSnapshot()
  const right = s.width - 2

  for (let y = s.height - 2; y >= 1; y--) {
    if (parity) {
      for (let x = 1; x <= right; x++) visit(x, y, s)
    } else {
      for (let x = right; x >= 1; x--) visit(x, y, s)
    }
  }
}

function visit(x: number, y: number, s: Sandbox): void {
  if (s.isVisited(x, y)) return
  if (!updateCell(x, y, s)) s.setVisited(x, y)
}
