import type { ElementId } from '../constants'
import type { RNG } from '../rng'
import type { Cell, Sandbox } from '../Sandbox'

/** RNG that replays the given values in a loop, so tests can force every branch. */
export function fixedRNG(...values: number[]): RNG {
  let i = 0
  const rng = () => {
    const v = values[i % values.length]
    i++
    return v
  }
  return Object.assign(rng, {
    getState: () => i,
    setState: (state: number) => { i = state },
  })
}

export function dumpCells(s: Sandbox): Cell[] {
  const cells: Cell[] = []
  for (let y = 0; y < s.height; y++) {
    for (let x = 0; x < s.width; x++) cells.push(s.get(x, y))
  }
  return cells
}

export function positionsOf(s: Sandbox, element: ElementId): string[] {
  const found: string[] = []
  for (let y = 0; y < s.height; y++) {
    for (let x = 0; x < s.width; x++) {
      if (s.elementAt(x, y) === element) found.push(`${x},${y}`)
    }
  }
  return found
}
