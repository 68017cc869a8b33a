import type { ElementId } from '../constants'
import type { Sandbox } from '../Sandbox'

/** Keep the cell below filled with the emitted element. The source itself never moves. */
export function updateSource(x: number, y: number, s: Sandbox, emits: ElementId): boolean {
  if (s.elementAt(x, y + 1) !== emits) s.setElement(x, y + 1, emits)
  return false
}
