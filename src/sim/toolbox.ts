// Toolbox: the editing tools an input layer applies at grid coordinates.
// Every write goes through Sandbox.setElement, so the border stays intact.

import { AIR, MIN_TOOL_SIZE, MAX_TOOL_SIZE, SPRAY_DENSITY, isElementId, type ElementId } from './constants'
import { isSourceElement } from './elements'
import type { Sandbox } from './Sandbox'

export type ToolShape = 'pixel' | 'circle' | 'square' | 'spray' | 'fill'

const TOOL_SHAPES: readonly ToolShape[] = ['pixel', 'circle', 'square', 'spray', 'fill']

export function isToolShape(value: string): value is ToolShape {
  return TOOL_SHAPES.some((shape) => shape === value)
}

export class Toolbox {
  element: ElementId
  shape: ToolShape
  private toolSize: number

  constructor(element: ElementId = AIR, shape: ToolShape = 'circle', size = 4) {
    this.element = element
    this.shape = shape
    this.toolSize = clampSize(size)
  }

  get size(): number { return this.toolSize }
  set size(value: number) { this.toolSize = clampSize(value) }

  /** Pick the element by numeric ID, as received from an untyped UI layer. */
  selectElement(id: number): void {
    if (!isElementId(id)) throw new Error(`Unknown element id ${id}`)
    this.element = id
  }

  selectShape(shape: string): void {
    if (!isToolShape(shape)) throw new Error(`Unknown tool shape "${shape}"`)
    this.shape = shape
  }

  /** Apply the current tool at (x, y). Border positions are ignored; off-grid ones throw. */
  apply(s: Sandbox, x: number, y: number): void {
    s.assertInBounds(x, y)
    paint(s, x, y, this.element, this.shape, this.toolSize)
  }

  /** Apply the current shape with Air, leaving the selected element alone. */
  erase(s: Sandbox, x: number, y: number): void {
    s.assertInBounds(x, y)
    paint(s, x, y, AIR, this.shape, this.toolSize)
  }
}

function clampSize(size: number): number {
  if (!Number.isFinite(size)) throw new Error(`Invalid tool size ${size}`)
  return Math.min(MAX_TOOL_SIZE, Math.max(MIN_TOOL_SIZE, Math.round(size)))
}

export function paint(s: Sandbox, x: number, y: number, element: ElementId, shape: ToolShape, size: number): void {
  if (!s.isInterior(x, y)) return
  switch (shape) {
    case 'pixel':
      placeElement(s, x, y, element)
      break
    case 'circle':
      paintArea(s, x, y, size, element, true, 1)
      break
    case 'square':
      paintArea(s, x, y, size, element, false, 1)
      break
    case 'spray':
      paintArea(s, x, y, size, element, true, SPRAY_DENSITY)
      break
    case 'fill':
      floodFill(s, x, y, element)
      break
  }
}

// Rewriting an identical cell would reset its strength and variant
function placeElement(s: Sandbox, x: number, y: number, element: ElementId): void {
  const source = isSourceElement(element)
  if (s.elementAt(x, y) === element && s.isSource(x, y) === source) return
  s.setElement(x, y, element, source)
}

/** Fill a disc (or square) around a cell; with density > 1 only about one cell in `density` is painted. */
function paintArea(
  s: Sandbox, cx: number, cy: number, radius: number,
  element: ElementId, round: boolean, density: number
): void {
  for (let dy = -radius; dy <= radius; dy++) {
    for (let dx = -radius; dx <= radius; dx++) {
      if (round && dx * dx + dy * dy > radius * radius) continue
      const nx = cx + dx, ny = cy + dy
      if (!s.isInterior(nx, ny)) continue
      if (density > 1 && s.random(density) !== 0) continue
      placeElement(s, nx, ny, element)
    }
  }
}

/** 4-connected flood fill of the region sharing the start cell's element. */
function floodFill(s: Sandbox, x: number, y: number, element: ElementId): void {
  const target = s.elementAt(x, y)
  if (target === element) return
  const stack: number[] = [x, y]
  while (stack.length > 0) {
    const py = stack.pop() ?? 0
    const px = stack.pop() ?? 0
    if (!s.isInterior(px, py) || s.elementAt(px, py) !== target) continue
    placeElement(s, px, py, element)
    stack.push(px - 1, py, px + 1, py, px, py - 1, px, py + 1)
  }
}
