// Sandbox: the bordered cell grid and its mutation primitives.
// Per-cell state lives in parallel typed arrays; the outer ring is Indestructible
// for the lifetime of the grid, so every interior cell has 8 in-bounds neighbours.

import { AIR, LIFE, INDESTRUCTIBLE, ELEMENT_IDS, MIN_SANDBOX_SIZE, type ElementId } from './constants'
import { ELEMENT_FLAGS, ELEMENT_STRENGTH, F_COLOR_VARIANCE } from './elements'
import { createRNG, randomInt, timeSeed, type RNG } from './rng'

/** Snapshot of one grid position. */
export interface Cell {
  element: ElementId
  variant: number
  strength: number
  visited: boolean
  source: boolean
}

export class Sandbox {
  readonly width: number
  readonly height: number
  rand: RNG

  private readonly elements: Uint8Array
  private readonly variants: Uint8Array
  private readonly strengths: Uint8Array
  private readonly visited: Uint8Array
  private readonly sources: Uint8Array
  /** 1 where a Life cell stood when the current sweep began */
  private readonly lifeSnapshot: Uint8Array
  private visitedState = false

  constructor(width: number, height: number, rand: RNG = createRNG(timeSeed())) {
    if (!Number.isInteger(width) || !Number.isInteger(height) ||
      width < MIN_SANDBOX_SIZE || height < MIN_SANDBOX_SIZE) {
      throw new Error(`Invalid sandbox size ${width}x${height}: both dimensions must be integers >= ${MIN_SANDBOX_SIZE}`)
    }
    this.width = width
    this.height = height
    this.rand = rand
    const n = width * height
    this.elements = new Uint8Array(n)
    this.variants = new Uint8Array(n)
    this.strengths = new Uint8Array(n)
    this.visited = new Uint8Array(n)
    this.sources = new Uint8Array(n)
    this.lifeSnapshot = new Uint8Array(n)

    for (let x = 0; x < width; x++) {
      this.setElement(x, 0, INDESTRUCTIBLE)
      this.setElement(x, height - 1, INDESTRUCTIBLE)
    }
    for (let y = 0; y < height; y++) {
      this.setElement(0, y, INDESTRUCTIBLE)
      this.setElement(width - 1, y, INDESTRUCTIBLE)
    }
  }

  index(x: number, y: number): number {
    return x + y * this.width
  }

  isInBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) &&
      x >= 0 && x < this.width && y >= 0 && y < this.height
  }

  isInterior(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) &&
      x >= 1 && x < this.width - 1 && y >= 1 && y < this.height - 1
  }

  /** Fail fast for collaborators handing in coordinates they did not clamp. */
  assertInBounds(x: number, y: number): void {
    if (!this.isInBounds(x, y)) {
      throw new Error(`Cell (${x}, ${y}) is outside the ${this.width}x${this.height} sandbox`)
    }
  }

  get(x: number, y: number): Cell {
    const i = this.index(x, y)
    return {
      element: ELEMENT_IDS[this.elements[i]],
      variant: this.variants[i],
      strength: this.strengths[i],
      visited: this.visited[i] === 1,
      source: this.sources[i] === 1,
    }
  }

  elementAt(x: number, y: number): ElementId {
    return ELEMENT_IDS[this.elements[this.index(x, y)]]
  }

  strengthAt(x: number, y: number): number {
    return this.strengths[this.index(x, y)]
  }

  variantAt(x: number, y: number): number {
    return this.variants[this.index(x, y)]
  }

  isSource(x: number, y: number): boolean {
    return this.sources[this.index(x, y)] === 1
  }

  /** True when the cell was already produced or processed during the current sweep. */
  isVisited(x: number, y: number): boolean {
    return (this.visited[this.index(x, y)] === 1) === this.visitedState
  }

  /** Cosmetic only; stored modulo 256. */
  setVariant(x: number, y: number, variant: number): void {
    this.variants[this.index(x, y)] = variant
  }

  setElement(x: number, y: number, element: ElementId, source = false): void {
    const i = this.index(x, y)
    if (this.elements[i] === INDESTRUCTIBLE) return
    this.elements[i] = element
    this.visited[i] = this.visitedState ? 1 : 0
    this.strengths[i] = ELEMENT_STRENGTH[element]
    this.sources[i] = source ? 1 : 0
    if (ELEMENT_FLAGS[element] & F_COLOR_VARIANCE) {
      this.variants[i] = randomInt(this.rand, 256)
    }
  }

  /** Exchange two cells completely; both end up stamped with the current parity. */
  swap(x: number, y: number, x2: number, y2: number): void {
    const a = this.index(x, y)
    const b = this.index(x2, y2)
    if (this.elements[a] === INDESTRUCTIBLE || this.elements[b] === INDESTRUCTIBLE) return
    swapAt(this.elements, a, b)
    swapAt(this.variants, a, b)
    swapAt(this.strengths, a, b)
    swapAt(this.sources, a, b)
    const stamp = this.visitedState ? 1 : 0
    this.visited[a] = stamp
    this.visited[b] = stamp
  }

  /** Decrement strength while above 1. Returns false, untouched, once it can decay no further. */
  reduceStrength(x: number, y: number): boolean {
    const i = this.index(x, y)
    if (this.strengths[i] > 1) {
      this.strengths[i]--
      return true
    }
    return false
  }

  /**
   * Wear down the cell at (x, y) by one unit of its own strength. Once strength
   * is already 0 the cell is fully consumed and becomes `element`; returns true
   * only in that case. Indestructible cells never dissolve.
   */
  dissolveTo(x: number, y: number, element: ElementId): boolean {
    const i = this.index(x, y)
    if (this.elements[i] === INDESTRUCTIBLE) return false
    if (this.strengths[i] > 0) {
      this.strengths[i]--
      return false
    }
    this.setElement(x, y, element)
    return true
  }

  clearCell(x: number, y: number): void {
    this.setElement(x, y, AIR)
  }

  setVisited(x: number, y: number): void {
    this.visited[this.index(x, y)] = this.visitedState ? 1 : 0
  }

  toggleVisitedState(): boolean {
    this.visitedState = !this.visitedState
    return this.visitedState
  }

  isVisitedState(): boolean {
    return this.visitedState
  }

  /** Uniform integer in [0, max). */
  random(max: number): number {
    return randomInt(this.rand, max)
  }

  randomNeighbourX(x: number): number {
    return this.rand() < 0.5 ? x + 1 : x - 1
  }

  /** Reset the interior to Air; the border is untouched. */
  clear(): void {
    const stamp = this.visitedState ? 1 : 0
    const air = ELEMENT_STRENGTH[AIR]
    for (let y = 1; y < this.height - 1; y++) {
      for (let x = 1; x < this.width - 1; x++) {
        const i = this.index(x, y)
        this.elements[i] = AIR
        this.variants[i] = 0
        this.strengths[i] = air
        this.sources[i] = 0
        this.visited[i] = stamp
      }
    }
  }

  /** Record Life positions so every cell of one sweep counts neighbours from the same generation. */
  takeLifeSnapshot(): void {
    const { elements, lifeSnapshot } = this
    for (let i = 0; i < elements.length; i++) {
      lifeSnapshot[i] = elements[i] === LIFE ? 1 : 0
    }
  }

  /** Moore-neighbourhood Life count as of the last snapshot. Interior cells only. */
  livingNeighbours(x: number, y: number): number {
    const s = this.lifeSnapshot
    const w = this.width
    const p = this.index(x, y)
    return s[p - w - 1] + s[p - w] + s[p - w + 1] +
      s[p - 1] + s[p + 1] +
      s[p + w - 1] + s[p + w] + s[p + w + 1]
  }

  count(element: ElementId): number {
    let n = 0
    for (let i = 0; i < this.elements.length; i++) {
      if (this.elements[i] === element) n++
    }
    return n
  }
}

function swapAt(arr: Uint8Array, a: number, b: number): void {
  const t = arr[a]
  arr[a] = arr[b]
  arr[b] = t
}
