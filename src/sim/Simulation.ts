// Simulation: headless, testable simulation context.
// Owns the sandbox plus the run/step state that decides whether a tick sweeps.

import { Sandbox } from './Sandbox'
import { createRNG } from './rng'
import type { RNG } from './rng'
import { parseSimulationConfig, type SimulationConfigInput } from './config'
import { sandboxPhysicsSystem } from './systems/physics'
import { createLogger } from '../logger'

const log = createLogger('simulation')

export class Simulation {
  sandbox: Sandbox
  rand: RNG
  running: boolean
  /** A single tick was requested while paused; consumed by the next advanceTick(). */
  stepRequested = false
  /** Wall-clock duration of the last advanceTick() call, diagnostics only. */
  frameTimeMs = 0
  simStep = 0
  initialSeed: number

  constructor(options: SimulationConfigInput = {}, rand?: RNG) {
    const config = parseSimulationConfig(options)
    this.initialSeed = config.seed
    this.rand = rand ?? createRNG(config.seed)
    this.running = config.running
    this.sandbox = new Sandbox(config.width, config.height, this.rand)
    log.info(`Sandbox created ${config.width}x${config.height} (seed ${config.seed})`)
  }

  /** Advance the simulation by one physics tick, if running or a step is pending. */
  advanceTick(): boolean {
    const start = performance.now()
    const shouldRun = this.running || this.stepRequested
    if (shouldRun) {
      this.stepRequested = false
      sandboxPhysicsSystem(this.sandbox)
      this.simStep++
    }
    this.frameTimeMs = performance.now() - start
    if (shouldRun) log.verbose(`Tick ${this.simStep} took ${this.frameTimeMs.toFixed(3)} ms`)
    return shouldRun
  }

  requestStep(): void {
    this.stepRequested = true
  }

  setRunning(running: boolean): void {
    this.running = running
  }

  /** Reset the interior to Air, keeping size, seed state and step count. */
  clear(): void {
    this.sandbox.clear()
    log.info('Sandbox cleared')
  }

  /** Replace the sandbox with an empty one of a new size. */
  resize(width: number, height: number): void {
    const config = parseSimulationConfig({ width, height, seed: this.initialSeed, running: this.running })
    this.sandbox = new Sandbox(config.width, config.height, this.rand)
    log.info(`Sandbox resized to ${config.width}x${config.height}`)
  }

  /** Fresh empty sandbox at the current size, reseeded, step counter zeroed. */
  reset(seed?: number): void {
    const config = parseSimulationConfig({
      width: this.sandbox.width, height: this.sandbox.height, seed, running: this.running,
    })
    this.initialSeed = config.seed
    this.rand = createRNG(config.seed)
    this.sandbox = new Sandbox(config.width, config.height, this.rand)
    this.simStep = 0
    this.stepRequested = false
    log.info(`Sandbox reset (seed ${config.seed})`)
  }
}
