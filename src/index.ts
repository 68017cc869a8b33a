export * from './sim/constants'
export {
  ELEMENTS, ELEMENT_FLAGS, ELEMENT_STRENGTH,
  burns, causesRust, growsPlant, dissolvesInAcid, isLiquid, isSolid, isSourceElement,
} from './sim/elements'
export type { ElementDef, ElementForm } from './sim/elements'
export { Sandbox } from './sim/Sandbox'
export type { Cell } from './sim/Sandbox'
export { Simulation } from './sim/Simulation'
export { Toolbox, paint, isToolShape } from './sim/toolbox'
export type { ToolShape } from './sim/toolbox'
export { createRNG, randomInt } from './sim/rng'
export type { RNG } from './sim/rng'
export { parseSimulationConfig, SimulationConfigSchema } from './sim/config'
export type { SimulationConfig, SimulationConfigInput } from './sim/config'
export { updateCell, sandboxPhysicsSystem } from './sim/systems/physics'
export { createLogger, resolveLogLevel } from './logger'
export type { Logger, LogLevel } from './logger'
