// ═══════════════════════════════════════════════════════════════════════════
// Compiler Configuration
// ═══════════════════════════════════════════════════════════════════════════

import { ValidationError } from './errors'

export interface CompilerConfig {
  /** Host logic tick rate; converts seconds into ticks */
  ticksPerSecond: number
  /** Generated modules are named `<prefix>.<baseObjectName>` */
  logicModulePrefix: string
  /** Syntax-check every emitted Lua module before returning it */
  checkGeneratedLogic: boolean
  /** Print debug output from the compiler */
  verbose: boolean
}

export const DEFAULT_COMPILER_CONFIG: Readonly<CompilerConfig> = Object.freeze({
  ticksPerSecond: 60,
  logicModulePrefix: 'logic',
  checkGeneratedLogic: true,
  verbose: false,
})

let current: Readonly<CompilerConfig> = DEFAULT_COMPILER_CONFIG

function validateConfig(config: CompilerConfig): Readonly<CompilerConfig> {
  if (!Number.isInteger(config.ticksPerSecond) || config.ticksPerSecond <= 0) {
    throw new ValidationError(`ticksPerSecond must be a positive integer, got ${config.ticksPerSecond}`)
  }
  if (!/^[A-Za-z_][A-Za-z0-9_.]*$/.test(config.logicModulePrefix)) {
    throw new ValidationError(`Invalid logic module prefix '${config.logicModulePrefix}'`)
  }
  return Object.freeze({ ...config })
}

/**
 * Merge overrides into the process-wide configuration.
 */
export function configureCompiler(overrides: Partial<CompilerConfig>): Readonly<CompilerConfig> {
  current = validateConfig({ ...current, ...overrides })
  return current
}

export function getCompilerConfig(): Readonly<CompilerConfig> {
  return current
}

export function resetCompilerConfig(): void {
  current = DEFAULT_COMPILER_CONFIG
}

/**
 * Convert a span in seconds to whole ticks, rounding up.
 * The epsilon keeps 0.3s at 10 ticks/s at 3 ticks instead of 4.
 */
export function secondsToTicks(seconds: number, ticksPerSecond: number): number {
  if (seconds <= 0) return 0
  return Math.ceil(seconds * ticksPerSecond - 1e-9)
}
