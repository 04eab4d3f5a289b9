// ═══════════════════════════════════════════════════════════════════════════
// Logging - tagged console output, debug gated by the compiler config
// ═══════════════════════════════════════════════════════════════════════════

import { getCompilerConfig } from './config'

export interface Logger {
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`
  return {
    debug: (...args) => {
      if (getCompilerConfig().verbose) console.debug(prefix, ...args)
    },
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  }
}
