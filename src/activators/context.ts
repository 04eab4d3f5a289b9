// ═══════════════════════════════════════════════════════════════════════════
// Compile Context - collaborators shared by every activator in one compile
// ═══════════════════════════════════════════════════════════════════════════

import { getCompilerConfig, type CompilerConfig } from '../config'
import { sceneNames, type NameRegistry } from '../scene/NameRegistry'
import type { SceneHost } from '../scene/SceneStore'

export interface CompileContext {
  scene: SceneHost
  names: NameRegistry
  /** Snapshot taken when the context was created */
  config: Readonly<CompilerConfig>
}

export interface CompileContextOptions {
  names?: NameRegistry
  config?: Partial<CompilerConfig>
}

export function createCompileContext(scene: SceneHost, options: CompileContextOptions = {}): CompileContext {
  return {
    scene,
    names: options.names ?? sceneNames,
    config: Object.freeze({ ...getCompilerConfig(), ...options.config }),
  }
}
