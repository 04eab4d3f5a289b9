// ═══════════════════════════════════════════════════════════════════════════
// sceneweave - declarative VR scene behaviour compiled to activator graphs
// ═══════════════════════════════════════════════════════════════════════════

export * from './errors'
export * from './config'
export { createLogger, type Logger } from './logging'

// Scene records
export * from './scene/geometry'
export * from './scene/document'
export * from './scene/actions'
export * from './scene/timeline'
export * from './scene/triggers'
export * from './scene/link'
export * from './scene/NameRegistry'
export * from './scene/SceneStore'

// Compiler
export * from './activators/graph'
export * from './activators/spatial'
export * from './activators/clickState'
export * from './activators/context'
export { Activator, type CompiledActivator } from './activators/Activator'
export { TimelineActivator } from './activators/TimelineActivator'
export { RegionTriggerActivator } from './activators/RegionTriggerActivator'
export { ClickLinkActivator } from './activators/ClickLinkActivator'
export * from './activators/compile'
export * from './activators/reactFlow'

// Host logic
export { emitLogic, luaString, luaNumber } from './logic/luaEmitter'
export { LuaRuntime, getLuaRuntime, type LuaResult } from './logic/LuaRuntime'

// Preview
export * from './runtime/ActivatorRuntime'
export { AssetCache, type AssetCacheOptions } from './assets/AssetCache'
