// ═══════════════════════════════════════════════════════════════════════════
// Activator - the compile protocol shared by timelines, triggers and links
//
// createNodes()  claim the carrier name, allocate state fields and nodes
// linkNodes()    wire conditions to the activation and dispatch nodes
// writeLogic()   emit the host logic module for the finished graph
//
// Steps run strictly in that order, once each.
// ═══════════════════════════════════════════════════════════════════════════

import { GeneratedLogicError, PreconditionError } from '../errors'
import { createLogger } from '../logging'
import { emitLogic } from '../logic/luaEmitter'
import { getLuaRuntime } from '../logic/LuaRuntime'
import type { CompileContext } from './context'
import { ActivatorGraphBuilder, type ActivatorGraph, type GraphKind } from './graph'

const log = createLogger('Activator')

type Phase = 'new' | 'created' | 'linked' | 'written'

export interface CompiledActivator {
  graph: ActivatorGraph
  /** Generated Lua module text */
  logic: string
}

export abstract class Activator {
  abstract readonly kind: GraphKind
  private phase: Phase = 'new'
  private builder: ActivatorGraphBuilder | null = null
  private graph: ActivatorGraph | null = null

  constructor(protected readonly context: CompileContext) {}

  /** Carrier object name in the host namespace */
  abstract get baseObjectName(): string

  /** Name of the record the graph is built from */
  protected abstract get sourceName(): string

  protected abstract allocate(builder: ActivatorGraphBuilder): void

  protected abstract wire(builder: ActivatorGraphBuilder): void

  get logicModule(): string {
    return `${this.context.config.logicModulePrefix}.${this.baseObjectName}`
  }

  createNodes(): void {
    if (this.phase !== 'new') {
      throw new PreconditionError(`Nodes for ${this.baseObjectName} were already created`)
    }
    const names = this.context.names.getState()
    names.claim(this.baseObjectName, 'logic')
    const builder = new ActivatorGraphBuilder(this.baseObjectName, this.kind, this.sourceName, this.logicModule)
    try {
      this.allocate(builder)
    } catch (err) {
      names.release(this.baseObjectName)
      throw err
    }
    this.builder = builder
    this.phase = 'created'
  }

  linkNodes(): void {
    if (this.phase !== 'created' || !this.builder) {
      throw new PreconditionError(`Nodes for ${this.baseObjectName} must be created before they can be linked`)
    }
    this.wire(this.builder)
    this.graph = this.builder.build()
    this.phase = 'linked'
  }

  writeLogic(): string {
    if (this.phase !== 'linked' || !this.graph) {
      throw new PreconditionError(`Logic for ${this.baseObjectName} can only be written once its nodes are linked`)
    }
    const logic = emitLogic(this.graph)
    if (this.context.config.checkGeneratedLogic) {
      try {
        getLuaRuntime().check(logic, this.logicModule)
      } catch (err) {
        if (err instanceof GeneratedLogicError) {
          log.error(`Generated logic for ${this.baseObjectName} failed the syntax check`)
        }
        throw err
      }
    }
    this.phase = 'written'
    log.debug(`Wrote ${this.logicModule} (${this.graph.nodes.length} nodes)`)
    return logic
  }

  getGraph(): ActivatorGraph {
    if (!this.graph) {
      throw new PreconditionError(`${this.baseObjectName} has not been linked yet`)
    }
    return this.graph
  }

  compile(): CompiledActivator {
    this.createNodes()
    this.linkNodes()
    const logic = this.writeLogic()
    return { graph: this.getGraph(), logic }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Trigger family
// ─────────────────────────────────────────────────────────────────────────────

export interface TriggerNodeIds {
  pulse: string
  /** Detect node of a region, click node of a link */
  condition: string
  activate: string
  dispatch: string[]
  disable: string | null
}

/**
 * Pulse and condition feed the activation, which fans out to the dispatch
 * nodes and the disable node.
 */
export function linkTriggerNodes(builder: ActivatorGraphBuilder, ids: TriggerNodeIds): void {
  builder.link(ids.pulse, ids.activate)
  builder.link(ids.condition, ids.activate)
  for (const dispatch of ids.dispatch) {
    builder.link(ids.activate, dispatch)
  }
  if (ids.disable) builder.link(ids.activate, ids.disable)
}
