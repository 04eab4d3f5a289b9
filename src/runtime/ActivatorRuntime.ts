// ═══════════════════════════════════════════════════════════════════════════
// Activator Runtime
// Evaluates compiled activator graphs one tick at a time, the way the host
// engine runs the generated logic. Used for previews and tests; it has no
// loop of its own.
//
// Per tick:
//   1. every loaded graph is evaluated (pulse -> condition -> activate)
//   2. clicks queued by link `activate` actions are delivered
//   3. effects of the dispatched actions on other graphs are applied, so
//      they are observed from the next tick on
// ═══════════════════════════════════════════════════════════════════════════

import { PreconditionError } from '../errors'
import { createLogger } from '../logging'
import type { Action } from '../scene/actions'
import type { SceneHost } from '../scene/SceneStore'
import { selectClickBinding, advanceClickCount, type ClickBinding } from '../activators/clickState'
import {
  findNode,
  getNode,
  initialHolderState,
  nodesOfKind,
  successors,
  type ActivateNode,
  type ActivatorGraph,
  type GraphKind,
  type HolderState,
} from '../activators/graph'
import { evaluateContainment, type ContainmentPredicate } from '../activators/spatial'

const log = createLogger('ActivatorRuntime')

export interface DispatchEvent {
  /** Carrier object of the graph that fired */
  graph: string
  nodeId: string
  action: Action
  tick: number
}

export type DispatchListener = (event: DispatchEvent) => void

// ─────────────────────────────────────────────────────────────────────────────
// Loaded graphs
// ─────────────────────────────────────────────────────────────────────────────

interface TimelineProgram {
  kind: 'timeline'
  ticksPerSecond: number
  lastTime: number
  schedule: Array<{ time: number; dispatch: string[] }>
}

interface RegionProgram {
  kind: 'region'
  predicate: ContainmentPredicate
  activate: ActivateNode
  dispatch: string[]
  remainEnabled: boolean
}

interface LinkProgram {
  kind: 'link'
  reset: number
  bindings: readonly ClickBinding[]
  remainEnabled: boolean
}

type Program = TimelineProgram | RegionProgram | LinkProgram

/** Counters private to a graph's logic, not part of its state holder */
interface Memory {
  held: number
  active: number
  tick: number
}

interface LoadedGraph {
  graph: ActivatorGraph
  program: Program
  state: HolderState
  memory: Memory
}

function freshMemory(): Memory {
  return { held: 0, active: 0, tick: -1 }
}

function dispatchTargets(graph: ActivatorGraph, from: string): string[] {
  return successors(graph, from).filter(id => getNode(graph, id)?.kind === 'dispatch')
}

function requireNode<T>(node: T | undefined, graph: ActivatorGraph, kind: string): T {
  if (node === undefined) {
    throw new PreconditionError(`${graph.baseObjectName} has no ${kind} node`)
  }
  return node
}

function toProgram(graph: ActivatorGraph): Program {
  const remainEnabled = nodesOfKind(graph, 'disable').length === 0
  switch (graph.kind) {
    case 'timeline': {
      const clock = requireNode(findNode(graph, 'clock'), graph, 'clock')
      return {
        kind: 'timeline',
        ticksPerSecond: clock.ticksPerSecond,
        lastTime: clock.lastTime,
        schedule: nodesOfKind(graph, 'schedule').map(node => ({
          time: node.time,
          dispatch: dispatchTargets(graph, node.id),
        })),
      }
    }
    case 'region': {
      const detect = requireNode(findNode(graph, 'detect'), graph, 'detect')
      const activate = requireNode(findNode(graph, 'activate'), graph, 'activate')
      return {
        kind: 'region',
        predicate: detect.predicate,
        activate,
        dispatch: dispatchTargets(graph, activate.id),
        remainEnabled,
      }
    }
    case 'link': {
      const click = requireNode(findNode(graph, 'click'), graph, 'click')
      return {
        kind: 'link',
        reset: click.reset,
        bindings: click.bindings,
        remainEnabled,
      }
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Runtime
// ─────────────────────────────────────────────────────────────────────────────

export class ActivatorRuntime {
  private graphs: Map<string, LoadedGraph> = new Map()
  private listeners: Set<DispatchListener> = new Set()
  private queuedClicks: string[] = []
  private tickCount = 0

  constructor(private readonly scene: SceneHost) {}

  load(graph: ActivatorGraph): void {
    if (this.graphs.has(graph.baseObjectName)) {
      throw new PreconditionError(`${graph.baseObjectName} is already loaded`)
    }
    this.graphs.set(graph.baseObjectName, {
      graph,
      program: toProgram(graph),
      state: initialHolderState(graph),
      memory: freshMemory(),
    })
    log.debug(`Loaded ${graph.baseObjectName}`)
  }

  unload(baseObjectName: string): boolean {
    return this.graphs.delete(baseObjectName)
  }

  getState(baseObjectName: string): Readonly<HolderState> | undefined {
    const loaded = this.graphs.get(baseObjectName)
    return loaded ? { ...loaded.state } : undefined
  }

  /**
   * Subscribe to dispatched actions. Returns an unsubscribe function.
   */
  onDispatch(listener: DispatchListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  tick(): void {
    this.tickCount++
    const effects: Action[] = []

    for (const loaded of this.graphs.values()) {
      this.evaluate(loaded, effects)
    }

    const queued = this.queuedClicks
    this.queuedClicks = []
    for (const object of queued) {
      const link = this.find('link', object)
      if (link) this.deliverClick(link, effects)
    }

    this.applyActions(effects)
  }

  run(ticks: number): void {
    for (let i = 0; i < ticks; i++) this.tick()
  }

  /**
   * Deliver a click to the link on `object`. Returns whether any action was
   * dispatched.
   */
  click(object: string): boolean {
    const link = this.find('link', object)
    if (!link) {
      log.warn(`No link is loaded for '${object}'`)
      return false
    }
    const effects: Action[] = []
    const fired = this.deliverClick(link, effects)
    this.applyActions(effects)
    return fired
  }

  /**
   * Return every loaded graph to its initial state.
   */
  reset(): void {
    for (const loaded of this.graphs.values()) {
      loaded.state = initialHolderState(loaded.graph)
      loaded.memory = freshMemory()
    }
    this.queuedClicks = []
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Evaluation
  // ─────────────────────────────────────────────────────────────────────────

  private evaluate(loaded: LoadedGraph, effects: Action[]): void {
    const { program } = loaded
    switch (program.kind) {
      case 'timeline':
        this.advanceTimeline(loaded, program, effects)
        break
      case 'region':
        this.activateRegion(loaded, program, effects)
        break
      case 'link':
        if (loaded.state.status === 'Start') this.countDown(loaded)
        break
    }
  }

  private advanceTimeline(loaded: LoadedGraph, program: TimelineProgram, effects: Action[]): void {
    const { state, memory } = loaded
    if (state.status !== 'Start') return

    const before = memory.tick / program.ticksPerSecond
    memory.tick++
    const now = memory.tick / program.ticksPerSecond

    for (const entry of program.schedule) {
      if (before < entry.time && entry.time <= now) {
        for (const id of entry.dispatch) this.dispatch(loaded, id, effects)
      }
    }
    if (now >= program.lastTime) state.status = 'Stop'
  }

  /**
   * The tick that ends the span only returns the status to Stop.
   */
  private countDown(loaded: LoadedGraph): void {
    const { state, memory } = loaded
    memory.active--
    if (memory.active <= 0) state.status = 'Stop'
  }

  private activateRegion(loaded: LoadedGraph, program: RegionProgram, effects: Action[]): void {
    const { state, memory } = loaded
    if (state.status === 'Start') {
      this.countDown(loaded)
      return
    }

    const detected = state.enabled === true && evaluateContainment(program.predicate, name => this.scene.getPosition(name))
    if (!detected) {
      memory.held = 0
      return
    }

    memory.held++
    if (memory.held < program.activate.sustainTicks) return
    memory.held = 0
    this.fire(loaded, program.activate.activeTicks, program.dispatch, program.remainEnabled, effects)
  }

  private deliverClick(loaded: LoadedGraph, effects: Action[]): boolean {
    const { program, state } = loaded
    if (program.kind !== 'link') return false
    if (state.enabled !== true || state.status !== 'Stop') return false

    const { click, count } = advanceClickCount(state.clicks ?? 0, program.reset)
    state.clicks = count

    const binding = selectClickBinding(program.bindings, click)
    if (!binding || binding.dispatch.length === 0) return false
    this.fire(loaded, binding.activeTicks, binding.dispatch, program.remainEnabled, effects)
    return true
  }

  private fire(
    loaded: LoadedGraph,
    activeTicks: number,
    ids: readonly string[],
    remainEnabled: boolean,
    effects: Action[]
  ): void {
    loaded.state.status = 'Start'
    loaded.memory.active = Math.max(1, activeTicks)
    for (const id of ids) this.dispatch(loaded, id, effects)
    if (!remainEnabled) loaded.state.enabled = false
  }

  private dispatch(loaded: LoadedGraph, nodeId: string, effects: Action[]): void {
    const node = getNode(loaded.graph, nodeId)
    if (node?.kind !== 'dispatch') return

    log.debug(`${loaded.graph.baseObjectName} dispatched ${nodeId}`)
    effects.push(node.action)
    const event: DispatchEvent = {
      graph: loaded.graph.baseObjectName,
      nodeId,
      action: node.action,
      tick: this.tickCount,
    }
    for (const listener of this.listeners) listener(event)
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Effects on other graphs
  // ─────────────────────────────────────────────────────────────────────────

  private find(kind: GraphKind, sourceName: string): LoadedGraph | undefined {
    for (const loaded of this.graphs.values()) {
      if (loaded.graph.kind === kind && loaded.graph.sourceName === sourceName) return loaded
    }
    return undefined
  }

  /**
   * Apply the effects of dispatched actions on loaded graphs: timeline
   * changes, trigger enable flags, link changes and scene resets. Scene
   * effects (move, visibility, sound, group) are left to the host.
   */
  applyActions(effects: readonly Action[]): void {
    let resetRequested = false

    for (const action of effects) {
      switch (action.type) {
        case 'timeline': {
          const timeline = this.find('timeline', action.target)
          if (!timeline) {
            log.warn(`Timeline '${action.target}' is not loaded`)
            break
          }
          const { state, memory } = timeline
          if (action.change === 'start' || (action.change === 'start-if-not-started' && state.status === 'Stop' && memory.tick === -1)) {
            memory.tick = -1
            state.status = 'Start'
          } else if (action.change === 'stop') {
            state.status = 'Stop'
          } else if (action.change === 'continue') {
            state.status = 'Start'
          }
          break
        }
        case 'event': {
          const trigger = this.find('region', action.target)
          if (!trigger) {
            log.warn(`Trigger '${action.target}' is not loaded`)
            break
          }
          trigger.state.enabled = action.enable
          break
        }
        case 'link': {
          const link = this.find('link', action.target)
          if (!link) {
            log.warn(`Link on '${action.target}' is not loaded`)
            break
          }
          if (action.change === 'activate') {
            this.queuedClicks.push(action.target)
          } else {
            link.state.enabled = action.change === 'enable'
          }
          break
        }
        case 'reset':
          resetRequested = true
          break
        default:
          // scene effects (move, visibility, sound, group) belong to the host
          break
      }
    }

    if (resetRequested) this.reset()
  }
}
