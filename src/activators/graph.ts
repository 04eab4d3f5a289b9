// ═══════════════════════════════════════════════════════════════════════════
// Activator Graph
// Compiled output for one timeline, trigger or link: the fields of its state
// holder, condition nodes and the dispatch nodes they fire. Node ids are
// namespaced by the carrier object, `<baseObjectName>.<local id>`.
// ═══════════════════════════════════════════════════════════════════════════

import { PreconditionError } from '../errors'
import type { Action } from '../scene/actions'
import type { ClickCount } from '../scene/link'
import type { ClickBinding } from './clickState'
import type { ContainmentPredicate } from './spatial'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type GraphKind = 'timeline' | 'region' | 'link'

export type Status = 'Start' | 'Stop'

/** One property of the state holder, with its initial value */
export type StateField =
  | { readonly name: 'enabled'; readonly initial: boolean }
  | { readonly name: 'status'; readonly initial: Status }
  | { readonly name: 'clicks'; readonly initial: number }

/** Runtime view of a state holder */
export interface HolderState {
  status: Status
  enabled?: boolean
  clicks?: number
}

/** Fires every tick while the holder's `enabled` flag is set */
export interface PulseNode {
  readonly kind: 'pulse'
  readonly id: string
}

/** Timeline clock, advanced once per tick while the status is Start */
export interface ClockNode {
  readonly kind: 'clock'
  readonly id: string
  readonly ticksPerSecond: number
  /** Time of the last scheduled action; the run ends once it is reached */
  readonly lastTime: number
}

/** Fires once per run when the elapsed time crosses `time` */
export interface ScheduleNode {
  readonly kind: 'schedule'
  readonly id: string
  readonly time: number
}

export interface DetectNode {
  readonly kind: 'detect'
  readonly id: string
  readonly predicate: ContainmentPredicate
}

export interface ClickNode {
  readonly kind: 'click'
  readonly id: string
  /** Scene object that receives the clicks */
  readonly object: string
  readonly reset: number
  readonly bindings: readonly ClickBinding[]
}

export interface ActivateNode {
  readonly kind: 'activate'
  readonly id: string
  /** Consecutive detecting ticks needed to fire; 0 fires on the first */
  readonly sustainTicks: number
  /**
   * Ticks the status stays Start after firing (at least one). Links hold for
   * the span of the list that fired; this is the longest of them.
   */
  readonly activeTicks: number
}

export interface DispatchNode {
  readonly kind: 'dispatch'
  readonly id: string
  readonly action: Action
  readonly clicks?: ClickCount
}

/** Clears `enabled` after a firing, for holders that do not remain enabled */
export interface DisableNode {
  readonly kind: 'disable'
  readonly id: string
}

export type ActivatorNode =
  | PulseNode
  | ClockNode
  | ScheduleNode
  | DetectNode
  | ClickNode
  | ActivateNode
  | DispatchNode
  | DisableNode

export type NodeKind = ActivatorNode['kind']

export type NodeOfKind<K extends NodeKind> = Extract<ActivatorNode, { kind: K }>

export interface ActivatorEdge {
  readonly from: string
  readonly to: string
}

export interface ActivatorGraph {
  /** Logic carrier identity in the host namespace */
  readonly baseObjectName: string
  readonly kind: GraphKind
  /** Name of the timeline or trigger, or the clicked object of a link */
  readonly sourceName: string
  readonly state: readonly StateField[]
  readonly nodes: readonly ActivatorNode[]
  readonly edges: readonly ActivatorEdge[]
  /** Module name the host loads the generated logic under */
  readonly logicModule: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Builder
// ─────────────────────────────────────────────────────────────────────────────

export class ActivatorGraphBuilder {
  private state: StateField[] = []
  private nodes: ActivatorNode[] = []
  private edges: ActivatorEdge[] = []

  constructor(
    readonly baseObjectName: string,
    readonly kind: GraphKind,
    readonly sourceName: string,
    readonly logicModule: string
  ) {}

  addState(field: StateField): void {
    if (this.state.some(f => f.name === field.name)) {
      throw new PreconditionError(`State field '${field.name}' already exists on ${this.baseObjectName}`)
    }
    this.state.push(Object.freeze({ ...field }))
  }

  /**
   * Add a node under its local id and return the namespaced id.
   */
  addNode(node: ActivatorNode): string {
    const id = `${this.baseObjectName}.${node.id}`
    if (this.hasNode(id)) {
      throw new PreconditionError(`Node '${id}' already exists`)
    }
    this.nodes.push(Object.freeze({ ...node, id }))
    return id
  }

  hasNode(id: string): boolean {
    return this.nodes.some(n => n.id === id)
  }

  link(from: string, to: string): void {
    for (const id of [from, to]) {
      if (!this.hasNode(id)) {
        throw new PreconditionError(`Cannot link ${from} -> ${to}: node '${id}' does not exist`)
      }
    }
    this.edges.push(Object.freeze({ from, to }))
  }

  build(): ActivatorGraph {
    return Object.freeze({
      baseObjectName: this.baseObjectName,
      kind: this.kind,
      sourceName: this.sourceName,
      state: Object.freeze([...this.state]),
      nodes: Object.freeze([...this.nodes]),
      edges: Object.freeze([...this.edges]),
      logicModule: this.logicModule,
    })
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Queries
// ─────────────────────────────────────────────────────────────────────────────

export function nodesOfKind<K extends NodeKind>(graph: ActivatorGraph, kind: K): NodeOfKind<K>[] {
  return graph.nodes.filter((n): n is NodeOfKind<K> => n.kind === kind)
}

export function findNode<K extends NodeKind>(graph: ActivatorGraph, kind: K): NodeOfKind<K> | undefined {
  return nodesOfKind(graph, kind)[0]
}

export function getNode(graph: ActivatorGraph, id: string): ActivatorNode | undefined {
  return graph.nodes.find(n => n.id === id)
}

/** Ids of the nodes `id` is wired to, in wiring order */
export function successors(graph: ActivatorGraph, id: string): string[] {
  return graph.edges.filter(e => e.from === id).map(e => e.to)
}

export function initialHolderState(graph: ActivatorGraph): HolderState {
  const holder: HolderState = { status: 'Stop' }
  for (const field of graph.state) {
    switch (field.name) {
      case 'enabled':
        holder.enabled = field.initial
        break
      case 'status':
        holder.status = field.initial
        break
      case 'clicks':
        holder.clicks = field.initial
        break
    }
  }
  return holder
}
