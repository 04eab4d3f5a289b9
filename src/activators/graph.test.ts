// ═══════════════════════════════════════════════════════════════════════════
// Activator Graph Tests
// ═══════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest'
import { ActivatorGraphBuilder, initialHolderState, nodesOfKind, successors } from './graph'
import { activatorGraphToReactFlow, describeNode } from './reactFlow'
import { createAction } from '../scene/actions'
import { PreconditionError } from '../errors'

const chime = createAction({ type: 'sound', target: 'chime', change: 'start' })

describe('ActivatorGraphBuilder', () => {
  let builder: ActivatorGraphBuilder

  beforeEach(() => {
    builder = new ActivatorGraphBuilder('trigger_door', 'region', 'door', 'logic.trigger_door')
  })

  it('should namespace node ids by the carrier object', () => {
    expect(builder.addNode({ kind: 'pulse', id: 'pulse' })).toBe('trigger_door.pulse')
    expect(builder.hasNode('trigger_door.pulse')).toBe(true)
  })

  it('should reject duplicate nodes and state fields', () => {
    builder.addNode({ kind: 'pulse', id: 'pulse' })
    expect(() => builder.addNode({ kind: 'disable', id: 'pulse' })).toThrow(PreconditionError)
    builder.addState({ name: 'enabled', initial: true })
    expect(() => builder.addState({ name: 'enabled', initial: false })).toThrow(PreconditionError)
  })

  it('should reject edges to unknown nodes', () => {
    const pulse = builder.addNode({ kind: 'pulse', id: 'pulse' })
    expect(() => builder.link(pulse, 'trigger_door.activate')).toThrow(
      "Cannot link trigger_door.pulse -> trigger_door.activate: node 'trigger_door.activate' does not exist"
    )
  })

  it('should build a frozen graph', () => {
    const activate = builder.addNode({ kind: 'activate', id: 'activate', sustainTicks: 0, activeTicks: 0 })
    const dispatch = builder.addNode({ kind: 'dispatch', id: 'dispatch_0', action: chime })
    builder.link(activate, dispatch)

    const graph = builder.build()
    expect(Object.isFrozen(graph)).toBe(true)
    expect(Object.isFrozen(graph.nodes)).toBe(true)
    expect(successors(graph, activate)).toEqual([dispatch])
    expect(nodesOfKind(graph, 'dispatch')[0].action).toBe(chime)
  })

  it('should derive the initial holder state', () => {
    builder.addState({ name: 'enabled', initial: false })
    builder.addState({ name: 'status', initial: 'Stop' })
    builder.addState({ name: 'clicks', initial: 0 })
    expect(initialHolderState(builder.build())).toEqual({ enabled: false, status: 'Stop', clicks: 0 })
  })
})

describe('activatorGraphToReactFlow', () => {
  it('should lay nodes out in columns', () => {
    const builder = new ActivatorGraphBuilder('trigger_door', 'region', 'door', 'logic.trigger_door')
    const pulse = builder.addNode({ kind: 'pulse', id: 'pulse' })
    const activate = builder.addNode({ kind: 'activate', id: 'activate', sustainTicks: 3, activeTicks: 0 })
    const first = builder.addNode({ kind: 'dispatch', id: 'dispatch_0', action: chime })
    const second = builder.addNode({ kind: 'dispatch', id: 'dispatch_1', action: chime, clicks: 2 })
    builder.link(pulse, activate)
    builder.link(activate, first)
    builder.link(activate, second)

    const { nodes, edges } = activatorGraphToReactFlow(builder.build())

    expect(nodes.map(n => n.position)).toEqual([
      { x: 0, y: 0 },
      { x: 240, y: 0 },
      { x: 480, y: 0 },
      { x: 480, y: 100 },
    ])
    expect(nodes.map(n => n.data.label)).toEqual([
      'Enabled',
      'Activate after 3 ticks',
      'start sound chime',
      '[2] start sound chime',
    ])
    expect(edges[0]).toEqual({
      id: 'trigger_door.pulse->trigger_door.activate',
      source: 'trigger_door.pulse',
      target: 'trigger_door.activate',
      type: 'smoothstep',
    })
  })

  it('should describe condition nodes', () => {
    expect(describeNode({ kind: 'schedule', id: 't.schedule_0', time: 1.5 })).toBe('At 1.5s')
    expect(describeNode({ kind: 'clock', id: 't.clock', ticksPerSecond: 60, lastTime: 0 })).toBe('Clock (60/s)')
    expect(
      describeNode({
        kind: 'detect',
        id: 'r.detect',
        predicate: { lo: [0, 0, 0], hi: [1, 1, 1], direction: 'Outside', aggregate: 'all', objects: ['a', 'b'] },
      })
    ).toBe('All of 2 outside')
  })
})
