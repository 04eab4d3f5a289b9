// ═══════════════════════════════════════════════════════════════════════════
// React Flow export - lays an activator graph out for the node editor
// ═══════════════════════════════════════════════════════════════════════════

import type { Node, Edge } from '@xyflow/react'
import { describeAction } from '../scene/actions'
import type { ActivatorGraph, ActivatorNode, NodeKind } from './graph'

export type ActivatorNodeData = {
  label: string
  kind: NodeKind
}

export type ActivatorFlowNode = Node<ActivatorNodeData>

const COLUMN_WIDTH = 240
const ROW_HEIGHT = 100

/** Sources on the left, conditions in the middle, effects on the right */
const COLUMN: Record<NodeKind, number> = {
  pulse: 0,
  clock: 0,
  detect: 0,
  click: 0,
  schedule: 1,
  activate: 1,
  dispatch: 2,
  disable: 2,
}

export function describeNode(node: ActivatorNode): string {
  switch (node.kind) {
    case 'pulse':
      return 'Enabled'
    case 'clock':
      return `Clock (${node.ticksPerSecond}/s)`
    case 'schedule':
      return `At ${node.time}s`
    case 'detect': {
      const { aggregate, direction, objects } = node.predicate
      return `${aggregate === 'any' ? 'Any' : 'All'} of ${objects.length} ${direction.toLowerCase()}`
    }
    case 'click':
      return `Click ${node.object}`
    case 'activate':
      return node.sustainTicks > 0 ? `Activate after ${node.sustainTicks} ticks` : 'Activate'
    case 'dispatch': {
      const label = describeAction(node.action)
      return node.clicks === undefined ? label : `[${node.clicks}] ${label}`
    }
    case 'disable':
      return 'Disable'
  }
}

export function activatorGraphToReactFlow(graph: ActivatorGraph): {
  nodes: ActivatorFlowNode[]
  edges: Edge[]
} {
  const rows = [0, 0, 0]

  const nodes: ActivatorFlowNode[] = graph.nodes.map(node => {
    const column = COLUMN[node.kind]
    const row = rows[column]++
    return {
      id: node.id,
      type: 'default',
      position: { x: column * COLUMN_WIDTH, y: row * ROW_HEIGHT },
      data: { label: describeNode(node), kind: node.kind },
    }
  })

  const edges: Edge[] = graph.edges.map(edge => ({
    id: `${edge.from}->${edge.to}`,
    source: edge.from,
    target: edge.to,
    type: 'smoothstep',
  }))

  return { nodes, edges }
}
