// ═══════════════════════════════════════════════════════════════════════════
// Click Link Activator
// Attaches a click counter to a scene object. Each click selects the actions
// bound to its click number, or the 'any' list.
// ═══════════════════════════════════════════════════════════════════════════

import { secondsToTicks } from '../config'
import { UnresolvedReferenceError } from '../errors'
import { actionSpan } from '../scene/actions'
import type { ClickLink } from '../scene/link'
import { linkObjectName } from '../scene/NameRegistry'
import { Activator, linkTriggerNodes, type TriggerNodeIds } from './Activator'
import type { ClickBinding } from './clickState'
import type { CompileContext } from './context'
import type { ActivatorGraphBuilder } from './graph'

export class ClickLinkActivator extends Activator {
  readonly kind = 'link'
  private ids: TriggerNodeIds | null = null

  constructor(private readonly link: ClickLink, private readonly object: string, context: CompileContext) {
    super(context)
  }

  get baseObjectName(): string {
    return linkObjectName(this.object)
  }

  protected get sourceName(): string {
    return this.object
  }

  protected allocate(builder: ActivatorGraphBuilder): void {
    const { link, object } = this
    if (this.context.scene.getPosition(object) === undefined) {
      throw new UnresolvedReferenceError(object, 'Link')
    }

    builder.addState({ name: 'enabled', initial: link.enabled })
    builder.addState({ name: 'status', initial: 'Stop' })
    builder.addState({ name: 'clicks', initial: 0 })

    const { ticksPerSecond } = this.context.config
    const dispatch: string[] = []
    const bindings: ClickBinding[] = []
    for (const [clicks, actions] of link.actions) {
      const ids: string[] = []
      for (const action of actions) {
        const id = builder.addNode({ kind: 'dispatch', id: `dispatch_${dispatch.length}`, action, clicks })
        dispatch.push(id)
        ids.push(id)
      }
      const activeTicks = secondsToTicks(Math.max(0, ...actions.map(actionSpan)), ticksPerSecond)
      bindings.push(Object.freeze({ clicks, dispatch: Object.freeze(ids), activeTicks }))
    }

    this.ids = {
      pulse: builder.addNode({ kind: 'pulse', id: 'pulse' }),
      condition: builder.addNode({ kind: 'click', id: 'click', object, reset: link.reset, bindings }),
      activate: builder.addNode({
        kind: 'activate',
        id: 'activate',
        sustainTicks: 0,
        activeTicks: Math.max(0, ...bindings.map(b => b.activeTicks)),
      }),
      dispatch,
      disable: link.remainEnabled ? null : builder.addNode({ kind: 'disable', id: 'disable' }),
    }
  }

  protected wire(builder: ActivatorGraphBuilder): void {
    if (this.ids) linkTriggerNodes(builder, this.ids)
  }
}
