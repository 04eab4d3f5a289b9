// ═══════════════════════════════════════════════════════════════════════════
// Region Trigger Activator
// Fires when tracked objects enter (or leave) an axis-aligned box. The
// containment test cannot be a static node, so it lives in generated logic.
// ═══════════════════════════════════════════════════════════════════════════

import { secondsToTicks } from '../config'
import { UnresolvedReferenceError } from '../errors'
import { createLogger } from '../logging'
import { actionSpan } from '../scene/actions'
import { triggerObjectName } from '../scene/NameRegistry'
import type { RegionTrigger } from '../scene/triggers'
import { Activator, linkTriggerNodes, type TriggerNodeIds } from './Activator'
import type { CompileContext } from './context'
import type { ActivatorGraphBuilder } from './graph'
import { buildContainmentPredicate } from './spatial'

const log = createLogger('RegionTrigger')

export class RegionTriggerActivator extends Activator {
  readonly kind = 'region'
  private ids: TriggerNodeIds | null = null

  constructor(private readonly trigger: RegionTrigger, context: CompileContext, private readonly target?: string) {
    super(context)
  }

  get baseObjectName(): string {
    return this.target ?? triggerObjectName(this.trigger.name)
  }

  protected get sourceName(): string {
    return this.trigger.name
  }

  /**
   * Names of the tracked objects, resolved against the scene. Groups expand
   * to their members.
   */
  resolveTrackedObjects(): string[] {
    const { scene } = this.context
    const context = `Trigger '${this.trigger.name}'`
    const requested = this.trigger.objects.kind === 'group' ? [this.trigger.objects.name] : this.trigger.objects.names

    const resolved: string[] = []
    for (const name of requested) {
      const members = scene.resolveObjects(name)
      if (members === undefined) {
        throw new UnresolvedReferenceError(name, context)
      }
      resolved.push(...members)
    }
    if (resolved.length === 0) {
      log.warn(`${context} tracks no objects and will never fire`)
    }
    return resolved
  }

  protected allocate(builder: ActivatorGraphBuilder): void {
    const { trigger } = this
    const { ticksPerSecond } = this.context.config
    const predicate = buildContainmentPredicate(trigger.box, this.resolveTrackedObjects(), trigger.detectAny)

    builder.addState({ name: 'enabled', initial: trigger.enabled })
    builder.addState({ name: 'status', initial: 'Stop' })

    this.ids = {
      pulse: builder.addNode({ kind: 'pulse', id: 'pulse' }),
      condition: builder.addNode({ kind: 'detect', id: 'detect', predicate }),
      activate: builder.addNode({
        kind: 'activate',
        id: 'activate',
        sustainTicks: secondsToTicks(trigger.duration, ticksPerSecond),
        activeTicks: secondsToTicks(Math.max(0, ...trigger.actions.map(actionSpan)), ticksPerSecond),
      }),
      dispatch: trigger.actions.map((action, i) => builder.addNode({ kind: 'dispatch', id: `dispatch_${i}`, action })),
      disable: trigger.remainEnabled ? null : builder.addNode({ kind: 'disable', id: 'disable' }),
    }
  }

  protected wire(builder: ActivatorGraphBuilder): void {
    if (this.ids) linkTriggerNodes(builder, this.ids)
  }
}
