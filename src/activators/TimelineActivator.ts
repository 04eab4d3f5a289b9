// ═══════════════════════════════════════════════════════════════════════════
// Timeline Activator
// Clock-driven graph: one schedule node per timed action, each wired to the
// dispatch node of its action.
// ═══════════════════════════════════════════════════════════════════════════

import { timelineObjectName } from '../scene/NameRegistry'
import type { Timeline } from '../scene/timeline'
import { Activator } from './Activator'
import type { CompileContext } from './context'
import type { ActivatorGraphBuilder } from './graph'

export class TimelineActivator extends Activator {
  readonly kind = 'timeline'
  private clockId = ''
  private scheduled: Array<{ schedule: string; dispatch: string }> = []

  constructor(private readonly timeline: Timeline, context: CompileContext, private readonly target?: string) {
    super(context)
  }

  get baseObjectName(): string {
    return this.target ?? timelineObjectName(this.timeline.name)
  }

  protected get sourceName(): string {
    return this.timeline.name
  }

  protected allocate(builder: ActivatorGraphBuilder): void {
    this.timeline.markCompiled()
    builder.addState({ name: 'status', initial: this.timeline.startImmediately ? 'Start' : 'Stop' })

    this.clockId = builder.addNode({
      kind: 'clock',
      id: 'clock',
      ticksPerSecond: this.context.config.ticksPerSecond,
      lastTime: this.timeline.lastTime,
    })

    let index = 0
    for (const { time, action } of this.timeline) {
      this.scheduled.push({
        schedule: builder.addNode({ kind: 'schedule', id: `schedule_${index}`, time }),
        dispatch: builder.addNode({ kind: 'dispatch', id: `dispatch_${index}`, action }),
      })
      index++
    }
  }

  protected wire(builder: ActivatorGraphBuilder): void {
    for (const { schedule, dispatch } of this.scheduled) {
      builder.link(this.clockId, schedule)
      builder.link(schedule, dispatch)
    }
  }
}
