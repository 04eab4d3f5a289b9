// ═══════════════════════════════════════════════════════════════════════════
// Timeline - choreography of actions keyed by start time
// ═══════════════════════════════════════════════════════════════════════════

import { TimelineActivator } from '../activators/TimelineActivator'
import type { CompiledActivator } from '../activators/Activator'
import type { CompileContext } from '../activators/context'
import { PreconditionError, ValidationError } from '../errors'
import { actionFromDocument, actionToDocument, type Action } from './actions'
import {
  element,
  findChildren,
  requireAttribute,
  requireNumber,
  boolToText,
  textToBool,
  type DocumentElement,
} from './document'

export interface TimedAction {
  readonly time: number
  readonly action: Action
}

export interface TimelineOptions {
  startImmediately?: boolean
  actions?: Iterable<readonly [number, Action] | TimedAction>
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

export class Timeline {
  readonly type = 'timeline'
  readonly name: string
  readonly startImmediately: boolean
  private entries: TimedAction[] = []
  private compiled = false

  constructor(name: string, options: TimelineOptions = {}) {
    if (!IDENTIFIER.test(name)) {
      throw new ValidationError(`Timeline name '${name}' must be an identifier`)
    }
    this.name = name
    this.startImmediately = options.startImmediately ?? true
    for (const entry of options.actions ?? []) {
      if ('action' in entry) {
        this.insert(entry.time, entry.action)
      } else {
        this.insert(entry[0], entry[1])
      }
    }
  }

  get size(): number {
    return this.entries.length
  }

  get isCompiled(): boolean {
    return this.compiled
  }

  /** Start time of the last action, 0 for an empty timeline */
  get lastTime(): number {
    return this.entries.length === 0 ? 0 : this.entries[this.entries.length - 1].time
  }

  /**
   * Insert after every entry with the same or an earlier time, so ties keep
   * their insertion order.
   */
  insert(time: number, action: Action): void {
    if (this.compiled) {
      throw new PreconditionError(`Timeline '${this.name}' is compiled and can no longer change`)
    }
    if (!Number.isFinite(time) || time < 0) {
      throw new ValidationError(`Timeline '${this.name}': start time must be a non-negative number, got ${time}`)
    }

    let lo = 0
    let hi = this.entries.length
    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      if (this.entries[mid].time <= time) {
        lo = mid + 1
      } else {
        hi = mid
      }
    }
    this.entries.splice(lo, 0, Object.freeze({ time, action }))
  }

  /**
   * Pairs in non-decreasing time order. Each call starts a fresh pass.
   */
  *iterate(): IterableIterator<TimedAction> {
    for (let i = 0; i < this.entries.length; i++) {
      yield this.entries[i]
    }
  }

  [Symbol.iterator](): IterableIterator<TimedAction> {
    return this.iterate()
  }

  /**
   * Called by the timeline activator; freezes the action list.
   */
  markCompiled(): void {
    this.compiled = true
  }

  compile(context: CompileContext, target?: string): CompiledActivator {
    return new TimelineActivator(this, context, target).compile()
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Documents
  // ─────────────────────────────────────────────────────────────────────────

  toDocument(): DocumentElement {
    const children = this.entries.map(({ time, action }) =>
      element('TimedActions', { 'seconds-time': String(time) }, [actionToDocument(action)])
    )
    return element(
      'Timeline',
      { name: this.name, 'start-immediately': boolToText(this.startImmediately) },
      children
    )
  }

  static fromDocument(el: DocumentElement): Timeline {
    const name = requireAttribute(el, 'name')
    const startText = el.attributes['start-immediately']
    const actions: TimedAction[] = []
    for (const timed of findChildren(el, 'TimedActions')) {
      const time = requireNumber(timed, 'seconds-time')
      for (const child of timed.children) {
        actions.push({ time, action: actionFromDocument(child) })
      }
    }
    return new Timeline(name, {
      startImmediately: startText === undefined ? true : textToBool(startText),
      actions,
    })
  }
}
