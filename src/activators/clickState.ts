// ═══════════════════════════════════════════════════════════════════════════
// Click State Machine - per-link click counting with optional wrap-around
// ═══════════════════════════════════════════════════════════════════════════

import type { Action } from '../scene/actions'
import { ANY_CLICKS, type ClickCount } from '../scene/link'

export interface ClickBinding {
  readonly clicks: ClickCount
  readonly dispatch: readonly string[]
  /** Ticks the link stays Start after this list fires */
  readonly activeTicks: number
}

export interface ClickAdvance {
  /** Click number reached by this click; selects the bound actions */
  click: number
  /** Counter value stored after the click */
  count: number
}

/**
 * Actions are looked up by `click`, not by the stored `count`: the reset
 * click wraps the counter to 0, and its list must still fire. `reset` < 0
 * never wraps.
 */
export function advanceClickCount(count: number, reset: number): ClickAdvance {
  const click = count + 1
  return { click, count: reset >= 0 && click === reset ? 0 : click }
}

export function selectClickActions(
  actions: ReadonlyMap<ClickCount, readonly Action[]>,
  click: number
): readonly Action[] {
  return actions.get(click) ?? actions.get(ANY_CLICKS) ?? []
}

/**
 * Same lookup over compiled bindings.
 */
export function selectClickBinding(bindings: readonly ClickBinding[], click: number): ClickBinding | undefined {
  return bindings.find(b => b.clicks === click) ?? bindings.find(b => b.clicks === ANY_CLICKS)
}
