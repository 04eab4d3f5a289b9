// ═══════════════════════════════════════════════════════════════════════════
// Click Links - objects that dispatch actions when clicked
// Actions are bound to a click count, or to 'any' for every click that has
// no list of its own.
// ═══════════════════════════════════════════════════════════════════════════

import { MalformedDocumentError, ValidationError } from '../errors'
import { actionFromDocument, actionToDocument, type Action } from './actions'
import { formatTuple, parseTuple, validateColor, type RGB } from './geometry'
import {
  element,
  findChild,
  findChildren,
  requireAttribute,
  requireChildText,
  boolToText,
  textToBool,
  type DocumentElement,
} from './document'

export const ANY_CLICKS = 'any'

export type ClickCount = number | typeof ANY_CLICKS

export interface ClickLink {
  readonly type: 'link'
  readonly enabled: boolean
  readonly remainEnabled: boolean
  /** Presentation only */
  readonly enabledColor: RGB
  /** Presentation only */
  readonly selectedColor: RGB
  readonly actions: ReadonlyMap<ClickCount, readonly Action[]>
  /** Click count at which the counter wraps to 0; -1 never resets */
  readonly reset: number
}

export interface ClickLinkInput {
  enabled?: boolean
  remainEnabled?: boolean
  enabledColor?: readonly number[]
  selectedColor?: readonly number[]
  actions?: Iterable<readonly [ClickCount, readonly Action[]]>
  reset?: number
}

export const DEFAULT_ENABLED_COLOR: RGB = [0, 128, 255]
export const DEFAULT_SELECTED_COLOR: RGB = [255, 0, 0]

export function createClickLink(input: ClickLinkInput = {}): ClickLink {
  const reset = input.reset ?? -1
  if (!Number.isInteger(reset) || reset < -1) {
    throw new ValidationError(`Link reset must be an integer >= -1, got ${reset}`)
  }

  const actions = new Map<ClickCount, readonly Action[]>()
  for (const [clicks, list] of input.actions ?? []) {
    if (clicks !== ANY_CLICKS && (!Number.isInteger(clicks) || clicks < 0)) {
      throw new ValidationError(`Click count must be a non-negative integer or '${ANY_CLICKS}', got ${clicks}`)
    }
    const existing = actions.get(clicks) ?? []
    actions.set(clicks, Object.freeze([...existing, ...list]))
  }

  // documents can only carry the reset as a tag on an action bound to it
  if (reset >= 0 && (actions.get(reset)?.length ?? 0) === 0) {
    throw new ValidationError(`Link reset ${reset} has no actions bound to it`)
  }

  return Object.freeze({
    type: 'link' as const,
    enabled: input.enabled ?? true,
    remainEnabled: input.remainEnabled ?? true,
    enabledColor: validateColor(input.enabledColor ?? DEFAULT_ENABLED_COLOR, 'enabled color'),
    selectedColor: validateColor(input.selectedColor ?? DEFAULT_SELECTED_COLOR, 'selected color'),
    actions,
    reset,
  })
}

// ─────────────────────────────────────────────────────────────────────────────
// Documents
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Store the link as a LinkRoot element holding one Actions element per action.
 */
export function linkToDocument(link: ClickLink): DocumentElement {
  const linkNode = element('Link', {}, [
    element('Enabled', {}, [], boolToText(link.enabled)),
    element('RemainEnabled', {}, [], boolToText(link.remainEnabled)),
    element('EnabledColor', {}, [], formatTuple(link.enabledColor)),
    element('SelectedColor', {}, [], formatTuple(link.selectedColor)),
  ])

  for (const [clicks, list] of link.actions) {
    for (const action of list) {
      linkNode.children.push(element('Actions', {}, [actionToDocument(action), clicksElement(clicks, link.reset)]))
    }
  }

  return element('LinkRoot', {}, [linkNode])
}

function clicksElement(clicks: ClickCount, reset: number): DocumentElement {
  if (clicks === ANY_CLICKS) {
    return element('Clicks', {}, [element('Any')])
  }
  return element('Clicks', {}, [
    element('NumClicks', { num_clicks: String(clicks), reset: boolToText(reset === clicks) }),
  ])
}

/**
 * Read a LinkRoot element. The reset count is the smallest click count
 * tagged with reset="true".
 */
export function linkFromDocument(root: DocumentElement): ClickLink {
  const linkNode = findChild(root, 'Link')
  if (!linkNode) {
    throw new MalformedDocumentError('LinkRoot element has no Link subelement')
  }

  const enabledColor = findChild(linkNode, 'EnabledColor')
  const selectedColor = findChild(linkNode, 'SelectedColor')

  let reset = -1
  const actions: Array<[ClickCount, Action[]]> = []
  const listFor = (clicks: ClickCount): Action[] => {
    const found = actions.find(([c]) => c === clicks)
    if (found) return found[1]
    const list: Action[] = []
    actions.push([clicks, list])
    return list
  }

  for (const actionsNode of findChildren(linkNode, 'Actions')) {
    let clicks: ClickCount = ANY_CLICKS
    const numClicks = findChild(actionsNode, 'Clicks')?.children.find(c => c.tag === 'NumClicks')
    if (numClicks) {
      const raw = requireAttribute(numClicks, 'num_clicks')
      const parsed = Number(raw)
      if (raw.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
        throw new MalformedDocumentError(`num_clicks attribute of NumClicks must be a non-negative integer, got '${raw}'`)
      }
      clicks = parsed
      const resetText = numClicks.attributes.reset
      if (resetText !== undefined && textToBool(resetText) && (reset === -1 || parsed < reset)) {
        reset = parsed
      }
    }
    const list = listFor(clicks)
    for (const child of actionsNode.children) {
      if (child.tag !== 'Clicks') list.push(actionFromDocument(child))
    }
  }

  return createClickLink({
    enabled: textToBool(requireChildText(linkNode, 'Enabled')),
    remainEnabled: textToBool(requireChildText(linkNode, 'RemainEnabled')),
    enabledColor: enabledColor?.text === undefined ? undefined : parseTuple(enabledColor.text, 3, 'EnabledColor'),
    selectedColor: selectedColor?.text === undefined ? undefined : parseTuple(selectedColor.text, 3, 'SelectedColor'),
    actions,
    reset,
  })
}
