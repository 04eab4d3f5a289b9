// ═══════════════════════════════════════════════════════════════════════════
// Actions - discrete effects dispatched by timelines, triggers and links
// Actions are values: frozen on construction and freely shared.
// ═══════════════════════════════════════════════════════════════════════════

import { ValidationError, MalformedDocumentError } from '../errors'
import { validateVec3, formatTuple, parseTuple, type Vec3 } from './geometry'
import {
  element,
  findChild,
  requireAttribute,
  requireNumber,
  boolToText,
  textToBool,
  type DocumentElement,
} from './document'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type LinkChange = 'enable' | 'disable' | 'activate'
export type SoundChange = 'start' | 'stop'
export type TimelineChange = 'start' | 'stop' | 'continue' | 'start-if-not-started'

export interface MoveAction {
  readonly type: 'move'
  readonly target: string
  readonly position: Vec3
  /** Offset from the current position instead of an absolute placement */
  readonly relative: boolean
  readonly duration: number
}

export interface VisibilityAction {
  readonly type: 'visibility'
  readonly target: string
  readonly visible: boolean
  readonly duration: number
}

export interface LinkChangeAction {
  readonly type: 'link'
  readonly target: string
  readonly change: LinkChange
}

export interface SoundAction {
  readonly type: 'sound'
  readonly target: string
  readonly change: SoundChange
}

export interface GroupVisibilityAction {
  readonly type: 'group'
  readonly target: string
  readonly visible: boolean
  readonly duration: number
}

export interface TimelineAction {
  readonly type: 'timeline'
  readonly target: string
  readonly change: TimelineChange
}

/** Enable or disable another trigger */
export interface EventAction {
  readonly type: 'event'
  readonly target: string
  readonly enable: boolean
}

/** Return every state holder in the scene to its initial values */
export interface ResetAction {
  readonly type: 'reset'
}

export type Action =
  | MoveAction
  | VisibilityAction
  | LinkChangeAction
  | SoundAction
  | GroupVisibilityAction
  | TimelineAction
  | EventAction
  | ResetAction

export type ActionType = Action['type']

const LINK_CHANGES: readonly LinkChange[] = ['enable', 'disable', 'activate']
const SOUND_CHANGES: readonly SoundChange[] = ['start', 'stop']
const TIMELINE_CHANGES: readonly TimelineChange[] = ['start', 'stop', 'continue', 'start-if-not-started']

// ─────────────────────────────────────────────────────────────────────────────
// Construction & Validation
// ─────────────────────────────────────────────────────────────────────────────

function requireTarget(target: string, type: string): string {
  if (typeof target !== 'string' || target.trim() === '') {
    throw new ValidationError(`${type} action requires a target name`)
  }
  return target
}

function requireDuration(duration: number, type: string): number {
  if (!Number.isFinite(duration) || duration < 0) {
    throw new ValidationError(`${type} action duration must be a non-negative number, got ${duration}`)
  }
  return duration
}

function requireOption<T extends string>(value: T, options: readonly T[], type: string): T {
  if (!options.includes(value)) {
    throw new ValidationError(`${type} action change must be one of ${options.join(', ')}, got '${value}'`)
  }
  return value
}

/**
 * Validate an action and freeze it.
 */
export function createAction(action: Action): Action {
  switch (action.type) {
    case 'move':
      requireTarget(action.target, action.type)
      requireDuration(action.duration, action.type)
      return Object.freeze({ ...action, position: validateVec3(action.position, 'move position') })
    case 'visibility':
    case 'group':
      requireTarget(action.target, action.type)
      requireDuration(action.duration, action.type)
      break
    case 'link':
      requireTarget(action.target, action.type)
      requireOption(action.change, LINK_CHANGES, action.type)
      break
    case 'sound':
      requireTarget(action.target, action.type)
      requireOption(action.change, SOUND_CHANGES, action.type)
      break
    case 'timeline':
      requireTarget(action.target, action.type)
      requireOption(action.change, TIMELINE_CHANGES, action.type)
      break
    case 'event':
      requireTarget(action.target, action.type)
      break
    case 'reset':
      break
    default:
      throw new ValidationError(`Unknown action type '${describeUnknown(action)}'`)
  }
  return Object.freeze({ ...action })
}

function describeUnknown(value: never): string {
  const raw: unknown = value
  if (typeof raw === 'object' && raw !== null && 'type' in raw) return String(raw.type)
  return String(raw)
}

/**
 * Seconds the action keeps running after dispatch (0 for instantaneous ones).
 */
export function actionSpan(action: Action): number {
  switch (action.type) {
    case 'move':
    case 'visibility':
    case 'group':
      return action.duration
    default:
      return 0
  }
}

/**
 * One-line description for logs.
 */
export function describeAction(action: Action): string {
  switch (action.type) {
    case 'move':
      return `move ${action.target} ${action.relative ? 'by' : 'to'} (${formatTuple(action.position)})`
    case 'visibility':
      return `${action.visible ? 'show' : 'hide'} ${action.target}`
    case 'group':
      return `${action.visible ? 'show' : 'hide'} group ${action.target}`
    case 'link':
    case 'sound':
    case 'timeline':
      return `${action.change} ${action.type} ${action.target}`
    case 'event':
      return `${action.enable ? 'enable' : 'disable'} trigger ${action.target}`
    case 'reset':
      return 'reset scene'
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Documents
// ─────────────────────────────────────────────────────────────────────────────

export function actionToDocument(action: Action): DocumentElement {
  switch (action.type) {
    case 'move':
      return element('ObjectChange', { name: action.target, duration: String(action.duration) }, [
        element('Move', { position: formatTuple(action.position), relative: boolToText(action.relative) }),
      ])
    case 'visibility':
      return element('ObjectChange', { name: action.target, duration: String(action.duration) }, [
        element('Visible', { value: boolToText(action.visible) }),
      ])
    case 'link':
      return element('ObjectChange', { name: action.target }, [
        element('Link', { change: action.change }),
      ])
    case 'sound':
      return element('SoundChange', { name: action.target, change: action.change })
    case 'group':
      return element('GroupChange', {
        name: action.target,
        visible: boolToText(action.visible),
        duration: String(action.duration),
      })
    case 'timeline':
      return element('TimelineChange', { name: action.target, change: action.change })
    case 'event':
      return element('EventChange', { name: action.target, enable: boolToText(action.enable) })
    case 'reset':
      return element('Reset')
  }
}

function durationOf(el: DocumentElement): number {
  return el.attributes.duration === undefined ? 0 : requireNumber(el, 'duration')
}

function changeOf<T extends string>(el: DocumentElement, options: readonly T[]): T {
  const raw = requireAttribute(el, 'change')
  const match = options.find(o => o === raw)
  if (match === undefined) {
    throw new MalformedDocumentError(`${el.tag} change must be one of ${options.join(', ')}, got '${raw}'`)
  }
  return match
}

export function actionFromDocument(el: DocumentElement): Action {
  switch (el.tag) {
    case 'ObjectChange': {
      const target = requireAttribute(el, 'name')
      const move = findChild(el, 'Move')
      if (move) {
        const position = parseTuple(requireAttribute(move, 'position'), 3, 'Move position')
        return createAction({
          type: 'move',
          target,
          position: [position[0], position[1], position[2]],
          relative: move.attributes.relative === undefined ? false : textToBool(move.attributes.relative),
          duration: durationOf(el),
        })
      }
      const visible = findChild(el, 'Visible')
      if (visible) {
        return createAction({
          type: 'visibility',
          target,
          visible: textToBool(requireAttribute(visible, 'value')),
          duration: durationOf(el),
        })
      }
      const link = findChild(el, 'Link')
      if (link) {
        return createAction({ type: 'link', target, change: changeOf(link, LINK_CHANGES) })
      }
      throw new MalformedDocumentError(`ObjectChange for '${target}' has no Move, Visible or Link subelement`)
    }
    case 'SoundChange':
      return createAction({
        type: 'sound',
        target: requireAttribute(el, 'name'),
        change: changeOf(el, SOUND_CHANGES),
      })
    case 'GroupChange':
      return createAction({
        type: 'group',
        target: requireAttribute(el, 'name'),
        visible: textToBool(requireAttribute(el, 'visible')),
        duration: durationOf(el),
      })
    case 'TimelineChange':
      return createAction({
        type: 'timeline',
        target: requireAttribute(el, 'name'),
        change: changeOf(el, TIMELINE_CHANGES),
      })
    case 'EventChange':
      return createAction({
        type: 'event',
        target: requireAttribute(el, 'name'),
        enable: textToBool(requireAttribute(el, 'enable')),
      })
    case 'Reset':
      return createAction({ type: 'reset' })
    default:
      throw new MalformedDocumentError(`Unknown action element '${el.tag}'`)
  }
}
