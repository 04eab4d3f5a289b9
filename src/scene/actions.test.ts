// ═══════════════════════════════════════════════════════════════════════════
// Action Tests
// ═══════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest'
import {
  createAction,
  actionSpan,
  describeAction,
  actionToDocument,
  actionFromDocument,
  type Action,
} from './actions'
import { element } from './document'
import { MalformedDocumentError, ValidationError } from '../errors'

describe('createAction', () => {
  it('should freeze actions', () => {
    const action = createAction({ type: 'sound', target: 'chime', change: 'start' })
    expect(Object.isFrozen(action)).toBe(true)
  })

  it('should reject empty targets', () => {
    expect(() => createAction({ type: 'visibility', target: ' ', visible: true, duration: 0 })).toThrow(
      'visibility action requires a target name'
    )
  })

  it('should reject negative durations', () => {
    expect(() =>
      createAction({ type: 'move', target: 'crate', position: [0, 0, 0], relative: false, duration: -1 })
    ).toThrow(ValidationError)
  })

  it('should reject non-finite positions', () => {
    expect(() =>
      createAction({ type: 'move', target: 'crate', position: [0, Infinity, 0], relative: false, duration: 0 })
    ).toThrow(ValidationError)
  })

  it('should accept a reset without a target', () => {
    expect(createAction({ type: 'reset' })).toEqual({ type: 'reset' })
  })
})

describe('actionSpan', () => {
  it('should return the duration of continuous actions only', () => {
    expect(actionSpan(createAction({ type: 'move', target: 'a', position: [1, 0, 0], relative: true, duration: 2 }))).toBe(2)
    expect(actionSpan(createAction({ type: 'group', target: 'g', visible: false, duration: 0.5 }))).toBe(0.5)
    expect(actionSpan(createAction({ type: 'timeline', target: 'intro', change: 'start' }))).toBe(0)
  })
})

describe('describeAction', () => {
  it('should describe actions in one line', () => {
    expect(describeAction(createAction({ type: 'move', target: 'crate', position: [1, 2, 3], relative: true, duration: 1 }))).toBe(
      'move crate by (1,2,3)'
    )
    expect(describeAction(createAction({ type: 'event', target: 'door', enable: false }))).toBe('disable trigger door')
    expect(describeAction(createAction({ type: 'link', target: 'lamp', change: 'activate' }))).toBe('activate link lamp')
  })
})

describe('action documents', () => {
  it('should write move actions as ObjectChange elements', () => {
    const doc = actionToDocument(
      createAction({ type: 'move', target: 'crate', position: [1, 2, 3], relative: true, duration: 1.5 })
    )
    expect(doc).toEqual(
      element('ObjectChange', { name: 'crate', duration: '1.5' }, [
        element('Move', { position: '1,2,3', relative: 'true' }),
      ])
    )
  })

  it('should read back every action kind', () => {
    const actions: Action[] = [
      createAction({ type: 'move', target: 'crate', position: [1, 2, 3], relative: false, duration: 0 }),
      createAction({ type: 'visibility', target: 'crate', visible: false, duration: 2 }),
      createAction({ type: 'link', target: 'lamp', change: 'disable' }),
      createAction({ type: 'sound', target: 'chime', change: 'stop' }),
      createAction({ type: 'group', target: 'walls', visible: true, duration: 0 }),
      createAction({ type: 'timeline', target: 'intro', change: 'start-if-not-started' }),
      createAction({ type: 'event', target: 'door', enable: true }),
      createAction({ type: 'reset' }),
    ]
    for (const action of actions) {
      expect(actionFromDocument(actionToDocument(action))).toEqual(action)
    }
  })

  it('should default a missing duration to 0', () => {
    const action = actionFromDocument(element('ObjectChange', { name: 'crate' }, [element('Visible', { value: 'true' })]))
    expect(action).toEqual({ type: 'visibility', target: 'crate', visible: true, duration: 0 })
  })

  it('should reject unknown elements and changes', () => {
    expect(() => actionFromDocument(element('Teleport'))).toThrow("Unknown action element 'Teleport'")
    expect(() => actionFromDocument(element('SoundChange', { name: 'chime', change: 'pause' }))).toThrow(
      MalformedDocumentError
    )
    expect(() => actionFromDocument(element('ObjectChange', { name: 'crate' }))).toThrow(MalformedDocumentError)
  })
})
