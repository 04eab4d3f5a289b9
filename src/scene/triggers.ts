// ═══════════════════════════════════════════════════════════════════════════
// Triggers - activation records fired by conditions in virtual space
// ═══════════════════════════════════════════════════════════════════════════

import { MalformedDocumentError, ValidationError } from '../errors'
import { actionFromDocument, actionToDocument, type Action } from './actions'
import { formatTuple, parseTuple, validateVec3, type Vec3 } from './geometry'
import {
  element,
  findChild,
  findChildren,
  requireAttribute,
  requireChild,
  requireNumber,
  boolToText,
  textToBool,
  type DocumentElement,
} from './document'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Fields every trigger-family record carries */
export interface TriggerBase {
  readonly enabled: boolean
  /** When false the trigger disables itself after its first activation */
  readonly remainEnabled: boolean
  /** Seconds the detect condition must hold before firing; 0 fires at once */
  readonly duration: number
  readonly actions: readonly Action[]
}

export type ContainmentMode = 'Inside' | 'Outside'

export interface RegionBox {
  readonly corner1: Vec3
  readonly corner2: Vec3
  readonly direction: ContainmentMode
}

export type ObjectSet =
  | { readonly kind: 'objects'; readonly names: readonly string[] }
  | { readonly kind: 'group'; readonly name: string }

export interface RegionTrigger extends TriggerBase {
  readonly type: 'region'
  readonly name: string
  readonly box: RegionBox
  readonly objects: ObjectSet
  /** Any tracked object satisfies the box (OR) versus all of them (AND) */
  readonly detectAny: boolean
}

export interface RegionTriggerInput {
  name: string
  box: { corner1: readonly number[]; corner2: readonly number[]; direction?: ContainmentMode }
  objects: ObjectSet
  actions?: readonly Action[]
  enabled?: boolean
  remainEnabled?: boolean
  duration?: number
  detectAny?: boolean
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

// ─────────────────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────────────────

export function validateTriggerDuration(duration: number, label: string): number {
  if (!Number.isFinite(duration) || duration < 0) {
    throw new ValidationError(`${label}: duration must be a non-negative number, got ${duration}`)
  }
  return duration
}

function validateObjectSet(objects: ObjectSet, label: string): ObjectSet {
  if (objects.kind === 'group') {
    if (objects.name.trim() === '') {
      throw new ValidationError(`${label}: group name must not be empty`)
    }
    return Object.freeze({ kind: 'group' as const, name: objects.name })
  }
  if (objects.names.some(n => n.trim() === '')) {
    throw new ValidationError(`${label}: tracked object names must not be empty`)
  }
  return Object.freeze({ kind: 'objects' as const, names: Object.freeze([...objects.names]) })
}

export function createRegionTrigger(input: RegionTriggerInput): RegionTrigger {
  if (!IDENTIFIER.test(input.name)) {
    throw new ValidationError(`Trigger name '${input.name}' must be an identifier`)
  }
  const label = `Trigger '${input.name}'`
  const direction = input.box.direction ?? 'Inside'
  if (direction !== 'Inside' && direction !== 'Outside') {
    throw new ValidationError(`${label}: box direction must be Inside or Outside`)
  }
  return Object.freeze({
    type: 'region' as const,
    name: input.name,
    enabled: input.enabled ?? true,
    remainEnabled: input.remainEnabled ?? true,
    duration: validateTriggerDuration(input.duration ?? 0, label),
    actions: Object.freeze([...(input.actions ?? [])]),
    box: Object.freeze({
      corner1: validateVec3(input.box.corner1, `${label} corner1`),
      corner2: validateVec3(input.box.corner2, `${label} corner2`),
      direction,
    }),
    objects: validateObjectSet(input.objects, label),
    detectAny: input.detectAny ?? true,
  })
}

// ─────────────────────────────────────────────────────────────────────────────
// Documents
// ─────────────────────────────────────────────────────────────────────────────

export function regionTriggerToDocument(trigger: RegionTrigger): DocumentElement {
  const tracked = trigger.objects.kind === 'group'
    ? element('Group', { name: trigger.objects.name })
    : element('Objects', {}, trigger.objects.names.map(name => element('Object', { name })))

  return element(
    'EventTrigger',
    {
      name: trigger.name,
      enabled: boolToText(trigger.enabled),
      'remain-enabled': boolToText(trigger.remainEnabled),
      duration: String(trigger.duration),
    },
    [
      element('ObjectTrigger', { 'detect-any': boolToText(trigger.detectAny) }, [
        tracked,
        element('Box', {
          corner1: formatTuple(trigger.box.corner1),
          corner2: formatTuple(trigger.box.corner2),
          direction: trigger.box.direction,
        }),
      ]),
      element('Actions', {}, trigger.actions.map(actionToDocument)),
    ]
  )
}

function optionalBool(el: DocumentElement, name: string, fallback: boolean): boolean {
  const raw = el.attributes[name]
  return raw === undefined ? fallback : textToBool(raw)
}

export function regionTriggerFromDocument(el: DocumentElement): RegionTrigger {
  const name = requireAttribute(el, 'name')
  const objectTrigger = requireChild(el, 'ObjectTrigger')
  const box = requireChild(objectTrigger, 'Box')

  const direction = box.attributes.direction ?? 'Inside'
  if (direction !== 'Inside' && direction !== 'Outside') {
    throw new MalformedDocumentError(`Box direction must be Inside or Outside, got '${direction}'`)
  }

  let objects: ObjectSet
  const group = findChild(objectTrigger, 'Group')
  const listed = findChild(objectTrigger, 'Objects')
  if (group) {
    objects = { kind: 'group', name: requireAttribute(group, 'name') }
  } else if (listed) {
    objects = {
      kind: 'objects',
      names: findChildren(listed, 'Object').map(o => requireAttribute(o, 'name')),
    }
  } else {
    throw new MalformedDocumentError(`ObjectTrigger of '${name}' has no Objects or Group subelement`)
  }

  const actionsRoot = findChild(el, 'Actions')

  return createRegionTrigger({
    name,
    enabled: optionalBool(el, 'enabled', true),
    remainEnabled: optionalBool(el, 'remain-enabled', true),
    duration: el.attributes.duration === undefined ? 0 : requireNumber(el, 'duration'),
    detectAny: optionalBool(objectTrigger, 'detect-any', true),
    box: {
      corner1: parseTuple(requireAttribute(box, 'corner1'), 3, 'Box corner1'),
      corner2: parseTuple(requireAttribute(box, 'corner2'), 3, 'Box corner2'),
      direction,
    },
    objects,
    actions: actionsRoot ? actionsRoot.children.map(actionFromDocument) : [],
  })
}
