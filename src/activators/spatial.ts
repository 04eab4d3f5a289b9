// ═══════════════════════════════════════════════════════════════════════════
// Spatial Predicates
// Typed description of an axis-aligned containment test over a set of
// tracked objects. Evaluated directly by the preview runtime and lowered to
// host script by the Lua emitter.
// ═══════════════════════════════════════════════════════════════════════════

import type { Vec3 } from '../scene/geometry'
import type { ContainmentMode, RegionBox } from '../scene/triggers'

export type Aggregate = 'any' | 'all'

export interface ContainmentPredicate {
  readonly lo: Vec3
  readonly hi: Vec3
  readonly direction: ContainmentMode
  readonly aggregate: Aggregate
  /** Resolved object names, in order, without duplicates */
  readonly objects: readonly string[]
}

export function buildContainmentPredicate(
  box: RegionBox,
  objects: readonly string[],
  detectAny: boolean
): ContainmentPredicate {
  const { corner1: c1, corner2: c2 } = box
  const predicate: ContainmentPredicate = {
    lo: [Math.min(c1[0], c2[0]), Math.min(c1[1], c2[1]), Math.min(c1[2], c2[2])],
    hi: [Math.max(c1[0], c2[0]), Math.max(c1[1], c2[1]), Math.max(c1[2], c2[2])],
    direction: box.direction,
    aggregate: detectAny ? 'any' : 'all',
    objects: Object.freeze([...new Set(objects)]),
  }
  return Object.freeze(predicate)
}

/** True when the position lies beyond the box on at least one axis */
export function isOutside(predicate: ContainmentPredicate, position: Vec3): boolean {
  for (let i = 0; i < 3; i++) {
    if (position[i] < predicate.lo[i] || position[i] > predicate.hi[i]) return true
  }
  return false
}

export function isContained(predicate: ContainmentPredicate, position: Vec3): boolean {
  const outside = isOutside(predicate, position)
  return predicate.direction === 'Inside' ? !outside : outside
}

/**
 * Evaluate against live positions. Objects without a position are not
 * contained; an empty object set never detects.
 */
export function evaluateContainment(
  predicate: ContainmentPredicate,
  getPosition: (objectName: string) => Vec3 | undefined
): boolean {
  if (predicate.objects.length === 0) return false

  const contained = (name: string): boolean => {
    const position = getPosition(name)
    return position !== undefined && isContained(predicate, position)
  }

  return predicate.aggregate === 'any'
    ? predicate.objects.some(contained)
    : predicate.objects.every(contained)
}
