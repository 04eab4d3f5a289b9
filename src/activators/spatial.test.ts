// ═══════════════════════════════════════════════════════════════════════════
// Spatial Predicate Tests
// ═══════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest'
import { buildContainmentPredicate, evaluateContainment, isContained, isOutside } from './spatial'
import type { Vec3 } from '../scene/geometry'
import type { RegionBox } from '../scene/triggers'

const inside: RegionBox = { corner1: [10, 10, 10], corner2: [0, 0, 0], direction: 'Inside' }
const outside: RegionBox = { ...inside, direction: 'Outside' }

function positions(map: Record<string, Vec3>): (name: string) => Vec3 | undefined {
  return name => map[name]
}

describe('buildContainmentPredicate', () => {
  it('should order the corners per axis', () => {
    const predicate = buildContainmentPredicate(
      { corner1: [5, -1, 3], corner2: [-5, 1, 2], direction: 'Inside' },
      ['a'],
      true
    )
    expect(predicate.lo).toEqual([-5, -1, 2])
    expect(predicate.hi).toEqual([5, 1, 3])
  })

  it('should drop duplicate objects', () => {
    expect(buildContainmentPredicate(inside, ['a', 'b', 'a'], false).objects).toEqual(['a', 'b'])
  })
})

describe('containment', () => {
  const predicate = buildContainmentPredicate(inside, ['a'], true)

  it('should contain points inside the box', () => {
    expect(isOutside(predicate, [5, 5, 5])).toBe(false)
    expect(isContained(predicate, [5, 5, 5])).toBe(true)
  })

  it('should treat the faces as inside', () => {
    expect(isContained(predicate, [0, 10, 10])).toBe(true)
  })

  it('should reject points beyond any single axis', () => {
    expect(isContained(predicate, [11, 0, 0])).toBe(false)
    expect(isContained(predicate, [5, 5, -0.1])).toBe(false)
  })

  it('should invert in Outside mode', () => {
    const inverted = buildContainmentPredicate(outside, ['a'], true)
    expect(isContained(inverted, [5, 5, 5])).toBe(false)
    expect(isContained(inverted, [11, 0, 0])).toBe(true)
  })
})

describe('evaluateContainment', () => {
  const scene = positions({ a: [5, 5, 5], b: [11, 0, 0] })

  it('should detect when any object is contained', () => {
    expect(evaluateContainment(buildContainmentPredicate(inside, ['a', 'b'], true), scene)).toBe(true)
    expect(evaluateContainment(buildContainmentPredicate(inside, ['b'], true), scene)).toBe(false)
  })

  it('should require every object when detecting all', () => {
    expect(evaluateContainment(buildContainmentPredicate(inside, ['a', 'b'], false), scene)).toBe(false)
    expect(evaluateContainment(buildContainmentPredicate(inside, ['a'], false), scene)).toBe(true)
  })

  it('should never detect an empty object set', () => {
    expect(evaluateContainment(buildContainmentPredicate(inside, [], true), scene)).toBe(false)
    expect(evaluateContainment(buildContainmentPredicate(inside, [], false), scene)).toBe(false)
  })

  it('should treat objects without a position as not contained', () => {
    expect(evaluateContainment(buildContainmentPredicate(outside, ['ghost'], true), scene)).toBe(false)
    expect(evaluateContainment(buildContainmentPredicate(inside, ['a', 'ghost'], false), scene)).toBe(false)
  })

  it('should read live positions on every call', () => {
    const live: Record<string, Vec3> = { a: [20, 20, 20] }
    const predicate = buildContainmentPredicate(inside, ['a'], true)
    expect(evaluateContainment(predicate, positions(live))).toBe(false)
    live.a = [1, 1, 1]
    expect(evaluateContainment(predicate, positions(live))).toBe(true)
  })
})
