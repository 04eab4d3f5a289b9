// ═══════════════════════════════════════════════════════════════════════════
// Geometry & Colour primitives shared by scene records
// ═══════════════════════════════════════════════════════════════════════════

import { MalformedDocumentError, ValidationError } from '../errors'

export type Vec3 = readonly [number, number, number]
export type RGB = readonly [number, number, number]

export function validateVec3(value: readonly number[], label: string): Vec3 {
  if (value.length !== 3 || !value.every(Number.isFinite)) {
    throw new ValidationError(`${label} must be three finite numbers, got [${value.join(', ')}]`)
  }
  return [value[0], value[1], value[2]]
}

export function validateColor(value: readonly number[], label: string): RGB {
  if (value.length !== 3 || !value.every(c => Number.isInteger(c) && c >= 0 && c <= 255)) {
    throw new ValidationError(`${label} must be three integers in 0..255, got [${value.join(', ')}]`)
  }
  return [value[0], value[1], value[2]]
}

export function formatTuple(values: readonly number[]): string {
  return values.join(',')
}

/**
 * Parse "x,y,z" (parentheses and spaces tolerated) into numbers.
 */
export function parseTuple(text: string, length: number, label: string): number[] {
  const parts = text.replace(/[()\s]/g, '').split(',')
  const values = parts.map(Number)
  if (parts.length !== length || parts.some(p => p === '') || !values.every(Number.isFinite)) {
    throw new MalformedDocumentError(`${label}: expected ${length} comma-separated numbers, got '${text}'`)
  }
  return values
}
