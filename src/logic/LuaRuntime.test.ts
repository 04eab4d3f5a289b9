// ═══════════════════════════════════════════════════════════════════════════
// Lua Runtime Tests
// ═══════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { LuaRuntime } from './LuaRuntime'
import { GeneratedLogicError, PreconditionError } from '../errors'

describe('LuaRuntime', () => {
  let runtime: LuaRuntime

  beforeEach(() => {
    runtime = new LuaRuntime()
  })

  afterEach(() => {
    runtime.close()
  })

  describe('execute', () => {
    it('should return scalars', () => {
      expect(runtime.execute('return 1 + 2')).toBe(3)
      expect(runtime.execute('return 1 / 4')).toBe(0.25)
      expect(runtime.execute('return "a" .. "b"')).toBe('ab')
      expect(runtime.execute('return 1 < 2')).toBe(true)
      expect(runtime.execute('return nil')).toBeNull()
    })

    it('should convert sequences to arrays', () => {
      expect(runtime.execute('return {3, 2, 1}')).toEqual([3, 2, 1])
    })

    it('should convert other tables to objects', () => {
      expect(runtime.execute('return {status = "Stop", clicks = 2}')).toEqual({ status: 'Stop', clicks: 2 })
      expect(runtime.execute('return {[2] = "b"}')).toEqual({ '2': 'b' })
    })

    it('should keep globals between chunks', () => {
      runtime.execute('counter = 41')
      expect(runtime.execute('counter = counter + 1 return counter')).toBe(42)
    })

    it('should report runtime errors', () => {
      expect(() => runtime.execute('error("boom")', 'test')).toThrow(GeneratedLogicError)
      expect(runtime.execute('return 7')).toBe(7)
    })
  })

  describe('check', () => {
    it('should compile without running', () => {
      expect(() => runtime.check('error("never runs")')).not.toThrow()
    })

    it('should report syntax errors', () => {
      expect(() => runtime.check('function broken(', 'logic.broken')).toThrow(GeneratedLogicError)
    })
  })

  it('should refuse work once closed', () => {
    runtime.close()
    expect(() => runtime.execute('return 1')).toThrow(PreconditionError)
  })
})
