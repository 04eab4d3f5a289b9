// ═══════════════════════════════════════════════════════════════════════════
// Lua Runtime - fengari-based Lua 5.3 interpreter
// Syntax-checks generated host logic, and runs it in tests.
// ═══════════════════════════════════════════════════════════════════════════

import { lua, lauxlib, lualib, to_luastring, type LuaState } from 'fengari'
import { GeneratedLogicError, PreconditionError } from '../errors'

export type LuaResult =
  | null
  | boolean
  | number
  | string
  | LuaResult[]
  | { [key: string]: LuaResult }

export class LuaRuntime {
  private L: LuaState
  private closed = false

  constructor() {
    this.L = lauxlib.luaL_newstate()
    lualib.luaL_openlibs(this.L)
  }

  /**
   * Run a chunk and return its first result converted to JavaScript.
   */
  execute(code: string, chunkName = 'chunk'): LuaResult {
    this.load(code, chunkName)

    const status = lua.lua_pcall(this.L, 0, 1, 0)
    if (status !== lua.LUA_OK) {
      throw new GeneratedLogicError(chunkName, this.popError())
    }

    const result = this.toJS(-1)
    lua.lua_settop(this.L, 0)
    return result
  }

  /**
   * Compile a chunk without running it.
   */
  check(code: string, chunkName = 'chunk'): void {
    this.load(code, chunkName)
    lua.lua_pop(this.L, 1)
  }

  close(): void {
    if (!this.closed) {
      lua.lua_close(this.L)
      this.closed = true
    }
  }

  private load(code: string, chunkName: string): void {
    if (this.closed) {
      throw new PreconditionError('Lua runtime is closed')
    }
    const buffer = to_luastring(code)
    const status = lauxlib.luaL_loadbuffer(this.L, buffer, buffer.length, to_luastring(chunkName))
    if (status !== lua.LUA_OK) {
      throw new GeneratedLogicError(chunkName, this.popError())
    }
  }

  private popError(): string {
    const message = lua.lua_tojsstring(this.L, -1)
    lua.lua_settop(this.L, 0)
    return message
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Conversion
  // ─────────────────────────────────────────────────────────────────────────

  private toJS(index: number): LuaResult {
    switch (lua.lua_type(this.L, index)) {
      case lua.LUA_TBOOLEAN:
        return lua.lua_toboolean(this.L, index)
      case lua.LUA_TNUMBER:
        return lua.lua_tonumber(this.L, index)
      case lua.LUA_TSTRING:
        return lua.lua_tojsstring(this.L, index)
      case lua.LUA_TTABLE:
        return this.tableToJS(index)
      default:
        // nil, functions and userdata have no JavaScript counterpart here
        return null
    }
  }

  /**
   * Sequences become arrays, anything else a plain object.
   */
  private tableToJS(index: number): LuaResult {
    const absolute = index < 0 ? lua.lua_gettop(this.L) + index + 1 : index
    const entries: Array<[string | number, LuaResult]> = []
    let isArray = true

    lua.lua_pushnil(this.L)
    while (lua.lua_next(this.L, absolute) !== 0) {
      let key: string | number
      if (lua.lua_type(this.L, -2) === lua.LUA_TNUMBER) {
        key = lua.lua_tonumber(this.L, -2)
        if (!Number.isInteger(key) || key < 1) isArray = false
      } else {
        key = lua.lua_tojsstring(this.L, -2)
        isArray = false
      }
      entries.push([key, this.toJS(-1)])
      lua.lua_pop(this.L, 1)
    }

    if (isArray && entries.length > 0) {
      const values: LuaResult[] = []
      for (const [key, value] of entries) {
        if (typeof key === 'number') values[key - 1] = value
      }
      if (values.length === entries.length) return values
    }

    const result: { [key: string]: LuaResult } = {}
    for (const [key, value] of entries) result[String(key)] = value
    return result
  }
}

// Singleton instance, used for syntax checks
let runtimeInstance: LuaRuntime | null = null

export function getLuaRuntime(): LuaRuntime {
  if (!runtimeInstance) {
    runtimeInstance = new LuaRuntime()
  }
  return runtimeInstance
}
