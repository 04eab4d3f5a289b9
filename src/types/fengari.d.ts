// Type definitions for fengari
// Fengari is a Lua 5.3 implementation in JavaScript. Only the parts of the
// C API this project calls are declared.

declare module 'fengari' {
  // Lua string type (Uint8Array)
  type LuaString = Uint8Array

  export function to_luastring(str: string): LuaString

  // Lua state type
  export type LuaState = unknown

  export const lua: {
    // Status codes
    LUA_OK: number

    // Type constants
    LUA_TBOOLEAN: number
    LUA_TNUMBER: number
    LUA_TSTRING: number
    LUA_TTABLE: number

    // Stack manipulation
    lua_gettop(L: LuaState): number
    lua_settop(L: LuaState, idx: number): void
    lua_pop(L: LuaState, n: number): void

    // Type checking and value retrieval
    lua_type(L: LuaState, idx: number): number
    lua_tonumber(L: LuaState, idx: number): number
    lua_toboolean(L: LuaState, idx: number): boolean
    lua_tojsstring(L: LuaState, idx: number): string

    // Tables
    lua_pushnil(L: LuaState): void
    lua_next(L: LuaState, idx: number): number

    // Function calls
    lua_pcall(L: LuaState, nargs: number, nresults: number, errfunc: number): number

    // State management
    lua_close(L: LuaState): void
  }

  export const lauxlib: {
    luaL_newstate(): LuaState
    luaL_loadbuffer(L: LuaState, buff: LuaString, size: number | null, name: LuaString): number
  }

  export const lualib: {
    luaL_openlibs(L: LuaState): void
  }
}
