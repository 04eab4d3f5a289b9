// ═══════════════════════════════════════════════════════════════════════════
// Lua Emitter
// Lowers an activator graph to the Lua module the host script loader runs.
//
// Host contract:
//   own              state holder table (enabled, status, clicks)
//   scene.position   function(name) -> x, y, z, or nil for a missing object
//   dispatch         function(id) fires the dispatch node with that id
//
// Entry points by graph kind:
//   region    M.detect_event(scene), M.activate(own, scene, dispatch)
//   link      M.tick(own), M.on_click(own, dispatch)
//   timeline  M.start(own), M.stop(own), M.resume(own),
//             M.start_if_not_started(own), M.advance(own, dispatch)
// Every module also has M.reset() for its private counters.
// ═══════════════════════════════════════════════════════════════════════════

import { PreconditionError } from '../errors'
import { ANY_CLICKS } from '../scene/link'
import {
  findNode,
  getNode,
  nodesOfKind,
  successors,
  type ActivateNode,
  type ActivatorGraph,
} from '../activators/graph'
import type { ClickBinding } from '../activators/clickState'

// ─────────────────────────────────────────────────────────────────────────────
// Literals
// ─────────────────────────────────────────────────────────────────────────────

export function luaString(value: string): string {
  let out = '"'
  for (const ch of value) {
    const code = ch.codePointAt(0) ?? 0
    if (ch === '"' || ch === '\\') {
      out += '\\' + ch
    } else if (ch === '\n') {
      out += '\\n'
    } else if (code < 0x20 || code === 0x7f) {
      out += '\\' + String(code).padStart(3, '0')
    } else {
      out += ch
    }
  }
  return out + '"'
}

export function luaNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new PreconditionError(`Cannot emit non-finite number ${value}`)
  }
  return String(value)
}

function luaList(items: readonly string[]): string {
  return `{${items.join(', ')}}`
}

function luaStringList(items: readonly string[]): string {
  return luaList(items.map(luaString))
}

function luaBinding(binding: ClickBinding): string {
  return `{active = ${binding.activeTicks}, ids = ${luaStringList(binding.dispatch)}}`
}

function headerComment(graph: ActivatorGraph): string {
  const source = graph.sourceName.replace(/[\r\n]+/g, ' ')
  return `-- ${graph.logicModule}: ${graph.kind} logic for ${source}`
}

// ─────────────────────────────────────────────────────────────────────────────
// Shared trigger-family pieces
// ─────────────────────────────────────────────────────────────────────────────

// The tick that ends the span only returns the status to Stop
const COUNT_DOWN = [
  'local function count_down(own)',
  '  memory.active = memory.active - 1',
  '  if memory.active <= 0 then',
  '    own.status = "Stop"',
  '  end',
  'end',
]

function requireActivate(graph: ActivatorGraph): ActivateNode {
  const activate = findNode(graph, 'activate')
  if (!activate) {
    throw new PreconditionError(`${graph.baseObjectName} has no activate node`)
  }
  return activate
}

function dispatchIds(graph: ActivatorGraph, from: string): string[] {
  return successors(graph, from).filter(id => getNode(graph, id)?.kind === 'dispatch')
}

function remainsEnabled(graph: ActivatorGraph): boolean {
  return nodesOfKind(graph, 'disable').length === 0
}

const FIRE = [
  'local function fire(own, dispatch, ids, active)',
  '  own.status = "Start"',
  '  memory.active = math.max(1, active)',
  '  for _, id in ipairs(ids) do',
  '    dispatch(id)',
  '  end',
  '  if not REMAIN_ENABLED then',
  '    own.enabled = false',
  '  end',
  'end',
]

// ─────────────────────────────────────────────────────────────────────────────
// Per kind
// ─────────────────────────────────────────────────────────────────────────────

function emitRegion(graph: ActivatorGraph): string[] {
  const detect = findNode(graph, 'detect')
  if (!detect) {
    throw new PreconditionError(`${graph.baseObjectName} has no detect node`)
  }
  const activate = requireActivate(graph)
  const { predicate } = detect

  return [
    `local LO = ${luaList(predicate.lo.map(luaNumber))}`,
    `local HI = ${luaList(predicate.hi.map(luaNumber))}`,
    `local INSIDE = ${predicate.direction === 'Inside'}`,
    `local DETECT_ANY = ${predicate.aggregate === 'any'}`,
    `local OBJECTS = ${luaStringList(predicate.objects)}`,
    `local SUSTAIN_TICKS = ${activate.sustainTicks}`,
    `local ACTIVE_TICKS = ${activate.activeTicks}`,
    `local REMAIN_ENABLED = ${remainsEnabled(graph)}`,
    `local DISPATCH = ${luaStringList(dispatchIds(graph, activate.id))}`,
    '',
    'local memory = {held = 0, active = 0}',
    '',
    'local function outside(x, y, z)',
    '  return x < LO[1] or x > HI[1] or y < LO[2] or y > HI[2] or z < LO[3] or z > HI[3]',
    'end',
    '',
    'local function contained(scene, name)',
    '  local x, y, z = scene.position(name)',
    '  if x == nil then',
    '    return false',
    '  end',
    '  if INSIDE then',
    '    return not outside(x, y, z)',
    '  end',
    '  return outside(x, y, z)',
    'end',
    '',
    ...COUNT_DOWN,
    '',
    ...FIRE,
    '',
    'function M.detect_event(scene)',
    '  if #OBJECTS == 0 then',
    '    return false',
    '  end',
    '  for _, name in ipairs(OBJECTS) do',
    '    local hit = contained(scene, name)',
    '    if DETECT_ANY and hit then',
    '      return true',
    '    end',
    '    if not DETECT_ANY and not hit then',
    '      return false',
    '    end',
    '  end',
    '  return not DETECT_ANY',
    'end',
    '',
    'function M.activate(own, scene, dispatch)',
    '  if own.status == "Start" then',
    '    count_down(own)',
    '    return false',
    '  end',
    '  if not (own.enabled and M.detect_event(scene)) then',
    '    memory.held = 0',
    '    return false',
    '  end',
    '  memory.held = memory.held + 1',
    '  if memory.held < SUSTAIN_TICKS then',
    '    return false',
    '  end',
    '  memory.held = 0',
    '  fire(own, dispatch, DISPATCH, ACTIVE_TICKS)',
    '  return true',
    'end',
    '',
    'function M.reset()',
    '  memory.held = 0',
    '  memory.active = 0',
    'end',
  ]
}

function emitLink(graph: ActivatorGraph): string[] {
  const click = findNode(graph, 'click')
  if (!click) {
    throw new PreconditionError(`${graph.baseObjectName} has no click node`)
  }

  const counted = click.bindings
    .filter(b => b.clicks !== ANY_CLICKS)
    .map(b => `  [${String(b.clicks)}] = ${luaBinding(b)},`)
  const any = click.bindings.find(b => b.clicks === ANY_CLICKS)

  return [
    `local RESET = ${click.reset}`,
    `local REMAIN_ENABLED = ${remainsEnabled(graph)}`,
    counted.length === 0 ? 'local ACTIONS = {}' : ['local ACTIONS = {', ...counted, '}'].join('\n'),
    `local ANY = ${any ? luaBinding(any) : 'nil'}`,
    '',
    'local memory = {active = 0}',
    '',
    ...COUNT_DOWN,
    '',
    ...FIRE,
    '',
    'function M.tick(own)',
    '  if own.status == "Start" then',
    '    count_down(own)',
    '  end',
    'end',
    '',
    'function M.on_click(own, dispatch)',
    '  if not own.enabled or own.status ~= "Stop" then',
    '    return false',
    '  end',
    '  local click = own.clicks + 1',
    '  if RESET >= 0 and click == RESET then',
    '    own.clicks = 0',
    '  else',
    '    own.clicks = click',
    '  end',
    '  local binding = ACTIONS[click] or ANY',
    '  if binding == nil or #binding.ids == 0 then',
    '    return false',
    '  end',
    '  fire(own, dispatch, binding.ids, binding.active)',
    '  return true',
    'end',
    '',
    'function M.reset()',
    '  memory.active = 0',
    'end',
  ]
}

function emitTimeline(graph: ActivatorGraph): string[] {
  const clock = findNode(graph, 'clock')
  if (!clock) {
    throw new PreconditionError(`${graph.baseObjectName} has no clock node`)
  }

  const schedule = nodesOfKind(graph, 'schedule').flatMap(node =>
    dispatchIds(graph, node.id).map(id => `  {time = ${luaNumber(node.time)}, id = ${luaString(id)}},`)
  )

  return [
    `local TICKS_PER_SECOND = ${clock.ticksPerSecond}`,
    `local LAST_TIME = ${luaNumber(clock.lastTime)}`,
    schedule.length === 0 ? 'local SCHEDULE = {}' : ['local SCHEDULE = {', ...schedule, '}'].join('\n'),
    '',
    'local memory = {tick = -1}',
    '',
    'function M.start(own)',
    '  memory.tick = -1',
    '  own.status = "Start"',
    'end',
    '',
    'function M.stop(own)',
    '  own.status = "Stop"',
    'end',
    '',
    'function M.resume(own)',
    '  own.status = "Start"',
    'end',
    '',
    'function M.start_if_not_started(own)',
    '  if own.status == "Stop" and memory.tick == -1 then',
    '    M.start(own)',
    '  end',
    'end',
    '',
    'function M.advance(own, dispatch)',
    '  if own.status ~= "Start" then',
    '    return',
    '  end',
    '  local before = memory.tick / TICKS_PER_SECOND',
    '  memory.tick = memory.tick + 1',
    '  local now = memory.tick / TICKS_PER_SECOND',
    '  for _, entry in ipairs(SCHEDULE) do',
    '    if before < entry.time and entry.time <= now then',
    '      dispatch(entry.id)',
    '    end',
    '  end',
    '  if now >= LAST_TIME then',
    '    own.status = "Stop"',
    '  end',
    'end',
    '',
    'function M.reset()',
    '  memory.tick = -1',
    'end',
  ]
}

// ─────────────────────────────────────────────────────────────────────────────
// Entry
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Generate the Lua module for a compiled graph. The chunk returns its module
 * table `M`.
 */
export function emitLogic(graph: ActivatorGraph): string {
  return [headerComment(graph), '', 'local M = {}', '', ...emitBody(graph), '', 'return M', ''].join('\n')
}

function emitBody(graph: ActivatorGraph): string[] {
  switch (graph.kind) {
    case 'region':
      return emitRegion(graph)
    case 'link':
      return emitLink(graph)
    case 'timeline':
      return emitTimeline(graph)
  }
}
