// ═══════════════════════════════════════════════════════════════════════════
// Activator Compiler Tests
// ═══════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { compile, compileScene, createActivator } from './compile'
import { createCompileContext, type CompileContext } from './context'
import { findNode, nodesOfKind } from './graph'
import { RegionTriggerActivator } from './RegionTriggerActivator'
import { TimelineActivator } from './TimelineActivator'
import { createAction } from '../scene/actions'
import { ANY_CLICKS, createClickLink } from '../scene/link'
import { createNameRegistry } from '../scene/NameRegistry'
import { createSceneStore, sceneHostFromStore } from '../scene/SceneStore'
import { Timeline } from '../scene/timeline'
import { createRegionTrigger, type RegionTriggerInput } from '../scene/triggers'
import { NameCollisionError, PreconditionError, UnresolvedReferenceError, ValidationError } from '../errors'

const chime = createAction({ type: 'sound', target: 'chime', change: 'start' })
const slide = createAction({ type: 'move', target: 'cart', position: [0, 0, 5], relative: true, duration: 2 })

function door(overrides: Partial<RegionTriggerInput> = {}) {
  return createRegionTrigger({
    name: 'door',
    box: { corner1: [0, 0, 0], corner2: [10, 10, 10] },
    objects: { kind: 'objects', names: ['player'] },
    actions: [chime, slide],
    ...overrides,
  })
}

describe('activator compiler', () => {
  let context: CompileContext

  beforeEach(() => {
    const store = createSceneStore()
    store.getState().addObject('player', [20, 20, 20])
    store.getState().addObject('cart', [0, 0, 0])
    store.getState().addObject('lamp', [1, 1, 1])
    store.getState().defineGroup('movers', ['player', 'cart'])
    context = createCompileContext(sceneHostFromStore(store), {
      names: createNameRegistry(),
      config: { ticksPerSecond: 10 },
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('region triggers', () => {
    it('should build the trigger graph', () => {
      const { graph, logic } = compile(door({ remainEnabled: false, duration: 0.5 }), undefined, context)

      expect(graph.baseObjectName).toBe('trigger_door')
      expect(graph.kind).toBe('region')
      expect(graph.logicModule).toBe('logic.trigger_door')
      expect(graph.state).toEqual([
        { name: 'enabled', initial: true },
        { name: 'status', initial: 'Stop' },
      ])
      expect(graph.nodes.map(n => n.id)).toEqual([
        'trigger_door.pulse',
        'trigger_door.detect',
        'trigger_door.activate',
        'trigger_door.dispatch_0',
        'trigger_door.dispatch_1',
        'trigger_door.disable',
      ])
      expect(graph.edges).toEqual([
        { from: 'trigger_door.pulse', to: 'trigger_door.activate' },
        { from: 'trigger_door.detect', to: 'trigger_door.activate' },
        { from: 'trigger_door.activate', to: 'trigger_door.dispatch_0' },
        { from: 'trigger_door.activate', to: 'trigger_door.dispatch_1' },
        { from: 'trigger_door.activate', to: 'trigger_door.disable' },
      ])
      expect(logic).toContain('function M.activate(own, scene, dispatch)')
    })

    it('should convert durations to ticks', () => {
      const { graph } = compile(door({ duration: 0.5 }), undefined, context)
      const activate = findNode(graph, 'activate')
      expect(activate?.sustainTicks).toBe(5)
      expect(activate?.activeTicks).toBe(20)
    })

    it('should leave out the disable node for triggers that remain enabled', () => {
      const { graph } = compile(door(), undefined, context)
      expect(nodesOfKind(graph, 'disable')).toEqual([])
    })

    it('should expand tracked groups', () => {
      const { graph } = compile(door({ objects: { kind: 'group', name: 'movers' } }), undefined, context)
      expect(findNode(graph, 'detect')?.predicate.objects).toEqual(['player', 'cart'])
    })

    it('should reject unknown tracked objects', () => {
      expect(() => compile(door({ objects: { kind: 'objects', names: ['ghost'] } }), undefined, context)).toThrow(
        new UnresolvedReferenceError('ghost', "Trigger 'door'")
      )
    })

    it('should warn about an empty tracked set', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
      compile(door({ objects: { kind: 'objects', names: [] } }), undefined, context)
      expect(warn).toHaveBeenCalledWith('[RegionTrigger]', "Trigger 'door' tracks no objects and will never fire")
    })

    it('should claim the carrier name once', () => {
      compile(door(), undefined, context)
      expect(() => compile(door(), undefined, context)).toThrow(NameCollisionError)
    })
  })

  describe('timelines', () => {
    it('should compile through the timeline itself', () => {
      const timeline = new Timeline('outro', { actions: [[2, chime]] })
      const { graph } = timeline.compile(context)

      expect(graph.baseObjectName).toBe('timeline_outro')
      expect(findNode(graph, 'clock')).toEqual({ kind: 'clock', id: 'timeline_outro.clock', ticksPerSecond: 10, lastTime: 2 })
      expect(timeline.isCompiled).toBe(true)
    })

    it('should wire one schedule node per action', () => {
      const timeline = new Timeline('intro', { actions: [[1, chime], [0, slide]] })
      const { graph } = compile(timeline, undefined, context)

      expect(graph.baseObjectName).toBe('timeline_intro')
      expect(graph.state).toEqual([{ name: 'status', initial: 'Start' }])
      expect(findNode(graph, 'clock')).toEqual({ kind: 'clock', id: 'timeline_intro.clock', ticksPerSecond: 10, lastTime: 1 })
      expect(nodesOfKind(graph, 'schedule').map(n => n.time)).toEqual([0, 1])
      expect(graph.edges).toEqual([
        { from: 'timeline_intro.clock', to: 'timeline_intro.schedule_0' },
        { from: 'timeline_intro.schedule_0', to: 'timeline_intro.dispatch_0' },
        { from: 'timeline_intro.clock', to: 'timeline_intro.schedule_1' },
        { from: 'timeline_intro.schedule_1', to: 'timeline_intro.dispatch_1' },
      ])
    })

    it('should freeze the timeline once compiled', () => {
      const timeline = new Timeline('intro')
      compile(timeline, undefined, context)
      expect(timeline.isCompiled).toBe(true)
      expect(() => timeline.insert(1, chime)).toThrow(PreconditionError)
    })

    it('should compile an empty timeline to a clock', () => {
      const { graph } = compile(new Timeline('silent', { startImmediately: false }), undefined, context)
      expect(graph.nodes.map(n => n.kind)).toEqual(['clock'])
      expect(graph.edges).toEqual([])
      expect(graph.state).toEqual([{ name: 'status', initial: 'Stop' }])
    })

    it('should attach to an explicit target name', () => {
      const { graph } = compile(new Timeline('intro'), 'intro_logic', context)
      expect(graph.baseObjectName).toBe('intro_logic')
      expect(graph.sourceName).toBe('intro')
    })
  })

  describe('click links', () => {
    it('should bind dispatch nodes to click counts', () => {
      const link = createClickLink({ actions: [[2, [chime, slide]], [ANY_CLICKS, [chime]]], reset: 2 })
      const { graph } = compile(link, 'lamp', context)

      expect(graph.baseObjectName).toBe('link_lamp')
      expect(graph.state).toEqual([
        { name: 'enabled', initial: true },
        { name: 'status', initial: 'Stop' },
        { name: 'clicks', initial: 0 },
      ])
      expect(findNode(graph, 'click')).toEqual({
        kind: 'click',
        id: 'link_lamp.click',
        object: 'lamp',
        reset: 2,
        bindings: [
          { clicks: 2, dispatch: ['link_lamp.dispatch_0', 'link_lamp.dispatch_1'], activeTicks: 20 },
          { clicks: ANY_CLICKS, dispatch: ['link_lamp.dispatch_2'], activeTicks: 0 },
        ],
      })
      expect(nodesOfKind(graph, 'dispatch').map(n => n.clicks)).toEqual([2, 2, ANY_CLICKS])
      expect(findNode(graph, 'activate')?.activeTicks).toBe(20)
    })

    it('should require the clicked object', () => {
      expect(() => compile(createClickLink(), undefined, context)).toThrow(ValidationError)
      expect(() => compile(createClickLink(), 'ghost', context)).toThrow(UnresolvedReferenceError)
      expect(context.names.getState().isTaken('link_ghost')).toBe(false)
    })
  })

  describe('protocol', () => {
    it('should reject linking before the nodes exist', () => {
      const activator = new RegionTriggerActivator(door(), context)
      expect(() => activator.linkNodes()).toThrow(PreconditionError)
    })

    it('should reject writing logic before linking', () => {
      const activator = new TimelineActivator(new Timeline('intro'), context)
      activator.createNodes()
      expect(() => activator.writeLogic()).toThrow(PreconditionError)
    })

    it('should reject running a step twice', () => {
      const activator = createActivator(door(), undefined, context)
      activator.createNodes()
      expect(() => activator.createNodes()).toThrow(PreconditionError)
      activator.linkNodes()
      expect(() => activator.linkNodes()).toThrow(PreconditionError)
    })

    it('should run the steps in order', () => {
      const activator = createActivator(door(), undefined, context)
      activator.createNodes()
      activator.linkNodes()
      expect(activator.writeLogic()).toMatch(/^-- logic\.trigger_door: region logic for door\n/)
      expect(activator.getGraph().baseObjectName).toBe('trigger_door')
    })
  })

  describe('compileScene', () => {
    it('should collect graphs and scripts by module', () => {
      const result = compileScene(
        [door(), new Timeline('intro'), { record: createClickLink(), target: 'lamp' }],
        context
      )
      expect(result.graphs.map(g => g.baseObjectName)).toEqual(['trigger_door', 'timeline_intro', 'link_lamp'])
      expect([...result.scripts.keys()]).toEqual(['logic.trigger_door', 'logic.timeline_intro', 'logic.link_lamp'])
    })

    it('should use the configured module prefix', () => {
      const prefixed = createCompileContext(context.scene, {
        names: createNameRegistry(),
        config: { logicModulePrefix: 'scene.logic' },
      })
      const { graph } = compile(new Timeline('intro'), undefined, prefixed)
      expect(graph.logicModule).toBe('scene.logic.timeline_intro')
    })
  })
})
