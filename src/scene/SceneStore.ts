// ═══════════════════════════════════════════════════════════════════════════
// Scene Store
// In-memory scene graph: object positions and named groups. Backs previews
// and tests through the SceneHost interface the compiler consumes.
// ═══════════════════════════════════════════════════════════════════════════

import { createStore, type StoreApi } from 'zustand/vanilla'
import { NameCollisionError, UnresolvedReferenceError } from '../errors'
import { validateVec3, type Vec3 } from './geometry'

/**
 * What the compiler and preview runtime need from the host scene graph.
 */
export interface SceneHost {
  /** Live position of an object, or undefined when it does not exist */
  getPosition(objectName: string): Vec3 | undefined
  /** Objects named by an object or group name, in order; undefined when unknown */
  resolveObjects(nameOrGroup: string): readonly string[] | undefined
}

export interface SceneState {
  objects: Record<string, Vec3>
  groups: Record<string, string[]>

  addObject: (name: string, position: Vec3) => void
  moveObject: (name: string, position: Vec3) => void
  removeObject: (name: string) => void
  defineGroup: (name: string, members: string[]) => void
}

export type SceneStore = StoreApi<SceneState>

export function createSceneStore(): SceneStore {
  return createStore<SceneState>()((set, get) => ({
    objects: {},
    groups: {},

    addObject: (name, position) => {
      const { objects, groups } = get()
      if (objects[name] !== undefined) throw new NameCollisionError(name, 'object')
      if (groups[name] !== undefined) throw new NameCollisionError(name, 'group')
      const checked = validateVec3(position, `position of ${name}`)
      set(state => ({ objects: { ...state.objects, [name]: checked } }))
    },

    moveObject: (name, position) => {
      if (get().objects[name] === undefined) {
        throw new UnresolvedReferenceError(name, 'moveObject')
      }
      const checked = validateVec3(position, `position of ${name}`)
      set(state => ({ objects: { ...state.objects, [name]: checked } }))
    },

    removeObject: (name) => {
      set(state => {
        const { [name]: _removed, ...objects } = state.objects
        return { objects }
      })
    },

    defineGroup: (name, members) => {
      const { objects, groups } = get()
      if (objects[name] !== undefined) throw new NameCollisionError(name, 'object')
      if (groups[name] !== undefined) throw new NameCollisionError(name, 'group')
      for (const member of members) {
        if (objects[member] === undefined) {
          throw new UnresolvedReferenceError(member, `group '${name}'`)
        }
      }
      set(state => ({ groups: { ...state.groups, [name]: [...new Set(members)] } }))
    },
  }))
}

/**
 * Adapt a scene store to the SceneHost interface. Reads go to the live
 * store state, so later moves are observed.
 */
export function sceneHostFromStore(store: SceneStore): SceneHost {
  return {
    getPosition: (objectName) => store.getState().objects[objectName],
    resolveObjects: (nameOrGroup) => {
      const { objects, groups } = store.getState()
      if (objects[nameOrGroup] !== undefined) return [nameOrGroup]
      return groups[nameOrGroup]
    },
  }
}
