// ═══════════════════════════════════════════════════════════════════════════
// Name Registry
// The host scene has a single namespace for objects, materials and logic
// carriers. Names are claimed when they are allocated; a clash is an error.
// ═══════════════════════════════════════════════════════════════════════════

import { createStore, type StoreApi } from 'zustand/vanilla'
import { NameCollisionError, ValidationError } from '../errors'

export type NameKind = 'object' | 'group' | 'material' | 'sound' | 'logic'

export interface NameRegistryState {
  names: Record<string, NameKind>

  claim: (name: string, kind: NameKind) => void
  release: (name: string) => boolean
  isTaken: (name: string) => boolean
  clear: () => void
}

export type NameRegistry = StoreApi<NameRegistryState>

export function createNameRegistry(): NameRegistry {
  return createStore<NameRegistryState>()((set, get) => ({
    names: {},

    claim: (name, kind) => {
      if (name.trim() === '') {
        throw new ValidationError('Cannot claim an empty name')
      }
      const existing = get().names[name]
      if (existing !== undefined) {
        throw new NameCollisionError(name, existing)
      }
      set(state => ({ names: { ...state.names, [name]: kind } }))
    },

    release: (name) => {
      if (get().names[name] === undefined) return false
      set(state => {
        const { [name]: _released, ...rest } = state.names
        return { names: rest }
      })
      return true
    },

    isTaken: (name) => get().names[name] !== undefined,

    clear: () => set({ names: {} }),
  }))
}

/** Process-wide registry used when a compile context does not supply one */
export const sceneNames = createNameRegistry()

// ─────────────────────────────────────────────────────────────────────────────
// Logic carrier names
// ─────────────────────────────────────────────────────────────────────────────

export function timelineObjectName(timeline: string): string {
  return `timeline_${timeline}`
}

export function triggerObjectName(trigger: string): string {
  return `trigger_${trigger}`
}

export function linkObjectName(object: string): string {
  return `link_${object}`
}
