// ═══════════════════════════════════════════════════════════════════════════
// Compile - entry points over the closed set of compilable records
// ═══════════════════════════════════════════════════════════════════════════

import { ValidationError } from '../errors'
import { createLogger } from '../logging'
import type { ClickLink } from '../scene/link'
import type { Timeline } from '../scene/timeline'
import type { RegionTrigger } from '../scene/triggers'
import type { Activator, CompiledActivator } from './Activator'
import { ClickLinkActivator } from './ClickLinkActivator'
import type { CompileContext } from './context'
import type { ActivatorGraph } from './graph'
import { RegionTriggerActivator } from './RegionTriggerActivator'
import { TimelineActivator } from './TimelineActivator'

const log = createLogger('Compiler')

export type CompilableRecord = Timeline | RegionTrigger | ClickLink

/** A record with the object it attaches to; links always need one */
export interface CompileEntry {
  record: CompilableRecord
  target?: string
}

export interface CompiledScene {
  graphs: ActivatorGraph[]
  /** Generated Lua by module name */
  scripts: Map<string, string>
}

/**
 * Build the activator for a record. `target` names the clicked object of a
 * link; for timelines and triggers it overrides the carrier object name.
 */
export function createActivator(
  record: CompilableRecord,
  target: string | undefined,
  context: CompileContext
): Activator {
  switch (record.type) {
    case 'timeline':
      return new TimelineActivator(record, context, target)
    case 'region':
      return new RegionTriggerActivator(record, context, target)
    case 'link':
      if (target === undefined || target.trim() === '') {
        throw new ValidationError('A link must be compiled against the object that receives its clicks')
      }
      return new ClickLinkActivator(record, target, context)
  }
}

export function compile(
  record: CompilableRecord,
  target: string | undefined,
  context: CompileContext
): CompiledActivator {
  return createActivator(record, target, context).compile()
}

export function compileScene(
  entries: Iterable<CompilableRecord | CompileEntry>,
  context: CompileContext
): CompiledScene {
  const graphs: ActivatorGraph[] = []
  const scripts = new Map<string, string>()

  for (const entry of entries) {
    const { record, target } = 'record' in entry ? entry : { record: entry, target: undefined }
    const { graph, logic } = compile(record, target, context)
    graphs.push(graph)
    scripts.set(graph.logicModule, logic)
  }

  log.debug(`Compiled ${graphs.length} activator graphs`)
  return { graphs, scripts }
}
