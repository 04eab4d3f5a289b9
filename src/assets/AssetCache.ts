// ═══════════════════════════════════════════════════════════════════════════
// AssetCache - imported assets keyed by filename
// An asset is loaded once; later requests get the cached handle, or a copy
// of it when the cache was built with a duplicator. Entries live as long as
// the cache.
// ═══════════════════════════════════════════════════════════════════════════

import { ValidationError } from '../errors'
import { createLogger } from '../logging'

const log = createLogger('AssetCache')

export interface AssetCacheOptions<H> {
  /** Copy the cached handle for each later request (models); omit to share it (materials) */
  duplicate?: (handle: H) => H
}

export class AssetCache<H> {
  private entries: Map<string, H> = new Map()
  private readonly duplicate: ((handle: H) => H) | undefined

  constructor(options: AssetCacheOptions<H> = {}) {
    this.duplicate = options.duplicate
  }

  get size(): number {
    return this.entries.size
  }

  has(filename: string): boolean {
    return this.entries.has(filename)
  }

  /**
   * Return the asset for `filename`, calling `load` only on the first request.
   * The first caller receives the cached handle itself.
   */
  acquire(filename: string, load: (filename: string) => H): H {
    if (filename === '') {
      throw new ValidationError('Asset filename must not be empty')
    }

    const cached = this.entries.get(filename)
    if (cached !== undefined) {
      return this.duplicate ? this.duplicate(cached) : cached
    }

    const handle = load(filename)
    this.entries.set(filename, handle)
    log.debug(`Loaded ${filename}`)
    return handle
  }
}
