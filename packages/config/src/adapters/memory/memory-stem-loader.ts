import { cloneRecord } from "../../core/merge"
import type { ConfigRecord, LoadedFragment } from "../../ports/fragment"
import type { StemLoader } from "../../ports/stem-loader"

/**
 * Serves mappings registered under exact stems. Useful for embedding
 * configuration in code and for tests.
 */
export class MemoryStemLoader implements StemLoader {
  readonly name = "memory"

  private readonly entries = new Map<string, ConfigRecord>()

  constructor(entries: Record<string, ConfigRecord> = {}) {
    for (const [stem, data] of Object.entries(entries)) {
      this.set(stem, data)
    }
  }

  set(stem: string, data: ConfigRecord): this {
    this.entries.set(stem, cloneRecord(data))
    return this
  }

  delete(stem: string): boolean {
    return this.entries.delete(stem)
  }

  async load(stem: string): Promise<LoadedFragment | undefined> {
    const data = this.entries.get(stem)
    if (data === undefined) return undefined

    return { stem, source: `memory:${stem}`, data: cloneRecord(data) }
  }
}
