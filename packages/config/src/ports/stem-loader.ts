import type { LoadedFragment } from "./fragment"

/**
 * Loads the configuration file that lives at a stem, whatever its format.
 *
 * A StemLoader is responsible only for *finding and parsing*. It does not
 * merge or validate keys.
 *
 * - Resolves `undefined` when nothing exists at the stem. This is the normal
 *   outcome for most stems and never an error.
 * - Rejects when something exists but cannot be parsed.
 * - Every call returns a fresh mapping; callers may mutate it.
 */
export interface StemLoader {
  /**
   * Human-readable name for debugging.
   * Example: "fs", "memory"
   */
  readonly name: string

  load(stem: string): Promise<LoadedFragment | undefined>
}
