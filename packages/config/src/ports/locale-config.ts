import type { Combination } from "./combination"
import type { ConfigFragment, ConfigRecord } from "./fragment"
import type { StemEntry } from "./stem"

/**
 * The outcome of one resolution: the merged mapping and where it came from.
 */
export interface IResolvedConfig {
  /** Merged configuration, frozen at every level. */
  readonly value: Readonly<ConfigRecord>

  /** Fragments that were found, in merge order. */
  readonly fragments: readonly ConfigFragment[]

  /** Top-level keys of the merged value. */
  keys(): string[]

  /**
   * Source of the fragment that supplied the final value of a top-level key,
   * or `undefined` when no fragment has the key.
   */
  explain(key: string): string | undefined

  /** Sources that supplied at least one final top-level value, in merge order. */
  sourcesUsed(): string[]

  /**
   * Top-level keys of the merged value that no default fragment declares.
   *
   * Non-fatal counterpart of `requireDefaults`.
   */
  undeclaredKeys(): string[]
}

/**
 * Configuration selected by an identity and merged from least to most
 * specific file.
 *
 * @example
 * ```typescript
 * const locale = new LocaleConfig({
 *   identity: ["db", "1", "qa"],
 *   directory: "/etc/app",
 * })
 *
 * locale.stems
 * // /etc/app/default, /etc/app/all.all.all, /etc/app/all.all.qa, …,
 * // /etc/app/db.1.qa, /etc/app/override
 *
 * await locale.config()            // merged mapping
 * (await locale.resolve()).explain("pool")  // "/etc/app/db.all.all.yaml"
 * ```
 */
export interface ILocaleConfig {
  readonly identity: readonly string[]

  /** Absolute directory stems resolve against. */
  readonly directory: string

  readonly combinations: readonly Combination[]

  /** Stem paths in merge order: default, combinations, override. */
  readonly stems: readonly string[]

  readonly stemEntries: readonly StemEntry[]

  /** Fragments that exist, in merge order. */
  configs(): Promise<readonly ConfigFragment[]>

  /** The merged configuration. */
  config(): Promise<Readonly<ConfigRecord>>

  resolve(): Promise<IResolvedConfig>
}
