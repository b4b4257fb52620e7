import deepmerge from "deepmerge"
import type { ConfigFragment, ConfigRecord } from "../ports/fragment"
import type { MergeBehavior, OverrideMode } from "../ports/merge"
import { ConfigError } from "./config-error"
import { isPlainRecord } from "./utils/is-record"

const mergeOptions: deepmerge.Options = {
  isMergeableObject: (value) => Array.isArray(value) || isPlainRecord(value),
  // Sequences are leaves: the winning side replaces them wholesale.
  arrayMerge: (_target, source) => source.map(cloneValue),
}

function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(cloneValue)
  if (isPlainRecord(value)) return cloneRecord(value)

  return value
}

/**
 * Copy the mappings and arrays of `data`; any other value is shared.
 */
export function cloneRecord(data: ConfigRecord): ConfigRecord {
  return deepmerge<ConfigRecord>({}, data, mergeOptions)
}

/**
 * Deep-merge two mappings without mutating either.
 *
 * Nested mappings merge key by key. Arrays and scalars are replaced by the
 * winning side, chosen by `behavior`.
 */
export function mergeRecords(
  left: ConfigRecord,
  right: ConfigRecord,
  behavior: MergeBehavior = "LEFT_PRECEDENT",
): ConfigRecord {
  return behavior === "LEFT_PRECEDENT"
    ? deepmerge<ConfigRecord>(right, left, mergeOptions)
    : deepmerge<ConfigRecord>(left, right, mergeOptions)
}

export type MergeFragmentsOptions = {
  /** @default "LEFT_PRECEDENT" */
  behavior?: MergeBehavior

  /**
   * Reject fragments that introduce a top-level key no default fragment
   * declares.
   * @default false
   */
  requireDefaults?: boolean

  /** @default "merge" */
  overrideMode?: OverrideMode
}

export type MergeResult = {
  value: ConfigRecord

  /** Top-level key → source of the fragment that supplied its final value. */
  provenance: ReadonlyMap<string, string>

  /** Top-level keys declared by default fragments. */
  declaredKeys: ReadonlySet<string>
}

/**
 * Fold fragments, least specific first, into one mapping.
 *
 * Each fragment is folded as `mergeRecords(fragment, accumulated, behavior)`.
 * Under `requireDefaults` a fragment is checked before it is folded, so a
 * key is only accepted when a default fragment declares it.
 */
export function mergeFragments(
  fragments: readonly ConfigFragment[],
  options: MergeFragmentsOptions = {},
): MergeResult {
  const behavior = options.behavior ?? "LEFT_PRECEDENT"
  const declaredKeys = new Set(
    fragments.filter((f) => f.role === "default").flatMap((f) => Object.keys(f.data)),
  )

  const overrides = fragments.filter((f) => f.role === "override")
  const layers =
    options.overrideMode === "replace" && overrides.length > 0 ? overrides : fragments

  let value: ConfigRecord = {}
  const provenance = new Map<string, string>()

  for (const fragment of layers) {
    if (options.requireDefaults && fragment.role !== "default") {
      assertDeclared(fragment, declaredKeys)
    }

    value = mergeRecords(fragment.data, value, behavior)

    for (const key of Object.keys(fragment.data)) {
      if (behavior === "LEFT_PRECEDENT" || !provenance.has(key)) {
        provenance.set(key, fragment.source)
      }
    }
  }

  return { value, provenance, declaredKeys }
}

function assertDeclared(fragment: ConfigFragment, declaredKeys: ReadonlySet<string>): void {
  for (const key of Object.keys(fragment.data)) {
    if (declaredKeys.has(key)) continue

    throw new ConfigError(
      `The "${key}" key is not declared in the default config (found in ${fragment.source})`,
      { code: "unknown_key", context: { key, source: fragment.source } },
    )
  }
}
