/**
 * A parsed configuration mapping.
 */
export type ConfigRecord = Record<string, unknown>

/**
 * One configuration file (or in-memory mapping) that was found and parsed.
 */
export type LoadedFragment = {
  /** The stem that was probed, without extension. */
  readonly stem: string

  /**
   * Human-readable origin used for provenance and error messages.
   * Example: "/etc/app/db.all.qa.yaml", "memory:/etc/app/default", "object:defaults"
   */
  readonly source: string

  readonly data: ConfigRecord
}

/**
 * Where a fragment sits in the merge order.
 *
 * Defaults come first, then combination stems from least to most specific,
 * then overrides.
 */
export type FragmentRole = "default" | "combination" | "override"

export type ConfigFragment = LoadedFragment & {
  readonly role: FragmentRole
}
