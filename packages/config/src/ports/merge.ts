export const mergeBehaviors = ["LEFT_PRECEDENT", "RIGHT_PRECEDENT"] as const

/**
 * Which argument of a two-way merge wins on conflicting leaves.
 *
 * Fragments are folded as `merge(fragment, accumulated)`, so `LEFT_PRECEDENT`
 * lets more specific files override less specific ones and `RIGHT_PRECEDENT`
 * keeps the first value seen.
 *
 * Only these two behaviors exist. Custom per-type merge rules are not
 * supported.
 */
export type MergeBehavior = (typeof mergeBehaviors)[number]

export const overrideModes = ["merge", "replace"] as const

/**
 * How override fragments combine with everything before them.
 *
 * - `merge`: overrides are folded as the most specific layer.
 * - `replace`: when any override fragment exists, it alone forms the result.
 */
export type OverrideMode = (typeof overrideModes)[number]
