export const algorithms = ["NESTED", "PERMUTE"] as const

/**
 * How an identity is expanded into combinations.
 *
 * - `NESTED` keeps identity order and swaps values for the wildcard.
 * - `PERMUTE` takes every subset of the identity in every order.
 */
export type Algorithm = (typeof algorithms)[number]

/**
 * One candidate specificity level: the identity values (or wildcards) that
 * make up a single file name.
 */
export type Combination = readonly string[]

export type CombinationGenerator = (
  identity: readonly string[],
  wildcard: string | null,
) => Combination[]
