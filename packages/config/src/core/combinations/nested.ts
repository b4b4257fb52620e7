import type { Combination } from "../../ports/combination"
import { odometer } from "./odometer"

/**
 * Every position is either the wildcard or its identity value, in identity
 * order. Yields 2^N combinations from all-wildcard to all-values.
 *
 * With a `null` wildcard the wildcard slots are dropped, shortening the
 * combination, and combinations left empty are discarded.
 */
export function nestedCombinations(
  identity: readonly string[],
  wildcard: string | null,
): Combination[] {
  const rows = odometer(identity.map((value) => [wildcard, value]))

  const combinations = rows.map((row) => row.filter((v): v is string => v !== null))

  if (wildcard !== null) return combinations

  return combinations.filter((combination) => combination.length > 0)
}
