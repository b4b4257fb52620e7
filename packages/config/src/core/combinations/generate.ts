import type { Algorithm, Combination, CombinationGenerator } from "../../ports/combination"
import { nestedCombinations } from "./nested"
import { permuteCombinations } from "./permute"

const generators: Record<Algorithm, CombinationGenerator> = {
  NESTED: nestedCombinations,
  PERMUTE: (identity) => permuteCombinations(identity),
}

export type GenerateCombinationsOptions = {
  algorithm: Algorithm
  wildcard: string | null
}

/**
 * Expand an identity into combinations, least specific first.
 *
 * Pure: identical inputs give identical, identically ordered output, which
 * the merge order depends on.
 */
export function generateCombinations(
  identity: readonly string[],
  { algorithm, wildcard }: GenerateCombinationsOptions,
): Combination[] {
  return generators[algorithm](identity, wildcard)
}
