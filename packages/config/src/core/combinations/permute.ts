import type { Combination } from "../../ports/combination"
import { odometer } from "./odometer"

/**
 * Every subset of the identity in every order, smallest subsets first.
 *
 * Subsets are visited in odometer order and de-duplicated by value set; each
 * one expands to its orderings in lexicographic order. The wildcard plays no
 * part.
 *
 * @example
 * ```ts
 * permuteCombinations(["c", "a", "b"])
 * // [], [b], [a], [c], [a,b], [b,a], [b,c], [c,b], [a,c], [c,a], [a,b,c], …
 * ```
 */
export function permuteCombinations(identity: readonly string[]): Combination[] {
  const seen = new Set<string>()
  const bases: string[][] = []

  for (const row of odometer(identity.map((value) => [null, value]))) {
    const present = row.filter((v): v is string => v !== null)
    const base = [...new Set(present)].sort()
    const key = JSON.stringify(base)

    if (seen.has(key)) continue

    seen.add(key)
    bases.push(base)
  }

  // Array.prototype.sort is stable, so bases keep odometer order within a size.
  return bases.flatMap((base) => [...orderings(base)]).sort((a, b) => a.length - b.length)
}

/**
 * Lexicographic permutations starting from an already sorted arrangement.
 */
function* orderings(sorted: readonly string[]): Generator<string[]> {
  const current = [...sorted]

  while (true) {
    yield [...current]

    let pivot = current.length - 2
    while (pivot >= 0 && current[pivot] >= current[pivot + 1]) pivot--

    if (pivot < 0) return

    let successor = current.length - 1
    while (current[successor] <= current[pivot]) successor--

    swap(current, pivot, successor)
    reverseFrom(current, pivot + 1)
  }
}

function swap(values: string[], i: number, j: number): void {
  const held = values[i]
  values[i] = values[j]
  values[j] = held
}

function reverseFrom(values: string[], start: number): void {
  for (let i = start, j = values.length - 1; i < j; i++, j--) {
    swap(values, i, j)
  }
}
