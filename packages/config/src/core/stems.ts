import path from "node:path"
import type { Combination } from "../ports/combination"
import type { StemEntry } from "../ports/stem"

export type BuildStemsOptions = {
  combinations: readonly Combination[]
  directory: string
  separator: string
  prefix: string
  suffix: string
  defaultStem: string | null
  overrideStem: string | null
}

/**
 * Turn combinations into file stems, keeping their order.
 *
 * The default stem comes first and the override stem last; neither gets the
 * prefix or suffix. Relative stems resolve against `directory`, absolute ones
 * are kept. A combination that renders to an empty name has no file and is
 * skipped.
 */
export function buildStems({
  combinations,
  directory,
  separator,
  prefix,
  suffix,
  defaultStem,
  overrideStem,
}: BuildStemsOptions): StemEntry[] {
  const stems: StemEntry[] = []

  if (defaultStem !== null) {
    stems.push({ path: path.resolve(directory, defaultStem), role: "default" })
  }

  for (const combination of combinations) {
    const name = `${prefix}${combination.join(separator)}${suffix}`
    if (name === "") continue

    stems.push({ path: path.resolve(directory, name), role: "combination", combination })
  }

  if (overrideStem !== null) {
    stems.push({ path: path.resolve(directory, overrideStem), role: "override" })
  }

  return stems
}
