import type { Combination } from "./combination"
import type { FragmentRole } from "./fragment"

export type StemEntry = {
  /** Absolute path without extension. */
  readonly path: string

  readonly role: FragmentRole

  /** Set for stems derived from a combination. */
  readonly combination?: Combination
}
