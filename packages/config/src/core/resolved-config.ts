import type { ConfigFragment, ConfigRecord } from "../ports/fragment"
import type { IResolvedConfig } from "../ports/locale-config"
import { deepFreeze } from "./utils/deep-freeze"

export class ResolvedConfig implements IResolvedConfig {
  constructor(
    private readonly data: Readonly<ConfigRecord>,
    readonly fragments: readonly ConfigFragment[],
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly declaredKeys: ReadonlySet<string>,
  ) {
    deepFreeze(this.data)
    deepFreeze(this.fragments)
  }

  get value(): Readonly<ConfigRecord> {
    return this.data
  }

  keys(): string[] {
    return Object.keys(this.data)
  }

  explain(key: string): string | undefined {
    return this.provenance.get(key)
  }

  sourcesUsed(): string[] {
    const used = new Set(this.provenance.values())

    return this.fragments.map((f) => f.source).filter((source) => used.has(source))
  }

  undeclaredKeys(): string[] {
    return this.keys().filter((k) => !this.declaredKeys.has(k))
  }
}
