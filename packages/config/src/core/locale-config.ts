import path from "node:path"
import { type Logger, NullLogger } from "@overlay/logger"
import { FileStemLoader } from "../adapters/fs/file-stem-loader"
import type { Combination } from "../ports/combination"
import type { ConfigFragment, ConfigRecord, FragmentRole } from "../ports/fragment"
import type { ILocaleConfig } from "../ports/locale-config"
import type { StemEntry } from "../ports/stem"
import type { StemLoader } from "../ports/stem-loader"
import { generateCombinations } from "./combinations/generate"
import { cloneRecord, mergeFragments } from "./merge"
import {
  type LocaleConfigOptions,
  parseLocaleConfigOptions,
  type ResolvedLocaleConfigOptions,
} from "./options"
import { ResolvedConfig } from "./resolved-config"
import { buildStems } from "./stems"

export type LocaleConfigDeps = {
  /** @default FileStemLoader with json, yaml, toml and dotenv */
  loader?: StemLoader
  /** @default NullLogger */
  logger?: Logger
}

export class LocaleConfig implements ILocaleConfig {
  readonly options: ResolvedLocaleConfigOptions
  readonly directory: string

  private readonly loader: StemLoader
  private readonly logger: Logger

  private cachedCombinations: readonly Combination[] | undefined
  private cachedStemEntries: readonly StemEntry[] | undefined
  private cachedStems: readonly string[] | undefined
  private pending: Promise<ResolvedConfig> | undefined

  constructor(options: LocaleConfigOptions, deps: LocaleConfigDeps = {}) {
    this.options = parseLocaleConfigOptions(options)
    this.directory = path.resolve(this.options.directory)
    this.loader = deps.loader ?? new FileStemLoader()
    this.logger = (deps.logger ?? new NullLogger()).child({
      component: "locale-config",
      directory: this.directory,
    })
  }

  get identity(): readonly string[] {
    return this.options.identity
  }

  get combinations(): readonly Combination[] {
    this.cachedCombinations ??= Object.freeze(
      generateCombinations(this.identity, {
        algorithm: this.options.algorithm,
        wildcard: this.options.wildcard,
      }),
    )

    return this.cachedCombinations
  }

  get stemEntries(): readonly StemEntry[] {
    this.cachedStemEntries ??= Object.freeze(
      buildStems({
        combinations: this.combinations,
        directory: this.directory,
        separator: this.options.separator,
        prefix: this.options.prefix,
        suffix: this.options.suffix,
        defaultStem: this.options.defaultStem,
        overrideStem: this.options.overrideStem,
      }),
    )

    return this.cachedStemEntries
  }

  get stems(): readonly string[] {
    this.cachedStems ??= Object.freeze(this.stemEntries.map((entry) => entry.path))

    return this.cachedStems
  }

  /**
   * Load and merge once; later calls share the same result, or the same
   * failure.
   */
  resolve(): Promise<ResolvedConfig> {
    this.pending ??= this.build()

    return this.pending
  }

  async configs(): Promise<readonly ConfigFragment[]> {
    return (await this.resolve()).fragments
  }

  async config(): Promise<Readonly<ConfigRecord>> {
    return (await this.resolve()).value
  }

  private async build(): Promise<ResolvedConfig> {
    try {
      const fragments = await this.loadFragments()

      const merged = mergeFragments(fragments, {
        behavior: this.options.mergeBehavior,
        requireDefaults: this.options.requireDefaults,
        overrideMode: this.options.overrideMode,
      })

      this.logger.info("resolved locale config", {
        identity: this.identity,
        algorithm: this.options.algorithm,
        fragments: fragments.length,
      })

      return new ResolvedConfig(merged.value, fragments, merged.provenance, merged.declaredKeys)
    } catch (err) {
      this.logger.debug("failed to resolve locale config", { identity: this.identity, err })
      throw err
    }
  }

  /**
   * Stems are independent reads, so they load concurrently; the result keeps
   * stem order.
   */
  private async loadFragments(): Promise<ConfigFragment[]> {
    this.logger.debug("probing config stems", { stems: this.stems.length })

    const loaded = await Promise.all(
      this.stemEntries.map(async (entry): Promise<ConfigFragment | undefined> => {
        const fragment = await this.loader.load(entry.path)

        if (fragment === undefined) {
          this.logger.trace("no config file for stem", { stem: entry.path })
          return undefined
        }

        this.logger.debug("loaded config fragment", {
          stem: entry.path,
          source: fragment.source,
        })

        return { ...fragment, role: entry.role }
      }),
    )

    const found = loaded.filter((f): f is ConfigFragment => f !== undefined)
    const { defaults, overrides } = this.options

    return [
      ...(defaults ? [objectFragment("defaults", defaults, "default")] : []),
      ...found,
      ...(overrides ? [objectFragment("overrides", overrides, "override")] : []),
    ]
  }
}

function objectFragment(name: string, data: ConfigRecord, role: FragmentRole): ConfigFragment {
  const label = `object:${name}`

  return { stem: label, source: label, data: cloneRecord(data), role }
}

/**
 * Construct a LocaleConfig and resolve it in one step.
 */
export async function loadLocaleConfig(
  options: LocaleConfigOptions,
  deps: LocaleConfigDeps = {},
): Promise<ResolvedConfig> {
  return new LocaleConfig(options, deps).resolve()
}
