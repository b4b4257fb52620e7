export { FileStemLoader, type FileStemLoaderOptions } from "./adapters/fs/file-stem-loader"
export {
  defaultFormats,
  dotenvFormat,
  jsonFormat,
  tomlFormat,
  yamlFormat,
} from "./adapters/formats"
export { MemoryStemLoader } from "./adapters/memory/memory-stem-loader"
export { generateCombinations } from "./core/combinations/generate"
export { nestedCombinations } from "./core/combinations/nested"
export { permuteCombinations } from "./core/combinations/permute"
export { ConfigError, type ConfigErrorOptions, isConfigError } from "./core/config-error"
export { LocaleConfig, type LocaleConfigDeps, loadLocaleConfig } from "./core/locale-config"
export {
  type MergeFragmentsOptions,
  type MergeResult,
  mergeFragments,
  mergeRecords,
} from "./core/merge"
export {
  type LocaleConfigOptions,
  localeConfigOptionsSchema,
  parseLocaleConfigOptions,
  type ResolvedLocaleConfigOptions,
} from "./core/options"
export { ResolvedConfig } from "./core/resolved-config"
export { type BuildStemsOptions, buildStems } from "./core/stems"
export { type Algorithm, algorithms, type Combination } from "./ports/combination"
export type { ConfigErrorCode, ErrorContext } from "./ports/error"
export type { ConfigFormat } from "./ports/format"
export type {
  ConfigFragment,
  ConfigRecord,
  FragmentRole,
  LoadedFragment,
} from "./ports/fragment"
export type { ILocaleConfig, IResolvedConfig } from "./ports/locale-config"
export {
  type MergeBehavior,
  mergeBehaviors,
  type OverrideMode,
  overrideModes,
} from "./ports/merge"
export type { StemEntry } from "./ports/stem"
export type { StemLoader } from "./ports/stem-loader"
