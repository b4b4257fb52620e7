import type { ConfigFormat } from "../../ports/format"
import { dotenvFormat } from "./dotenv-format"
import { jsonFormat } from "./json-format"
import { tomlFormat } from "./toml-format"
import { yamlFormat } from "./yaml-format"

/**
 * Probe order for a stem: json, yaml, yml, toml, env.
 */
export const defaultFormats: readonly ConfigFormat[] = [
  jsonFormat,
  yamlFormat,
  tomlFormat,
  dotenvFormat,
]

export { dotenvFormat, jsonFormat, tomlFormat, yamlFormat }
