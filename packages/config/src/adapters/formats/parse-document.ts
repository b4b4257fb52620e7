import { ConfigError } from "../../core/config-error"
import { isRecord } from "../../core/utils/is-record"
import type { ConfigRecord } from "../../ports/fragment"

/**
 * Run a format's parser and require a mapping at the top level.
 *
 * An empty document (`null`/`undefined`) counts as an empty mapping.
 */
export function parseDocument(format: string, file: string, parse: () => unknown): ConfigRecord {
  let document: unknown

  try {
    document = parse()
  } catch (err) {
    throw new ConfigError(`Failed to parse ${format} in ${file}`, {
      code: "parse_failed",
      cause: err,
      context: { file, format },
    })
  }

  if (document === null || document === undefined) return {}

  if (!isRecord(document)) {
    throw new ConfigError(`Expected a mapping at the top level of ${file}`, {
      code: "parse_failed",
      context: { file, format },
    })
  }

  return document
}
