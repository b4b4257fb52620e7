import type { ConfigRecord } from "./fragment"

/**
 * A serialization format a configuration file may be written in.
 */
export interface ConfigFormat {
  /** Example: "json", "yaml" */
  readonly name: string

  /** Extensions owned by this format, without the dot, in probe order. */
  readonly extensions: readonly string[]

  /**
   * Parse file contents into a mapping.
   *
   * Throws a `parse_failed` ConfigError when the content is malformed or its
   * top level is not a mapping.
   */
  parse(content: string, file: string): ConfigRecord
}
