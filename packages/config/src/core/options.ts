import { z } from "zod"
import { algorithms } from "../ports/combination"
import { mergeBehaviors, overrideModes } from "../ports/merge"
import { ConfigError } from "./config-error"

const stemName = z.string().min(1, "Stem names must not be empty").nullable()

export const localeConfigOptionsSchema = z.object({
  /** Ordered classifier values, e.g. the parts of a hostname. */
  identity: z.array(z.string()).readonly(),
  directory: z.string().default("."),
  wildcard: z.string().nullable().default("all"),
  defaultStem: stemName.default("default"),
  overrideStem: stemName.default("override"),
  separator: z.string().length(1, "The separator must be a single character").default("."),
  prefix: z.string().default(""),
  suffix: z.string().default(""),
  algorithm: z.enum(algorithms).default("NESTED"),
  mergeBehavior: z.enum(mergeBehaviors).default("LEFT_PRECEDENT"),
  overrideMode: z.enum(overrideModes).default("merge"),
  requireDefaults: z.boolean().default(false),
  /** Loaded before the default stem. */
  defaults: z.record(z.string(), z.unknown()).optional(),
  /** Loaded after the override stem. */
  overrides: z.record(z.string(), z.unknown()).optional(),
})

export type LocaleConfigOptions = z.input<typeof localeConfigOptionsSchema>

export type ResolvedLocaleConfigOptions = z.output<typeof localeConfigOptionsSchema>

/**
 * Validate construction options and fill in defaults.
 *
 * @throws ConfigError `invalid_options` listing every problem found.
 */
export function parseLocaleConfigOptions(input: unknown): ResolvedLocaleConfigOptions {
  const result = localeConfigOptionsSchema.safeParse(input)

  if (!result.success) {
    throw new ConfigError(`Invalid locale config options:\n${z.prettifyError(result.error)}`, {
      code: "invalid_options",
      cause: result.error,
      context: { issues: result.error.issues.map((issue) => issue.path.join(".")) },
    })
  }

  return result.data
}
