import fs from "node:fs/promises"
import type { ConfigFormat } from "../../ports/format"
import type { ConfigRecord, LoadedFragment } from "../../ports/fragment"
import type { StemLoader } from "../../ports/stem-loader"
import { defaultFormats } from "../formats"

/**
 * Options for loading configuration files from disk.
 */
export type FileStemLoaderOptions = {
  /**
   * Formats to probe, in order. For each format every extension it owns is
   * tried before moving on.
   *
   * @default json, yaml, toml, dotenv
   */
  formats?: readonly ConfigFormat[]

  /**
   * Parse a file only with the format owning its extension.
   *
   * - `true`: `default.yaml` is YAML, and a YAML error is final.
   * - `false`: the owning format is tried first, then every other format;
   *   the first successful parse wins.
   *
   * @default true
   */
  useExtension?: boolean
}

type Candidate = {
  extension: string
  format: ConfigFormat
}

export class FileStemLoader implements StemLoader {
  readonly name = "fs"

  private readonly formats: readonly ConfigFormat[]
  private readonly candidates: readonly Candidate[]
  private readonly useExtension: boolean

  constructor(opts: FileStemLoaderOptions = {}) {
    this.formats = opts.formats ?? defaultFormats
    this.useExtension = opts.useExtension ?? true
    this.candidates = this.formats.flatMap((format) =>
      format.extensions.map((extension) => ({ extension, format })),
    )
  }

  async load(stem: string): Promise<LoadedFragment | undefined> {
    for (const { extension, format } of this.candidates) {
      const file = `${stem}.${extension}`
      const content = await readIfExists(file)

      if (content === undefined) continue

      return { stem, source: file, data: this.parse(format, content, file) }
    }

    return undefined
  }

  private parse(owner: ConfigFormat, content: string, file: string): ConfigRecord {
    if (this.useExtension) return owner.parse(content, file)

    const attempts = [owner, ...this.formats.filter((f) => f !== owner)]
    let firstError: unknown

    for (const format of attempts) {
      try {
        return format.parse(content, file)
      } catch (err) {
        firstError ??= err
      }
    }

    throw firstError
  }
}

async function readIfExists(file: string): Promise<string | undefined> {
  try {
    return await fs.readFile(file, "utf-8")
  } catch (err) {
    if (isMissing(err)) return undefined
    throw err
  }
}

function isMissing(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "EISDIR" || err.code === "ENOTDIR")
  )
}
