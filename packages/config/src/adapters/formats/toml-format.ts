import { parse } from "smol-toml"
import type { ConfigFormat } from "../../ports/format"
import { parseDocument } from "./parse-document"

export const tomlFormat: ConfigFormat = {
  name: "toml",
  extensions: ["toml"],
  parse: (content, file) => parseDocument("toml", file, () => parse(content)),
}
