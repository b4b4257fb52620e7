import { parse } from "yaml"
import type { ConfigFormat } from "../../ports/format"
import { parseDocument } from "./parse-document"

export const yamlFormat: ConfigFormat = {
  name: "yaml",
  extensions: ["yaml", "yml"],
  parse: (content, file) => parseDocument("yaml", file, () => parse(content)),
}
