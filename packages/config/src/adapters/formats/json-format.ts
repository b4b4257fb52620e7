import type { ConfigFormat } from "../../ports/format"
import { parseDocument } from "./parse-document"

export const jsonFormat: ConfigFormat = {
  name: "json",
  extensions: ["json"],
  parse: (content, file) => parseDocument("json", file, () => JSON.parse(content)),
}
