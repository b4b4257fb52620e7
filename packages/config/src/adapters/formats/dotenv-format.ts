import { parse } from "dotenv"
import type { ConfigFormat } from "../../ports/format"
import { parseDocument } from "./parse-document"

/**
 * `KEY=value` files. Values are always strings and there is no nesting.
 */
export const dotenvFormat: ConfigFormat = {
  name: "dotenv",
  extensions: ["env"],
  parse: (content, file) => parseDocument("dotenv", file, () => parse(content)),
}
