/**
 * True for mappings a configuration file can hold at its top level:
 * non-null objects that are not arrays.
 */
export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

/**
 * True for object literals and null-prototype maps. Class instances, dates
 * and functions are values, not mappings.
 */
export function isPlainRecord(v: unknown): v is Record<string, unknown> {
  if (!isRecord(v)) return false

  const proto: unknown = Object.getPrototypeOf(v)
  return proto === Object.prototype || proto === null
}
