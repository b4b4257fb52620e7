import { isPlainRecord } from "./is-record"

/**
 * Freeze plain mappings and arrays all the way down. Other objects
 * (functions, class instances) are left as they are.
 */
export function deepFreeze<T>(value: T): T {
  if (Object.isFrozen(value)) return value

  if (Array.isArray(value) || isPlainRecord(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }

  return value
}
