/**
 * Property value kinds, mapped onto the data type features that govern them.
 */

import type { DataTypeFeature } from "@graphcheck/harness"

export type ValueKind = Exclude<DataTypeFeature, "Properties">

/**
 * The data type feature a value needs, or undefined when no graph can hold it.
 */
export function dataTypeOf(value: unknown): ValueKind | undefined {
  switch (typeof value) {
    case "boolean":
      return "BooleanValues"
    case "string":
      return "StringValues"
    case "number":
      if (!Number.isFinite(value)) return undefined
      return Number.isInteger(value) ? "IntegerValues" : "DoubleValues"
    case "object":
      if (Array.isArray(value)) return "ListValues"
      if (value !== null && Object.getPrototypeOf(value) === Object.prototype) return "MapValues"
      return undefined
    default:
      return undefined
  }
}

export function describeKind(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (typeof value === "object") return value.constructor?.name ?? "object"
  return typeof value
}
