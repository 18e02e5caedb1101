import type { ListValue, Struct, Value } from "../grpc/types.js"

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue }

export type JsonObject = { [key: string]: JsonValue }

/**
 * Encode a plain JSON document as a google.protobuf.Struct
 *
 * @example
 * ```typescript
 * toStruct({ components: [{ name: "arm", type: "arm" }] })
 * ```
 */
export function toStruct(document: JsonObject): Struct {
  const fields: { [key: string]: Value } = {}
  for (const [key, value] of Object.entries(document)) {
    fields[key] = toValue(value)
  }
  return { fields }
}

/**
 * Decode a google.protobuf.Struct, e.g. a part's `robot_config`, back into
 * a plain JSON document
 */
export function fromStruct(struct: Struct): JsonObject {
  const document: JsonObject = {}
  for (const [key, value] of Object.entries(struct.fields)) {
    document[key] = fromValue(value)
  }
  return document
}

export function toValue(value: JsonValue): Value {
  if (value === null) {
    return { nullValue: "NULL_VALUE" }
  }
  if (Array.isArray(value)) {
    const list: ListValue = { values: value.map(toValue) }
    return { listValue: list }
  }
  switch (typeof value) {
    case "boolean":
      return { boolValue: value }
    case "number":
      return { numberValue: value }
    case "string":
      return { stringValue: value }
    default:
      return { structValue: toStruct(value) }
  }
}

export function fromValue(value: Value): JsonValue {
  // `kind` is only present on decoded messages
  switch (value.kind) {
    case "nullValue":
      return null
    case "numberValue":
      return value.numberValue ?? 0
    case "stringValue":
      return value.stringValue ?? ""
    case "boolValue":
      return value.boolValue ?? false
    case "structValue":
      return value.structValue ? fromStruct(value.structValue) : {}
    case "listValue":
      return value.listValue ? value.listValue.values.map(fromValue) : []
  }

  if (value.structValue != null) return fromStruct(value.structValue)
  if (value.listValue != null) return value.listValue.values.map(fromValue)
  if (value.stringValue != null) return value.stringValue
  if (value.numberValue != null) return value.numberValue
  if (value.boolValue != null) return value.boolValue
  return null
}
