import { ResolverError } from "../util/errors.js"

/**
 * Protobuf FieldDescriptorProto.Type enum values.
 *
 * From google/protobuf/descriptor.proto:
 *   1=double, 2=float, 3=int64, 4=uint64, 5=int32, 6=fixed64,
 *   7=fixed32, 8=bool, 9=string, 10=group, 11=message, 12=bytes,
 *   13=uint32, 14=enum, 15=sfixed32, 16=sfixed64, 17=sint32, 18=sint64
 */
export const enum FieldType {
  Double = 1,
  Float = 2,
  Int64 = 3,
  Uint64 = 4,
  Int32 = 5,
  Fixed64 = 6,
  Fixed32 = 7,
  Bool = 8,
  String = 9,
  Group = 10,
  Message = 11,
  Bytes = 12,
  Uint32 = 13,
  Enum = 14,
  Sfixed32 = 15,
  Sfixed64 = 16,
  Sint32 = 17,
  Sint64 = 18
}

/** FieldDescriptorProto.Label */
export const enum FieldLabel {
  Optional = 1,
  Required = 2,
  Repeated = 3
}

/**
 * Host-side value kind of a field, as the class-based runtime sees it.
 * Several wire encodings collapse onto the same kind (int32/sint32/sfixed32 → INT).
 */
export type ValueKind =
  | "INT"
  | "LONG"
  | "FLOAT"
  | "DOUBLE"
  | "BOOLEAN"
  | "STRING"
  | "BYTE_STRING"
  | "ENUM"
  | "MESSAGE"

/** Mapping entry: descriptor field type → value kind + display name. */
export interface FieldTypeInfo {
  /** Lowercase .proto keyword (e.g. "sfixed64") */
  protoName: string
  valueKind: ValueKind
}

export const FIELD_TYPE_MAP: Record<number, FieldTypeInfo> = {
  // TYPE_DOUBLE = 1
  1: { protoName: "double", valueKind: "DOUBLE" },
  // TYPE_FLOAT = 2
  2: { protoName: "float", valueKind: "FLOAT" },
  // TYPE_INT64 = 3
  3: { protoName: "int64", valueKind: "LONG" },
  // TYPE_UINT64 = 4
  4: { protoName: "uint64", valueKind: "LONG" },
  // TYPE_INT32 = 5
  5: { protoName: "int32", valueKind: "INT" },
  // TYPE_FIXED64 = 6
  6: { protoName: "fixed64", valueKind: "LONG" },
  // TYPE_FIXED32 = 7
  7: { protoName: "fixed32", valueKind: "INT" },
  // TYPE_BOOL = 8
  8: { protoName: "bool", valueKind: "BOOLEAN" },
  // TYPE_STRING = 9
  9: { protoName: "string", valueKind: "STRING" },
  // TYPE_GROUP = 10 (a group is a message on the host side)
  10: { protoName: "group", valueKind: "MESSAGE" },
  // TYPE_MESSAGE = 11
  11: { protoName: "message", valueKind: "MESSAGE" },
  // TYPE_BYTES = 12
  12: { protoName: "bytes", valueKind: "BYTE_STRING" },
  // TYPE_UINT32 = 13
  13: { protoName: "uint32", valueKind: "INT" },
  // TYPE_ENUM = 14
  14: { protoName: "enum", valueKind: "ENUM" },
  // TYPE_SFIXED32 = 15
  15: { protoName: "sfixed32", valueKind: "INT" },
  // TYPE_SFIXED64 = 16
  16: { protoName: "sfixed64", valueKind: "LONG" },
  // TYPE_SINT32 = 17
  17: { protoName: "sint32", valueKind: "INT" },
  // TYPE_SINT64 = 18
  18: { protoName: "sint64", valueKind: "LONG" }
}

/**
 * Look up the type table entry for a descriptor type number.
 */
export function fieldTypeInfo(fieldType: number): FieldTypeInfo {
  const info = FIELD_TYPE_MAP[fieldType]
  if (!info) {
    throw new ResolverError(`Unsupported protobuf field type: ${fieldType}`)
  }
  return info
}

/** FieldOptions.JSType */
export type JsType = "JS_NORMAL" | "JS_STRING" | "JS_NUMBER"

const JS_TYPES: readonly JsType[] = ["JS_NORMAL", "JS_STRING", "JS_NUMBER"]

/**
 * Map the numeric FieldOptions.jstype value to its name.
 * Unknown numbers decode as JS_NORMAL, matching protobuf's closed-enum fallback.
 */
export function jsTypeFromNumber(value: number): JsType {
  return JS_TYPES[value] ?? "JS_NORMAL"
}
