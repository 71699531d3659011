import { FieldLabel, FieldType, fieldTypeInfo } from "../schema/field-types.js"
import type { JsType, ValueKind } from "../schema/field-types.js"
import type { SchemaField } from "../schema/model.js"

/** Only 64-bit integer fields can carry a jstype annotation. */
const WIDE_INT_TYPES: ReadonlySet<FieldType> = new Set<FieldType>([
  FieldType.Int64,
  FieldType.Sfixed64,
  FieldType.Uint64,
  FieldType.Fixed64,
  FieldType.Sint64
])

const UNSIGNED_TYPES: ReadonlySet<FieldType> = new Set<FieldType>([
  FieldType.Fixed32,
  FieldType.Fixed64,
  FieldType.Uint32,
  FieldType.Uint64
])

/** Sanitized content kinds the renderer knows how to trust. */
export type SanitizedContentKind = "html" | "js" | "css" | "uri" | "trusted_resource_uri"

/** Well-known safe-content protos → the sanitized kind they carry. */
const SAFE_PROTO_TO_SANITIZED_KIND = new Map<string, SanitizedContentKind>([
  ["webutil.html.types.SafeHtmlProto", "html"],
  ["webutil.html.types.SafeScriptProto", "js"],
  ["webutil.html.types.SafeStyleProto", "css"],
  ["webutil.html.types.SafeStyleSheetProto", "css"],
  ["webutil.html.types.SafeUrlProto", "uri"],
  ["webutil.html.types.TrustedResourceUrlProto", "trusted_resource_uri"]
])

export function valueKind(field: SchemaField): ValueKind {
  return fieldTypeInfo(field.type).valueKind
}

export function isRepeated(field: SchemaField): boolean {
  return field.label === FieldLabel.Repeated
}

/** fixed32, fixed64, uint32 and uint64; never the signed 64-bit types. */
export function isUnsigned(field: SchemaField): boolean {
  return UNSIGNED_TYPES.has(field.type)
}

/**
 * True when a 64-bit integer field explicitly declares a jstype.
 * The annotation value is not checked against the field's width.
 */
export function hasWideIntAnnotation(field: SchemaField): boolean {
  return WIDE_INT_TYPES.has(field.type) && field.options.jstype !== undefined
}

/**
 * The declared jstype, or null when the field has none.
 */
export function wideIntAnnotation(field: SchemaField): JsType | null {
  return field.options.jstype ?? null
}

/**
 * Whether rendering code must check presence explicitly to reproduce the
 * namespaced runtime's null-for-unset behavior.
 *
 * Defaulted and repeated fields never need it. In proto3 only message
 * fields keep explicit presence; in proto2 every singular field does.
 */
export function requiresPresenceCheckForNullEmulation(field: SchemaField): boolean {
  if (field.hasDefaultValue || isRepeated(field)) {
    return false
  }
  if (field.file.syntax === "proto3") {
    return valueKind(field) === "MESSAGE"
  }
  return true
}

export function sanitizedContentKind(field: SchemaField): SanitizedContentKind | null {
  if (field.type !== FieldType.Message || !field.typeName) {
    return null
  }
  return SAFE_PROTO_TO_SANITIZED_KIND.get(field.typeName) ?? null
}

export function isSanitizedContentField(field: SchemaField): boolean {
  return sanitizedContentKind(field) !== null
}
