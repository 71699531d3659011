import { FieldLabel, fieldTypeInfo, jsTypeFromNumber } from "./field-types.js"
import type {
  SchemaEnum,
  SchemaField,
  SchemaFile,
  SchemaMessage,
  Syntax
} from "./model.js"

// ── Decoded descriptor shapes ─────────────────────────────────────────
// Plain objects as produced by protobufjs `Type.toObject(msg, { arrays: true })`
// for the descriptor subset declared in plugin.ts. Absent optional fields
// are left out, so `undefined` means "not set on the wire".

export interface FileOptionsObject {
  java_package?: string
  java_outer_classname?: string
  java_multiple_files?: boolean
}

export interface MessageOptionsObject {
  map_entry?: boolean
}

export interface FieldOptionsObject {
  jstype?: number
}

export interface FieldDescriptorObject {
  name?: string
  extendee?: string
  number?: number
  label?: number
  type?: number
  type_name?: string
  default_value?: string
  options?: FieldOptionsObject
  oneof_index?: number
  json_name?: string
}

export interface EnumDescriptorObject {
  name?: string
}

export interface DescriptorObject {
  name?: string
  field?: FieldDescriptorObject[]
  nested_type?: DescriptorObject[]
  enum_type?: EnumDescriptorObject[]
  extension?: FieldDescriptorObject[]
  options?: MessageOptionsObject
}

export interface FileDescriptorObject {
  name?: string
  package?: string
  dependency?: string[]
  message_type?: DescriptorObject[]
  enum_type?: EnumDescriptorObject[]
  extension?: FieldDescriptorObject[]
  options?: FileOptionsObject
  syntax?: string
}

// ── Descriptor → schema model ─────────────────────────────────────────

/** Where a field sits: inside a message body, or an `extend` block. */
type FieldPlacement =
  | { kind: "member"; message: SchemaMessage }
  | { kind: "extension"; scope?: SchemaMessage }

/**
 * Build the read-only schema graph for one FileDescriptorProto.
 */
export function buildSchemaFile(desc: FileDescriptorObject): SchemaFile {
  const packageName = desc.package ?? ""
  const messages: SchemaMessage[] = []
  const enums: SchemaEnum[] = []
  const extensions: SchemaField[] = []

  const file: SchemaFile = {
    name: desc.name ?? "",
    package: packageName,
    syntax: toSyntax(desc.syntax),
    options: {
      javaPackage: desc.options?.java_package,
      javaOuterClassname: desc.options?.java_outer_classname,
      javaMultipleFiles: desc.options?.java_multiple_files === true
    },
    messages,
    enums,
    extensions
  }

  for (const msg of desc.message_type ?? []) {
    messages.push(buildMessage(msg, file, packageName))
  }
  for (const en of desc.enum_type ?? []) {
    enums.push(buildEnum(en, file, packageName))
  }
  for (const ext of desc.extension ?? []) {
    extensions.push(buildField(ext, file, { kind: "extension" }))
  }

  return file
}

/**
 * Editions files default to explicit presence, the same as proto2.
 */
function toSyntax(syntax: string | undefined): Syntax {
  return syntax === "proto3" ? "proto3" : "proto2"
}

function buildMessage(
  desc: DescriptorObject,
  file: SchemaFile,
  parentFqn: string,
  containingType?: SchemaMessage
): SchemaMessage {
  const name = desc.name ?? ""
  const fullName = parentFqn ? `${parentFqn}.${name}` : name
  const fields: SchemaField[] = []
  const nestedMessages: SchemaMessage[] = []
  const nestedEnums: SchemaEnum[] = []
  const extensions: SchemaField[] = []

  const message: SchemaMessage = {
    kind: "message",
    name,
    fullName,
    file,
    containingType,
    fields,
    nestedMessages,
    nestedEnums,
    extensions,
    isMapEntry: desc.options?.map_entry === true
  }

  for (const f of desc.field ?? []) {
    fields.push(buildField(f, file, { kind: "member", message }))
  }
  for (const nested of desc.nested_type ?? []) {
    nestedMessages.push(buildMessage(nested, file, fullName, message))
  }
  for (const en of desc.enum_type ?? []) {
    nestedEnums.push(buildEnum(en, file, fullName, message))
  }
  for (const ext of desc.extension ?? []) {
    extensions.push(buildField(ext, file, { kind: "extension", scope: message }))
  }

  return message
}

function buildEnum(
  desc: EnumDescriptorObject,
  file: SchemaFile,
  parentFqn: string,
  containingType?: SchemaMessage
): SchemaEnum {
  const name = desc.name ?? ""
  return {
    kind: "enum",
    name,
    fullName: parentFqn ? `${parentFqn}.${name}` : name,
    file,
    containingType
  }
}

function buildField(
  desc: FieldDescriptorObject,
  file: SchemaFile,
  placement: FieldPlacement
): SchemaField {
  const type = desc.type ?? 0
  // Rejects unknown type numbers up front so resolvers can trust the table
  fieldTypeInfo(type)

  const jstype = desc.options?.jstype
  return {
    name: desc.name ?? "",
    number: desc.number ?? 0,
    type,
    typeName: stripLeadingDot(desc.type_name),
    label: desc.label ?? FieldLabel.Optional,
    hasDefaultValue: desc.default_value !== undefined,
    defaultValue: desc.default_value,
    options: { jstype: jstype === undefined ? undefined : jsTypeFromNumber(jstype) },
    file,
    containingType: placement.kind === "member" ? placement.message : undefined,
    isExtension: placement.kind === "extension",
    extendee: placement.kind === "extension" ? stripLeadingDot(desc.extendee) : undefined,
    extensionScope: placement.kind === "extension" ? placement.scope : undefined
  }
}

/** ".foo.Bar" → "foo.Bar" */
function stripLeadingDot(name: string | undefined): string | undefined {
  return name === undefined ? undefined : name.replace(/^\./, "")
}
