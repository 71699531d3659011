import type { FieldLabel, FieldType, JsType } from "./field-types.js"

/**
 * Read-only schema graph the resolvers work on.
 *
 * Built once per request by the descriptor adapter (see descriptors.ts).
 * Children hold back-references to their parents (`file`, `containingType`,
 * `extensionScope`); parents are never copied.
 */

export type Syntax = "proto2" | "proto3"

export interface SchemaFile {
  /** Path as protoc reports it, e.g. "foo/bar/baz.proto" */
  readonly name: string
  /** Declared package; "" when the file has none */
  readonly package: string
  readonly syntax: Syntax
  readonly options: SchemaFileOptions
  readonly messages: readonly SchemaMessage[]
  readonly enums: readonly SchemaEnum[]
  /** Extensions declared at file scope */
  readonly extensions: readonly SchemaField[]
}

/** Subset of FileOptions consumed by the class-based runtime naming. */
export interface SchemaFileOptions {
  readonly javaPackage?: string
  readonly javaOuterClassname?: string
  readonly javaMultipleFiles: boolean
}

interface ElementBase {
  readonly name: string
  /** Dot-separated, package-prefixed, no leading dot */
  readonly fullName: string
  readonly file: SchemaFile
  readonly containingType?: SchemaMessage
}

export interface SchemaMessage extends ElementBase {
  readonly kind: "message"
  readonly fields: readonly SchemaField[]
  readonly nestedMessages: readonly SchemaMessage[]
  readonly nestedEnums: readonly SchemaEnum[]
  /** Extensions declared inside this message's body */
  readonly extensions: readonly SchemaField[]
  readonly isMapEntry: boolean
}

export interface SchemaEnum extends ElementBase {
  readonly kind: "enum"
}

/** A message or enum declaration. */
export type SchemaElement = SchemaMessage | SchemaEnum

export interface SchemaFieldOptions {
  /** FieldOptions.jstype, only when explicitly declared */
  readonly jstype?: JsType
}

export interface SchemaField {
  readonly name: string
  readonly number: number
  readonly type: FieldType
  /** Referenced message/enum full name without the leading dot */
  readonly typeName?: string
  readonly label: FieldLabel
  readonly hasDefaultValue: boolean
  readonly defaultValue?: string
  readonly options: SchemaFieldOptions
  readonly file: SchemaFile
  /** Owning message of a regular field; unset for extensions */
  readonly containingType?: SchemaMessage
  readonly isExtension: boolean
  /** Full name of the extended message, for extensions */
  readonly extendee?: string
  /** Message the extension is declared inside; unset at file scope */
  readonly extensionScope?: SchemaMessage
}
