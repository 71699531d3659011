import type { JsType, ValueKind } from "./schema/field-types.js"
import type { SchemaElement, SchemaField, SchemaFile, SchemaMessage, Syntax } from "./schema/model.js"
import {
  computeFieldAccessorName,
  extensionAccessPath,
  hasWideIntAnnotation,
  isUnsigned,
  javaOuterClassname,
  javaPackage,
  javaQualifiedName,
  jsExtensionImport,
  jsExtensionName,
  qualifiedName,
  requiresPresenceCheckForNullEmulation,
  runtimeNamespace,
  sanitizedContentKind,
  valueKind,
  wideIntAnnotation
} from "./resolver/index.js"
import type { RuntimeTarget, SanitizedContentKind } from "./resolver/index.js"
import { log } from "./util/logger.js"

/** Names and flags resolved for one .proto file. */
export interface SymbolManifest {
  file: string
  package: string
  syntax: Syntax
  namespace: string | null
  javaPackage: string | null
  javaOuterClassname: string | null
  types: TypeSymbol[]
  fields: FieldSymbol[]
  extensions: ExtensionSymbol[]
}

export interface TypeSymbol {
  kind: SchemaElement["kind"]
  fullName: string
  jsName: string | null
  javaName: string | null
}

export interface FieldSymbol {
  /** Full name of the owning message */
  message: string
  name: string
  accessor: string | null
  valueKind: ValueKind
  unsigned: boolean
  wideIntAnnotation: boolean
  jstype: JsType | null
  presenceCheck: boolean
  sanitizedContent: SanitizedContentKind | null
}

export interface ExtensionSymbol {
  name: string
  extendee: string | null
  /** Full name of the immediate declaring message; null at file scope */
  scope: string | null
  accessor: string | null
  classAccessPath: string | null
  namespacedAccessPath: string | null
  jsImport: string | null
  jsName: string | null
}

export interface ManifestOptions {
  targets: readonly RuntimeTarget[]
}

/**
 * True when the file declares anything worth a manifest.
 */
export function hasSymbols(file: SchemaFile): boolean {
  return file.messages.length > 0 || file.enums.length > 0 || file.extensions.length > 0
}

/**
 * Resolve every type, field and extension of a file for the requested runtimes.
 */
export function buildSymbolManifest(file: SchemaFile, options: ManifestOptions): SymbolManifest {
  const withClass = options.targets.includes("class")
  const withNamespaced = options.targets.includes("namespaced")

  const manifest: SymbolManifest = {
    file: file.name,
    package: file.package,
    syntax: file.syntax,
    namespace: withNamespaced ? runtimeNamespace(file) : null,
    javaPackage: withClass ? javaPackage(file) : null,
    javaOuterClassname: withClass ? javaOuterClassname(file) : null,
    types: [],
    fields: [],
    extensions: []
  }

  const addType = (element: SchemaElement): void => {
    manifest.types.push({
      kind: element.kind,
      fullName: element.fullName,
      jsName: withNamespaced ? qualifiedName(element) : null,
      javaName: withClass ? javaQualifiedName(element) : null
    })
  }

  const addExtension = (field: SchemaField): void => {
    manifest.extensions.push({
      name: field.name,
      extendee: field.extendee ?? null,
      scope: field.extensionScope?.fullName ?? null,
      accessor: withNamespaced ? computeFieldAccessorName(field) : null,
      classAccessPath: withClass ? extensionAccessPath(field, "class") : null,
      namespacedAccessPath: withNamespaced ? extensionAccessPath(field, "namespaced") : null,
      jsImport: withNamespaced ? jsExtensionImport(field) : null,
      jsName: withNamespaced ? jsExtensionName(field) : null
    })
  }

  const visitMessage = (message: SchemaMessage): void => {
    // Map entries are synthesized by protoc and never referenced by name
    if (message.isMapEntry) return

    addType(message)
    for (const field of message.fields) {
      manifest.fields.push({
        message: message.fullName,
        name: field.name,
        accessor: withNamespaced ? computeFieldAccessorName(field) : null,
        valueKind: valueKind(field),
        unsigned: isUnsigned(field),
        wideIntAnnotation: hasWideIntAnnotation(field),
        jstype: wideIntAnnotation(field),
        presenceCheck: requiresPresenceCheckForNullEmulation(field),
        sanitizedContent: sanitizedContentKind(field)
      })
    }
    message.nestedMessages.forEach(visitMessage)
    message.nestedEnums.forEach(addType)
  }

  const visitExtensions = (message: SchemaMessage): void => {
    message.extensions.forEach(addExtension)
    message.nestedMessages.forEach(visitExtensions)
  }

  file.messages.forEach(visitMessage)
  file.enums.forEach(addType)
  file.extensions.forEach(addExtension)
  file.messages.forEach(visitExtensions)

  log.debug(
    "Resolved %s: %d types, %d fields, %d extensions",
    file.name,
    manifest.types.length,
    manifest.fields.length,
    manifest.extensions.length
  )

  return manifest
}

/**
 * Serialize a manifest the way it is written to the response.
 */
export function renderManifest(manifest: SymbolManifest): string {
  return `${JSON.stringify(manifest, null, 2)}\n`
}
