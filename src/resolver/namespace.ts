import { FieldLabel } from "../schema/field-types.js"
import type { SchemaElement, SchemaField, SchemaFile } from "../schema/model.js"
import { ContractViolation } from "../util/errors.js"
import { toLowerCamel } from "../util/names.js"

/** Root object every namespaced-runtime symbol hangs off. */
export const JS_ROOT_NAMESPACE = "proto"

/**
 * Namespaced-runtime root namespace for a file.
 * e.g. package "foo.bar" → "proto.foo.bar", no package → "proto"
 */
export function runtimeNamespace(file: SchemaFile): string {
  if (file.package) {
    return `${JS_ROOT_NAMESPACE}.${file.package}`
  }
  return JS_ROOT_NAMESPACE
}

/**
 * Element full name with the file's package removed.
 * e.g. "foo.bar.Outer.Inner" in package "foo.bar" → "Outer.Inner"
 *
 * Throws ContractViolation when the full name is not under the package.
 */
export function packageRelativeName(element: SchemaElement): string {
  const protoPackage = element.file.package
  const name = element.fullName
  if (!protoPackage) return name

  const prefix = `${protoPackage}.`
  if (!name.startsWith(prefix)) {
    throw new ContractViolation(name, prefix)
  }
  return name.slice(prefix.length)
}

/**
 * Semi-qualified namespaced-runtime name of a message or enum: nested
 * containers are kept, the proto package is replaced by the runtime namespace.
 * e.g. "foo.bar.Outer.Inner" → "proto.foo.bar.Outer.Inner"
 */
export function qualifiedName(element: SchemaElement): string {
  return `${runtimeNamespace(element.file)}.${packageRelativeName(element)}`
}

/**
 * Namespaced-runtime accessor name of a field or extension.
 * e.g. "user_id" → "userId", repeated "user_id" → "userIdList"
 */
export function computeFieldAccessorName(field: SchemaField): string {
  const name = toLowerCamel(field.name)
  return field.label === FieldLabel.Repeated ? `${name}List` : name
}
