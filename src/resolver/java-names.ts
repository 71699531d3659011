import type { SchemaElement, SchemaField, SchemaFile } from "../schema/model.js"
import { protoBaseName, underscoresToCamelCase } from "../util/names.js"
import { packageRelativeName } from "./namespace.js"

/**
 * Class-based runtime naming: where protoc's class generator puts things.
 */

/**
 * `java_package` when set, otherwise the proto package.
 */
export function javaPackage(file: SchemaFile): string {
  return file.options.javaPackage ?? file.package
}

/**
 * Name of the outer holder class generated for a file.
 * e.g. "foo/my_file.proto" → "MyFile"; "MyFileOuterClass" when a
 * top-level message or enum is already called "MyFile"
 */
export function javaOuterClassname(file: SchemaFile): string {
  if (file.options.javaOuterClassname) {
    return file.options.javaOuterClassname
  }

  const name = underscoresToCamelCase(protoBaseName(file.name), true)
  const taken = [...file.messages, ...file.enums].some(el => el.name === name)
  return taken ? `${name}OuterClass` : name
}

/**
 * Fully-qualified class name of a message or enum.
 * e.g. package "foo.bar", file "my_file.proto", "foo.bar.Outer.Inner"
 *      → "foo.bar.MyFile.Outer.Inner" ("foo.bar.Outer.Inner" with java_multiple_files)
 */
export function javaQualifiedName(element: SchemaElement): string {
  const file = element.file
  const parts = [javaPackage(file)]
  if (!file.options.javaMultipleFiles) {
    parts.push(javaOuterClassname(file))
  }
  parts.push(packageRelativeName(element))
  return parts.filter(p => p.length > 0).join(".")
}

/**
 * Static member name of a field or extension in generated classes.
 * e.g. "foo_bar2baz" → "fooBar2Baz"
 */
export function javaFieldName(field: SchemaField): string {
  return underscoresToCamelCase(field.name, false)
}
