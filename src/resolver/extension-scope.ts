import type { SchemaField, SchemaMessage } from "../schema/model.js"
import { ResolverError } from "../util/errors.js"
import { javaFieldName, javaOuterClassname, javaPackage, javaQualifiedName } from "./java-names.js"
import { computeFieldAccessorName, qualifiedName, runtimeNamespace } from "./namespace.js"

export type RuntimeTarget = "class" | "namespaced"

export const RUNTIME_TARGETS: readonly RuntimeTarget[] = ["class", "namespaced"]

/**
 * How one runtime locates the accessor of an extension field.
 */
export interface ExtensionPathStrategy {
  /** Container whose generated symbol holds the extension; undefined at file scope */
  holderScope(field: SchemaField): SchemaMessage | undefined
  accessPath(field: SchemaField): string
}

/**
 * Class-based runtime: generated extension holders are static members of
 * the class of the *immediate* declaring message.
 */
const classStrategy: ExtensionPathStrategy = {
  holderScope(field) {
    return field.extensionScope
  },

  accessPath(field) {
    const scope = this.holderScope(field)
    let holder: string
    if (scope) {
      holder = javaQualifiedName(scope)
    } else {
      // Top-level extension: lives on the file's outer class
      const pkg = javaPackage(field.file)
      const outer = javaOuterClassname(field.file)
      holder = pkg ? `${pkg}.${outer}` : outer
    }
    return `${holder}.${javaFieldName(field)}.getDescriptor()`
  }
}

/**
 * Namespaced-object runtime: extensions are flattened under the namespace
 * object of the *outermost* message enclosing the declaring scope.
 */
const namespacedStrategy: ExtensionPathStrategy = {
  holderScope(field) {
    return field.extensionScope && outermostScope(field.extensionScope)
  },

  accessPath(field) {
    const scope = this.holderScope(field)
    const holder = scope ? qualifiedName(scope) : runtimeNamespace(field.file)
    return `${holder}.${computeFieldAccessorName(field)}`
  }
}

export const EXTENSION_PATH_STRATEGIES: Record<RuntimeTarget, ExtensionPathStrategy> = {
  class: classStrategy,
  namespaced: namespacedStrategy
}

/**
 * Walk `containingType` links up to the top-level message.
 */
export function outermostScope(scope: SchemaMessage): SchemaMessage {
  let current = scope
  while (current.containingType) {
    current = current.containingType
  }
  return current
}

/**
 * Runtime-specific reference to an extension's accessor.
 * e.g. class: "foo.Outer.Inner.myExt.getDescriptor()",
 *      namespaced: "proto.foo.Outer.myExt"
 */
export function extensionAccessPath(field: SchemaField, target: RuntimeTarget): string {
  assertExtension(field)
  return EXTENSION_PATH_STRATEGIES[target].accessPath(field)
}

/**
 * Symbol a namespaced-runtime module must import to reach the extension:
 * the outermost scope's namespace object, or the extension itself at file scope.
 */
export function jsExtensionImport(field: SchemaField): string {
  assertExtension(field)
  const scope = namespacedStrategy.holderScope(field)
  if (scope) {
    return qualifiedName(scope)
  }
  return `${runtimeNamespace(field.file)}.${computeFieldAccessorName(field)}`
}

/**
 * Name passed to the namespaced runtime's getExtension(), qualified by the
 * immediate declaring scope.
 */
export function jsExtensionName(field: SchemaField): string {
  assertExtension(field)
  const holder = field.extensionScope
    ? qualifiedName(field.extensionScope)
    : runtimeNamespace(field.file)
  return `${holder}.${computeFieldAccessorName(field)}`
}

function assertExtension(field: SchemaField): void {
  if (!field.isExtension) {
    throw new ResolverError(`Field "${field.name}" is not an extension`)
  }
}
