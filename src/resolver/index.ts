export {
  JS_ROOT_NAMESPACE,
  runtimeNamespace,
  packageRelativeName,
  qualifiedName,
  computeFieldAccessorName
} from "./namespace.js"
export {
  javaPackage,
  javaOuterClassname,
  javaQualifiedName,
  javaFieldName
} from "./java-names.js"
export {
  RUNTIME_TARGETS,
  EXTENSION_PATH_STRATEGIES,
  outermostScope,
  extensionAccessPath,
  jsExtensionImport,
  jsExtensionName
} from "./extension-scope.js"
export type { RuntimeTarget, ExtensionPathStrategy } from "./extension-scope.js"
export {
  valueKind,
  isRepeated,
  isUnsigned,
  hasWideIntAnnotation,
  wideIntAnnotation,
  requiresPresenceCheckForNullEmulation,
  sanitizedContentKind,
  isSanitizedContentField
} from "./field-semantics.js"
export type { SanitizedContentKind } from "./field-semantics.js"
