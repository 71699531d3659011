/**
 * Base class for every error the resolver raises on purpose.
 * The plugin reports these through CodeGeneratorResponse.error.
 */
export class ResolverError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ResolverError"
  }
}

/**
 * The schema graph broke the package-prefix invariant: an element's full
 * name does not start with its file's package. Never expected from protoc
 * output, so it aborts resolution instead of producing a mis-stripped name.
 */
export class ContractViolation extends ResolverError {
  readonly element: string
  readonly expectedPrefix: string

  constructor(element: string, expectedPrefix: string) {
    super(`Expected "${element}" to start with "${expectedPrefix}"`)
    this.name = "ContractViolation"
    this.element = element
    this.expectedPrefix = expectedPrefix
  }
}
