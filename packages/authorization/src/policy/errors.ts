/**
 * A position in caller-supplied policy or schema text, as byte offsets.
 */
export interface SourceLocation {
  start: number
  end: number
  label?: string
}

/**
 * One error message as reported by the evaluator, kept verbatim.
 */
export interface EvaluatorIssue {
  message: string
  help?: string
  locations: readonly SourceLocation[]
}

export type AuthorizationErrorCode =
  | 'MALFORMED_INPUT'
  | 'POLICY_SYNTAX'
  | 'MISSING_ARGUMENT'
  | 'SHARED_CONTEXT'
  | 'REQUEST_REJECTED'

/**
 * Base class for every error raised by the authorization layer.
 */
export abstract class AuthorizationLayerError extends Error {
  abstract readonly code: AuthorizationErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Caller input that does not fit the canonical shape. Always names one field.
 */
export class MalformedInputError extends AuthorizationLayerError {
  readonly code = 'MALFORMED_INPUT'

  constructor(
    readonly field: string,
    readonly reason: string
  ) {
    super(`${field}: ${reason}`)
  }
}

export class PolicySyntaxError extends AuthorizationLayerError {
  readonly code = 'POLICY_SYNTAX'
  readonly issues: EvaluatorIssue[]

  constructor(issues: EvaluatorIssue[]) {
    super(issues.map((issue) => issue.message).join('\n') || 'policy text could not be parsed')
    this.issues = issues
  }

  get locations(): SourceLocation[] {
    return this.issues.flatMap((issue) => issue.locations)
  }
}

export class MissingArgumentError extends AuthorizationLayerError {
  readonly code = 'MISSING_ARGUMENT'

  constructor(readonly argument: string) {
    super(`${argument} is required`)
  }
}

export type SharedInput = 'policies' | 'entities' | 'schema'

/**
 * Policies, entities or schema shared by a batch failed to load. Raised before
 * any request of the batch is evaluated.
 */
export class SharedContextError extends AuthorizationLayerError {
  readonly code = 'SHARED_CONTEXT'

  constructor(
    readonly source: SharedInput,
    readonly issues: EvaluatorIssue[],
    options?: { cause?: unknown }
  ) {
    super(
      `failed to load shared ${source}: ${issues.map((issue) => issue.message).join('; ')}`,
      options
    )
  }
}

/**
 * The evaluator refused one request, e.g. because it does not conform to the
 * schema. Only the request's own batch slot is affected.
 */
export class RequestRejectedError extends AuthorizationLayerError {
  readonly code = 'REQUEST_REJECTED'

  constructor(readonly issues: EvaluatorIssue[]) {
    super(issues.map((issue) => issue.message).join('; ') || 'request rejected by evaluator')
  }
}

/**
 * Errors that can occupy a failed batch slot.
 */
export type RequestError = MalformedInputError | RequestRejectedError
