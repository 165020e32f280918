import type { EvaluatorIssue, RequestError, SourceLocation } from './errors.js'
import type { EvaluatorAnswer, EvaluatorDecision, EvaluatorValidation } from './evaluator.js'
import { Decision, type EvaluationError } from './types.js'

/**
 * Timing of one evaluated request, in microseconds.
 */
export interface AuthorizationMetrics {
  normalizeSharedMicros: number
  normalizeRequestMicros: number
  authorizeMicros: number
  totalMicros: number
}

export interface Diagnostics {
  /** Ids of the policies that determined the decision, in evaluator order. */
  readonly reasons: readonly string[]
  readonly errors: readonly EvaluationError[]
  /** Non-fatal evaluator messages about the request, verbatim. */
  readonly warnings: readonly EvaluatorIssue[]
}

export interface AuthorizationResultFields {
  type: 'evaluated'
  decision: Decision
  allowed: boolean
  diagnostics: Diagnostics
  correlationId: string | undefined
  metrics: Readonly<AuthorizationMetrics>
}

function freezeIssue(issue: EvaluatorIssue): EvaluatorIssue {
  return Object.freeze({
    ...issue,
    locations: Object.freeze(issue.locations.map((location) => Object.freeze({ ...location }))),
  })
}

function sameList<T>(a: readonly T[], b: readonly T[], eq: (x: T, y: T) => boolean): boolean {
  return a.length === b.length && a.every((item, i) => {
    const other = b[i]
    return other !== undefined && eq(item, other)
  })
}

/**
 * The outcome of one evaluated authorization request.
 *
 * Values are frozen. Every field is available both as a getter and through
 * {@link AuthorizationResult.get}; `allowed` is exactly `decision === Decision.Allow`.
 */
export class AuthorizationResult {
  readonly type = 'evaluated'
  readonly decision: Decision
  readonly diagnostics: Diagnostics
  readonly correlationId: string | undefined
  readonly metrics: Readonly<AuthorizationMetrics>

  constructor(fields: {
    decision: Decision
    reasons: readonly string[]
    errors: readonly EvaluationError[]
    warnings?: readonly EvaluatorIssue[]
    correlationId?: string
    metrics: AuthorizationMetrics
  }) {
    this.decision = fields.decision
    this.diagnostics = Object.freeze({
      reasons: Object.freeze([...fields.reasons]),
      errors: Object.freeze(fields.errors.map((e) => Object.freeze({ ...e }))),
      warnings: Object.freeze((fields.warnings ?? []).map(freezeIssue)),
    })
    this.correlationId = fields.correlationId
    this.metrics = Object.freeze({ ...fields.metrics })
    Object.freeze(this)
  }

  get allowed(): boolean {
    return this.decision === Decision.Allow
  }

  get<K extends keyof AuthorizationResultFields>(key: K): AuthorizationResultFields[K] {
    const fields: AuthorizationResultFields = {
      type: this.type,
      decision: this.decision,
      allowed: this.allowed,
      diagnostics: this.diagnostics,
      correlationId: this.correlationId,
      metrics: this.metrics,
    }
    return fields[key]
  }

  /**
   * Compares decision, diagnostics and correlation id. Metrics are timing
   * data and never take part in equality.
   */
  equals(other: AuthorizationOutcome): boolean {
    return (
      other instanceof AuthorizationResult &&
      other.decision === this.decision &&
      other.correlationId === this.correlationId &&
      sameList(this.diagnostics.reasons, other.diagnostics.reasons, (a, b) => a === b) &&
      sameList(
        this.diagnostics.errors,
        other.diagnostics.errors,
        (a, b) => a.policyId === b.policyId && a.message === b.message
      ) &&
      sameList(this.diagnostics.warnings, other.diagnostics.warnings, (a, b) => a.message === b.message)
    )
  }

  toJSON() {
    return {
      type: this.type,
      decision: this.decision,
      allowed: this.allowed,
      diagnostics: {
        reasons: [...this.diagnostics.reasons],
        errors: this.diagnostics.errors.map((e) => ({ ...e })),
        warnings: this.diagnostics.warnings.map((w) => ({ ...w, locations: [...w.locations] })),
      },
      ...(this.correlationId !== undefined ? { correlationId: this.correlationId } : {}),
      metrics: { ...this.metrics },
    }
  }
}

/**
 * A batch slot whose request could not be evaluated. Never allows.
 */
export class AuthorizationFailure {
  readonly type = 'failure'
  readonly allowed = false
  readonly error: RequestError
  readonly correlationId: string | undefined

  constructor(error: RequestError, correlationId?: string) {
    this.error = error
    this.correlationId = correlationId
    Object.freeze(this)
  }

  get errors(): readonly string[] {
    return [this.error.message]
  }

  equals(other: AuthorizationOutcome): boolean {
    return (
      other instanceof AuthorizationFailure &&
      other.correlationId === this.correlationId &&
      other.error.code === this.error.code &&
      other.error.message === this.error.message
    )
  }

  toJSON() {
    return {
      type: this.type,
      allowed: this.allowed,
      error: { code: this.error.code, message: this.error.message },
      ...(this.correlationId !== undefined ? { correlationId: this.correlationId } : {}),
    }
  }
}

export type AuthorizationOutcome = AuthorizationResult | AuthorizationFailure

/**
 * Wraps an evaluator decision and the evaluator's warnings. Diagnostics are
 * kept verbatim and in order.
 */
export function marshalAuthorization(
  decision: EvaluatorDecision,
  correlationId: string | undefined,
  metrics: AuthorizationMetrics,
  warnings: readonly EvaluatorIssue[] = []
): AuthorizationResult {
  return new AuthorizationResult({
    decision: decision.decision,
    reasons: decision.reasons,
    errors: decision.errors,
    warnings,
    ...(correlationId !== undefined ? { correlationId } : {}),
    metrics,
  })
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ValidationError {
  readonly message: string
  readonly policyId?: string
  readonly location?: SourceLocation
  readonly help?: string
}

export function formatValidationError(error: ValidationError): string {
  return error.policyId ? `[${error.policyId}] ${error.message}` : error.message
}

/**
 * Outcome of validating policies against a schema. `passed` is false when any
 * error was found, or when warnings were found and the engine fails on them.
 */
export class ValidationResult {
  readonly passed: boolean
  readonly errors: readonly ValidationError[]
  readonly warnings: readonly ValidationError[]

  constructor(passed: boolean, errors: ValidationError[], warnings: ValidationError[] = []) {
    this.passed = passed
    this.errors = Object.freeze(errors.map((e) => Object.freeze({ ...e })))
    this.warnings = Object.freeze(warnings.map((w) => Object.freeze({ ...w })))
    Object.freeze(this)
  }

  toString(): string {
    return `ValidationResult(passed=${this.passed}, errors=${this.errors.length})`
  }
}

function toValidationError(issue: EvaluatorIssue & { policyId?: string }): ValidationError {
  const [location] = issue.locations
  return {
    message: issue.message,
    ...(issue.policyId ? { policyId: issue.policyId } : {}),
    ...(location ? { location } : {}),
    ...(issue.help ? { help: issue.help } : {}),
  }
}

/**
 * Translates validator output. A validator that could not run (unparsable
 * policies or schema) yields a failed result carrying its errors.
 */
export function marshalValidation(
  answer: EvaluatorAnswer<EvaluatorValidation>,
  failOnWarnings: boolean
): ValidationResult {
  if (answer.type === 'failure') {
    return new ValidationResult(false, answer.errors.map(toValidationError))
  }
  const errors = answer.value.errors.map(toValidationError)
  const warnings = answer.value.warnings.map(toValidationError)
  const passed = errors.length === 0 && !(failOnWarnings && warnings.length > 0)
  return new ValidationResult(passed, errors, warnings)
}
