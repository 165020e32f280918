import { createConfig, type EngineConfig, type EngineConfigInput } from '@cedar-relay/config'
import { getMeter, getProjectLogger } from '@cedar-relay/telemetry'
import type { Counter, Histogram } from '@opentelemetry/api'
import {
  MalformedInputError,
  MissingArgumentError,
  PolicySyntaxError,
  RequestRejectedError,
  SharedContextError,
  type EvaluatorIssue,
  type SharedInput,
} from './errors.js'
import { CedarWasmEvaluator, type PolicyEvaluator, type SharedContext } from './evaluator.js'
import {
  isMissing,
  normalizeEntities,
  normalizePolicies,
  normalizePolicySetJson,
  normalizeRequest,
  normalizeSchema,
  peekCorrelationId,
} from './normalizer.js'
import {
  AuthorizationFailure,
  marshalAuthorization,
  marshalValidation,
  type AuthorizationOutcome,
  type AuthorizationResult,
  type ValidationResult,
} from './result.js'
import type {
  AuthorizationRequest,
  RawAuthorizationRequest,
  RawEntities,
  RawPolicies,
  RawSchema,
} from './types.js'

export interface AuthorizationEngineOptions {
  /** Defaults to a {@link CedarWasmEvaluator}. */
  evaluator?: PolicyEvaluator
  config?: EngineConfigInput
}

export interface AuthorizeOptions {
  /** Log the shared inputs of the call at debug level. */
  verbose?: boolean
}

export interface FormatPoliciesOptions {
  lineWidth?: number
  indentWidth?: number
}

/**
 * A Cedar JSON policy set holding static policies only.
 */
export interface PolicySetJson {
  staticPolicies: Record<string, object>
  templates: Record<string, never>
  templateLinks: never[]
}

function micros(ms: number): number {
  return Math.round(ms * 1000)
}

function toIssue(err: Error): EvaluatorIssue {
  return { message: err.message, locations: [] }
}

/**
 * The main entry point of the authorization layer.
 *
 * Normalizes caller input, submits it to the policy evaluator and marshals the
 * answers. The engine keeps no per-call state: one instance, and one
 * evaluator, can serve any number of callers.
 *
 * @example
 * ```typescript
 * const engine = new AuthorizationEngine()
 * const result = engine.isAuthorized(
 *   { principal: 'User::"bob"', action: 'Action::"view"', resource: 'Photo::"1234-abcd"' },
 *   'permit(principal, action == Action::"view", resource);',
 *   [{ uid: { type: 'User', id: 'bob' }, attrs: {}, parents: [] }]
 * )
 * result.allowed // true
 * ```
 */
export class AuthorizationEngine {
  readonly config: EngineConfig
  private readonly evaluator: PolicyEvaluator
  private readonly logger = getProjectLogger('engine')
  private readonly decisions: Counter
  private readonly batchSize: Histogram

  constructor(options: AuthorizationEngineOptions = {}) {
    this.evaluator = options.evaluator ?? new CedarWasmEvaluator()
    this.config = createConfig(options.config)

    const meter = getMeter()
    this.decisions = meter.createCounter('authorization.decisions', {
      description: 'Authorization requests by outcome',
    })
    this.batchSize = meter.createHistogram('authorization.batch.size', {
      description: 'Number of requests per authorization call',
    })
  }

  /**
   * The evaluator's version string.
   */
  engineVersion(): string {
    return this.evaluator.version()
  }

  /**
   * Evaluates a single request. Behaves exactly like a batch of one, except
   * that the error a batch would store in the request's slot is thrown.
   *
   * @throws {SharedContextError} If the policies, entities or schema fail to load.
   * @throws {MalformedInputError} If the request does not normalize.
   * @throws {RequestRejectedError} If the evaluator refuses the request.
   */
  isAuthorized(
    request: RawAuthorizationRequest,
    policies: RawPolicies,
    entities: RawEntities,
    schema?: RawSchema | null,
    options?: AuthorizeOptions
  ): AuthorizationResult {
    const [outcome] = this.isAuthorizedBatch([request], policies, entities, schema, options)
    if (outcome === undefined) {
      throw new Error('batch of one produced no result')
    }
    if (outcome.type === 'failure') throw outcome.error
    return outcome
  }

  /**
   * Evaluates independent requests against shared policies, entities and
   * schema. Result `i` belongs to request `i` and echoes its correlation id.
   *
   * A request that fails to normalize, or that the evaluator refuses, yields
   * an {@link AuthorizationFailure} in its own slot; the other requests are
   * evaluated normally.
   *
   * @throws {SharedContextError} If the shared inputs fail to load. Nothing is
   * evaluated in that case.
   */
  isAuthorizedBatch(
    requests: readonly RawAuthorizationRequest[],
    policies: RawPolicies,
    entities: RawEntities,
    schema?: RawSchema | null,
    options: AuthorizeOptions = {}
  ): AuthorizationOutcome[] {
    const startedAt = performance.now()
    const shared = this.loadSharedContext(policies, entities, schema)
    const normalizeSharedMicros = micros(performance.now() - startedAt)

    if (options.verbose) {
      this.logger.debug('shared context {shared}', { shared })
    }
    this.logger.debug(
      'evaluating {count} requests against {entityCount} entities',
      { count: requests.length, entityCount: shared.entities.length }
    )

    const outcomes = requests.map((raw, index) =>
      this.evaluateRequest(raw, index, shared, normalizeSharedMicros)
    )
    this.batchSize.record(requests.length)
    return outcomes
  }

  /**
   * Validates policies against a schema, reporting every error in one pass.
   *
   * @throws {MissingArgumentError} If policies or schema are not supplied.
   * @throws {MalformedInputError} If either does not fit an accepted encoding.
   */
  validatePolicies(policies: RawPolicies, schema?: RawSchema | null): ValidationResult {
    if (policies === undefined || policies === null) throw new MissingArgumentError('policies')
    if (isMissing(schema)) throw new MissingArgumentError('schema')

    const answer = this.evaluator.validate(normalizePolicies(policies), normalizeSchema(schema))
    const result = marshalValidation(answer, this.config.validation.failOnWarnings)
    this.logger.debug('validation finished with {errors} errors and {warnings} warnings', {
      errors: result.errors.length,
      warnings: result.warnings.length,
    })
    return result
  }

  /**
   * Pretty-prints policy text with the evaluator's formatter.
   *
   * @throws {PolicySyntaxError} If the text does not parse.
   */
  formatPolicies(policyText: string, options: FormatPoliciesOptions = {}): string {
    if (typeof policyText !== 'string') {
      throw new MalformedInputError('policies', 'expected policy text')
    }
    const answer = this.evaluator.format(policyText, {
      lineWidth: options.lineWidth ?? this.config.formatter.lineWidth,
      indentWidth: options.indentWidth ?? this.config.formatter.indentWidth,
    })
    if (answer.type === 'failure') throw new PolicySyntaxError(answer.errors)
    return answer.value
  }

  /**
   * Converts policy text to a Cedar JSON policy set. Policies are keyed
   * `policy0`, `policy1`, … in source order, the ids the evaluator assigns.
   *
   * @throws {PolicySyntaxError} If the text does not parse.
   * @throws {MalformedInputError} If the text contains templates.
   */
  policiesToJson(policyText: string): PolicySetJson {
    const parts = this.evaluator.splitPolicies(policyText)
    if (parts.type === 'failure') throw new PolicySyntaxError(parts.errors)
    if (parts.value.templates.length > 0) {
      throw new MalformedInputError('policies', 'policy templates cannot be converted to JSON')
    }

    const staticPolicies: Record<string, object> = {}
    parts.value.policies.forEach((policy, i) => {
      const answer = this.evaluator.policyToJson(policy)
      if (answer.type === 'failure') throw new PolicySyntaxError(answer.errors)
      staticPolicies[`policy${i}`] = answer.value
    })
    return { staticPolicies, templates: {}, templateLinks: [] }
  }

  /**
   * Converts a Cedar JSON policy set, or its JSON string, back to policy text.
   * Policies are separated by a blank line, in key order.
   */
  policiesFromJson(policySet: string | object): string {
    const policies = normalizePolicySetJson(policySet)
    return Object.entries(policies)
      .map(([id, policy]) => {
        const answer = this.evaluator.policyToText(policy)
        if (answer.type === 'failure') {
          throw new MalformedInputError(
            `policies.staticPolicies.${id}`,
            answer.errors.map((e) => e.message).join('; ')
          )
        }
        return answer.value.trim()
      })
      .join('\n\n')
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private loadSharedContext(
    policies: RawPolicies,
    entities: RawEntities,
    schema: RawSchema | null | undefined
  ): SharedContext {
    const policySet = this.loadShared('policies', () => normalizePolicies(policies))
    const policyIssues = this.evaluator.checkPolicies(policySet)
    if (policyIssues.length > 0) {
      throw new SharedContextError('policies', policyIssues, {
        cause: new PolicySyntaxError(policyIssues),
      })
    }

    const shared: SharedContext = {
      policies: policySet,
      entities: this.loadShared('entities', () => normalizeEntities(entities)),
    }

    if (!isMissing(schema)) {
      const normalized = this.loadShared('schema', () => normalizeSchema(schema))
      const schemaIssues = this.evaluator.checkSchema(normalized)
      if (schemaIssues.length > 0) throw new SharedContextError('schema', schemaIssues)
      shared.schema = normalized
    }

    const entityIssues = this.evaluator.checkEntities(shared.entities, shared.schema)
    if (entityIssues.length > 0) throw new SharedContextError('entities', entityIssues)

    return shared
  }

  private loadShared<T>(source: SharedInput, normalize: () => T): T {
    try {
      return normalize()
    } catch (err) {
      if (err instanceof MalformedInputError || err instanceof MissingArgumentError) {
        throw new SharedContextError(source, [toIssue(err)], { cause: err })
      }
      throw err
    }
  }

  private evaluateRequest(
    raw: unknown,
    index: number,
    shared: SharedContext,
    normalizeSharedMicros: number
  ): AuthorizationOutcome {
    const startedAt = performance.now()

    let request: AuthorizationRequest
    try {
      request = normalizeRequest(raw)
    } catch (err) {
      if (!(err instanceof MalformedInputError)) throw err
      this.logger.warn('request {index} is malformed: {reason}', { index, reason: err.message })
      return this.fail(new AuthorizationFailure(err, peekCorrelationId(raw)))
    }
    const normalizedAt = performance.now()

    const answer = this.evaluator.authorize(request, shared, {
      validateRequest: this.config.requests.validateAgainstSchema,
    })
    const finishedAt = performance.now()

    if (answer.type === 'failure') {
      const error = new RequestRejectedError(answer.errors)
      this.logger.warn('request {index} was rejected: {reason}', { index, reason: error.message })
      return this.fail(new AuthorizationFailure(error, request.correlationId))
    }

    const metrics = {
      normalizeSharedMicros,
      normalizeRequestMicros: micros(normalizedAt - startedAt),
      authorizeMicros: micros(finishedAt - normalizedAt),
      totalMicros: normalizeSharedMicros + micros(finishedAt - startedAt),
    }
    const result = marshalAuthorization(answer.value, request.correlationId, metrics, answer.warnings)
    this.decisions.add(1, { decision: result.decision })
    return result
  }

  private fail(failure: AuthorizationFailure): AuthorizationFailure {
    this.decisions.add(1, { decision: 'failure' })
    return failure
  }
}
