import * as cedar from '@cedar-policy/cedar-wasm/nodejs'
import type { DetailedError } from '@cedar-policy/cedar-wasm/nodejs'
import type { EvaluatorIssue } from './errors.js'
import {
  Decision,
  type AuthorizationRequest,
  type EntityRecord,
  type EvaluationError,
  type PolicySet,
  type Schema,
} from './types.js'

type CedarAuthorizationCall = Parameters<typeof cedar.isAuthorized>[0]
type CedarPolicySet = CedarAuthorizationCall['policies']
type CedarSchema = NonNullable<CedarAuthorizationCall['schema']>
type CedarEntities = CedarAuthorizationCall['entities']
type CedarEntityUid = CedarAuthorizationCall['principal']
type CedarContext = CedarAuthorizationCall['context']
type CedarPolicy = Parameters<typeof cedar.policyToText>[0]

/**
 * Outcome of one evaluator call: a value, or the evaluator's own errors.
 */
export type EvaluatorAnswer<T> =
  | { type: 'success'; value: T; warnings: EvaluatorIssue[] }
  | { type: 'failure'; errors: EvaluatorIssue[] }

/**
 * Policies, entities and schema shared by every request of one call.
 */
export interface SharedContext {
  policies: PolicySet
  entities: EntityRecord[]
  schema?: Schema
}

export interface EvaluatorDecision {
  decision: Decision
  /** Ids of the policies that determined the decision. */
  reasons: string[]
  errors: EvaluationError[]
}

export interface EvaluatorValidationIssue extends EvaluatorIssue {
  policyId?: string
}

export interface EvaluatorValidation {
  errors: EvaluatorValidationIssue[]
  warnings: EvaluatorValidationIssue[]
}

export interface FormatOptions {
  lineWidth: number
  indentWidth: number
}

/**
 * The policy evaluator as seen by this layer. Implementations hold no
 * per-call state and may be shared across engines and callers.
 */
export interface PolicyEvaluator {
  version(): string
  checkPolicies(policies: PolicySet): EvaluatorIssue[]
  checkSchema(schema: Schema): EvaluatorIssue[]
  checkEntities(entities: EntityRecord[], schema?: Schema): EvaluatorIssue[]
  authorize(
    request: AuthorizationRequest,
    shared: SharedContext,
    options: { validateRequest: boolean }
  ): EvaluatorAnswer<EvaluatorDecision>
  validate(policies: PolicySet, schema: Schema): EvaluatorAnswer<EvaluatorValidation>
  format(policyText: string, options: FormatOptions): EvaluatorAnswer<string>
  splitPolicies(policyText: string): EvaluatorAnswer<{ policies: string[]; templates: string[] }>
  policyToJson(policyText: string): EvaluatorAnswer<object>
  policyToText(policy: object): EvaluatorAnswer<string>
}

function toIssue(error: DetailedError): EvaluatorIssue {
  const issue: EvaluatorIssue = {
    message: error.message,
    locations: (error.sourceLocations ?? []).map((location) => ({
      start: location.start,
      end: location.end,
      ...(location.label ? { label: location.label } : {}),
    })),
  }
  if (error.help) issue.help = error.help
  return issue
}

function toCedarPolicySet(policies: PolicySet): CedarPolicySet {
  if (policies.kind === 'text') return { staticPolicies: policies.text }
  // JSON policies were shape-checked by the normalizer; the evaluator checks the rest
  return { staticPolicies: policies.policies as unknown as CedarPolicySet['staticPolicies'] }
}

function toCedarSchema(schema: Schema): CedarSchema {
  return schema.kind === 'cedar' ? schema.text : (schema.json as unknown as CedarSchema)
}

// The normalized records already have the JSON shape the evaluator reads; the
// casts only bridge to cedar-wasm's generated types.
function toCedarEntities(entities: EntityRecord[]): CedarEntities {
  return entities as unknown as CedarEntities
}

function toCedarUid(uid: AuthorizationRequest['principal']): CedarEntityUid {
  return { type: uid.type, id: uid.id } as unknown as CedarEntityUid
}

/**
 * {@link PolicyEvaluator} backed by the Cedar WebAssembly build for Node.js.
 */
export class CedarWasmEvaluator implements PolicyEvaluator {
  constructor() {
    Object.freeze(this)
  }

  version(): string {
    return cedar.getCedarVersion()
  }

  checkPolicies(policies: PolicySet): EvaluatorIssue[] {
    const answer = cedar.checkParsePolicySet(toCedarPolicySet(policies))
    return answer.type === 'failure' ? answer.errors.map(toIssue) : []
  }

  checkSchema(schema: Schema): EvaluatorIssue[] {
    const answer = cedar.checkParseSchema(toCedarSchema(schema))
    return answer.type === 'failure' ? answer.errors.map(toIssue) : []
  }

  checkEntities(entities: EntityRecord[], schema?: Schema): EvaluatorIssue[] {
    const answer = cedar.checkParseEntities({
      entities: toCedarEntities(entities),
      ...(schema ? { schema: toCedarSchema(schema) } : {}),
    })
    return answer.type === 'failure' ? answer.errors.map(toIssue) : []
  }

  authorize(
    request: AuthorizationRequest,
    shared: SharedContext,
    options: { validateRequest: boolean }
  ): EvaluatorAnswer<EvaluatorDecision> {
    const answer = cedar.isAuthorized({
      principal: toCedarUid(request.principal),
      action: toCedarUid(request.action),
      resource: toCedarUid(request.resource),
      context: request.context as unknown as CedarContext,
      entities: toCedarEntities(shared.entities),
      policies: toCedarPolicySet(shared.policies),
      ...(shared.schema
        ? { schema: toCedarSchema(shared.schema), validateRequest: options.validateRequest }
        : {}),
    })

    if (answer.type === 'failure') {
      return { type: 'failure', errors: answer.errors.map(toIssue) }
    }

    const { decision, diagnostics } = answer.response
    return {
      type: 'success',
      value: {
        decision: decision === 'allow' ? Decision.Allow : Decision.Deny,
        reasons: [...diagnostics.reason],
        errors: diagnostics.errors.map((e) => ({ policyId: e.policyId, message: e.error.message })),
      },
      warnings: answer.warnings.map(toIssue),
    }
  }

  validate(policies: PolicySet, schema: Schema): EvaluatorAnswer<EvaluatorValidation> {
    const answer = cedar.validate({
      schema: toCedarSchema(schema),
      policies: toCedarPolicySet(policies),
      validationSettings: { mode: 'strict' },
    })
    if (answer.type === 'failure') {
      return { type: 'failure', errors: answer.errors.map(toIssue) }
    }

    const withPolicy = (e: { policyId: string; error: DetailedError }) => ({
      policyId: e.policyId,
      ...toIssue(e.error),
    })
    return {
      type: 'success',
      value: {
        errors: answer.validationErrors.map(withPolicy),
        warnings: [
          ...answer.validationWarnings.map(withPolicy),
          ...answer.otherWarnings.map(toIssue),
        ],
      },
      warnings: [],
    }
  }

  format(policyText: string, options: FormatOptions): EvaluatorAnswer<string> {
    const answer = cedar.formatPolicies({
      policyText,
      lineWidth: options.lineWidth,
      indentWidth: options.indentWidth,
    })
    if (answer.type === 'failure') {
      return { type: 'failure', errors: answer.errors.map(toIssue) }
    }
    return { type: 'success', value: answer.formatted_policy, warnings: [] }
  }

  splitPolicies(policyText: string): EvaluatorAnswer<{ policies: string[]; templates: string[] }> {
    const answer = cedar.policySetTextToParts(policyText)
    if (answer.type === 'failure') {
      return { type: 'failure', errors: answer.errors.map(toIssue) }
    }
    return {
      type: 'success',
      value: { policies: answer.policies, templates: answer.policy_templates },
      warnings: [],
    }
  }

  policyToJson(policyText: string): EvaluatorAnswer<object> {
    const answer = cedar.policyToJson(policyText)
    if (answer.type === 'failure') {
      return { type: 'failure', errors: answer.errors.map(toIssue) }
    }
    return { type: 'success', value: answer.json, warnings: [] }
  }

  policyToText(policy: object): EvaluatorAnswer<string> {
    const answer = cedar.policyToText(policy as unknown as CedarPolicy)
    if (answer.type === 'failure') {
      return { type: 'failure', errors: answer.errors.map(toIssue) }
    }
    return { type: 'success', value: answer.text, warnings: [] }
  }
}
