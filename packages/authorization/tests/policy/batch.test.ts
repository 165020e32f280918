import { configureLogger, resetLogger } from '@cedar-relay/telemetry'
import { afterEach, describe, expect, it } from 'vitest'
import { AuthorizationEngine } from '../../src/policy/authorization-engine.js'
import {
  MalformedInputError,
  PolicySyntaxError,
  RequestRejectedError,
  SharedContextError,
  type EvaluatorIssue,
} from '../../src/policy/errors.js'
import type {
  EvaluatorAnswer,
  EvaluatorDecision,
  EvaluatorValidation,
  PolicyEvaluator,
  SharedContext,
} from '../../src/policy/evaluator.js'
import { Decision, type AuthorizationRequest } from '../../src/policy/types.js'

function unsupported<T>(): EvaluatorAnswer<T> {
  return { type: 'failure', errors: [{ message: 'unsupported', locations: [] }] }
}

/**
 * Allows requests whose principal is alice, rejects principals listed in
 * `rejected`, and records every request it is asked to evaluate.
 */
class RecordingEvaluator implements PolicyEvaluator {
  readonly evaluated: AuthorizationRequest[] = []
  readonly options: { validateRequest: boolean }[] = []
  readonly shared: SharedContext[] = []
  readonly rejected = new Set<string>()
  policyIssues: EvaluatorIssue[] = []
  entityIssues: EvaluatorIssue[] = []
  warnings: EvaluatorIssue[] = []

  version(): string {
    return '0.0.0-test'
  }

  checkPolicies(): EvaluatorIssue[] {
    return this.policyIssues
  }

  checkSchema(): EvaluatorIssue[] {
    return []
  }

  checkEntities(): EvaluatorIssue[] {
    return this.entityIssues
  }

  authorize(
    request: AuthorizationRequest,
    shared: SharedContext,
    options: { validateRequest: boolean }
  ): EvaluatorAnswer<EvaluatorDecision> {
    this.evaluated.push(request)
    this.shared.push(shared)
    this.options.push(options)
    if (this.rejected.has(request.principal.id)) {
      return { type: 'failure', errors: [{ message: 'request does not conform', locations: [] }] }
    }
    const allowed = request.principal.id === 'alice'
    return {
      type: 'success',
      value: {
        decision: allowed ? Decision.Allow : Decision.Deny,
        reasons: allowed ? ['allow-alice'] : [],
        errors: [],
      },
      warnings: this.warnings,
    }
  }

  validate(): EvaluatorAnswer<EvaluatorValidation> {
    return unsupported()
  }

  format(): EvaluatorAnswer<string> {
    return unsupported()
  }

  splitPolicies(): EvaluatorAnswer<{ policies: string[]; templates: string[] }> {
    return unsupported()
  }

  policyToJson(): EvaluatorAnswer<object> {
    return unsupported()
  }

  policyToText(): EvaluatorAnswer<string> {
    return unsupported()
  }
}

const policies = 'permit(principal == User::"alice", action, resource);'
const entities = [{ uid: 'User::"alice"', attrs: {}, parents: [] }]

function request(principal: string, correlationId?: string) {
  return {
    principal: `User::"${principal}"`,
    action: 'Action::"view"',
    resource: 'Photo::"p1"',
    ...(correlationId !== undefined ? { correlationId } : {}),
  }
}

function setup() {
  const evaluator = new RecordingEvaluator()
  return { evaluator, engine: new AuthorizationEngine({ evaluator }) }
}

describe('AuthorizationEngine.isAuthorizedBatch', () => {
  it('returns one result per request, in order', () => {
    const { engine } = setup()
    const results = engine.isAuthorizedBatch(
      [request('alice', 'a'), request('bob', 'b'), request('alice', 'c')],
      policies,
      entities
    )

    expect(results.map((r) => r.allowed)).toEqual([true, false, true])
    expect(results.map((r) => r.correlationId)).toEqual(['a', 'b', 'c'])
  })

  it('returns an empty list for an empty batch', () => {
    const { engine, evaluator } = setup()
    expect(engine.isAuthorizedBatch([], policies, entities)).toEqual([])
    expect(evaluator.evaluated).toHaveLength(0)
  })

  it('isolates a malformed request to its own slot', () => {
    const { engine, evaluator } = setup()
    const results = engine.isAuthorizedBatch(
      [request('alice'), { ...request('alice'), principal: 'alice', correlationId: 'bad' }, request('bob')],
      policies,
      entities
    )

    const failed = results[1]
    expect(failed?.type).toBe('failure')
    expect(failed?.correlationId).toBe('bad')
    if (failed?.type !== 'failure') return
    expect(failed.error).toBeInstanceOf(MalformedInputError)
    expect(failed.error.message).toBe(
      'principal: expected an entity reference like User::"alice", got "alice"'
    )

    expect(results[0]?.allowed).toBe(true)
    expect(results[2]?.type).toBe('evaluated')
    expect(evaluator.evaluated).toHaveLength(2)
  })

  it('isolates a request the evaluator refuses', () => {
    const { engine, evaluator } = setup()
    evaluator.rejected.add('mallory')

    const results = engine.isAuthorizedBatch(
      [request('mallory', 'm'), request('alice', 'a')],
      policies,
      entities
    )

    const [rejected, allowed] = results
    expect(rejected?.type).toBe('failure')
    if (rejected?.type === 'failure') {
      expect(rejected.error).toBeInstanceOf(RequestRejectedError)
      expect(rejected.errors).toEqual(['request does not conform'])
      expect(rejected.correlationId).toBe('m')
    }
    expect(allowed?.allowed).toBe(true)
  })

  it('evaluates nothing when the policies do not parse', () => {
    const { engine, evaluator } = setup()
    evaluator.policyIssues = [{ message: 'unexpected token `(`', locations: [{ start: 6, end: 7 }] }]

    let caught: unknown
    try {
      engine.isAuthorizedBatch([request('alice'), request('bob')], 'permit((', entities)
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(SharedContextError)
    if (!(caught instanceof SharedContextError)) return
    expect(caught.source).toBe('policies')
    expect(caught.cause).toBeInstanceOf(PolicySyntaxError)
    expect(caught.message).toBe('failed to load shared policies: unexpected token `(`')
    expect(evaluator.evaluated).toHaveLength(0)
  })

  it('evaluates nothing when the entities do not normalize', () => {
    const { engine, evaluator } = setup()

    expect(() =>
      engine.isAuthorizedBatch([request('alice')], policies, [
        { uid: 'User::"alice"', attrs: {}, parents: [] },
        { uid: 'User::"alice"', attrs: {}, parents: [] },
      ])
    ).toThrow('failed to load shared entities: entities[1].uid: duplicate entity User::"alice"')
    expect(evaluator.evaluated).toHaveLength(0)
  })

  it('evaluates nothing when the evaluator rejects the entities', () => {
    const { engine, evaluator } = setup()
    evaluator.entityIssues = [{ message: 'entity does not conform to the schema', locations: [] }]

    expect(() => engine.isAuthorizedBatch([request('alice')], policies, entities)).toThrow(
      SharedContextError
    )
    expect(evaluator.evaluated).toHaveLength(0)
  })

  it('shares one normalized context across the batch', () => {
    const { engine, evaluator } = setup()
    engine.isAuthorizedBatch([request('alice'), request('bob')], policies, JSON.stringify(entities))

    expect(evaluator.shared).toHaveLength(2)
    expect(evaluator.shared[0]).toBe(evaluator.shared[1])
    expect(evaluator.shared[0]?.entities).toEqual([
      { uid: { type: 'User', id: 'alice' }, attrs: {}, parents: [] },
    ])
    expect(evaluator.shared[0]?.schema).toBeUndefined()
  })

  it('treats a blank schema as no schema', () => {
    const { engine, evaluator } = setup()
    engine.isAuthorizedBatch([request('alice')], policies, entities, '  ')
    expect(evaluator.shared[0]?.schema).toBeUndefined()
  })

  it('passes the request validation setting to the evaluator', () => {
    const evaluator = new RecordingEvaluator()
    const engine = new AuthorizationEngine({
      evaluator,
      config: { requests: { validateAgainstSchema: false } },
    })
    engine.isAuthorizedBatch([request('alice')], policies, entities, 'entity User;')

    expect(evaluator.options).toEqual([{ validateRequest: false }])
    expect(evaluator.shared[0]?.schema).toEqual({ kind: 'cedar', text: 'entity User;' })
  })

  it('carries evaluator warnings onto the result', () => {
    const { engine, evaluator } = setup()
    evaluator.warnings = [{ message: 'deprecated syntax in policy0', locations: [] }]

    const [result] = engine.isAuthorizedBatch([request('alice', 'w')], policies, entities)

    expect(result?.type).toBe('evaluated')
    if (result?.type !== 'evaluated') return
    expect(result.diagnostics.warnings).toEqual([
      { message: 'deprecated syntax in policy0', locations: [] },
    ])
    expect(result.toJSON().diagnostics).toEqual({
      reasons: ['allow-alice'],
      errors: [],
      warnings: [{ message: 'deprecated syntax in policy0', locations: [] }],
    })
  })

  it('records timing for every evaluated request', () => {
    const { engine } = setup()
    const [result] = engine.isAuthorizedBatch([request('alice')], policies, entities)

    expect(result?.type).toBe('evaluated')
    if (result?.type !== 'evaluated') return
    const { normalizeSharedMicros, normalizeRequestMicros, authorizeMicros, totalMicros } = result.metrics
    for (const value of [normalizeSharedMicros, normalizeRequestMicros, authorizeMicros]) {
      expect(Number.isInteger(value)).toBe(true)
      expect(value).toBeGreaterThanOrEqual(0)
    }
    expect(totalMicros).toBeGreaterThanOrEqual(normalizeSharedMicros)
  })
})

describe('AuthorizationEngine.isAuthorized', () => {
  it('matches the batch result for the same request', () => {
    const { engine } = setup()
    const single = engine.isAuthorized(request('alice', 'x'), policies, entities)
    const [batched] = engine.isAuthorizedBatch([request('alice', 'x')], policies, entities)

    expect(batched).toBeDefined()
    if (batched) expect(single.equals(batched)).toBe(true)
  })

  it('throws the error a batch would store in the slot', () => {
    const { engine, evaluator } = setup()
    evaluator.rejected.add('mallory')

    expect(() =>
      engine.isAuthorized({ ...request('bob'), resource: 'Photo' }, policies, entities)
    ).toThrow(MalformedInputError)
    expect(() => engine.isAuthorized(request('mallory'), policies, entities)).toThrow(
      RequestRejectedError
    )
  })

  it('reports the evaluator version', () => {
    expect(setup().engine.engineVersion()).toBe('0.0.0-test')
  })
})

describe('AuthorizationEngine logging', () => {
  afterEach(async () => {
    await resetLogger()
  })

  it('warns once for each failed slot', async () => {
    const records: { category: readonly string[]; properties: Record<string, unknown> }[] = []
    await configureLogger({ _testSink: (record) => void records.push(record), level: 'warning' })

    const { engine } = setup()
    engine.isAuthorizedBatch(
      [request('alice'), { ...request('bob'), principal: 'bob' }],
      policies,
      entities
    )

    expect(records).toHaveLength(1)
    expect(records[0]?.category).toEqual(['cedar-relay', 'engine'])
    expect(records[0]?.properties).toMatchObject({ index: 1 })
  })
})
