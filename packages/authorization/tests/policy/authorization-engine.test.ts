import { describe, expect, it } from 'vitest'
import { AuthorizationEngine } from '../../src/policy/authorization-engine.js'
import { EntityBuilder } from '../../src/policy/entity-builder.js'
import {
  MalformedInputError,
  PolicySyntaxError,
  RequestRejectedError,
  SharedContextError,
} from '../../src/policy/errors.js'
import { Decision } from '../../src/policy/types.js'

describe('AuthorizationEngine', () => {
  const engine = new AuthorizationEngine()

  const policies = `
    permit(
      principal == User::"bob",
      action == Action::"view",
      resource == Photo::"1234-abcd"
    );
  `

  const entities = [
    { uid: 'User::"bob"', attrs: { age: 30 }, parents: [] },
    { uid: 'Photo::"1234-abcd"', attrs: {}, parents: [] },
  ]

  describe('isAuthorized', () => {
    it('allows a request a policy permits', () => {
      const result = engine.isAuthorized(
        { principal: 'User::"bob"', action: 'Action::"view"', resource: 'Photo::"1234-abcd"' },
        policies,
        entities
      )

      expect(result.decision).toBe(Decision.Allow)
      expect(result.allowed).toBe(true)
      expect(result.diagnostics.reasons).toEqual(['policy0'])
      expect(result.diagnostics.errors).toEqual([])
    })

    it('denies a request no policy permits', () => {
      const result = engine.isAuthorized(
        { principal: 'User::"bob"', action: 'Action::"delete"', resource: 'Photo::"1234-abcd"' },
        policies,
        entities
      )

      expect(result.decision).toBe(Decision.Deny)
      expect(result.allowed).toBe(false)
      expect(result.diagnostics.reasons).toEqual([])
      expect(result.diagnostics.errors).toEqual([])
    })

    it('lets forbid override permit', () => {
      const result = engine.isAuthorized(
        { principal: 'User::"bob"', action: 'Action::"view"', resource: 'Photo::"1234-abcd"' },
        `${policies}\nforbid(principal, action, resource) when { principal.age < 40 };`,
        entities
      )

      expect(result.decision).toBe(Decision.Deny)
      expect(result.diagnostics.reasons).toEqual(['policy1'])
    })

    it('reports policy evaluation errors without failing the request', () => {
      const result = engine.isAuthorized(
        { principal: 'User::"bob"', action: 'Action::"view"', resource: 'Photo::"1234-abcd"' },
        'permit(principal, action, resource) when { principal.nickname == "b" };',
        entities
      )

      expect(result.decision).toBe(Decision.Deny)
      expect(result.diagnostics.errors).toHaveLength(1)
      expect(result.diagnostics.errors[0]?.policyId).toBe('policy0')
    })

    it('echoes the correlation id', () => {
      const result = engine.isAuthorized(
        {
          principal: 'User::"bob"',
          action: 'Action::"view"',
          resource: 'Photo::"1234-abcd"',
          correlation_id: 'trace-7',
        },
        policies,
        entities
      )
      expect(result.correlationId).toBe('trace-7')
    })

    it('decides the same for every form of context', () => {
      const contextPolicy = 'permit(principal, action, resource) when { context.ip == "10.0.0.1" };'
      const base = { principal: 'User::"bob"', action: 'Action::"view"', resource: 'Photo::"1234-abcd"' }

      const asRecord = engine.isAuthorized({ ...base, context: { ip: '10.0.0.1' } }, contextPolicy, entities)
      const asJson = engine.isAuthorized({ ...base, context: '{"ip": "10.0.0.1"}' }, contextPolicy, entities)
      const absent = engine.isAuthorized(base, contextPolicy, entities)

      expect(asRecord.allowed).toBe(true)
      expect(asRecord.equals(asJson)).toBe(true)
      expect(absent.allowed).toBe(false)
    })

    it('accepts entities as JSON text and as a built collection', () => {
      const groupPolicy = 'permit(principal in UserGroup::"admins", action == Action::"edit", resource);'
      const request = { principal: 'User::"alice"', action: 'Action::"edit"', resource: 'Doc::"d1"' }

      const collection = EntityBuilder.create()
        .entity('UserGroup', 'admins')
        .entity('User', 'alice')
        .setAttributes({ department: 'finance' })
        .addParent('UserGroup', 'admins')
        .build()

      const fromCollection = engine.isAuthorized(request, groupPolicy, collection)
      const fromJson = engine.isAuthorized(
        request,
        groupPolicy,
        JSON.stringify([
          { uid: { type: 'UserGroup', id: 'admins' }, attrs: {}, parents: [] },
          {
            uid: { type: 'User', id: 'alice' },
            attrs: { department: 'finance' },
            parents: [{ type: 'UserGroup', id: 'admins' }],
          },
        ])
      )

      expect(fromCollection.allowed).toBe(true)
      expect(fromCollection.equals(fromJson)).toBe(true)
    })

    it('accepts policies keyed by id', () => {
      const result = engine.isAuthorized(
        { principal: 'User::"bob"', action: 'Action::"view"', resource: 'Photo::"1234-abcd"' },
        { 'bob-views': 'permit(principal == User::"bob", action, resource);' },
        entities
      )
      expect(result.diagnostics.reasons).toEqual(['bob-views'])
    })

    it('raises a shared context error for unparsable policies', () => {
      let caught: unknown
      try {
        engine.isAuthorized(
          { principal: 'User::"bob"', action: 'Action::"view"', resource: 'Photo::"1234-abcd"' },
          'permit(principal, action',
          entities
        )
      } catch (err) {
        caught = err
      }

      expect(caught).toBeInstanceOf(SharedContextError)
      if (!(caught instanceof SharedContextError)) return
      expect(caught.source).toBe('policies')
      expect(caught.cause).toBeInstanceOf(PolicySyntaxError)
      expect(caught.issues.length).toBeGreaterThan(0)
    })

    it('raises a malformed input error naming the field', () => {
      let caught: unknown
      try {
        engine.isAuthorized(
          { principal: 'User::"bob"', action: 'view', resource: 'Photo::"1234-abcd"' },
          policies,
          entities
        )
      } catch (err) {
        caught = err
      }

      expect(caught).toBeInstanceOf(MalformedInputError)
      if (caught instanceof MalformedInputError) expect(caught.field).toBe('action')
    })

    it('rejects a request that does not conform to the schema', () => {
      const schema = `
        entity User;
        entity Photo;
        action view appliesTo { principal: User, resource: Photo };
      `
      expect(() =>
        engine.isAuthorized(
          { principal: 'Photo::"1234-abcd"', action: 'Action::"view"', resource: 'Photo::"1234-abcd"' },
          'permit(principal, action, resource);',
          [],
          schema
        )
      ).toThrow(RequestRejectedError)
    })

    it('evaluates against a schema when the request conforms', () => {
      const schema = `
        entity User = { age: Long };
        entity Photo;
        action view appliesTo { principal: User, resource: Photo };
      `
      const result = engine.isAuthorized(
        { principal: 'User::"bob"', action: 'Action::"view"', resource: 'Photo::"1234-abcd"' },
        'permit(principal, action == Action::"view", resource) when { principal.age > 18 };',
        entities,
        schema
      )
      expect(result.allowed).toBe(true)
    })
  })

  describe('engineVersion', () => {
    it('reports a version number', () => {
      expect(engine.engineVersion()).toMatch(/^\d+\.\d+\.\d+/)
    })
  })
})
