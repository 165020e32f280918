import type { EntityCollection } from './entity-collection.js'

/**
 * Identifies an entity by its (possibly namespaced) type and id.
 *
 * @example
 * ```typescript
 * const bob: EntityUid = { type: 'User', id: 'bob' }
 * const photo: EntityUid = { type: 'PhotoApp::Photo', id: '1234-abcd' }
 * ```
 */
export interface EntityUid {
  readonly type: string
  readonly id: string
}

/**
 * Values the evaluator can represent in contexts and entity attributes.
 */
export type CedarValue =
  | boolean
  | number
  | string
  | CedarValue[]
  | { __entity: EntityUid }
  | { __extn: { fn: string; arg: CedarValue } }
  | { [key: string]: CedarValue }

export type CedarRecord = { [key: string]: CedarValue }

/**
 * A fully normalized entity: uid, attributes and ordered parents.
 */
export interface EntityRecord {
  uid: EntityUid
  attrs: CedarRecord
  parents: EntityUid[]
  tags?: CedarRecord
}

/**
 * A fully normalized authorization request.
 */
export interface AuthorizationRequest {
  principal: EntityUid
  action: EntityUid
  resource: EntityUid
  context: CedarRecord
  correlationId?: string
}

export enum Decision {
  Allow = 'allow',
  Deny = 'deny',
}

/**
 * A non-fatal error raised while evaluating one policy. The policy is skipped
 * and evaluation of the others continues.
 */
export interface EvaluationError {
  policyId: string
  message: string
}

export type PolicySet =
  | { kind: 'text'; text: string }
  | { kind: 'structured'; policies: Record<string, string | object> }

export type Schema = { kind: 'cedar'; text: string } | { kind: 'json'; json: Record<string, unknown> }

// ---------------------------------------------------------------------------
// Caller-facing input shapes
// ---------------------------------------------------------------------------

/**
 * An entity reference as callers may write it: `Type::"id"`, `{ type, id }`,
 * or the `{ __entity: { type, id } }` escape used inside Cedar JSON values.
 */
export type RawEntityUid = string | { type: string; id: string } | { __entity: EntityUid }

/**
 * Context as a record or as the JSON encoding of one.
 */
export type RawContext = Record<string, unknown> | string | null | undefined

export interface RawAuthorizationRequest {
  principal: RawEntityUid
  action: RawEntityUid
  resource: RawEntityUid
  context?: RawContext
  correlationId?: string
  /** Alias of `correlationId`. */
  correlation_id?: string
}

export interface RawEntity {
  uid: RawEntityUid
  attrs: Record<string, unknown>
  parents: RawEntityUid[]
  tags?: Record<string, unknown>
}

/**
 * Entity graph as an array of records, the JSON encoding of that array, or a
 * collection produced by {@link EntityBuilder}.
 */
export type RawEntities = RawEntity[] | string | EntityCollection

/**
 * Policy-language text, or policies keyed by id in text or Cedar JSON form.
 */
export type RawPolicies = string | Record<string, string | object>

/**
 * Cedar schema text, JSON schema text, or a JSON schema object.
 */
export type RawSchema = string | Record<string, unknown>

/**
 * Interface for objects that can provide a set of entities.
 */
export interface EntityProvider {
  build(): EntityRecord[] | EntityCollection
}

/**
 * Maps arbitrary data onto an entity's id, attributes and parents.
 */
export type Mapper<T = unknown> = (data: T) => {
  id: string
  attrs: CedarRecord
  parents?: EntityUid[]
}

export type MapperRegistry = Map<string, Mapper>
