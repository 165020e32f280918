/**
 * @cedar-relay/authorization
 *
 * Authorization requests against Cedar policies: input normalization, batch
 * evaluation, policy validation and formatting.
 *
 * @example
 * ```typescript
 * import { AuthorizationEngine, EntityBuilder } from '@cedar-relay/authorization'
 *
 * const engine = new AuthorizationEngine()
 *
 * const entities = EntityBuilder.create()
 *   .entity('UserGroup', 'admin')
 *   .entity('User', 'alice')
 *   .addParent('UserGroup', 'admin')
 *   .build()
 *
 * const [first, second] = engine.isAuthorizedBatch(
 *   [
 *     { principal: 'User::"alice"', action: 'Action::"view"', resource: 'Document::"doc1"', correlationId: 'a' },
 *     { principal: { type: 'User', id: 'alice' }, action: 'Action::"edit"', resource: 'Document::"doc1"' },
 *   ],
 *   'permit(principal in UserGroup::"admin", action == Action::"view", resource);',
 *   entities
 * )
 * ```
 */
export * from './policy/authorization-engine.js'
export * from './policy/entity-builder.js'
export * from './policy/entity-collection.js'
export * from './policy/errors.js'
export * from './policy/evaluator.js'
export * from './policy/result.js'
export * from './policy/types.js'
export {
  normalizeContext,
  normalizeEntities,
  normalizeEntityUid,
  normalizePolicies,
  normalizeRequest,
  normalizeSchema,
} from './policy/normalizer.js'
