import type { EntityRecord, EntityUid } from './types.js'

/**
 * Renders an entity uid in the policy language's literal form, `Type::"id"`.
 */
export function formatEntityUid(uid: EntityUid): string {
  return `${uid.type}::${JSON.stringify(uid.id)}`
}

/**
 * A collection of entities indexed by uid.
 *
 * Accepted anywhere an entity graph is expected, e.g. as the `entities`
 * argument of `AuthorizationEngine.isAuthorized`.
 */
export class EntityCollection {
  private entities: EntityRecord[]
  private entityMap: Map<string, EntityRecord>

  /**
   * @param entities - Entities in graph order. Later duplicates are kept in the
   * list (so the normalizer can reject them) but do not replace the indexed entry.
   */
  constructor(entities: EntityRecord[]) {
    this.entities = entities
    this.entityMap = new Map()

    for (const entity of entities) {
      const key = formatEntityUid(entity.uid)
      if (!this.entityMap.has(key)) this.entityMap.set(key, entity)
    }
  }

  /**
   * Creates a reference for a type and id, whether or not it is in the collection.
   */
  entityRef(type: string, id: string): EntityUid {
    return { type, id }
  }

  get(type: string, id: string): EntityRecord | undefined {
    return this.entityMap.get(formatEntityUid({ type, id }))
  }

  has(uid: EntityUid): boolean {
    return this.entityMap.has(formatEntityUid(uid))
  }

  getAll(): EntityRecord[] {
    return this.entities
  }

  getByType(type: string): EntityRecord[] {
    return this.entities.filter((e) => e.uid.type === type)
  }

  get size(): number {
    return this.entities.length
  }
}
