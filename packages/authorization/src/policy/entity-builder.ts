import { EntityCollection } from './entity-collection.js'
import type { CedarRecord, EntityProvider, EntityRecord, Mapper, MapperRegistry } from './types.js'

/**
 * Factory for creating `EntityBuilder` instances.
 * Allows pre-registering mappers for specific entity types to streamline entity creation.
 */
export class EntityBuilderFactory {
  private mappers: MapperRegistry = new Map()

  /**
   * Registers a mapper function for a specific entity type.
   * Entities of that type can then be added from raw data with `builder.add(type, data)`.
   *
   * @returns The factory instance for chaining.
   */
  registerMapper<T>(type: string, mapper: Mapper<T>): this {
    this.mappers.set(type, (data: unknown) => mapper(data as T))
    return this
  }

  createEntityBuilder(): EntityBuilder {
    return new EntityBuilder(new Map(this.mappers))
  }
}

/**
 * A fluent builder for entity graphs.
 *
 * @example
 * ```typescript
 * const entities = EntityBuilder.create()
 *   .entity('UserGroup', 'admins')
 *   .entity('User', 'alice')
 *   .setAttributes({ department: 'finance' })
 *   .addParent('UserGroup', 'admins')
 *   .build()
 * ```
 */
export class EntityBuilder implements EntityProvider {
  private entities: EntityRecord[] = []
  private currentEntity: EntityRecord | null = null
  private mappers: MapperRegistry

  /**
   * Prefer `EntityBuilderFactory.createEntityBuilder()` if you have registered mappers.
   */
  public constructor(mappers: MapperRegistry = new Map()) {
    this.mappers = mappers
  }

  static create(): EntityBuilder {
    return new EntityBuilder()
  }

  /**
   * Starts a new entity with no attributes and no parents.
   */
  entity(type: string, id: string): EntityBuilder {
    const newEntity: EntityRecord = {
      uid: { type, id },
      attrs: {},
      parents: [],
    }

    this.entities.push(newEntity)
    this.currentEntity = newEntity

    return this
  }

  /**
   * Merges attributes into the entity most recently started or added.
   *
   * @throws Error if no entity is currently being built.
   */
  setAttributes(attrs: CedarRecord): EntityBuilder {
    if (!this.currentEntity) {
      throw new Error(
        'Cannot set attributes: No entity is currently being built. Call entity() first.'
      )
    }
    this.currentEntity.attrs = { ...this.currentEntity.attrs, ...attrs }
    return this
  }

  /**
   * @throws Error if no entity is currently being built.
   */
  addParent(type: string, id: string): EntityBuilder {
    if (!this.currentEntity) {
      throw new Error('Cannot add parent: No entity is currently being built. Call entity() first.')
    }
    this.currentEntity.parents.push({ type, id })
    return this
  }

  /**
   * Adds entities from another provider (like another builder).
   */
  add(component: EntityProvider): EntityBuilder
  /**
   * Adds an entity using the mapper registered for `type`.
   */
  add<T>(type: string, data: T): EntityBuilder
  add(componentOrType: EntityProvider | string, data?: unknown): EntityBuilder {
    if (typeof componentOrType === 'string') {
      const type = componentOrType
      const mapper = this.mappers.get(type)
      if (!mapper) {
        throw new Error(`No mapper registered for entity type: ${type}`)
      }

      const { id, attrs, parents } = mapper(data)
      const newEntity: EntityRecord = {
        uid: { type, id },
        attrs,
        parents: parents ?? [],
      }

      this.entities.push(newEntity)
      this.currentEntity = newEntity
      return this
    }

    const result = componentOrType.build()
    const componentEntities = result instanceof EntityCollection ? result.getAll() : result

    this.entities.push(...componentEntities)

    // A single added entity stays open for further chaining
    this.currentEntity = componentEntities.length === 1 ? (componentEntities[0] ?? null) : null

    return this
  }

  build(): EntityCollection {
    return new EntityCollection([...this.entities])
  }
}
