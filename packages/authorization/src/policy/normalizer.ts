import { z } from 'zod'
import { EntityCollection, formatEntityUid } from './entity-collection.js'
import { MalformedInputError, MissingArgumentError } from './errors.js'
import type {
  AuthorizationRequest,
  CedarRecord,
  CedarValue,
  EntityRecord,
  EntityUid,
  PolicySet,
  Schema,
} from './types.js'

const IDENTIFIER = '[A-Za-z_][A-Za-z0-9_]*'
const TYPE_NAME = new RegExp(`^(?:${IDENTIFIER}::)*${IDENTIFIER}$`)
const ENTITY_UID_LITERAL = new RegExp(
  `^\\s*((?:${IDENTIFIER}::)*${IDENTIFIER})::"((?:[^"\\\\]|\\\\.)*)"\\s*$`,
  's'
)

const EntityUidObjectSchema = z.object({
  type: z.string().regex(TYPE_NAME, 'must be an entity type name such as User or App::User'),
  id: z.string(),
})

const UidInputSchema = z.union([z.string(), z.record(z.string(), z.unknown())])

const RawRequestSchema = z.object({
  principal: UidInputSchema,
  action: UidInputSchema,
  resource: UidInputSchema,
  context: z.unknown().optional(),
  correlationId: z.string().optional(),
  correlation_id: z.string().optional(),
})

// Attribute maps pass through uncopied; normalizeRecord reads their keys
const AttributeMapSchema = z.custom<object>(isPlainObject, {
  message: 'expected a record of attribute values',
})

const RawEntitySchema = z.object({
  uid: UidInputSchema,
  attrs: AttributeMapSchema,
  parents: z.array(UidInputSchema),
  tags: AttributeMapSchema.optional(),
})

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function joinPath(field: string, path: readonly PropertyKey[]): string {
  return path.reduce<string>(
    (acc, key) => (typeof key === 'number' ? `${acc}[${key}]` : `${acc}.${String(key)}`),
    field
  )
}

function fromZodError(field: string, error: z.ZodError): MalformedInputError {
  const issue = error.issues[0]
  if (!issue) return new MalformedInputError(field, 'invalid input')
  return new MalformedInputError(joinPath(field, issue.path), issue.message)
}

function parseJson(field: string, text: string): unknown {
  try {
    return JSON.parse(text)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new MalformedInputError(field, `invalid JSON: ${message}`)
  }
}

function isPlainObject(value: unknown): value is object {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * `undefined`, `null` and blank strings all mean "not supplied".
 */
export function isMissing(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && !value.trim())
}

function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (typeof value !== 'object') return typeof value
  return Object.prototype.toString.call(value).slice(8, -1)
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '0': '\0',
  '\\': '\\',
  "'": "'",
  '"': '"',
}

function unescapeStringLiteral(field: string, body: string): string {
  return body.replace(/\\(u\{([0-9a-fA-F]{1,6})\}|.)/gs, (_match, escape: string, hex?: string) => {
    if (hex !== undefined) {
      const codePoint = parseInt(hex, 16)
      if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
        throw new MalformedInputError(field, `invalid unicode escape \\u{${hex}}`)
      }
      return String.fromCodePoint(codePoint)
    }
    const replacement = SIMPLE_ESCAPES[escape]
    if (replacement === undefined) {
      throw new MalformedInputError(field, `unsupported escape sequence \\${escape}`)
    }
    return replacement
  })
}

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/**
 * Checks that a value can be represented by the evaluator and copies it.
 * Nothing is coerced: `null`, fractional numbers and class instances such as
 * `Date` are rejected.
 */
export function normalizeValue(field: string, value: unknown): CedarValue {
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return value
    case 'number':
      if (!Number.isSafeInteger(value)) {
        throw new MalformedInputError(field, `unsupported number ${value}: only integers are allowed`)
      }
      return value
    case 'object':
      if (value === null) break
      if (Array.isArray(value)) {
        return value.map((item: unknown, i) => normalizeValue(`${field}[${i}]`, item))
      }
      if (!isPlainObject(value)) {
        throw new MalformedInputError(field, `unsupported value type ${describeType(value)}`)
      }
      if ('__entity' in value && Object.keys(value).length === 1) {
        return { __entity: normalizeEntityUid(`${field}.__entity`, value.__entity) }
      }
      if ('__extn' in value && Object.keys(value).length === 1) {
        return normalizeExtension(`${field}.__extn`, value.__extn)
      }
      return normalizeRecord(field, value)
    default:
      break
  }
  throw new MalformedInputError(field, `unsupported value type ${describeType(value)}`)
}

function normalizeExtension(field: string, raw: unknown): CedarValue {
  if (!isPlainObject(raw) || !('fn' in raw) || typeof raw.fn !== 'string' || !('arg' in raw)) {
    throw new MalformedInputError(field, 'extension values need a string "fn" and an "arg"')
  }
  return { __extn: { fn: raw.fn, arg: normalizeValue(`${field}.arg`, raw.arg) } }
}

/**
 * Copies every own key, `__proto__` included, as an own property of the result.
 */
export function normalizeRecord(field: string, raw: object): CedarRecord {
  return Object.fromEntries(
    Object.entries(raw).map(([key, value]) => [key, normalizeValue(`${field}.${key}`, value)])
  )
}

// ---------------------------------------------------------------------------
// Entity references
// ---------------------------------------------------------------------------

function parseEntityUidLiteral(field: string, text: string): EntityUid {
  const match = ENTITY_UID_LITERAL.exec(text)
  const [, type, body] = match ?? []
  if (type === undefined || body === undefined) {
    throw new MalformedInputError(field, `expected an entity reference like User::"alice", got ${JSON.stringify(text)}`)
  }
  return { type, id: unescapeStringLiteral(field, body) }
}

/**
 * Normalizes `Type::"id"`, `{ type, id }` or `{ __entity: { type, id } }`.
 */
export function normalizeEntityUid(field: string, raw: unknown): EntityUid {
  if (typeof raw === 'string') return parseEntityUidLiteral(field, raw)

  if (isPlainObject(raw) && '__entity' in raw) {
    return normalizeEntityUid(`${field}.__entity`, raw.__entity)
  }

  const parsed = EntityUidObjectSchema.safeParse(raw)
  if (!parsed.success) throw fromZodError(field, parsed.error)
  return { type: parsed.data.type, id: parsed.data.id }
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

/**
 * Context as a record, its JSON encoding, or absent (empty context).
 */
export function normalizeContext(raw: unknown): CedarRecord {
  if (raw === undefined || raw === null) return {}
  const value = typeof raw === 'string' ? parseJson('context', raw) : raw
  if (!isPlainObject(value)) {
    throw new MalformedInputError('context', 'expected a record of attribute values')
  }
  return normalizeRecord('context', value)
}

export function normalizeRequest(raw: unknown): AuthorizationRequest {
  const parsed = RawRequestSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    if (!issue || issue.path.length === 0) {
      throw new MalformedInputError('request', issue?.message ?? 'invalid request')
    }
    const [head, ...rest] = issue.path
    throw new MalformedInputError(joinPath(String(head), rest), issue.message)
  }

  const { principal, action, resource, context, correlationId, correlation_id } = parsed.data
  const request: AuthorizationRequest = {
    principal: normalizeEntityUid('principal', principal),
    action: normalizeEntityUid('action', action),
    resource: normalizeEntityUid('resource', resource),
    context: normalizeContext(context),
  }
  const tag = correlationId ?? correlation_id
  if (tag !== undefined) request.correlationId = tag
  return request
}

/**
 * Reads the correlation tag of a request that may not normalize, so that a
 * failed batch slot can still echo it.
 */
export function peekCorrelationId(raw: unknown): string | undefined {
  if (!isPlainObject(raw)) return undefined
  if ('correlationId' in raw && typeof raw.correlationId === 'string') return raw.correlationId
  if ('correlation_id' in raw && typeof raw.correlation_id === 'string') return raw.correlation_id
  return undefined
}

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

/**
 * Normalizes an entity graph given as records, their JSON encoding, or an
 * {@link EntityCollection}. Every form yields the same records.
 */
export function normalizeEntities(raw: unknown): EntityRecord[] {
  if (raw === undefined || raw === null) throw new MissingArgumentError('entities')
  const value =
    raw instanceof EntityCollection
      ? raw.getAll()
      : typeof raw === 'string'
        ? parseJson('entities', raw)
        : raw

  const parsed = z.array(RawEntitySchema).safeParse(value)
  if (!parsed.success) throw fromZodError('entities', parsed.error)

  const seen = new Set<string>()
  return parsed.data.map((entity, i) => {
    const field = `entities[${i}]`
    const uid = normalizeEntityUid(`${field}.uid`, entity.uid)
    const key = formatEntityUid(uid)
    if (seen.has(key)) {
      throw new MalformedInputError(`${field}.uid`, `duplicate entity ${key}`)
    }
    seen.add(key)

    const record: EntityRecord = {
      uid,
      attrs: normalizeRecord(`${field}.attrs`, entity.attrs),
      parents: entity.parents.map((parent, j) =>
        normalizeEntityUid(`${field}.parents[${j}]`, parent)
      ),
    }
    if (entity.tags !== undefined) record.tags = normalizeRecord(`${field}.tags`, entity.tags)
    return record
  })
}

// ---------------------------------------------------------------------------
// Policies and schema
// ---------------------------------------------------------------------------

/**
 * Policy text passes through untouched; a map of policy id to policy text or
 * Cedar JSON policy is checked for shape only.
 */
export function normalizePolicies(raw: unknown): PolicySet {
  if (raw === undefined || raw === null) throw new MissingArgumentError('policies')
  if (typeof raw === 'string') return { kind: 'text', text: raw }
  if (!isPlainObject(raw)) {
    throw new MalformedInputError('policies', 'expected policy text or a map of policy id to policy')
  }

  const policies: Record<string, string | object> = {}
  for (const [id, policy] of Object.entries(raw)) {
    if (!id) throw new MalformedInputError('policies', 'policy ids must not be empty')
    if (typeof policy !== 'string' && !isPlainObject(policy)) {
      throw new MalformedInputError(`policies.${id}`, 'expected policy text or a JSON policy object')
    }
    policies[id] = policy
  }
  return { kind: 'structured', policies }
}

/**
 * Cedar schema text, JSON schema text (recognised by a leading `{`) or a JSON
 * schema object.
 */
export function normalizeSchema(raw: unknown): Schema {
  if (isMissing(raw)) throw new MissingArgumentError('schema')
  if (typeof raw === 'string') {
    if (!raw.trimStart().startsWith('{')) return { kind: 'cedar', text: raw }
    const json = parseJson('schema', raw)
    if (!isPlainObject(json)) throw new MalformedInputError('schema', 'expected a JSON object')
    return { kind: 'json', json: { ...json } }
  }
  if (!isPlainObject(raw)) {
    throw new MalformedInputError('schema', 'expected schema text or a JSON schema object')
  }
  return { kind: 'json', json: { ...raw } }
}

/**
 * Reads a Cedar JSON policy set, as an object or its JSON string, and returns
 * its static policies keyed by id.
 */
export function normalizePolicySetJson(raw: unknown): Record<string, object> {
  if (isMissing(raw)) throw new MissingArgumentError('policies')
  const value = typeof raw === 'string' ? parseJson('policies', raw) : raw
  if (!isPlainObject(value)) throw new MalformedInputError('policies', 'expected a JSON policy set')

  const templates = 'templates' in value ? value.templates : undefined
  if (isPlainObject(templates) && Object.keys(templates).length > 0) {
    throw new MalformedInputError('policies.templates', 'policy templates are not supported')
  }

  const staticPolicies = 'staticPolicies' in value ? value.staticPolicies : undefined
  if (!isPlainObject(staticPolicies)) {
    throw new MalformedInputError('policies.staticPolicies', 'expected a map of policy id to JSON policy')
  }
  const policies: Record<string, object> = {}
  for (const [id, policy] of Object.entries(staticPolicies)) {
    if (!isPlainObject(policy)) {
      throw new MalformedInputError(`policies.staticPolicies.${id}`, 'expected a JSON policy object')
    }
    policies[id] = policy
  }
  return policies
}
