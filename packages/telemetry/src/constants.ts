/**
 * Shared constants of @cedar-relay/telemetry.
 */

/** Root LogTape category; every logger of this project lives below it. */
export const ROOT_CATEGORY = 'cedar-relay'

/** Meter name used for authorization metrics. */
export const METER_NAME = 'cedar-relay'

// ---------------------------------------------------------------------------
// Environment validation helpers
// ---------------------------------------------------------------------------

export const VALID_LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'fatal'] as const
export type LogLevel = (typeof VALID_LOG_LEVELS)[number]

export const VALID_ENVIRONMENTS = ['development', 'production', 'test'] as const
export type Environment = (typeof VALID_ENVIRONMENTS)[number]

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return (values as readonly string[]).includes(value)
}

export function validateLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined
  if (isOneOf(VALID_LOG_LEVELS, value)) return value
  console.warn(`[telemetry] invalid LOG_LEVEL "${value}", defaulting to "info"`)
  return undefined
}

export function validateEnvironment(value: string | undefined): Environment | undefined {
  if (!value) return undefined
  if (isOneOf(VALID_ENVIRONMENTS, value)) return value
  console.warn(`[telemetry] invalid NODE_ENV "${value}", defaulting to "development"`)
  return undefined
}
