import { configure, getLogger, reset } from '@logtape/logtape'
import type { LogLevel, LogRecord, Sink } from '@logtape/logtape'
import { trace, context } from '@opentelemetry/api'
import { ROOT_CATEGORY, validateLogLevel, validateEnvironment } from './constants.js'

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warning' | 'error' | 'fatal'
  environment?: 'development' | 'production' | 'test'
  /** @internal Test-only: replace the console sinks with a capturing sink */
  _testSink?: Sink
}

let configuring: Promise<void> | undefined

function stringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    // cyclic value: mark back references instead of failing the log call
    const seen = new WeakSet<object>()
    return JSON.stringify(value, (_key, val: unknown) => {
      if (typeof val !== 'object' || val === null) return val
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
      return val
    })
  }
}

export function formatMessage(record: LogRecord): string {
  return record.message.map((part) => (typeof part === 'string' ? part : stringify(part))).join('')
}

function hasProperties(record: LogRecord): boolean {
  return Object.keys(record.properties).length > 0
}

function createPrettySink(): Sink {
  return (record: LogRecord) => {
    const time = new Date(record.timestamp).toISOString().slice(11, 23)
    const level = record.level.toUpperCase().padEnd(7)
    const props = hasProperties(record) ? ` ${stringify(record.properties)}` : ''
    console.error(`${time} ${level} ${record.category.join('.')}: ${formatMessage(record)}${props}`)
  }
}

/**
 * One JSON object per line, with trace ids when a span is active.
 */
export function createJsonSink(write: (line: string) => void = (line) => process.stderr.write(line)): Sink {
  return (record: LogRecord) => {
    const span = trace.getSpan(context.active())?.spanContext()
    write(
      stringify({
        timestamp: record.timestamp,
        level: record.level,
        category: record.category.join('.'),
        message: formatMessage(record),
        ...(hasProperties(record) ? { properties: record.properties } : {}),
        ...(span ? { trace_id: span.traceId, span_id: span.spanId } : {}),
      }) + '\n'
    )
  }
}

/**
 * Configure LogTape for the host application: pretty lines on stderr in
 * development and test, JSON lines in production. Library code never calls
 * this. Only the first successful call takes effect.
 */
export function configureLogger(config: LoggerConfig = {}): Promise<void> {
  configuring ??= applyConfig(config).catch((err: unknown) => {
    configuring = undefined
    throw err
  })
  return configuring
}

async function applyConfig(config: LoggerConfig): Promise<void> {
  const level: LogLevel = config.level ?? validateLogLevel(process.env.LOG_LEVEL) ?? 'info'
  const environment = config.environment ?? validateEnvironment(process.env.NODE_ENV) ?? 'development'

  const sink = config._testSink ?? (environment === 'production' ? createJsonSink() : createPrettySink())

  await configure({
    sinks: { main: sink },
    loggers: [
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['main'] },
      { category: [ROOT_CATEGORY], lowestLevel: level, sinks: ['main'] },
    ],
  })
}

/**
 * @internal
 * Reset all internal state so `configureLogger` can be called again.
 * Intended for test teardown only.
 */
export async function resetLogger(): Promise<void> {
  await reset()
  configuring = undefined
}

/**
 * Logger for a subsystem below the project's root category.
 *
 * @example
 * ```typescript
 * const logger = getProjectLogger('engine')
 * logger.debug`evaluating ${count} requests`
 * ```
 */
export function getProjectLogger(...subcategory: string[]) {
  return getLogger([ROOT_CATEGORY, ...subcategory])
}

export { getLogger }
export type { LogLevel }
