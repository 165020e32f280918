import { configureLogger, resetLogger, getLogger, getProjectLogger, createJsonSink } from './logger.js'
import type { LoggerConfig, LogLevel } from './logger.js'
import { getMeter } from './metrics.js'

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------
export { configureLogger, getLogger, getProjectLogger, createJsonSink }
/** @internal Reset all logger state. For test teardown only. */
export { resetLogger }
export type { LoggerConfig, LogLevel }

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------
export { getMeter }

export {
  ROOT_CATEGORY,
  METER_NAME,
  validateLogLevel,
  validateEnvironment,
} from './constants.js'
