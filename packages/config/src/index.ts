import { z } from 'zod'

/**
 * Formatter settings passed to the evaluator's pretty-printer.
 */
export const FormatterConfigSchema = z.object({
  lineWidth: z.number().int().positive().default(80),
  indentWidth: z.number().int().min(0).max(16).default(2),
})

export type FormatterConfig = z.infer<typeof FormatterConfigSchema>

/**
 * Policy validation settings.
 */
export const ValidationConfigSchema = z.object({
  failOnWarnings: z.boolean().default(false),
})

export type ValidationConfig = z.infer<typeof ValidationConfigSchema>

/**
 * Request evaluation settings.
 */
export const RequestConfigSchema = z.object({
  // When a schema is supplied, requests that do not conform to it are rejected
  validateAgainstSchema: z.boolean().default(true),
})

export type RequestConfig = z.infer<typeof RequestConfigSchema>

/**
 * Top-level engine configuration
 */
export const EngineConfigSchema = z.object({
  formatter: FormatterConfigSchema.prefault({}),
  validation: ValidationConfigSchema.prefault({}),
  requests: RequestConfigSchema.prefault({}),
})

export type EngineConfig = z.infer<typeof EngineConfigSchema>
export type EngineConfigInput = z.input<typeof EngineConfigSchema>

/**
 * Parses a partial configuration, filling in defaults.
 *
 * @throws {z.ZodError} If a value is out of range or of the wrong type.
 */
export function createConfig(input: EngineConfigInput = {}): EngineConfig {
  return Object.freeze(EngineConfigSchema.parse(input))
}

/**
 * Loads the default configuration from environment variables.
 *
 * - `CEDAR_RELAY_LINE_WIDTH`, `CEDAR_RELAY_INDENT_WIDTH`: formatter widths
 * - `CEDAR_RELAY_FAIL_ON_WARNINGS`: `true` makes validation warnings fail validation
 * - `CEDAR_RELAY_VALIDATE_REQUESTS`: `false` skips request checks against the schema
 *
 * @param env - The environment to read, `process.env` by default.
 */
export function loadDefaultConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return createConfig({
    formatter: {
      lineWidth: env.CEDAR_RELAY_LINE_WIDTH ? Number(env.CEDAR_RELAY_LINE_WIDTH) : undefined,
      indentWidth: env.CEDAR_RELAY_INDENT_WIDTH ? Number(env.CEDAR_RELAY_INDENT_WIDTH) : undefined,
    },
    validation: {
      failOnWarnings: env.CEDAR_RELAY_FAIL_ON_WARNINGS === 'true',
    },
    requests: {
      validateAgainstSchema: env.CEDAR_RELAY_VALIDATE_REQUESTS !== 'false',
    },
  })
}
