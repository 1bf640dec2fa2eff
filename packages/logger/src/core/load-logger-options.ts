import { z } from "zod"
import type { LoggerOptions } from "../ports/logger-options"
import { logLevelNames } from "../ports/log-level"

export const loggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type LoggerEnv = z.infer<typeof loggerEnvSchema>

/**
 * Reads logger options from environment-style key/values.
 *
 * @example
 * ```ts
 * const logger = createPinoLogger({}, loadLoggerOptions(process.env), { service: "queue" })
 * ```
 */
export function loadLoggerOptions(
  env: Record<string, string | undefined> = process.env,
): LoggerOptions {
  const result = loggerEnvSchema.safeParse(env)

  if (!result.success) {
    throw new Error(`Logger configuration is invalid:\n${z.prettifyError(result.error)}`)
  }

  return {
    level: result.data.LOG_LEVEL,
    prettify: result.data.LOG_PRETTY,
  }
}
