import type { LogLevel } from '@nestjs/common'
import { z } from 'zod'

// most severe first
const LOG_LEVELS = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'] as const satisfies readonly LogLevel[]

const envSchema = z.object({
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .catch('log'),
})

export interface AppConfig {
  logLevel: LogLevel
  logLevels: LogLevel[]
}

/** Enabled levels: the configured one and every more severe one. */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { LOG_LEVEL } = envSchema.parse({ LOG_LEVEL: env.LOG_LEVEL })
  return {
    logLevel: LOG_LEVEL,
    logLevels: LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(LOG_LEVEL) + 1),
  }
}
