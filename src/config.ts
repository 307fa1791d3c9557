import { z } from 'zod'

const ConfigSchema = z.object({
  dbName: z.string().trim().min(1).catch('WeeklyShopDB'),
  logLevel: z.enum(['silent', 'info', 'debug']).catch('info'),
})

export type AppConfig = z.infer<typeof ConfigSchema>
export type LogLevel = AppConfig['logLevel']

/** Read settings from the environment. Missing or invalid values fall back to defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return ConfigSchema.parse({
    dbName: env.SHOPPING_DB_NAME,
    logLevel: env.SHOPPING_LOG_LEVEL,
  })
}

export const config = loadConfig()
