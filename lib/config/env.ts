import { z } from 'zod'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const EnvSchema = z.object({
  LOG_LEVEL: z.string().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('info'),
  LOG_DIR: z.string().min(1).default('logs'),
  WORKBOOK_PROFILE: z.string().min(1).default('default'),
  OUTPUT_DIR: z.string().min(1).default('.data/output'),
  INPUT_FALLBACK_DIR: z.string().min(1).default('data/input'),
})

export type AppConfig = z.infer<typeof EnvSchema>

let cached: AppConfig | null = null

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return EnvSchema.parse(env)
}

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig()
  return cached
}

// tests only
export function resetConfig() {
  cached = null
}
