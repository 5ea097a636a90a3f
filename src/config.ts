import fs from 'node:fs'
import path from 'node:path'
import yaml from 'yaml'
import { z } from 'zod'
import { BASE_URL } from './constants.js'
import { ConfigError } from './errors.js'

const configSchema = z.object({
  melcloud: z.object({
    email: z.string().email('melcloud.email must be an email address'),
    password: z.string().min(1, 'melcloud.password is required'),
    baseUrl: z.string().url('melcloud.baseUrl must be a URL').optional(),
    pollInterval: z
      .number()
      .int()
      .min(60, 'melcloud.pollInterval must be at least 60 seconds')
      .max(3600, 'melcloud.pollInterval should not exceed 3600 seconds')
      .optional(),
    debounceDelay: z
      .number()
      .min(0.5, 'melcloud.debounceDelay must be at least 0.5 seconds')
      .max(30, 'melcloud.debounceDelay should not exceed 30 seconds')
      .optional(),
    requestSpacing: z
      .number()
      .int()
      .min(0, 'melcloud.requestSpacing cannot be negative')
      .max(5000, 'melcloud.requestSpacing should not exceed 5000 milliseconds')
      .optional(),
    outdoorTemperatureTtl: z
      .number()
      .int()
      .min(60, 'melcloud.outdoorTemperatureTtl must be at least 60 seconds')
      .max(86400, 'melcloud.outdoorTemperatureTtl should not exceed 86400 seconds')
      .optional(),
    telemetryTtl: z
      .number()
      .int()
      .min(60, 'melcloud.telemetryTtl must be at least 60 seconds')
      .max(86400, 'melcloud.telemetryTtl should not exceed 86400 seconds')
      .optional(),
    staleAfterFailures: z
      .number()
      .int()
      .min(1, 'melcloud.staleAfterFailures must be at least 1')
      .max(100, 'melcloud.staleAfterFailures should not exceed 100')
      .optional(),
  }),
  logging: z
    .object({
      showChanges: z.boolean().optional(),
      ignoredKeys: z.array(z.string()).optional(),
    })
    .optional(),
})

export type AppConfig = z.infer<typeof configSchema>

/**
 * Config with every optional value filled in, intervals converted to milliseconds
 */
export interface ResolvedConfig {
  email: string
  password: string
  baseUrl: string
  pollIntervalMs: number
  debounceMs: number
  requestSpacingMs: number
  outdoorTemperatureTtlMs: number
  telemetryTtlMs: number
  staleAfterFailures: number
  showChanges: boolean
  ignoredKeys: string[]
}

const booleanString = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => val.toLowerCase() === 'true')

const envSchema = z.object({
  MELCLOUD_EMAIL: z.string(),
  MELCLOUD_PASSWORD: z.string(),
  MELCLOUD_BASE_URL: z.string().default(BASE_URL),
  MELCLOUD_POLL_INTERVAL: z.coerce
    .number()
    .int()
    .min(60, 'MELCLOUD_POLL_INTERVAL must be at least 60 seconds')
    .max(3600, 'MELCLOUD_POLL_INTERVAL should not exceed 3600 seconds')
    .default(60),
  MELCLOUD_DEBOUNCE_DELAY: z.coerce
    .number()
    .min(0.5, 'MELCLOUD_DEBOUNCE_DELAY must be at least 0.5 seconds')
    .max(30, 'MELCLOUD_DEBOUNCE_DELAY should not exceed 30 seconds')
    .default(2),
  MELCLOUD_REQUEST_SPACING: z.coerce
    .number()
    .int()
    .min(0, 'MELCLOUD_REQUEST_SPACING cannot be negative')
    .max(5000, 'MELCLOUD_REQUEST_SPACING should not exceed 5000 milliseconds')
    .default(500),
  MELCLOUD_OUTDOOR_TEMPERATURE_TTL: z.coerce
    .number()
    .int()
    .min(60, 'MELCLOUD_OUTDOOR_TEMPERATURE_TTL must be at least 60 seconds')
    .max(86400, 'MELCLOUD_OUTDOOR_TEMPERATURE_TTL should not exceed 86400 seconds')
    .default(1800),
  MELCLOUD_TELEMETRY_TTL: z.coerce
    .number()
    .int()
    .min(60, 'MELCLOUD_TELEMETRY_TTL must be at least 60 seconds')
    .max(86400, 'MELCLOUD_TELEMETRY_TTL should not exceed 86400 seconds')
    .default(300),
  MELCLOUD_STALE_AFTER_FAILURES: z.coerce
    .number()
    .int()
    .min(1, 'MELCLOUD_STALE_AFTER_FAILURES must be at least 1')
    .max(100, 'MELCLOUD_STALE_AFTER_FAILURES should not exceed 100')
    .default(3),
  LOGGING_SHOW_CHANGES: booleanString('true'),
  LOGGING_IGNORED_KEYS: z
    .string()
    .default('')
    .transform((val) => (val ? val.split(',').map((k) => k.trim()) : [])),
})

// Determine which config file to use based on environment
// - CONFIG_FILE_OVERRIDE: Explicitly set config file
// - Tests: tests/config.yml (committed to repo)
// - Production: config.yml
export const getConfigFilename = (): string => {
  if (process.env.CONFIG_FILE_OVERRIDE) {
    return process.env.CONFIG_FILE_OVERRIDE
  }
  if (process.env.VITEST || process.env.NODE_ENV === 'test') {
    return 'tests/config.yml'
  }
  return 'config.yml'
}

const formatIssues = (title: string, error: z.ZodError): string =>
  [title, ...error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)].join('\n')

/**
 * Write a config file built from MELCLOUD_* and LOGGING_* environment variables
 */
export function createConfigFromEnv(configPath: string, env: NodeJS.ProcessEnv = process.env): void {
  console.info('Config file not found. Creating from environment variables...')

  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(formatIssues('Environment variable validation failed:', parsed.error), {
      cause: parsed.error,
    })
  }
  const envConfig = parsed.data

  const content: AppConfig = {
    melcloud: {
      email: envConfig.MELCLOUD_EMAIL,
      password: envConfig.MELCLOUD_PASSWORD,
      baseUrl: envConfig.MELCLOUD_BASE_URL,
      pollInterval: envConfig.MELCLOUD_POLL_INTERVAL,
      debounceDelay: envConfig.MELCLOUD_DEBOUNCE_DELAY,
      requestSpacing: envConfig.MELCLOUD_REQUEST_SPACING,
      outdoorTemperatureTtl: envConfig.MELCLOUD_OUTDOOR_TEMPERATURE_TTL,
      telemetryTtl: envConfig.MELCLOUD_TELEMETRY_TTL,
      staleAfterFailures: envConfig.MELCLOUD_STALE_AFTER_FAILURES,
    },
    logging: {
      showChanges: envConfig.LOGGING_SHOW_CHANGES,
      ignoredKeys: envConfig.LOGGING_IGNORED_KEYS,
    },
  }

  fs.writeFileSync(configPath, yaml.stringify(content), 'utf8')
  console.info('Config file created successfully.')
}

/**
 * Validate a parsed YAML document and fill in the defaults
 */
export function parseConfig(raw: unknown): ResolvedConfig {
  const parsed = configSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(formatIssues('Configuration validation failed:', parsed.error), { cause: parsed.error })
  }
  const { melcloud, logging } = parsed.data

  return {
    email: melcloud.email,
    password: melcloud.password,
    baseUrl: melcloud.baseUrl ?? BASE_URL,
    pollIntervalMs: (melcloud.pollInterval ?? 60) * 1000,
    debounceMs: (melcloud.debounceDelay ?? 2) * 1000,
    requestSpacingMs: melcloud.requestSpacing ?? 500,
    outdoorTemperatureTtlMs: (melcloud.outdoorTemperatureTtl ?? 1800) * 1000,
    telemetryTtlMs: (melcloud.telemetryTtl ?? 300) * 1000,
    staleAfterFailures: melcloud.staleAfterFailures ?? 3,
    showChanges: logging?.showChanges ?? true,
    ignoredKeys: logging?.ignoredKeys ?? [],
  }
}

/**
 * Read the config file, creating it from the environment when it does not exist yet
 */
export function loadConfig(filename: string = getConfigFilename()): ResolvedConfig {
  const configPath = path.resolve(process.cwd(), filename)
  if (!fs.existsSync(configPath)) {
    createConfigFromEnv(configPath)
  }

  let raw: unknown
  try {
    raw = yaml.parse(fs.readFileSync(configPath, 'utf8'))
  } catch (error) {
    throw new ConfigError(`Could not read ${filename}`, { cause: error })
  }
  return parseConfig(raw)
}
