/**
 * Configuration
 *
 * Reads settings from the environment (after `dotenv` has loaded `.env`)
 * and validates them with zod.
 *
 * @module config
 */

import { config as loadDotenv } from 'dotenv'
import { z } from 'zod'
import { ConfigurationError } from '../errors'
import { LOG_LEVELS } from '../utils/logger'
import {
  DEFAULT_BODY_LIMIT_BYTES,
  DEFAULT_DB_PATH,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
} from '../constants'

/**
 * General information about the site, returned with every page payload
 */
export interface SiteMetadata {
  title: string
  description: string
}

export const DEFAULT_SITE: SiteMetadata = {
  title: 'Tiny Blog',
  description: 'A small blog backed by a single-file key-value store.',
}

const envSchema = z.object({
  BLOG_DB_PATH: z.string().min(1).default(DEFAULT_DB_PATH),
  HOST: z.string().min(1).default(DEFAULT_HOST),
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(DEFAULT_BODY_LIMIT_BYTES),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(DEFAULT_SHUTDOWN_TIMEOUT_MS),
  SITE_TITLE: z.string().default(DEFAULT_SITE.title),
  SITE_DESCRIPTION: z.string().default(DEFAULT_SITE.description),
})

/**
 * Resolved application configuration
 */
export interface BlogConfig {
  dbPath: string
  host: string
  port: number
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL']
  bodyLimitBytes: number
  shutdownTimeoutMs: number
  site: SiteMetadata
}

/**
 * Build the configuration from an environment map
 *
 * @throws ConfigurationError naming the first invalid variable
 */
export function parseConfig(env: Record<string, string | undefined>): BlogConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const issue = result.error.issues[0]
    const variable = issue?.path.join('.') ?? 'environment'
    throw new ConfigurationError(`Invalid ${variable}: ${issue?.message ?? 'unknown error'}`, {
      variable,
    })
  }

  const e = result.data
  return {
    dbPath: e.BLOG_DB_PATH,
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    bodyLimitBytes: e.BODY_LIMIT_BYTES,
    shutdownTimeoutMs: e.SHUTDOWN_TIMEOUT_MS,
    site: { title: e.SITE_TITLE, description: e.SITE_DESCRIPTION },
  }
}

/**
 * Load `.env` into `process.env` (existing variables win) and parse it
 */
export function loadConfig(): BlogConfig {
  loadDotenv()
  return parseConfig(process.env)
}
