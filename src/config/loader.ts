/**
 * Configuration Loader
 *
 * Validates emulator configuration with zod and reads `MEMCQL_*`
 * environment variables.
 */

import { z } from 'zod'
import { ConfigurationError } from '../errors'
import { LOG_LEVELS, type Logger } from '../utils/logger'

// =============================================================================
// Schema
// =============================================================================

const logLevelSchema = z.enum(LOG_LEVELS)

const identifierSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain identifier')

export const configSchema = z.object({
  defaultKeyspace: identifierSchema.optional(),
  logLevel: logLevelSchema.default('silent'),
  strictSchema: z.boolean().default(false),
  clusterName: z.string().min(1).default('Test Cluster'),
  dataCenter: z.string().min(1).default('datacenter1'),
  rack: z.string().min(1).default('rack1'),
  rpcAddress: z.string().ip().default('127.0.0.1'),
  releaseVersion: z.string().min(1).default('4.0.0'),
})

// =============================================================================
// Types
// =============================================================================

/**
 * Emulator configuration as written by callers
 */
export type MemCQLConfig = z.input<typeof configSchema> & {
  /** Wall clock in milliseconds; drives TTL expiry and default write timestamps */
  clock?: (() => number) | undefined
  /** Logger to use instead of the console logger selected by `logLevel` */
  logger?: Logger | undefined
}

/**
 * Configuration with every default applied
 */
export type ResolvedConfig = z.output<typeof configSchema> & {
  clock: () => number
  logger?: Logger | undefined
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Define configuration with type safety
 *
 * @example
 * ```typescript
 * import { defineConfig, MemCQL } from 'memcql'
 *
 * const config = defineConfig({ defaultKeyspace: 'app', logLevel: 'debug' })
 * const db = new MemCQL(config)
 * ```
 */
export function defineConfig(config: MemCQLConfig): MemCQLConfig {
  return config
}

/**
 * Apply defaults and validate a configuration object
 */
export function resolveConfig(config: MemCQLConfig = {}): ResolvedConfig {
  const { clock, logger, ...rest } = config
  const parsed = configSchema.safeParse(rest)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues })
  }
  return { ...parsed.data, clock: clock ?? Date.now, logger }
}

const ENV_KEYS = {
  defaultKeyspace: 'MEMCQL_DEFAULT_KEYSPACE',
  logLevel: 'MEMCQL_LOG_LEVEL',
  strictSchema: 'MEMCQL_STRICT_SCHEMA',
  clusterName: 'MEMCQL_CLUSTER_NAME',
  dataCenter: 'MEMCQL_DATA_CENTER',
  rack: 'MEMCQL_RACK',
  rpcAddress: 'MEMCQL_RPC_ADDRESS',
  releaseVersion: 'MEMCQL_RELEASE_VERSION',
} as const

function parseBooleanEnv(name: string, raw: string): boolean {
  const lowered = raw.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(lowered)) return true
  if (['0', 'false', 'no', 'off', ''].includes(lowered)) return false
  throw new ConfigurationError(`${name} must be a boolean, got '${raw}'`, { variable: name })
}

/**
 * Build a configuration from `MEMCQL_*` environment variables.
 * Unset variables are left out so that defaults apply.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MemCQLConfig {
  const config: MemCQLConfig = {}

  const read = (key: keyof typeof ENV_KEYS): string | undefined => {
    const value = env[ENV_KEYS[key]]
    return value === undefined || value === '' ? undefined : value
  }

  const defaultKeyspace = read('defaultKeyspace')
  if (defaultKeyspace !== undefined) config.defaultKeyspace = defaultKeyspace

  const logLevel = read('logLevel')
  if (logLevel !== undefined) {
    const level = logLevelSchema.safeParse(logLevel.toLowerCase())
    if (!level.success) {
      throw new ConfigurationError(
        `${ENV_KEYS.logLevel} must be one of ${LOG_LEVELS.join(', ')}, got '${logLevel}'`,
        { variable: ENV_KEYS.logLevel }
      )
    }
    config.logLevel = level.data
  }

  const strictSchema = env[ENV_KEYS.strictSchema]
  if (strictSchema !== undefined) {
    config.strictSchema = parseBooleanEnv(ENV_KEYS.strictSchema, strictSchema)
  }

  const clusterName = read('clusterName')
  if (clusterName !== undefined) config.clusterName = clusterName
  const dataCenter = read('dataCenter')
  if (dataCenter !== undefined) config.dataCenter = dataCenter
  const rack = read('rack')
  if (rack !== undefined) config.rack = rack
  const rpcAddress = read('rpcAddress')
  if (rpcAddress !== undefined) config.rpcAddress = rpcAddress
  const releaseVersion = read('releaseVersion')
  if (releaseVersion !== undefined) config.releaseVersion = releaseVersion

  return config
}
