/**
 * memcql Configuration
 */

export {
  configSchema,
  defineConfig,
  resolveConfig,
  loadConfigFromEnv,
  type MemCQLConfig,
  type ResolvedConfig,
} from './loader'
