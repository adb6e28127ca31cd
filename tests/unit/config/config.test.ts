/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest'
import { ConfigurationError, defineConfig, loadConfigFromEnv, noopLogger, resolveConfig } from '../../../src'

describe('resolveConfig', () => {
  it('applies defaults', () => {
    const config = resolveConfig()
    expect(config).toMatchObject({
      logLevel: 'silent',
      strictSchema: false,
      clusterName: 'Test Cluster',
      dataCenter: 'datacenter1',
      rack: 'rack1',
      rpcAddress: '127.0.0.1',
      releaseVersion: '4.0.0',
    })
    expect(config.defaultKeyspace).toBeUndefined()
    expect(config.logger).toBeUndefined()
    expect(config.clock).toBe(Date.now)
  })

  it('keeps the clock and logger it is given', () => {
    const clock = (): number => 42
    const config = resolveConfig({ clock, logger: noopLogger, strictSchema: true })
    expect(config.clock()).toBe(42)
    expect(config.logger).toBe(noopLogger)
    expect(config.strictSchema).toBe(true)
  })

  it('lists every invalid field', () => {
    try {
      resolveConfig({ clusterName: '', rpcAddress: 'localhost' })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConfigurationError) {
        expect(error.message).toMatch(/^Invalid configuration: /)
        expect(error.message).toContain('clusterName: ')
        expect(error.message).toContain('rpcAddress: ')
      }
    }
  })
})

describe('defineConfig', () => {
  it('returns the configuration unchanged', () => {
    const config = { defaultKeyspace: 'app', logLevel: 'debug' as const }
    expect(defineConfig(config)).toBe(config)
  })
})

describe('loadConfigFromEnv', () => {
  it('reads MEMCQL_* variables', () => {
    expect(loadConfigFromEnv({
      MEMCQL_DEFAULT_KEYSPACE: 'app',
      MEMCQL_LOG_LEVEL: 'WARN',
      MEMCQL_STRICT_SCHEMA: 'yes',
      MEMCQL_CLUSTER_NAME: 'Dev',
      MEMCQL_DATA_CENTER: 'dc2',
      MEMCQL_RACK: 'r7',
      MEMCQL_RPC_ADDRESS: '10.0.0.5',
      MEMCQL_RELEASE_VERSION: '5.0.1',
    })).toEqual({
      defaultKeyspace: 'app',
      logLevel: 'warn',
      strictSchema: true,
      clusterName: 'Dev',
      dataCenter: 'dc2',
      rack: 'r7',
      rpcAddress: '10.0.0.5',
      releaseVersion: '5.0.1',
    })
  })

  it('leaves unset and empty variables out', () => {
    expect(loadConfigFromEnv({ MEMCQL_CLUSTER_NAME: '' })).toEqual({})
  })

  it('reads an empty boolean as false', () => {
    expect(loadConfigFromEnv({ MEMCQL_STRICT_SCHEMA: '' })).toEqual({ strictSchema: false })
  })

  it('rejects malformed values', () => {
    expect(() => loadConfigFromEnv({ MEMCQL_STRICT_SCHEMA: 'maybe' })).toThrow(
      "MEMCQL_STRICT_SCHEMA must be a boolean, got 'maybe'"
    )
    expect(() => loadConfigFromEnv({ MEMCQL_LOG_LEVEL: 'loud' })).toThrow(
      "MEMCQL_LOG_LEVEL must be one of debug, info, warn, error, silent, got 'loud'"
    )
  })

  it('produces input for resolveConfig', () => {
    const config = resolveConfig(loadConfigFromEnv({ MEMCQL_RACK: 'r2' }))
    expect(config.rack).toBe('r2')
    expect(config.clusterName).toBe('Test Cluster')
  })
})
