/**
 * Configuration tests
 */

import { describe, it, expect } from 'vitest'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { defaultConfig, parseSelectedProviders, resolveConfig } from '../../../core/config'
import { ConfigError } from '../../../core/errors'

describe('defaultConfig', () => {
  it('should point at a stock work directory', () => {
    const config = defaultConfig()
    const work = join(homedir(), '.local', 'var', 'pmbootstrap')

    expect(config.work).toBe(work)
    expect(config.aports).toBe(join(work, 'cache_git', 'pmaports'))
    expect(config.channel).toBe('edge')
    expect(config.deviceArch).toBeNull()
    expect(config.selectedProviders).toEqual({})
    expect(config.logLevel).toBe('info')
  })
})

describe('resolveConfig', () => {
  it('should read the environment', () => {
    const config = resolveConfig(
      {},
      {
        APKDEPS_WORK: '/srv/work',
        APKDEPS_ARCH: 'aarch64',
        APKDEPS_DEVICE_ARCH: 'armv7',
        APKDEPS_MIRRORS_POSTMARKETOS: 'http://a.test/pmos/, http://b.test/pmos/',
        APKDEPS_SELECTED_PROVIDERS: 'so:libEGL.so.1=libhybris',
        APKDEPS_LOG_LEVEL: 'debug',
      }
    )

    expect(config.work).toBe('/srv/work')
    expect(config.nativeArch).toBe('aarch64')
    expect(config.deviceArch).toBe('armv7')
    expect(config.mirrorsPostmarketos).toEqual(['http://a.test/pmos/', 'http://b.test/pmos/'])
    expect(config.selectedProviders).toEqual({ 'so:libEGL.so.1': 'libhybris' })
    expect(config.logLevel).toBe('debug')
  })

  it('should let overrides win over the environment', () => {
    const config = resolveConfig({ work: '/override' }, { APKDEPS_WORK: '/env' })
    expect(config.work).toBe('/override')
  })

  it('should move aports along with the work directory', () => {
    expect(resolveConfig({ work: '/w' }, {}).aports).toBe('/w/cache_git/pmaports')
  })

  it('should keep an explicit aports directory', () => {
    expect(resolveConfig({ work: '/w', aports: '/src/pmaports' }, {}).aports).toBe('/src/pmaports')
    expect(resolveConfig({ work: '/w' }, { APKDEPS_APORTS: '/env/pmaports' }).aports).toBe('/env/pmaports')
  })

  it('should allow an empty postmarketOS mirror list', () => {
    expect(resolveConfig({}, { APKDEPS_MIRRORS_POSTMARKETOS: '' }).mirrorsPostmarketos).toEqual([])
  })

  it('should reject an unknown log level', () => {
    expect(() => resolveConfig({}, { APKDEPS_LOG_LEVEL: 'loud' })).toThrow(ConfigError)
    expect(() => resolveConfig({}, { APKDEPS_LOG_LEVEL: 'loud' })).toThrow("Invalid log level 'loud'")
  })

  it('should reject a mirror without trailing slash', () => {
    expect(() => resolveConfig({ mirrorAlpine: 'http://mirror.test/alpine' }, {})).toThrow(
      'Mirror URL must end with a slash: http://mirror.test/alpine'
    )
  })

  it('should reject an empty native architecture', () => {
    expect(() => resolveConfig({ nativeArch: '' }, {})).toThrow('Native architecture is empty')
  })
})

describe('parseSelectedProviders', () => {
  it('should read comma separated pairs', () => {
    expect(parseSelectedProviders('a=b, so:libGL.so.1=mesa-gl,')).toEqual({ a: 'b', 'so:libGL.so.1': 'mesa-gl' })
  })

  it('should reject an entry without provider', () => {
    expect(() => parseSelectedProviders('a=')).toThrow("Invalid provider selection 'a=', expected capability=provider")
    expect(() => parseSelectedProviders('lonely')).toThrow(ConfigError)
  })
})
