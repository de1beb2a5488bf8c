/**
 * ProviderResolver tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import type { InstalledIndex } from '../../../core/apkindex'
import { PackageNotFoundError } from '../../../core/errors'
import { createLogger } from '../../../core/log'
import { ProviderResolver, highestPriority, shortestProvider } from '../../../core/provider'
import { MemoryFiles, StaticLocator, captureLines, index, record } from '../../helpers/memory-index'

const MAIN = '/work/cache_apk_aarch64/APKINDEX.main.tar.gz'
const PMOS = '/work/cache_apk_aarch64/APKINDEX.pmos.tar.gz'
const X86 = '/work/cache_apk_x86_64/APKINDEX.main.tar.gz'

describe('ProviderResolver', () => {
  let fs: MemoryFiles
  let lines: string[]
  let resolver: ProviderResolver

  beforeEach(() => {
    fs = new MemoryFiles()
    fs.write(
      MAIN,
      index(
        { P: 'only-one', V: '1.0-r0', A: 'aarch64', p: 'cmd:only' },
        { P: 'mesa-egl', V: '24.0-r0', A: 'aarch64', p: 'so:libEGL.so.1=1.0' },
        { P: 'libhybris', V: '0.1-r0', A: 'aarch64', p: 'so:libEGL.so.1=1.0' },
        { P: 'mkinitfs', V: '2.0-r0', A: 'aarch64' },
        { P: 'mkinitfs-alt', V: '1.0-r0', A: 'aarch64', p: 'mkinitfs' },
        { P: 'ui-a', V: '1-r0', A: 'noarch', p: 'pmos-ui', k: '10' },
        { P: 'ui-b', V: '1-r0', A: 'noarch', p: 'pmos-ui', k: '20' },
        { P: 'ui-c', V: '1-r0', A: 'noarch', p: 'pmos-ui' },
        { P: 'tie-long-name', V: '1-r0', A: 'noarch', p: 'pmos-tie', k: '5' },
        { P: 'tie-b', V: '1-r0', A: 'noarch', p: 'pmos-tie', k: '5' },
        { P: 'foo', V: '1.0-r0', A: 'aarch64' }
      )
    )
    fs.write(
      PMOS,
      index(
        { P: 'foo', V: '2.0-r0', A: 'aarch64' },
        { P: 'mesa-egl', V: '23.0-r0', A: 'aarch64', p: 'so:libEGL.so.1' }
      )
    )
    fs.write(X86, index({ P: 'foo', V: '9.0-r0' }))

    const capture = captureLines()
    lines = capture.lines
    const logger = createLogger({ level: 'verbose', sink: capture.sink })
    resolver = new ProviderResolver({
      parser: fs.parser(),
      locator: new StaticLocator({ aarch64: [MAIN, PMOS], x86_64: [X86] }),
      nativeArch: 'aarch64',
      logger,
    })
  })

  describe('providers', () => {
    it('should take the higher version found in a later index', () => {
      expect(resolver.providers('foo').get('foo')?.version).toBe('2.0-r0')
    })

    it('should keep the higher version found in an earlier index', () => {
      const found = resolver.providers('so:libEGL.so.1')
      expect(found.get('mesa-egl')?.version).toBe('24.0-r0')
      expect(lines).toContain(
        `[apkdeps] VERBOSE so:libEGL.so.1: provided by: mesa-egl-23.0-r0 in ${PMOS} (but 24.0-r0 is higher)`
      )
    })

    it('should list providers in index order', () => {
      expect([...resolver.providers('pmos-ui').keys()]).toEqual(['ui-a', 'ui-b', 'ui-c'])
    })

    it('should strip a version constraint from the name', () => {
      expect([...resolver.providers('so:libEGL.so.1>=1.0').keys()]).toEqual(['mesa-egl', 'libhybris'])
    })

    it('should search the indexes of another architecture', () => {
      expect(resolver.providers('foo', { arch: 'x86_64' }).get('foo')?.version).toBe('9.0-r0')
    })

    it('should search explicit indexes', () => {
      expect(resolver.providers('foo', { indexes: [MAIN] }).get('foo')?.version).toBe('1.0-r0')
    })

    it('should throw when nothing provides the name', () => {
      const find = () => resolver.providers('nope')
      expect(find).toThrow(PackageNotFoundError)
      expect(find).toThrow(`Could not find package 'nope' in: ${MAIN}, ${PMOS}`)
      expect(lines).toContain(`[apkdeps] DEBUG Searched in APKINDEX files: ${MAIN}, ${PMOS}`)
    })

    it('should return an empty map when the name need not exist', () => {
      expect(resolver.providers('nope', { mustExist: false }).size).toBe(0)
    })
  })

  describe('package', () => {
    it('should prefer the package of the same name', () => {
      expect(resolver.package('mkinitfs')?.pkgname).toBe('mkinitfs')
    })

    it('should fall back to the shortest provider', () => {
      expect(resolver.package('pmos-ui')?.pkgname).toBe('ui-a')
    })

    it('should return null when the package need not exist', () => {
      expect(resolver.package('nope', { mustExist: false })).toBeNull()
    })

    it('should throw when the package must exist', () => {
      expect(() => resolver.package('nope')).toThrow(PackageNotFoundError)
    })
  })

  describe('resolveOne', () => {
    const libEGL = 'so:libEGL.so.1'

    it('should return null when nothing provides the name', () => {
      expect(resolver.resolveOne('nope')).toBeNull()
    })

    it('should take the only provider', () => {
      expect(resolver.resolveOne('cmd:only')?.pkgname).toBe('only-one')
    })

    it('should prefer the package of the same name', () => {
      const pick = resolver.resolveOne('mkinitfs', { install: new Set(['mkinitfs-alt']) })
      expect(pick?.pkgname).toBe('mkinitfs')
    })

    it('should prefer a provider about to be installed', () => {
      const installed = vi.fn((): InstalledIndex => new Map())
      const pick = resolver.resolveOne(libEGL, { install: new Set(['libhybris']), installed })

      expect(pick?.pkgname).toBe('libhybris')
      expect(installed).not.toHaveBeenCalled()
      expect(lines).toContain(
        `[apkdeps] VERBOSE ${libEGL}: choosing provider 'libhybris', because it will be installed anyway`
      )
    })

    it('should prefer an installed provider', () => {
      const installed = new Map([['libhybris', record('libhybris', '0.1-r0')]])
      expect(resolver.resolveOne(libEGL, { installed })?.pkgname).toBe('libhybris')
    })

    it('should read the installed database on demand', () => {
      const installed = vi.fn((): InstalledIndex => new Map([['libhybris', record('libhybris', '0.1-r0')]]))
      expect(resolver.resolveOne(libEGL, { installed })?.pkgname).toBe('libhybris')
      expect(installed).toHaveBeenCalledTimes(1)
    })

    it('should rank the install list above the installed database', () => {
      const pick = resolver.resolveOne(libEGL, {
        install: new Set(['mesa-egl']),
        installed: new Map([['libhybris', record('libhybris', '0.1-r0')]]),
      })
      expect(pick?.pkgname).toBe('mesa-egl')
    })

    it('should honor an explicit selection', () => {
      const pick = resolver.resolveOne(libEGL, { overrides: { [libEGL]: 'libhybris' } })
      expect(pick?.pkgname).toBe('libhybris')
      expect(lines).toContain(
        `[apkdeps] VERBOSE ${libEGL}: choosing provider 'libhybris', because it was explicitly selected.`
      )
    })

    it('should rank the installed database above an explicit selection', () => {
      const pick = resolver.resolveOne(libEGL, {
        installed: new Map([['mesa-egl', record('mesa-egl', '24.0-r0')]]),
        overrides: { [libEGL]: 'libhybris' },
      })
      expect(pick?.pkgname).toBe('mesa-egl')
    })

    it('should ignore a selection that does not provide the name', () => {
      const pick = resolver.resolveOne(libEGL, { overrides: { [libEGL]: 'swiftshader' } })
      expect(pick?.pkgname).toBe('mesa-egl')
    })

    it('should take the single provider with the highest priority', () => {
      expect(resolver.resolveOne('pmos-ui')?.pkgname).toBe('ui-b')
    })

    it('should take the shortest name among equal priorities', () => {
      expect(resolver.resolveOne('pmos-tie')?.pkgname).toBe('tie-b')
    })

    it('should take the shortest name without priorities', () => {
      expect(resolver.resolveOne(libEGL)?.pkgname).toBe('mesa-egl')
    })

    it('should accept a version constraint', () => {
      expect(resolver.resolveOne('so:libEGL.so.1>=1.0', { install: new Set(['libhybris']) })?.pkgname).toBe(
        'libhybris'
      )
    })
  })
})

describe('highestPriority', () => {
  it('should keep the providers with the highest priority', () => {
    const capture = captureLines()
    const providers = new Map([
      ['ui-a', record('ui-a', '1', { providerPriority: 10 })],
      ['ui-b', record('ui-b', '1', { providerPriority: 20 })],
      ['ui-c', record('ui-c', '1')],
    ])

    const ret = highestPriority(providers, 'pmos-ui', createLogger({ level: 'debug', sink: capture.sink }))
    expect([...ret.keys()]).toEqual(['ui-b'])
    expect(capture.lines).toEqual(['[apkdeps] DEBUG pmos-ui: picked provider(s) with highest priority 20: ui-b'])
  })

  it('should count a priority of zero', () => {
    const providers = new Map([
      ['a', record('a', '1', { providerPriority: 0 })],
      ['b', record('b', '1')],
    ])
    expect([...highestPriority(providers, 'x').keys()]).toEqual(['a'])
  })

  it('should return every provider when none has a priority', () => {
    const providers = new Map([
      ['a', record('a', '1')],
      ['b', record('b', '1', { providerPriority: -5 })],
    ])
    expect(highestPriority(providers, 'x')).toBe(providers)
  })
})

describe('shortestProvider', () => {
  it('should take the shortest name, the first one on ties', () => {
    const providers = new Map([
      ['longer', record('longer', '1')],
      ['ab', record('ab', '1')],
      ['cd', record('cd', '1')],
    ])
    expect(shortestProvider(providers, 'x').pkgname).toBe('ab')
  })

  it('should log only when there is a choice', () => {
    const capture = captureLines()
    const logger = createLogger({ level: 'debug', sink: capture.sink })

    shortestProvider(new Map([['a', record('a', '1')]]), 'x', logger)
    expect(capture.lines).toEqual([])

    shortestProvider(new Map([['bb', record('bb', '1')], ['a', record('a', '1')]]), 'x', logger)
    expect(capture.lines).toEqual(['[apkdeps] DEBUG x: has multiple providers (bb, a), picked shortest: a'])
  })

  it('should throw on an empty map', () => {
    expect(() => shortestProvider(new Map(), 'x')).toThrow(PackageNotFoundError)
  })
})
