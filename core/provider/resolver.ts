/**
 * Provider Resolver
 *
 * Finds every index record providing a package or capability name, and
 * picks one of them when several do.
 */

import type { IndexParser, InstalledIndex, PackageRecord } from '../apkindex'
import { PackageNotFoundError } from '../errors'
import { silentLogger, type Logger } from '../log'
import { compare, removeOperators } from '../version'
import type {
  IndexLocator,
  ProviderMap,
  ProvidersOptions,
  ResolveOneOptions,
} from './types'

export interface ProviderResolverOptions {
  parser: IndexParser
  locator: IndexLocator
  /** Architecture used when a call names none */
  nativeArch: string
  logger?: Logger
}

/**
 * Keep the providers with the highest provider_priority. Providers without
 * one count as -1, and only priorities of 0 or more are considered; when
 * none qualifies, all providers are returned.
 */
export function highestPriority(
  providers: ProviderMap,
  name: string,
  logger: Logger = silentLogger
): ProviderMap {
  let max = 0
  const ret = new Map<string, PackageRecord>()
  for (const [pkgname, provider] of providers) {
    const priority = provider.providerPriority ?? -1
    if (priority > max) {
      ret.clear()
      max = priority
    }
    if (priority === max) {
      ret.set(pkgname, provider)
    }
  }

  if (ret.size > 0) {
    logger.debug(`${name}: picked provider(s) with highest priority ${max}: ${[...ret.keys()].join(', ')}`)
    return ret
  }

  return providers
}

/**
 * Provider with the shortest pkgname, the first one on ties. apk itself
 * would refuse to choose here.
 *
 * @throws PackageNotFoundError on an empty map
 */
export function shortestProvider(
  providers: ProviderMap,
  name: string,
  logger: Logger = silentLogger
): PackageRecord {
  let best: PackageRecord | undefined
  for (const [pkgname, provider] of providers) {
    if (!best || pkgname.length < best.pkgname.length) {
      best = provider
    }
  }
  if (!best) {
    throw new PackageNotFoundError(name)
  }

  if (providers.size !== 1) {
    logger.debug(
      `${name}: has multiple providers (${[...providers.keys()].join(', ')}), picked shortest: ${best.pkgname}`
    )
  }
  return best
}

export class ProviderResolver {
  private parser: IndexParser
  private locator: IndexLocator
  private nativeArch: string
  private logger: Logger

  constructor(options: ProviderResolverOptions) {
    this.parser = options.parser
    this.locator = options.locator
    this.nativeArch = options.nativeArch
    this.logger = options.logger ?? silentLogger
  }

  /**
   * All providers of a package or capability across the indexes, in index
   * order. A provider found again in a later index replaces the earlier
   * record unless its version is lower.
   *
   * @throws PackageNotFoundError when nothing provides it and `mustExist`
   */
  providers(capability: string, options: ProvidersOptions = {}): Map<string, PackageRecord> {
    const { mustExist = true } = options
    const indexes = options.indexes && options.indexes.length > 0
      ? options.indexes
      : this.locator.files(options.arch ?? this.nativeArch)
    const name = removeOperators(capability)

    const ret = new Map<string, PackageRecord>()
    for (const path of indexes) {
      const found = this.parser.parse(path).get(name)
      if (!found) continue

      for (const [pkgname, provider] of found) {
        const last = ret.get(pkgname)
        if (last && compare(provider.version, last.version) === -1) {
          this.logger.verbose(
            `${name}: provided by: ${pkgname}-${provider.version} in ${path} (but ${last.version} is higher)`
          )
          continue
        }

        this.logger.verbose(`${name}: provided by: ${pkgname}-${provider.version} in ${path}`)
        ret.set(pkgname, provider)
      }
    }

    if (ret.size === 0 && mustExist) {
      this.logger.debug(`Searched in APKINDEX files: ${indexes.join(', ')}`)
      throw new PackageNotFoundError(name, [...indexes])
    }

    return ret
  }

  /**
   * Index record of a package: the provider of the same name, else the
   * provider with the shortest name.
   *
   * @returns null when nothing provides it and `mustExist` is false
   */
  package(name: string, options: ProvidersOptions = {}): PackageRecord | null {
    const { mustExist = true } = options
    const found = this.providers(name, options)
    const bare = removeOperators(name)

    const same = found.get(bare)
    if (same) return same

    if (found.size > 0) {
      return shortestProvider(found, bare, this.logger)
    }

    if (mustExist) {
      throw new PackageNotFoundError(bare)
    }
    return null
  }

  /**
   * Pick one provider for a capability. Rules, first match wins:
   *
   * 1. the only provider
   * 2. the provider named like the capability
   * 3. a provider that is about to be installed
   * 4. a provider that is already installed
   * 5. the provider selected in `overrides`
   * 6. the single provider with the highest provider_priority
   * 7. the provider with the shortest name
   *
   * @returns null when nothing provides the capability
   */
  resolveOne(capability: string, options: ResolveOneOptions = {}): PackageRecord | null {
    const name = removeOperators(capability)
    const providers = this.providers(name, { indexes: options.indexes, arch: options.arch, mustExist: false })

    if (providers.size === 0) return null

    this.logger.verbose(`${name}: provided by: ${[...providers.keys()].join(', ')}`)
    if (providers.size === 1) {
      return providers.values().next().value ?? null
    }

    const same = providers.get(name)
    if (same) {
      this.logger.verbose(`${name}: choosing package of the same name as provider`)
      return same
    }

    const install = options.install
    if (install) {
      for (const [pkgname, provider] of providers) {
        if (install.has(pkgname)) {
          this.logger.verbose(`${name}: choosing provider '${pkgname}', because it will be installed anyway`)
          return provider
        }
      }
    }

    const installed = readInstalled(options.installed)
    for (const [pkgname, provider] of providers) {
      if (installed.has(pkgname)) {
        this.logger.verbose(`${name}: choosing provider '${pkgname}', because it is installed already`)
        return provider
      }
    }

    const selected = options.overrides?.[name]
    const override = selected === undefined ? undefined : providers.get(selected)
    if (override) {
      this.logger.verbose(`${name}: choosing provider '${override.pkgname}', because it was explicitly selected.`)
      return override
    }

    const prioritized = highestPriority(providers, name, this.logger)
    if (prioritized.size === 1) {
      return prioritized.values().next().value ?? null
    }

    return shortestProvider(prioritized, name, this.logger)
  }
}

function readInstalled(installed: ResolveOneOptions['installed']): InstalledIndex {
  if (installed === undefined) return new Map()
  return typeof installed === 'function' ? installed() : installed
}
