/**
 * Output formatting utilities for CLI
 */

import type { InstalledIndex, PackageRecord, ProviderIndex } from '../../core/apkindex'
import type { PackageInfo } from '../../core/depends'
import type { FormatOptions } from '../types'

/**
 * "pkgname-version"
 */
export function formatRecord(record: PackageRecord): string {
  return `${record.pkgname}-${record.version}`
}

/**
 * Providers of one name, one per line
 */
export function formatProviders(providers: ReadonlyMap<string, PackageRecord>, options?: FormatOptions): string {
  if (options?.json) {
    return JSON.stringify([...providers.values()], null, 2)
  }

  if (providers.size === 0) {
    return '(none)'
  }

  return [...providers.values()]
    .map((p) => {
      const priority = p.providerPriority !== undefined ? ` (priority ${p.providerPriority})` : ''
      return `${formatRecord(p)} [${p.arch}]${priority}`
    })
    .join('\n')
}

/**
 * Repository view: "capability: provider-version, ..."
 */
export function formatProviderIndex(view: ProviderIndex, options?: FormatOptions): string {
  if (options?.json) {
    const out: Record<string, Record<string, PackageRecord>> = {}
    for (const [capability, providers] of view) {
      out[capability] = Object.fromEntries(providers)
    }
    return JSON.stringify(out, null, 2)
  }

  if (view.size === 0) {
    return '(empty)'
  }

  return [...view]
    .map(([capability, providers]) => `${capability}: ${[...providers.values()].map(formatRecord).join(', ')}`)
    .join('\n')
}

/**
 * Installed view: "capability: pkgname-version"
 */
export function formatInstalledIndex(view: InstalledIndex, options?: FormatOptions): string {
  if (options?.json) {
    return JSON.stringify(Object.fromEntries(view), null, 2)
  }

  if (view.size === 0) {
    return '(empty)'
  }

  return [...view].map(([capability, record]) => `${capability}: ${formatRecord(record)}`).join('\n')
}

/**
 * Package lookup result: "pkgname-version [arches]", then its depends
 * and provides when it has any
 */
export function formatPackageInfo(info: PackageInfo, options?: FormatOptions): string {
  if (options?.json) {
    return JSON.stringify(info, null, 2)
  }

  const lines = [`${info.pkgname}-${info.version} [${info.arch.join(' ')}]`]
  if (info.depends.length > 0) lines.push(`depends: ${info.depends.join(' ')}`)
  if (info.provides.length > 0) lines.push(`provides: ${info.provides.join(' ')}`)
  return lines.join('\n')
}

/**
 * Resolved dependency list
 */
export function formatDepends(names: string[], options?: FormatOptions): string {
  if (options?.json) {
    return JSON.stringify(names, null, 2)
  }
  return names.length === 0 ? '(none)' : names.join('\n')
}
