/**
 * Engine configuration
 *
 * Defaults mirror a stock bootstrapper work directory. Every key can be
 * overridden by `APKDEPS_*` environment variables or by explicit overrides,
 * which win over the environment.
 *
 * @module core/config
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { ConfigError } from '../errors'
import { isLogLevel, type LogLevel } from '../log'

export interface ApkdepsConfig {
  /** Work directory holding chroots, package caches and local repositories */
  work: string
  /** Local recipe tree (pmaports checkout) */
  aports: string
  /** Release channel, names the local repository directory */
  channel: string
  /** Alpine mirror base URL, ending in a slash */
  mirrorAlpine: string
  /** postmarketOS mirror base URLs, each ending in a slash */
  mirrorsPostmarketos: string[]
  /** Alpine mirror directory of the channel ("edge", "v3.19", ...) */
  mirrordirAlpine: string
  /** postmarketOS branch of the channel ("master", "v23.12", ...) */
  branchPmaports: string
  /** Architecture of the `native` environment */
  nativeArch: string
  /** Architecture of the device environments (`rootfs_*`, `installer_*`) */
  deviceArch: string | null
  /** Explicit provider picks: capability -> provider pkgname */
  selectedProviders: Record<string, string>
  logLevel: LogLevel
}

export type ConfigOverrides = Partial<ApkdepsConfig>

/**
 * Architectures devices are built for, in the order a package lookup
 * falls back to them
 */
export const BUILD_DEVICE_ARCHES: readonly string[] = ['armhf', 'armv7', 'aarch64', 'x86_64', 'x86', 'riscv64']

const NODE_TO_APK_ARCH: Record<string, string> = {
  x64: 'x86_64',
  ia32: 'x86',
  arm64: 'aarch64',
  arm: 'armv7',
  riscv64: 'riscv64',
  ppc64: 'ppc64le',
  s390x: 's390x',
}

export function defaultConfig(): ApkdepsConfig {
  const work = join(homedir(), '.local', 'var', 'pmbootstrap')
  return {
    work,
    aports: join(work, 'cache_git', 'pmaports'),
    channel: 'edge',
    mirrorAlpine: 'http://dl-cdn.alpinelinux.org/alpine/',
    mirrorsPostmarketos: ['http://mirror.postmarketos.org/postmarketos/'],
    mirrordirAlpine: 'edge',
    branchPmaports: 'master',
    nativeArch: NODE_TO_APK_ARCH[process.arch] ?? process.arch,
    deviceArch: null,
    selectedProviders: {},
    logLevel: 'info',
  }
}

/**
 * Parse `APKDEPS_SELECTED_PROVIDERS`: comma separated `capability=provider`
 */
export function parseSelectedProviders(value: string): Record<string, string> {
  const ret: Record<string, string> = {}
  for (const entry of value.split(',')) {
    const trimmed = entry.trim()
    if (!trimmed) continue
    const eq = trimmed.indexOf('=')
    if (eq <= 0 || eq === trimmed.length - 1) {
      throw new ConfigError(
        `Invalid provider selection '${trimmed}', expected capability=provider`,
        'selectedProviders'
      )
    }
    ret[trimmed.slice(0, eq)] = trimmed.slice(eq + 1)
  }
  return ret
}

function fromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const ret: ConfigOverrides = {}
  if (env.APKDEPS_WORK) ret.work = env.APKDEPS_WORK
  if (env.APKDEPS_APORTS) ret.aports = env.APKDEPS_APORTS
  if (env.APKDEPS_CHANNEL) ret.channel = env.APKDEPS_CHANNEL
  if (env.APKDEPS_MIRROR_ALPINE) ret.mirrorAlpine = env.APKDEPS_MIRROR_ALPINE
  if (env.APKDEPS_MIRRORS_POSTMARKETOS !== undefined) {
    ret.mirrorsPostmarketos = env.APKDEPS_MIRRORS_POSTMARKETOS
      .split(',')
      .map((m) => m.trim())
      .filter((m) => m.length > 0)
  }
  if (env.APKDEPS_MIRRORDIR_ALPINE) ret.mirrordirAlpine = env.APKDEPS_MIRRORDIR_ALPINE
  if (env.APKDEPS_BRANCH_PMAPORTS) ret.branchPmaports = env.APKDEPS_BRANCH_PMAPORTS
  if (env.APKDEPS_ARCH) ret.nativeArch = env.APKDEPS_ARCH
  if (env.APKDEPS_DEVICE_ARCH) ret.deviceArch = env.APKDEPS_DEVICE_ARCH
  if (env.APKDEPS_SELECTED_PROVIDERS) {
    ret.selectedProviders = parseSelectedProviders(env.APKDEPS_SELECTED_PROVIDERS)
  }
  if (env.APKDEPS_LOG_LEVEL) {
    const level = env.APKDEPS_LOG_LEVEL
    if (!isLogLevel(level)) {
      throw new ConfigError(`Invalid log level '${level}'`, 'logLevel')
    }
    ret.logLevel = level
  }
  return ret
}

function validate(config: ApkdepsConfig): void {
  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(`Invalid log level '${config.logLevel}'`, 'logLevel')
  }
  const urls = [config.mirrorAlpine, ...config.mirrorsPostmarketos]
  for (const url of urls) {
    if (!url.endsWith('/')) {
      throw new ConfigError(`Mirror URL must end with a slash: ${url}`, 'mirrors')
    }
  }
  if (!config.nativeArch) {
    throw new ConfigError('Native architecture is empty', 'nativeArch')
  }
}

/**
 * Build the effective configuration: defaults, then environment, then
 * explicit overrides.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ApkdepsConfig {
  const base = defaultConfig()
  const envOverrides = fromEnv(env)
  const merged: ApkdepsConfig = { ...base, ...envOverrides, ...overrides }

  // aports follows a relocated work dir unless set explicitly
  if (!envOverrides.aports && !overrides.aports && merged.work !== base.work) {
    merged.aports = join(merged.work, 'cache_git', 'pmaports')
  }

  validate(merged)
  return merged
}
