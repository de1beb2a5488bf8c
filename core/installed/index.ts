/**
 * Installed packages per environment
 *
 * An environment is a chroot named by its suffix: `native`, `buildroot_<arch>`,
 * `rootfs_<device>` or `installer_<device>`.
 *
 * @module core/installed
 */

import { join } from 'node:path'
import type { IndexParser, InstalledIndex } from '../apkindex'
import type { ApkdepsConfig } from '../config'
import { ConfigError } from '../errors'

/**
 * Path of apk's installed database inside an environment.
 */
export function installedPath(config: ApkdepsConfig, environment: string): string {
  return join(config.work, `chroot_${environment}`, 'lib', 'apk', 'db', 'installed')
}

/**
 * Architecture packages are installed for in an environment.
 *
 * @throws ConfigError for an unknown environment, or a device environment
 *         without a configured device architecture
 */
export function archForEnvironment(config: ApkdepsConfig, environment: string): string {
  if (environment === 'native') {
    return config.nativeArch
  }

  if (environment.startsWith('buildroot_')) {
    const arch = environment.slice('buildroot_'.length)
    if (arch) return arch
  }

  if (environment.startsWith('rootfs_') || environment.startsWith('installer_')) {
    if (!config.deviceArch) {
      throw new ConfigError(`No device architecture configured for environment '${environment}'`, 'deviceArch')
    }
    return config.deviceArch
  }

  throw new ConfigError(`Invalid environment: ${environment}`, 'environment')
}

/**
 * Installed databases of the environments, parsed through the index
 * parser's cache.
 */
export class InstalledPackages {
  constructor(
    private config: ApkdepsConfig,
    private parser: IndexParser
  ) {}

  get(environment: string): InstalledIndex {
    return this.parser.parse(installedPath(this.config, environment), false)
  }
}
