/**
 * Repository locations
 *
 * Where apk keeps the index of each configured repository for an
 * architecture.
 *
 * @module core/repo
 */

import { createHash } from 'node:crypto'
import { join } from 'node:path'
import type { ApkdepsConfig } from '../config'
import { silentLogger, type Logger } from '../log'
import type { IndexLocator } from '../provider'

/** Local repository of self-built packages, as seen inside a chroot */
export const USER_REPOSITORY = '/mnt/pmbootstrap/packages'

const HASH_DIGITS = '0123456789abcdefghijklmnopqrstuvwxyz'

export interface RepositorySelection {
  /** @default true */
  user?: boolean
  /** @default true */
  postmarketos?: boolean
  /** @default true */
  alpine?: boolean
}

/**
 * Hash apk puts into cached index file names, the "12345678" in
 * "APKINDEX.12345678.tar.gz": hex digits of the first bytes of the sha1 of
 * the repository URL.
 */
export function repositoryHash(url: string, length = 8): string {
  const digest = createHash('sha1').update(url, 'utf8').digest()
  let ret = ''
  for (let i = 0; i < Math.floor(length / 2); i++) {
    const byte = digest[i] ?? 0
    ret += HASH_DIGITS.charAt((byte >> 4) & 0xf)
    ret += HASH_DIGITS.charAt(byte & 0xf)
  }
  return ret
}

/**
 * Repository URLs in the order of /etc/apk/repositories.
 */
export function repositoryUrls(
  config: ApkdepsConfig,
  selection: RepositorySelection = {},
  logger: Logger = silentLogger
): string[] {
  const { user = true, postmarketos = true, alpine = true } = selection
  const ret: string[] = []

  if (user) {
    ret.push(USER_REPOSITORY)
  }

  if (postmarketos) {
    for (let mirror of config.mirrorsPostmarketos) {
      if (mirror.endsWith('/master')) {
        logger.warn("WARNING: 'master' at the end of the postmarketOS mirror is deprecated, the branch gets added automatically now!")
        mirror = mirror.slice(0, -'master'.length)
      }
      ret.push(`${mirror}${config.branchPmaports}`)
    }
  }

  if (alpine) {
    const directories = ['main', 'community']
    if (config.mirrordirAlpine === 'edge') {
      directories.push('testing')
    }
    for (const dir of directories) {
      ret.push(`${config.mirrorAlpine}${config.mirrordirAlpine}/${dir}`)
    }
  }

  return ret
}

/**
 * APKINDEX.tar.gz paths for an architecture: the local repository first,
 * then apk's cached index of every remote repository.
 */
export function apkindexFiles(
  config: ApkdepsConfig,
  arch: string = config.nativeArch,
  selection: RepositorySelection = {}
): string[] {
  const ret: string[] = []
  if (selection.user ?? true) {
    ret.push(join(config.work, 'packages', config.channel, arch, 'APKINDEX.tar.gz'))
  }

  for (const url of repositoryUrls(config, { ...selection, user: false })) {
    ret.push(join(config.work, `cache_apk_${arch}`, `APKINDEX.${repositoryHash(url)}.tar.gz`))
  }
  return ret
}

/**
 * Index locator over the configured repositories.
 */
export class RepositoryIndexes implements IndexLocator {
  constructor(
    private config: ApkdepsConfig,
    private selection: RepositorySelection = {}
  ) {}

  files(arch: string): string[] {
    return apkindexFiles(this.config, arch, this.selection)
  }
}
