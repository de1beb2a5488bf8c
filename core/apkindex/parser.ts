/**
 * Index Parser
 *
 * Reads APKINDEX.tar.gz archives and installed databases into capability
 * views, cached per path and modification time.
 */

import { readFileSync, statSync } from 'node:fs'
import { resolve } from 'node:path'
import { IndexCache } from '../cache'
import { ParseError } from '../errors'
import { silentLogger, type Logger } from '../log'
import { decompress, findTarMember, isGzipData } from '../tarball'
import { addInstalled, addProvider, parseIndexText } from './block'
import type {
  IndexViews,
  InstalledIndex,
  PackageRecord,
  ProviderIndex,
  ReadFileFn,
  StatFn,
} from './types'

export interface IndexParserOptions {
  cache?: IndexCache<IndexViews>
  logger?: Logger
  stat?: StatFn
  readFile?: ReadFileFn
}

const defaultStat: StatFn = (path) => {
  const stats = statSync(path, { throwIfNoEntry: false })
  return stats && stats.isFile() ? { mtimeMs: stats.mtimeMs } : null
}

const defaultReadFile: ReadFileFn = (path) => readFileSync(path)

const textDecoder = new TextDecoder('utf-8')

/**
 * Text of an index file: the `APKINDEX` member of a gzipped tar, or the
 * file itself when it is not compressed (installed database).
 */
export function readIndexText(data: Uint8Array, path: string): string {
  if (!isGzipData(data)) {
    return textDecoder.decode(data)
  }

  let tar: Uint8Array
  try {
    tar = decompress(data)
  } catch (error) {
    throw new ParseError(`Could not decompress ${path}`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    })
  }

  let member: Uint8Array | null
  try {
    member = findTarMember(tar, 'APKINDEX')
  } catch (error) {
    throw new ParseError(`Corrupt archive ${path}`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    })
  }
  if (!member) {
    throw new ParseError(`No APKINDEX member in archive: ${path}`, { path })
  }
  return textDecoder.decode(member)
}

export class IndexParser {
  readonly cache: IndexCache<IndexViews>
  private logger: Logger
  private stat: StatFn
  private readFile: ReadFileFn

  constructor(options: IndexParserOptions = {}) {
    this.cache = options.cache ?? new IndexCache<IndexViews>()
    this.logger = options.logger ?? silentLogger
    this.stat = options.stat ?? defaultStat
    this.readFile = options.readFile ?? defaultReadFile
  }

  /**
   * Parse an index into its capability view. Every record is registered
   * under its pkgname and under each of its provides; virtual packages
   * (no timestamp) are left out.
   *
   * A missing file is not an error: there are simply no binary packages
   * for that architecture, and the view is empty.
   *
   * @param multipleProviders - true for repository indexes, false for the
   *                            installed database
   */
  parse(path: string, multipleProviders?: true): ProviderIndex
  parse(path: string, multipleProviders: false): InstalledIndex
  parse(path: string, multipleProviders: boolean): ProviderIndex | InstalledIndex
  parse(path: string, multipleProviders = true): ProviderIndex | InstalledIndex {
    return multipleProviders ? this.parseMultiple(path) : this.parseSingle(path)
  }

  /**
   * All blocks of an index in file order, without skipping virtual
   * packages or dropping lower versions.
   */
  parseBlocks(path: string): PackageRecord[] {
    const absolute = resolve(path)
    return parseIndexText(readIndexText(this.readFile(absolute), absolute), absolute)
  }

  /**
   * Drop the cached views of a path.
   *
   * @returns true if anything was cached
   */
  clearCache(path: string): boolean {
    const absolute = resolve(path)
    this.logger.verbose(`Clear APKINDEX cache for: ${absolute}`)
    if (this.cache.delete(absolute)) {
      return true
    }
    this.logger.verbose(`Nothing to do, path was not in cache: ${this.cache.keys().join(', ')}`)
    return false
  }

  private parseMultiple(path: string): ProviderIndex {
    const absolute = resolve(path)
    const stat = this.statOrNote(absolute)
    if (!stat) return new Map()

    const cached = this.cache.get(absolute, stat.mtimeMs, 'multiple')
    if (cached) return cached

    const view = new Map<string, Map<string, PackageRecord>>()
    for (const record of this.indexedRecords(absolute)) {
      addProvider(view, record)
      for (const alias of record.provides) {
        addProvider(view, record, alias)
      }
    }

    this.cache.set(absolute, stat.mtimeMs, 'multiple', view)
    return view
  }

  private parseSingle(path: string): InstalledIndex {
    const absolute = resolve(path)
    const stat = this.statOrNote(absolute)
    if (!stat) return new Map()

    const cached = this.cache.get(absolute, stat.mtimeMs, 'single')
    if (cached) return cached

    const view = new Map<string, PackageRecord>()
    for (const record of this.indexedRecords(absolute)) {
      addInstalled(view, record)
      for (const alias of record.provides) {
        addInstalled(view, record, alias)
      }
    }

    this.cache.set(absolute, stat.mtimeMs, 'single', view)
    return view
  }

  private statOrNote(path: string): { mtimeMs: number } | null {
    const stat = this.stat(path)
    if (!stat) {
      this.logger.verbose(
        `NOTE: APKINDEX not found, assuming no binary packages exist for that architecture: ${path}`
      )
    }
    return stat
  }

  private indexedRecords(path: string): PackageRecord[] {
    const ret: PackageRecord[] = []
    for (const record of this.parseBlocks(path)) {
      if (record.timestamp === undefined) {
        this.logger.verbose(`Skipped virtual package ${record.pkgname} in file: ${path}`)
        continue
      }
      ret.push(record)
    }
    return ret
  }
}
