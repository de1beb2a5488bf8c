/**
 * Types for index archive handling
 *
 * APKINDEX.tar.gz files are one or more gzip members, each holding a USTAR
 * segment (signature first, then the index itself).
 */

/**
 * Entry type in a tar archive
 */
export type TarEntryType =
  | 'file'
  | 'directory'
  | 'symlink'
  | 'hardlink'
  | 'pax-global'
  | 'pax-extended'
  | 'gnu-longname'
  | 'unknown'

/**
 * Parsed tar header
 */
export interface TarHeader {
  /** File name (combined with the USTAR prefix) */
  name: string
  /** File mode (permissions) */
  mode: number
  /** File size in bytes */
  size: number
  /** Modification time */
  mtime: Date
  /** Entry type */
  type: TarEntryType
  /** Whether the checksum is valid */
  checksumValid: boolean
  /** Whether this is a null block (end of a segment) */
  isNullBlock: boolean
}

/**
 * Tar entry with content
 */
export interface TarEntry {
  name: string
  type: TarEntryType
  size: number
  mtime: Date
  checksumValid: boolean
  content: Uint8Array
}

/**
 * Input for building an archive in memory
 */
export interface TarInput {
  name: string
  content: Uint8Array | string
  mode?: number
  mtime?: Date
}

/**
 * Constants for tar format
 */
export const TAR_BLOCK_SIZE = 512
export const GZIP_MAGIC = new Uint8Array([0x1f, 0x8b])

/**
 * Type flag characters
 */
export const TYPE_FLAGS = {
  FILE: 0x30,           // '0' or NUL
  HARDLINK: 0x31,       // '1'
  SYMLINK: 0x32,        // '2'
  DIRECTORY: 0x35,      // '5'
  PAX_EXTENDED: 0x78,   // 'x'
  PAX_GLOBAL: 0x67,     // 'g'
  GNU_LONGNAME: 0x4c,   // 'L'
} as const
