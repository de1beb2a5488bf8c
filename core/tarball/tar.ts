/**
 * Tar header parsing and creation
 *
 * Reads USTAR segments that may be concatenated without end-of-archive
 * markers in between, as apk writes its signed indexes.
 */

import { ParseError } from '../errors'
import {
  TAR_BLOCK_SIZE,
  TYPE_FLAGS,
  type TarEntry,
  type TarEntryType,
  type TarHeader,
  type TarInput,
} from './types'

const textDecoder = new TextDecoder('utf-8')
const textEncoder = new TextEncoder()

/**
 * Parse a tar header from a 512-byte block
 *
 * @param header - 512-byte header block
 * @returns Parsed header information
 */
export function parseTarHeader(header: Uint8Array): TarHeader {
  if (header.every((byte) => byte === 0)) {
    return {
      name: '',
      mode: 0,
      size: 0,
      mtime: new Date(0),
      type: 'unknown',
      checksumValid: false,
      isNullBlock: true,
    }
  }

  const name = parseString(header, 0, 100)
  const mode = parseOctal(header, 100, 8)
  const size = parseOctal(header, 124, 12)
  const mtime = new Date(parseOctal(header, 136, 12) * 1000)
  const checksum = parseOctal(header, 148, 8)
  const typeflag = header[156] ?? 0

  const magic = parseString(header, 257, 6)
  const prefix = magic.startsWith('ustar') ? parseString(header, 345, 155) : ''

  return {
    name: prefix ? `${prefix}/${name}` : name,
    mode,
    size,
    mtime,
    type: parseType(typeflag),
    checksumValid: validateChecksum(header, checksum),
    isNullBlock: false,
  }
}

/**
 * Parse a null-terminated string from a buffer
 */
function parseString(buffer: Uint8Array, offset: number, length: number): string {
  const slice = buffer.subarray(offset, offset + length)
  const nullIndex = slice.indexOf(0)
  const end = nullIndex === -1 ? length : nullIndex
  return textDecoder.decode(slice.subarray(0, end))
}

/**
 * Parse an octal number from a buffer
 */
function parseOctal(buffer: Uint8Array, offset: number, length: number): number {
  const str = parseString(buffer, offset, length).trim()
  if (!str) return 0
  return parseInt(str, 8) || 0
}

/**
 * Validate tar header checksum
 */
function validateChecksum(header: Uint8Array, expectedChecksum: number): boolean {
  return computeChecksum(header) === expectedChecksum
}

function computeChecksum(header: Uint8Array): number {
  // Checksum field (148-155) counts as spaces
  let sum = 0
  for (let i = 0; i < TAR_BLOCK_SIZE; i++) {
    sum += i >= 148 && i < 156 ? 32 : header[i] ?? 0
  }
  return sum
}

/**
 * Parse type flag to entry type
 */
function parseType(typeflag: number): TarEntryType {
  switch (typeflag) {
    case 0: // NUL character (old format)
    case TYPE_FLAGS.FILE:
      return 'file'
    case TYPE_FLAGS.HARDLINK:
      return 'hardlink'
    case TYPE_FLAGS.SYMLINK:
      return 'symlink'
    case TYPE_FLAGS.DIRECTORY:
      return 'directory'
    case TYPE_FLAGS.PAX_EXTENDED:
      return 'pax-extended'
    case TYPE_FLAGS.PAX_GLOBAL:
      return 'pax-global'
    case TYPE_FLAGS.GNU_LONGNAME:
      return 'gnu-longname'
    default:
      return 'unknown'
  }
}

/**
 * Iterate over the entries of an uncompressed tar stream. Null blocks are
 * skipped instead of ending the walk, so concatenated segments are read
 * as one archive.
 */
export function* readTarEntries(data: Uint8Array): Generator<TarEntry> {
  let offset = 0
  while (offset + TAR_BLOCK_SIZE <= data.length) {
    const header = parseTarHeader(data.subarray(offset, offset + TAR_BLOCK_SIZE))
    offset += TAR_BLOCK_SIZE
    if (header.isNullBlock) continue

    const content = data.subarray(offset, Math.min(offset + header.size, data.length))
    offset += Math.ceil(header.size / TAR_BLOCK_SIZE) * TAR_BLOCK_SIZE

    yield {
      name: header.name,
      type: header.type,
      size: header.size,
      mtime: header.mtime,
      checksumValid: header.checksumValid,
      content,
    }
  }
}

/**
 * Find a regular file by name, or null.
 *
 * @throws ParseError for a header with a bad checksum before or at the member
 */
export function findTarMember(data: Uint8Array, name: string): Uint8Array | null {
  for (const entry of readTarEntries(data)) {
    if (!entry.checksumValid) {
      throw new ParseError(`Invalid tar header checksum for '${entry.name}'`, { path: entry.name })
    }
    if (entry.type === 'file' && entry.name === name) {
      return entry.content
    }
  }
  return null
}

/**
 * Create a USTAR tar header
 */
export function createTarHeader(
  name: string,
  size: number,
  options: {
    mode?: number
    mtime?: Date
    type?: TarEntryType
  } = {}
): Uint8Array {
  const header = new Uint8Array(TAR_BLOCK_SIZE)
  const { mode = 0o644, mtime = new Date(0), type = 'file' } = options

  writeString(header, 0, name, 100)
  writeOctal(header, 100, mode, 8)
  writeOctal(header, 108, 0, 8)
  writeOctal(header, 116, 0, 8)
  writeOctal(header, 124, size, 12)
  writeOctal(header, 136, Math.floor(mtime.getTime() / 1000), 12)
  header[156] = type === 'directory' ? TYPE_FLAGS.DIRECTORY : TYPE_FLAGS.FILE
  writeString(header, 257, 'ustar\0', 6)
  writeString(header, 263, '00', 2)

  writeOctal(header, 148, computeChecksum(header), 8)
  header[155] = 32 // space

  return header
}

/**
 * Write a string to header at offset
 */
function writeString(header: Uint8Array, offset: number, str: string, length: number): void {
  const encoded = textEncoder.encode(str)
  header.set(encoded.subarray(0, Math.min(encoded.length, length)), offset)
}

/**
 * Write an octal number to header at offset
 */
function writeOctal(header: Uint8Array, offset: number, value: number, length: number): void {
  const str = value.toString(8).padStart(length - 1, '0')
  writeString(header, offset, str, length - 1)
  header[offset + length - 1] = 0 // null terminator
}

/**
 * Pad data to tar block boundary
 */
export function padToBlockSize(data: Uint8Array): Uint8Array {
  const remainder = data.length % TAR_BLOCK_SIZE
  if (remainder === 0) return data

  const padded = new Uint8Array(data.length + (TAR_BLOCK_SIZE - remainder))
  padded.set(data)
  return padded
}

/**
 * Create end-of-archive marker (two null blocks)
 */
export function createEndOfArchive(): Uint8Array {
  return new Uint8Array(TAR_BLOCK_SIZE * 2)
}

/**
 * Build an uncompressed tar stream from in-memory files.
 *
 * @param endMarker - append the two null blocks (apk's signature segment
 *                    omits them)
 */
export function createTar(files: TarInput[], endMarker = true): Uint8Array {
  const chunks: Uint8Array[] = []
  for (const file of files) {
    const content = typeof file.content === 'string' ? textEncoder.encode(file.content) : file.content
    chunks.push(createTarHeader(file.name, content.length, { mode: file.mode, mtime: file.mtime }))
    if (content.length > 0) {
      chunks.push(padToBlockSize(content))
    }
  }
  if (endMarker) {
    chunks.push(createEndOfArchive())
  }
  return concatArrays(chunks)
}

export function concatArrays(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0)
  const out = new Uint8Array(total)
  let offset = 0
  for (const chunk of chunks) {
    out.set(chunk, offset)
    offset += chunk.length
  }
  return out
}
