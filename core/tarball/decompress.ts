/**
 * Gzip handling for index archives
 *
 * apk signs an index by prepending a separately gzipped signature segment,
 * so an APKINDEX.tar.gz is several gzip members back to back. zlib's
 * gunzip reads all of them into one tar stream.
 */

import { gunzipSync, gzipSync } from 'node:zlib'
import { GZIP_MAGIC } from './types'

/**
 * Check if data starts with the gzip magic bytes
 */
export function isGzipData(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === GZIP_MAGIC[0] && data[1] === GZIP_MAGIC[1]
}

/**
 * Decompress gzip data, all members concatenated
 */
export function decompress(data: Uint8Array): Uint8Array {
  return new Uint8Array(gunzipSync(data))
}

/**
 * Compress data with gzip
 */
export function compress(data: Uint8Array): Uint8Array {
  return new Uint8Array(gzipSync(data))
}
