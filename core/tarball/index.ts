/**
 * Tarball - index archive reading
 *
 * Synchronous gzip and tar handling for APKINDEX.tar.gz, plus the writer
 * used to build archives in memory.
 */

// Types
export type {
  TarEntryType,
  TarHeader,
  TarEntry,
  TarInput,
} from './types'
export { TAR_BLOCK_SIZE, GZIP_MAGIC, TYPE_FLAGS } from './types'

// Tar format
export {
  parseTarHeader,
  readTarEntries,
  findTarMember,
  createTarHeader,
  padToBlockSize,
  createEndOfArchive,
  createTar,
  concatArrays,
} from './tar'

// Compression
export { isGzipData, decompress, compress } from './decompress'
