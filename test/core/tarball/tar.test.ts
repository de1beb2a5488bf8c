/**
 * Tar reading and writing tests
 */

import { describe, it, expect } from 'vitest'
import {
  TAR_BLOCK_SIZE,
  compress,
  concatArrays,
  createTar,
  createTarHeader,
  decompress,
  findTarMember,
  isGzipData,
  padToBlockSize,
  parseTarHeader,
  readTarEntries,
} from '../../../core/tarball'
import { ParseError } from '../../../core/errors'

const decoder = new TextDecoder()
const encoder = new TextEncoder()

describe('createTar', () => {
  it('should write header, padded content and end marker', () => {
    const tar = createTar([{ name: 'a.txt', content: 'hello' }])
    expect(tar.length).toBe(TAR_BLOCK_SIZE * 4)
  })

  it('should omit the end marker on request', () => {
    const tar = createTar([{ name: 'a.txt', content: 'hello' }], false)
    expect(tar.length).toBe(TAR_BLOCK_SIZE * 2)
  })

  it('should write only a header for an empty file', () => {
    const tar = createTar([{ name: 'empty', content: '' }], false)
    expect(tar.length).toBe(TAR_BLOCK_SIZE)
  })
})

describe('parseTarHeader', () => {
  it('should read back what createTarHeader wrote', () => {
    const header = parseTarHeader(
      createTarHeader('APKINDEX', 1234, { mode: 0o600, mtime: new Date(1700000000000) })
    )

    expect(header.name).toBe('APKINDEX')
    expect(header.size).toBe(1234)
    expect(header.mode).toBe(0o600)
    expect(header.mtime.getTime()).toBe(1700000000000)
    expect(header.type).toBe('file')
    expect(header.checksumValid).toBe(true)
    expect(header.isNullBlock).toBe(false)
  })

  it('should report directories', () => {
    expect(parseTarHeader(createTarHeader('etc/', 0, { type: 'directory' })).type).toBe('directory')
  })

  it('should flag a null block', () => {
    const header = parseTarHeader(new Uint8Array(TAR_BLOCK_SIZE))
    expect(header.isNullBlock).toBe(true)
    expect(header.name).toBe('')
  })

  it('should notice a corrupted checksum', () => {
    const block = createTarHeader('APKINDEX', 10)
    block[0] = 0x42
    expect(parseTarHeader(block).checksumValid).toBe(false)
  })
})

describe('readTarEntries', () => {
  it('should yield every member with its content', () => {
    const tar = createTar([
      { name: 'DESCRIPTION', content: 'test repository' },
      { name: 'APKINDEX', content: 'P:a\n' },
    ])

    const entries = [...readTarEntries(tar)]
    expect(entries.map((e) => e.name)).toEqual(['DESCRIPTION', 'APKINDEX'])
    expect(entries.map((e) => decoder.decode(e.content))).toEqual(['test repository', 'P:a\n'])
    expect(entries[0]?.size).toBe(15)
  })

  it('should read past end markers of concatenated segments', () => {
    const tar = concatArrays([
      createTar([{ name: 'first', content: 'one' }]),
      createTar([{ name: 'second', content: 'two' }]),
    ])
    expect([...readTarEntries(tar)].map((e) => e.name)).toEqual(['first', 'second'])
  })

  it('should report the checksum of each header', () => {
    const tar = createTar([{ name: 'APKINDEX', content: 'P:a\n' }])
    tar[0] = 0x42
    expect([...readTarEntries(tar)].map((e) => [e.name, e.checksumValid])).toEqual([['BPKINDEX', false]])
  })

  it('should yield nothing for an empty stream', () => {
    expect([...readTarEntries(new Uint8Array(0))]).toEqual([])
  })
})

describe('findTarMember', () => {
  it('should find a file after an unterminated signature segment', () => {
    const tar = concatArrays([
      createTar([{ name: '.SIGN.RSA.test.rsa.pub', content: 'signature' }], false),
      createTar([{ name: 'APKINDEX', content: 'P:musl\n' }]),
    ])

    const member = findTarMember(tar, 'APKINDEX')
    expect(member).not.toBeNull()
    expect(decoder.decode(member ?? new Uint8Array(0))).toBe('P:musl\n')
  })

  it('should return null for a missing member', () => {
    expect(findTarMember(createTar([{ name: 'DESCRIPTION', content: 'x' }]), 'APKINDEX')).toBeNull()
  })

  it('should reject a header with a bad checksum', () => {
    const tar = createTar([{ name: 'APKINDEX', content: 'P:a\n' }])
    tar[0] = 0x42
    expect(() => findTarMember(tar, 'APKINDEX')).toThrow(ParseError)
    expect(() => findTarMember(tar, 'APKINDEX')).toThrow("Invalid tar header checksum for 'BPKINDEX'")
  })

  it('should ignore directories of the same name', () => {
    const tar = concatArrays([createTarHeader('APKINDEX', 0, { type: 'directory' }), new Uint8Array(TAR_BLOCK_SIZE * 2)])
    expect(findTarMember(tar, 'APKINDEX')).toBeNull()
  })
})

describe('padToBlockSize', () => {
  it('should pad to the next block', () => {
    expect(padToBlockSize(new Uint8Array(1)).length).toBe(TAR_BLOCK_SIZE)
    expect(padToBlockSize(new Uint8Array(513)).length).toBe(TAR_BLOCK_SIZE * 2)
  })

  it('should leave aligned data alone', () => {
    const data = new Uint8Array(TAR_BLOCK_SIZE)
    expect(padToBlockSize(data)).toBe(data)
  })
})

describe('gzip', () => {
  it('should detect the magic bytes', () => {
    expect(isGzipData(compress(encoder.encode('x')))).toBe(true)
    expect(isGzipData(encoder.encode('P:a\n'))).toBe(false)
    expect(isGzipData(new Uint8Array([0x1f]))).toBe(false)
  })

  it('should decompress concatenated members into one stream', () => {
    const data = concatArrays([compress(encoder.encode('first ')), compress(encoder.encode('second'))])
    expect(decoder.decode(decompress(data))).toBe('first second')
  })

  it('should throw on corrupt data', () => {
    expect(() => decompress(new Uint8Array([0x1f, 0x8b, 0x00, 0x01]))).toThrow()
  })
})
