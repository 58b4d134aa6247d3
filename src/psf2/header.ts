// PSF2 header: eight little-endian uint32 fields

import type { ReadBuffer } from '../shared/buffer'
import { Psf2Error } from '../shared/errors'

export const PSF2_MAGIC = 0x864ab572 // bytes 72 b5 4a 86
export const PSF2_VERSION = 0
export const PSF2_HEADER_SIZE = 32

// Header flag bits
export const PSF2_HAS_UNICODE_TABLE = 0x01

export interface Psf2Header {
  magic: number
  version: number
  headerSize: number
  flags: number
  /** Number of glyphs */
  length: number
  /** Bytes per glyph bitmap */
  charSize: number
  height: number
  width: number
  /** Bytes per bitmap row, width rounded up to a whole byte */
  lineSize: number
}

export function readHeader(buf: ReadBuffer): Psf2Header {
  if (buf.length < PSF2_HEADER_SIZE) {
    throw new Psf2Error(
      'TruncatedHeader',
      `PSF2 header needs ${PSF2_HEADER_SIZE} bytes, got ${buf.length}`,
      buf.length
    )
  }

  buf.seek(0)
  const field = (): number => {
    const value = buf.readU32LE()
    if (value === null) {
      throw new Psf2Error('TruncatedHeader', 'Unexpected end of PSF2 header', buf.offset)
    }
    return value
  }

  const magic = field()
  const version = field()
  const headerSize = field()
  const flags = field()
  const length = field()
  const charSize = field()
  const height = field()
  const width = field()

  if (magic !== PSF2_MAGIC) {
    throw new Psf2Error('InvalidMagic', `Invalid PSF2 magic 0x${magic.toString(16).padStart(8, '0')}`, 0)
  }
  if (version !== PSF2_VERSION) {
    throw new Psf2Error('UnsupportedVersion', `Unsupported PSF2 version ${version}`, 4)
  }
  if (headerSize < PSF2_HEADER_SIZE) {
    throw new Psf2Error(
      'InvalidHeaderSize',
      `PSF2 header size ${headerSize} is smaller than ${PSF2_HEADER_SIZE}`,
      8
    )
  }

  return {
    magic,
    version,
    headerSize,
    flags,
    length,
    charSize,
    height,
    width,
    lineSize: Math.ceil(width / 8),
  }
}
