// PSF2 Unicode mapping table
//
// One entry per glyph, in glyph order. An entry is a run of UTF-8 characters,
// optionally followed by 0xFE-separated multi-codepoint spellings, and ends with 0xFF.
// Multi-codepoint spellings are skipped: they add no mappings.

import type { ReadBuffer } from '../shared/buffer'
import { Psf2Error } from '../shared/errors'
import { decodeUtf8Scalar, utf8SequenceLength } from '../shared/utf8'

export const UNICODE_SEPARATOR = 0xfe
export const UNICODE_TERMINATOR = 0xff

/**
 * Decode the mapping table from the reader's position to the end of input.
 * Returns code point -> glyph index; on duplicates the first entry wins.
 */
export function readUnicodeTable(buf: ReadBuffer, glyphCount: number): Map<number, number> {
  const table = new Map<number, number>()
  let glyph = 0

  while (buf.remaining > 0) {
    if (glyph >= glyphCount) {
      throw new Psf2Error(
        'InconsistentUnicodeTable',
        `Unicode table has more entries than the ${glyphCount} glyphs`,
        buf.offset
      )
    }

    let next = peek(buf)
    while (next !== UNICODE_SEPARATOR && next !== UNICODE_TERMINATOR) {
      const cp = readChar(buf)
      if (!table.has(cp)) {
        table.set(cp, glyph)
      }
      next = peek(buf)
    }

    let b = buf.readU8()
    while (b !== UNICODE_TERMINATOR) {
      if (b === null) {
        throw new Psf2Error('TruncatedUnicodeTable', 'Unicode table entry is not terminated', buf.offset)
      }
      b = buf.readU8()
    }

    glyph++
  }

  if (glyph !== glyphCount) {
    throw new Psf2Error(
      'InconsistentUnicodeTable',
      `Unicode table has ${glyph} entries for ${glyphCount} glyphs`,
      buf.offset
    )
  }

  return table
}

function peek(buf: ReadBuffer): number {
  const b = buf.peekU8()
  if (b === null) {
    throw new Psf2Error('TruncatedUnicodeTable', 'Unicode table entry is not terminated', buf.offset)
  }
  return b
}

function readChar(buf: ReadBuffer): number {
  const start = buf.offset
  const lead = peek(buf)
  const n = utf8SequenceLength(lead)
  if (n > 4) {
    throw new Psf2Error('InvalidUtf8Sequence', `Invalid UTF-8 lead byte 0x${lead.toString(16)}`, start)
  }
  const bytes = buf.readBytes(n)
  if (!bytes) {
    // Only a run of valid continuation bytes counts as cut off
    const tail = buf.readBytes(buf.remaining) ?? new Uint8Array(0)
    if (tail.subarray(1).some((b) => (b & 0xc0) !== 0x80)) {
      throw invalidSequence(tail, start)
    }
    throw new Psf2Error(
      'TruncatedUnicodeTable',
      `UTF-8 sequence of ${n} bytes runs past the end of input`,
      start
    )
  }
  const cp = decodeUtf8Scalar(bytes)
  if (cp === null) {
    throw invalidSequence(bytes, start)
  }
  return cp
}

function invalidSequence(bytes: Uint8Array, offset: number): Psf2Error {
  const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join(' ')
  return new Psf2Error('InvalidUtf8Sequence', `Invalid UTF-8 sequence: ${hex}`, offset)
}
