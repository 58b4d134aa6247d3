// PSF2 glyph bitmap table

import type { ReadBuffer } from '../shared/buffer'
import { Psf2Error } from '../shared/errors'
import { Glyph } from './font'
import type { Psf2Header } from './header'

// Slice the bitmap table into one owned buffer per glyph.
// Leaves the reader at the start of the Unicode table.
export function readGlyphs(buf: ReadBuffer, header: Psf2Header): Glyph[] {
  const { length, charSize, lineSize, height, headerSize } = header

  if (charSize !== lineSize * height) {
    throw new Psf2Error(
      'InconsistentGeometry',
      `Glyph size ${charSize} does not match ${height} rows of ${lineSize} bytes`,
      20
    )
  }
  if (charSize === 0 && length > 0) {
    throw new Psf2Error('InconsistentGeometry', `Font declares ${length} empty glyphs`, 20)
  }

  const tableEnd = headerSize + length * charSize
  if (tableEnd > buf.length || !buf.seek(headerSize)) {
    throw new Psf2Error(
      'TruncatedGlyphTable',
      `Glyph table needs ${tableEnd} bytes, got ${buf.length}`,
      buf.length
    )
  }

  const glyphs: Glyph[] = []
  for (let i = 0; i < length; i++) {
    const bitmap = buf.readBytes(charSize)
    if (!bitmap) {
      throw new Psf2Error('TruncatedGlyphTable', `Glyph ${i} is truncated`, buf.offset)
    }
    // Copy so the font never borrows the caller's buffer
    glyphs.push(new Glyph(bitmap.slice(), lineSize, height))
  }

  return glyphs
}
