// PSF2 decoder
// https://www.win.tue.nl/~aeb/linux/kbd/font-formats-1.html

import { ByteReader } from '../shared/buffer'
import { Font } from './font'
import { readGlyphs } from './glyphs'
import { PSF2_HAS_UNICODE_TABLE, readHeader } from './header'
import { readUnicodeTable } from './unicode'

/**
 * Parse a PSF2 font from its bytes.
 * Nothing in the returned font references `data`.
 */
export function psf2Decode(data: ArrayBuffer | Uint8Array): Font {
  const buf = new ByteReader(data)

  const header = readHeader(buf)
  const glyphs = readGlyphs(buf, header)

  // Older tools write the table without setting the flag
  const hasUnicodeTable = (header.flags & PSF2_HAS_UNICODE_TABLE) !== 0 || buf.remaining > 0
  const unicode = hasUnicodeTable ? readUnicodeTable(buf, header.length) : new Map<number, number>()

  return new Font(header.width, header.height, glyphs, unicode, hasUnicodeTable)
}
