// Parsed PSF2 font and glyphs. Both are immutable once constructed.

import { Psf2Error } from '../shared/errors'

/** A character, as a one-code-point string or a Unicode scalar value */
export type CharLike = string | number

export class Glyph {
  /** Bytes per row of pixels */
  readonly lineSize: number
  /**
   * Width in pixels, the row size rounded up to whole bytes.
   * May exceed the font's nominal width: some fonts draw into the padding bits.
   */
  readonly width: number
  /** Height in pixels, always the font's height */
  readonly height: number
  private readonly data: Uint8Array

  constructor(bitmap: Uint8Array, lineSize: number, height: number) {
    if (bitmap.byteLength !== lineSize * height) {
      throw new Psf2Error(
        'InconsistentGeometry',
        `Glyph bitmap is ${bitmap.byteLength} bytes, expected ${lineSize * height}`
      )
    }
    this.data = bitmap
    this.lineSize = lineSize
    this.width = lineSize * 8
    this.height = height
  }

  /** Copy of the raw bitmap, rows top to bottom, MSB is the leftmost pixel */
  get bitmap(): Uint8Array {
    return this.data.slice()
  }

  /**
   * Whether pixel (x, y) is set, or null if it lies outside the glyph.
   */
  get(x: number, y: number): boolean | null {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return null
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return null

    const byte = this.data[y * this.lineSize + Math.floor(x / 8)]
    return (byte & (0x80 >> x % 8)) !== 0
  }
}

export class Font {
  /** Nominal width in pixels */
  readonly width: number
  /** Nominal height in pixels */
  readonly height: number
  /** Whether the font carried a Unicode mapping table */
  readonly hasUnicodeTable: boolean
  private readonly glyphs: readonly Glyph[]
  private readonly unicode: ReadonlyMap<number, number>

  constructor(
    width: number,
    height: number,
    glyphs: readonly Glyph[],
    unicode: ReadonlyMap<number, number>,
    hasUnicodeTable: boolean = unicode.size > 0
  ) {
    for (const [cp, index] of unicode) {
      if (!Number.isInteger(index) || index < 0 || index >= glyphs.length) {
        throw new Psf2Error(
          'InconsistentUnicodeTable',
          `U+${formatCodePoint(cp)} maps to glyph ${index} of ${glyphs.length}`
        )
      }
    }
    this.width = width
    this.height = height
    this.glyphs = Object.freeze([...glyphs])
    this.unicode = new Map(unicode)
    this.hasUnicodeTable = hasUnicodeTable
  }

  get boundingBox(): readonly [width: number, height: number] {
    return [this.width, this.height]
  }

  get glyphCount(): number {
    return this.glyphs.length
  }

  glyph(index: number): Glyph | null {
    return this.glyphs[index] ?? null
  }

  indexOf(char: CharLike): number | null {
    const cp = toCodePoint(char)
    if (cp === null) return null
    return this.unicode.get(cp) ?? null
  }

  lookup(char: CharLike): Glyph | null {
    const index = this.indexOf(char)
    return index === null ? null : this.glyphs[index]
  }

  has(char: CharLike): boolean {
    return this.indexOf(char) !== null
  }

  /** Mapped code points, in table order */
  codePoints(): number[] {
    return [...this.unicode.keys()]
  }
}

function toCodePoint(char: CharLike): number | null {
  if (typeof char === 'number') {
    return Number.isInteger(char) && char >= 0 && char <= 0x10ffff ? char : null
  }
  const cp = char.codePointAt(0)
  if (cp === undefined || String.fromCodePoint(cp).length !== char.length) return null
  return cp
}

function formatCodePoint(cp: number): string {
  return cp.toString(16).toUpperCase().padStart(4, '0')
}
