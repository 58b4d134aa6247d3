import { describe, it, expect } from 'vitest'
import { Font, Glyph } from '../src/psf2/font'
import { Psf2Error } from '../src/shared/errors'
import { catchError } from './helpers'

describe('glyph', () => {
  it('reads pixels MSB first', () => {
    const glyph = new Glyph(new Uint8Array([0b10110000]), 1, 1)

    expect(glyph.get(0, 0)).toBe(true)
    expect(glyph.get(1, 0)).toBe(false)
    expect(glyph.get(2, 0)).toBe(true)
    expect(glyph.get(3, 0)).toBe(true)
    for (let x = 4; x < 8; x++) {
      expect(glyph.get(x, 0)).toBe(false)
    }
  })

  it('returns null outside the glyph', () => {
    const glyph = new Glyph(new Uint8Array([0xff]), 1, 1)

    expect(glyph.get(8, 0)).toBeNull()
    expect(glyph.get(0, 1)).toBeNull()
    expect(glyph.get(-1, 0)).toBeNull()
    expect(glyph.get(0, -1)).toBeNull()
    expect(glyph.get(0.5, 0)).toBeNull()
  })

  it('locates pixels in multi-byte rows', () => {
    const glyph = new Glyph(new Uint8Array([0x00, 0x10, 0x80, 0x00]), 2, 2)

    expect(glyph.width).toBe(16)
    expect(glyph.height).toBe(2)
    expect(glyph.get(11, 0)).toBe(true)
    expect(glyph.get(10, 0)).toBe(false)
    expect(glyph.get(0, 1)).toBe(true)
    expect(glyph.get(8, 1)).toBe(false)
    expect(glyph.get(16, 0)).toBeNull()
  })

  it('addresses bits past 2^31 in very wide rows', () => {
    const lineSize = 2 ** 28 + 1
    const bitmap = new Uint8Array(lineSize)
    bitmap[2 ** 28] = 0x80
    const glyph = new Glyph(bitmap, lineSize, 1)

    expect(glyph.get(2 ** 31, 0)).toBe(true)
    expect(glyph.get(2 ** 31 + 1, 0)).toBe(false)
    expect(glyph.get(0, 0)).toBe(false)
  })

  it('hands out a copy of its bitmap', () => {
    const glyph = new Glyph(new Uint8Array([0x80]), 1, 1)
    const bitmap = glyph.bitmap
    bitmap[0] = 0

    expect(glyph.get(0, 0)).toBe(true)
    expect(glyph.bitmap).toEqual(new Uint8Array([0x80]))
  })

  it('rejects a bitmap of the wrong size', () => {
    const err = catchError(() => new Glyph(new Uint8Array(3), 1, 2))

    expect(err).toBeInstanceOf(Psf2Error)
    expect(err).toMatchObject({ kind: 'InconsistentGeometry' })
  })
})

describe('font', () => {
  const glyphs = [new Glyph(new Uint8Array([0x00]), 1, 1), new Glyph(new Uint8Array([0xff]), 1, 1)]
  const font = new Font(
    6,
    1,
    glyphs,
    new Map([
      [0x41, 1],
      [0x1f600, 0],
    ])
  )

  it('reports its bounding box', () => {
    expect(font.width).toBe(6)
    expect(font.height).toBe(1)
    expect(font.boundingBox).toEqual([6, 1])
    expect(font.glyphCount).toBe(2)
  })

  it('looks up glyphs by string or code point', () => {
    expect(font.lookup('A')).toBe(glyphs[1])
    expect(font.lookup(0x41)).toBe(glyphs[1])
    expect(font.lookup('😀')).toBe(glyphs[0])
    expect(font.indexOf('😀')).toBe(0)
    expect(font.has('A')).toBe(true)
  })

  it('treats unmapped or malformed characters as absent', () => {
    expect(font.lookup('B')).toBeNull()
    expect(font.lookup('AB')).toBeNull()
    expect(font.lookup('')).toBeNull()
    expect(font.lookup(-1)).toBeNull()
    expect(font.lookup(0x110000)).toBeNull()
    expect(font.lookup(65.5)).toBeNull()
    expect(font.has('B')).toBe(false)
  })

  it('returns glyphs by index', () => {
    expect(font.glyph(1)).toBe(glyphs[1])
    expect(font.glyph(2)).toBeNull()
    expect(font.glyph(-1)).toBeNull()
  })

  it('lists mapped code points in table order', () => {
    expect(font.codePoints()).toEqual([0x41, 0x1f600])
    expect(font.hasUnicodeTable).toBe(true)
  })

  it('rejects mappings to missing glyphs', () => {
    const err = catchError(() => new Font(8, 1, glyphs, new Map([[0x41, 2]])))

    expect(err).toMatchObject({
      kind: 'InconsistentUnicodeTable',
      message: 'U+0041 maps to glyph 2 of 2',
    })
  })
})
