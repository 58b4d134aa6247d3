import { bench, describe } from 'vitest'
import { psf2Decode } from '../src/psf2/decode'
import { buildFont, unicodeEntry } from '../test/helpers'

function sizeLabel(bytes: number): string {
  return bytes >= 1024 * 1024
    ? `${(bytes / 1024 / 1024).toFixed(1)} MB`
    : `${(bytes / 1024).toFixed(1)} KB`
}

// Console-font shapes: 256 or 512 glyphs, each mapped to one or two characters
const shapes = [
  { label: '8x16, 256 glyphs', width: 8, height: 16, count: 256 },
  { label: '12x24, 512 glyphs', width: 12, height: 24, count: 512 },
  { label: '16x32, 512 glyphs', width: 16, height: 32, count: 512 },
] as const

const fixtures = shapes.map((shape) => {
  const charSize = Math.ceil(shape.width / 8) * shape.height
  const glyphs = Array.from({ length: shape.count }, (_, i) =>
    Array.from({ length: charSize }, (_, j) => (i * 31 + j * 7) & 0xff)
  )
  const unicode = glyphs.flatMap((_, i) =>
    unicodeEntry(String.fromCodePoint(0x20 + i) + String.fromCodePoint(0x2500 + i))
  )
  const input = buildFont({ width: shape.width, height: shape.height, glyphs, unicode })
  return { label: shape.label, input }
})

console.log('\n[bench] psf2Decode:')
for (const f of fixtures) {
  console.log(`  ${f.label}: ${sizeLabel(f.input.byteLength)}`)
}

describe('psf2Decode', () => {
  for (const f of fixtures) {
    bench(`${f.label} (${sizeLabel(f.input.byteLength)})`, () => {
      psf2Decode(f.input)
    })
  }
})

describe('lookup', () => {
  const font = psf2Decode(fixtures[0].input)
  bench('lookup + full glyph scan', () => {
    const glyph = font.lookup('A')
    if (!glyph) return
    for (let y = 0; y < glyph.height; y++) {
      for (let x = 0; x < glyph.width; x++) {
        glyph.get(x, y)
      }
    }
  })
})
