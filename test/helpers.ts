// Synthetic PSF2 fonts and assertions shared by tests and benchmarks

export interface TestFontOptions {
  width: number
  height: number
  /** One bitmap per glyph */
  glyphs: ArrayLike<number>[]
  /** Raw Unicode table bytes, appended after the glyph table */
  unicode?: ArrayLike<number>
  flags?: number
  // Header overrides for malformed input
  magic?: number
  version?: number
  headerSize?: number
  length?: number
  charSize?: number
}

const HEADER_SIZE = 32

export function buildFont(options: TestFontOptions): Uint8Array {
  const lineSize = Math.ceil(options.width / 8)
  const charSize = options.charSize ?? lineSize * options.height
  const headerSize = options.headerSize ?? HEADER_SIZE
  const glyphBytes = options.glyphs.reduce((n, g) => n + g.length, 0)
  const unicode = options.unicode ?? []

  const out = new Uint8Array(Math.max(headerSize, HEADER_SIZE) + glyphBytes + unicode.length)
  const view = new DataView(out.buffer)
  view.setUint32(0, options.magic ?? 0x864ab572, true)
  view.setUint32(4, options.version ?? 0, true)
  view.setUint32(8, headerSize, true)
  view.setUint32(12, options.flags ?? (options.unicode ? 1 : 0), true)
  view.setUint32(16, options.length ?? options.glyphs.length, true)
  view.setUint32(20, charSize, true)
  view.setUint32(24, options.height, true)
  view.setUint32(28, options.width, true)

  let offset = Math.max(headerSize, HEADER_SIZE)
  for (const glyph of options.glyphs) {
    out.set(glyph, offset)
    offset += glyph.length
  }
  out.set(unicode, offset)
  return out
}

// One Unicode table entry: the glyph's characters, then any 0xFE-prefixed sequences, then 0xFF
export function unicodeEntry(chars: string, sequences: string[] = []): number[] {
  const encoder = new TextEncoder()
  const bytes = [...encoder.encode(chars)]
  for (const seq of sequences) {
    bytes.push(0xfe, ...encoder.encode(seq))
  }
  bytes.push(0xff)
  return bytes
}

// Blank glyphs of the given size
export function blankGlyphs(count: number, charSize: number): number[][] {
  return Array.from({ length: count }, () => new Array<number>(charSize).fill(0))
}

// Run a decode step that is expected to fail and return its error
export function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('Expected decoding to fail')
}
