// UTF-8 scalar decoding for the PSF2 Unicode table

// Smallest code point each sequence length may encode (anything lower is overlong)
const MIN_SCALAR = [0, 0, 0x80, 0x800, 0x10000] as const

// Sequence length from the lead byte's leading one-bits, minimum 1
export function utf8SequenceLength(lead: number): number {
  let n = 0
  for (let mask = 0x80; mask !== 0 && (lead & mask) !== 0; mask >>= 1) {
    n++
  }
  return Math.max(n, 1)
}

// Decode exactly one scalar value, or null if the bytes are not valid UTF-8
export function decodeUtf8Scalar(bytes: Uint8Array): number | null {
  const n = bytes.byteLength
  if (n < 1 || n > 4 || utf8SequenceLength(bytes[0]) !== n) return null

  // A lone continuation byte has one leading one-bit
  if (n === 1) {
    return bytes[0] < 0x80 ? bytes[0] : null
  }

  let cp = bytes[0] & (0x7f >> n)
  for (let i = 1; i < n; i++) {
    const b = bytes[i]
    if ((b & 0xc0) !== 0x80) return null
    cp = (cp << 6) | (b & 0x3f)
  }

  if (cp < MIN_SCALAR[n]) return null
  if (cp >= 0xd800 && cp <= 0xdfff) return null
  if (cp > 0x10ffff) return null
  return cp
}
