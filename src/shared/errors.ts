// Parse errors

export type Psf2ErrorKind =
  | 'TruncatedHeader'
  | 'InvalidMagic'
  | 'UnsupportedVersion'
  | 'InvalidHeaderSize'
  | 'TruncatedGlyphTable'
  | 'InconsistentGeometry'
  | 'TruncatedUnicodeTable'
  | 'InvalidUtf8Sequence'
  | 'InconsistentUnicodeTable'
  | 'InvalidCompression'

export class Psf2Error extends Error {
  readonly kind: Psf2ErrorKind
  /** Byte offset into the input where decoding failed, if one applies */
  readonly offset: number | null

  constructor(kind: Psf2ErrorKind, message: string, offset: number | null = null, options?: ErrorOptions) {
    super(message, options)
    this.name = 'Psf2Error'
    this.kind = kind
    this.offset = offset
  }
}
