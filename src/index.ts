// PSF2
export { psf2Decode } from './psf2/decode'
export { psf2Load } from './psf2/load'
export { Font, Glyph, type CharLike } from './psf2/font'
export {
  PSF2_MAGIC,
  PSF2_VERSION,
  PSF2_HEADER_SIZE,
  PSF2_HAS_UNICODE_TABLE,
  type Psf2Header,
} from './psf2/header'
export { UNICODE_SEPARATOR, UNICODE_TERMINATOR } from './psf2/unicode'

// Errors
export { Psf2Error, type Psf2ErrorKind } from './shared/errors'
