// Decode raw or gzip-compressed PSF2 (.psf, .psf.gz)

import { Psf2Error } from '../shared/errors'
import { gunzip, isGzip } from '../shared/gzip'
import { psf2Decode } from './decode'
import type { Font } from './font'

export async function psf2Load(data: ArrayBuffer | Uint8Array): Promise<Font> {
  const input = data instanceof Uint8Array ? data : new Uint8Array(data)
  if (!isGzip(input)) {
    return psf2Decode(input)
  }

  let inflated: Uint8Array
  try {
    inflated = await gunzip(input)
  } catch (err) {
    throw new Psf2Error('InvalidCompression', 'Failed to decompress gzip-compressed font', 0, {
      cause: err,
    })
  }
  return psf2Decode(inflated)
}
