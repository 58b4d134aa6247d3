// Gzip decompression
// Tries Node zlib, then browser DecompressionStream

type DecompressFn = (data: Uint8Array) => Promise<Uint8Array>

const GZIP_ID1 = 0x1f
const GZIP_ID2 = 0x8b

let zlibDecompress: Promise<DecompressFn | null> | null = null

async function tryLoadZlib(): Promise<DecompressFn | null> {
  if (typeof process === 'undefined' || !process.versions?.node) return null
  try {
    const zlib = await import('node:zlib')
    return async (data: Uint8Array) => {
      const result = zlib.gunzipSync(data)
      return new Uint8Array(result.buffer, result.byteOffset, result.byteLength)
    }
  } catch {
    // zlib unavailable
    return null
  }
}

function tryLoadBrowserGunzip(): DecompressFn | null {
  if (typeof DecompressionStream === 'undefined') return null
  return async (data: Uint8Array): Promise<Uint8Array> => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(data)
        controller.close()
      },
    }).pipeThrough(new DecompressionStream('gzip'))
    return new Uint8Array(await new Response(stream).arrayBuffer())
  }
}

export function isGzip(data: Uint8Array): boolean {
  return data.byteLength >= 2 && data[0] === GZIP_ID1 && data[1] === GZIP_ID2
}

export async function gunzip(data: Uint8Array): Promise<Uint8Array> {
  zlibDecompress ??= tryLoadZlib()
  const native = await zlibDecompress
  if (native) {
    return native(data)
  }
  const browser = tryLoadBrowserGunzip()
  if (browser) {
    return browser(data)
  }
  throw new Error('Gzip decode requires Node.js zlib or browser DecompressionStream API')
}
