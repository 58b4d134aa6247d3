// Binary reader with bounds checking

export interface ReadBuffer {
  readonly offset: number
  readonly length: number
  readonly remaining: number
  skip(n: number): boolean
  seek(offset: number): boolean
  peekU8(): number | null
  readU8(): number | null
  readU32LE(): number | null
  readBytes(n: number): Uint8Array | null
}

export class ByteReader implements ReadBuffer {
  private u8: Uint8Array
  private pos: number = 0

  constructor(data: ArrayBuffer | Uint8Array) {
    this.u8 = data instanceof Uint8Array ? data : new Uint8Array(data)
  }

  get offset(): number {
    return this.pos
  }

  get length(): number {
    return this.u8.byteLength
  }

  get remaining(): number {
    return this.u8.byteLength - this.pos
  }

  skip(n: number): boolean {
    if (n < 0 || this.pos + n > this.u8.byteLength) {
      return false
    }
    this.pos += n
    return true
  }

  seek(offset: number): boolean {
    if (offset > this.u8.byteLength || offset < 0) {
      return false
    }
    this.pos = offset
    return true
  }

  peekU8(): number | null {
    if (this.pos + 1 > this.u8.byteLength) return null
    return this.u8[this.pos]
  }

  readU8(): number | null {
    if (this.pos + 1 > this.u8.byteLength) return null
    return this.u8[this.pos++]
  }

  readU32LE(): number | null {
    if (this.pos + 4 > this.u8.byteLength) return null
    const idx = this.pos
    this.pos = idx + 4
    return (
      (this.u8[idx + 3] * 0x1000000 +
        ((this.u8[idx + 2] << 16) | (this.u8[idx + 1] << 8) | this.u8[idx])) >>>
      0
    )
  }

  readBytes(n: number): Uint8Array | null {
    if (n < 0 || this.pos + n > this.u8.byteLength) return null
    const result = this.u8.subarray(this.pos, this.pos + n)
    this.pos += n
    return result
  }
}
