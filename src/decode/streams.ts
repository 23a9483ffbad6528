// Input/output buffer wrappers for LZW decompression

export class LzwInput {
  buffer: Uint8Array
  pos: number

  constructor(buffer: Uint8Array) {
    this.buffer = buffer
    this.pos = 0
  }

  // -1 once the buffer is exhausted
  readByte(): number {
    if (this.pos >= this.buffer.length) {
      return -1
    }
    return this.buffer[this.pos++]
  }

  available(): number {
    return this.buffer.length - this.pos
  }
}

const INITIAL_OUTPUT_SIZE = 256

export class LzwOutput {
  buffer: Uint8Array
  pos: number

  constructor(capacity: number = INITIAL_OUTPUT_SIZE) {
    this.buffer = new Uint8Array(Math.max(capacity, 1))
    this.pos = 0
  }

  write(buf: Uint8Array): number {
    const count = buf.length
    if (this.pos + count > this.buffer.length) {
      let size = this.buffer.length << 1
      while (size < this.pos + count) {
        size <<= 1
      }
      const grown = new Uint8Array(size)
      grown.set(this.buffer.subarray(0, this.pos))
      this.buffer = grown
    }
    this.buffer.set(buf, this.pos)
    this.pos += count
    return count
  }

  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.pos)
  }
}
