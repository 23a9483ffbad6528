// Test helpers: pack LZW codes at explicit widths, and a reference GIF-style encoder

import type { BitOrder } from '../../src/decode/bit-reader'

export type Code = [code: number, width: number]

export class CodeWriter {
  private bytes: number[] = []
  private acc = 0
  private count = 0

  constructor(private readonly order: BitOrder) {}

  write(code: number, width: number): void {
    for (let i = 0; i < width; i++) {
      const bit = this.order === 'little'
        ? (code >>> i) & 1
        : (code >>> (width - 1 - i)) & 1
      if (this.order === 'little') {
        this.acc |= bit << this.count
      } else {
        this.acc |= bit << (7 - this.count)
      }
      if (++this.count === 8) {
        this.bytes.push(this.acc)
        this.acc = 0
        this.count = 0
      }
    }
  }

  finish(): Uint8Array {
    if (this.count > 0) {
      this.bytes.push(this.acc)
      this.acc = 0
      this.count = 0
    }
    return Uint8Array.from(this.bytes)
  }
}

export function packCodes(codes: Code[], order: BitOrder = 'little'): Uint8Array {
  const writer = new CodeWriter(order)
  for (const [code, width] of codes) writer.write(code, width)
  return writer.finish()
}

// Widens after the entry that pushes nextCode past the code space, clears at 4096
export function lzwEncode(data: Uint8Array, initCodeSize: number, order: BitOrder = 'little'): Uint8Array {
  const clear = 1 << initCodeSize
  const eoi = clear + 1
  const writer = new CodeWriter(order)
  const table = new Map<number, number>()
  let width = initCodeSize + 1
  let next = clear + 2

  writer.write(clear, width)
  if (data.length === 0) {
    writer.write(eoi, width)
    return writer.finish()
  }

  let current = data[0]
  for (let i = 1; i < data.length; i++) {
    const key = current * 256 + data[i]
    const hit = table.get(key)
    if (hit !== undefined) {
      current = hit
      continue
    }
    writer.write(current, width)
    if (next < 4096) {
      table.set(key, next++)
      if (next > 1 << width && width < 12) width++
    } else {
      writer.write(clear, width)
      table.clear()
      next = clear + 2
      width = initCodeSize + 1
    }
    current = data[i]
  }
  writer.write(current, width)
  if (next === 1 << width && width < 12) width++
  writer.write(eoi, width)
  return writer.finish()
}

export function makeXorshift32(seed: number): () => number {
  let x = seed | 0
  return () => {
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    return x >>> 0
  }
}

export function randomBytes(len: number, nextU32: () => number, alphabet = 256): Uint8Array {
  const out = new Uint8Array(len)
  for (let i = 0; i < len; i++) out[i] = nextU32() % alphabet
  return out
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let len = 0
  for (const c of chunks) len += c.length
  const out = new Uint8Array(len)
  let o = 0
  for (const c of chunks) {
    out.set(c, o)
    o += c.length
  }
  return out
}
