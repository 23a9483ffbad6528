// Bit reading for LZW decompression

import { LzwInput } from './streams'

export type BitOrder = 'little' | 'big'

export interface BitCount {
  bits: number
}

const MAX_READ_BITS = 24

const kBitMask = new Uint32Array([
  0x0, 0x1, 0x3, 0x7, 0xf, 0x1f, 0x3f, 0x7f,
  0xff, 0x1ff, 0x3ff, 0x7ff, 0xfff, 0x1fff, 0x3fff, 0x7fff,
  0xffff, 0x1ffff, 0x3ffff, 0x7ffff, 0xfffff, 0x1fffff, 0x3fffff, 0x7fffff,
  0xffffff,
])

// Byte-at-a-time reader; holds the unread tail of the last byte it consumed.
// In both orders the bits read end up right-aligned in the returned value.
export class LzwBitReader {
  input_: LzwInput
  order_: BitOrder
  bit_buffer_: number = 0
  bit_count_: number = 0

  constructor(input: LzwInput, order: BitOrder) {
    this.input_ = input
    this.order_ = order
  }

  // Short reads are not errors: out.bits says how many bits were available
  readBits(n_bits: number, out: BitCount): number {
    if (!Number.isInteger(n_bits) || n_bits < 0 || n_bits > MAX_READ_BITS) {
      throw new Error(`Invalid bit count: ${n_bits}`)
    }
    return this.order_ === 'little'
      ? this.readLittle(n_bits, out)
      : this.readBig(n_bits, out)
  }

  private readLittle(n_bits: number, out: BitCount): number {
    const take = Math.min(this.bit_count_, n_bits)
    let val = this.bit_buffer_ & kBitMask[take]
    this.bit_buffer_ >>>= take
    this.bit_count_ -= take
    let got = take

    while (got < n_bits) {
      const next_byte = this.input_.readByte()
      if (next_byte < 0) {
        break
      }
      const need = n_bits - got
      if (need >= 8) {
        val |= next_byte << got
        got += 8
        continue
      }
      val |= (next_byte & kBitMask[need]) << got
      this.bit_buffer_ = next_byte >>> need
      this.bit_count_ = 8 - need
      got += need
    }

    out.bits = got
    return val
  }

  private readBig(n_bits: number, out: BitCount): number {
    const take = Math.min(this.bit_count_, n_bits)
    this.bit_count_ -= take
    let val = this.bit_buffer_ >>> this.bit_count_
    this.bit_buffer_ &= kBitMask[this.bit_count_]
    let got = take

    while (got < n_bits) {
      const next_byte = this.input_.readByte()
      if (next_byte < 0) {
        break
      }
      const need = n_bits - got
      if (need >= 8) {
        val = (val << 8) | next_byte
        got += 8
        continue
      }
      const rest = 8 - need
      val = (val << need) | (next_byte >>> rest)
      this.bit_buffer_ = next_byte & kBitMask[rest]
      this.bit_count_ = rest
      got += need
    }

    out.bits = got
    return val
  }
}
