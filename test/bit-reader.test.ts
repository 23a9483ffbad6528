import { describe, it, expect } from 'vitest'
import { BitCount, LzwBitReader } from '../src/decode/bit-reader'
import { LzwInput } from '../src/decode/streams'

describe('LzwBitReader', () => {
  it('fills low-order bits first in little-endian order', () => {
    const br = new LzwBitReader(new LzwInput(new Uint8Array([0xb4, 0x0f])), 'little')
    const count: BitCount = { bits: 0 }

    expect(br.readBits(3, count)).toBe(4)
    expect(count.bits).toBe(3)
    expect(br.readBits(7, count)).toBe(118)
    expect(count.bits).toBe(7)
  })

  it('fills high-order bits first in big-endian order', () => {
    const br = new LzwBitReader(new LzwInput(new Uint8Array([0xb4, 0x0f])), 'big')
    const count: BitCount = { bits: 0 }

    expect(br.readBits(3, count)).toBe(5)
    expect(count.bits).toBe(3)
    expect(br.readBits(7, count)).toBe(80)
    expect(count.bits).toBe(7)
  })

  it('reports short reads at the end of input', () => {
    for (const [order, tail] of [['little', 3], ['big', 15]] as const) {
      const br = new LzwBitReader(new LzwInput(new Uint8Array([0xb4, 0x0f])), order)
      const count: BitCount = { bits: 0 }
      br.readBits(10, count)

      expect(br.readBits(8, count)).toBe(tail)
      expect(count.bits).toBe(6)
      expect(br.readBits(4, count)).toBe(0)
      expect(count.bits).toBe(0)
    }
  })

  it('reads across several whole bytes', () => {
    const count: BitCount = { bits: 0 }
    const little = new LzwBitReader(new LzwInput(new Uint8Array([0x34, 0x12, 0xff])), 'little')
    expect(little.readBits(16, count)).toBe(0x1234)
    expect(count.bits).toBe(16)

    const big = new LzwBitReader(new LzwInput(new Uint8Array([0x12, 0x34, 0xff])), 'big')
    expect(big.readBits(16, count)).toBe(0x1234)
    expect(count.bits).toBe(16)
  })

  it('advances the input one byte at a time', () => {
    const input = new LzwInput(new Uint8Array([0xaa, 0xbb, 0xcc]))
    const br = new LzwBitReader(input, 'little')
    const count: BitCount = { bits: 0 }

    br.readBits(9, count)
    expect(input.pos).toBe(2)
    br.readBits(7, count)
    expect(input.pos).toBe(2)
    expect(input.available()).toBe(1)
  })

  it('rejects bit counts it cannot hold', () => {
    const br = new LzwBitReader(new LzwInput(new Uint8Array(4)), 'little')
    expect(() => br.readBits(25, { bits: 0 })).toThrow('Invalid bit count: 25')
    expect(() => br.readBits(-1, { bits: 0 })).toThrow('Invalid bit count: -1')
  })
})
