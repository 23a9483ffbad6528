// LZW decoding

import { LzwDecoder, LzwDecoderOptions } from './engine'

export type LzwDecodeOptions = LzwDecoderOptions

export function lzwDecode(
  buffer: Uint8Array,
  initCodeSize: number,
  options?: LzwDecodeOptions
): Uint8Array {
  const decoder = new LzwDecoder(initCodeSize, options)
  try {
    return decoder.decode(buffer)
  } finally {
    decoder.dispose()
  }
}

// GIF streams pack codes LSB-first
export class LittleLzwDecoder extends LzwDecoder {
  constructor(initCodeSize: number, options?: Omit<LzwDecoderOptions, 'bitOrder'>) {
    super(initCodeSize, { ...options, bitOrder: 'little' })
  }
}

// TIFF strips pack codes MSB-first
export class BigLzwDecoder extends LzwDecoder {
  constructor(initCodeSize: number, options?: Omit<LzwDecoderOptions, 'bitOrder'>) {
    super(initCodeSize, { ...options, bitOrder: 'big' })
  }
}
