// Decode
export { lzwDecode, LittleLzwDecoder, BigLzwDecoder } from './decode/decode'
export type { LzwDecodeOptions } from './decode/decode'
export { LzwDecoder } from './decode/engine'
export type { LzwDecoderOptions } from './decode/engine'
export { LzwDecompressionStream } from './decode/decompression-stream'

// Low-level pieces
export { LzwBitReader } from './decode/bit-reader'
export type { BitOrder, BitCount } from './decode/bit-reader'
export { LzwDictionary, MAX_CODE_SIZE, MAX_DICTIONARY_SIZE } from './decode/dictionary'
export { LzwInput, LzwOutput } from './decode/streams'
