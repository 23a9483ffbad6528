// LZW decoding engine (GIF/TIFF variable-width codes)

import { BitCount, BitOrder, LzwBitReader } from './bit-reader'
import { LzwDictionary, MAX_CODE_SIZE, MAX_DICTIONARY_SIZE } from './dictionary'
import { LzwInput, LzwOutput } from './streams'

export interface LzwDecoderOptions {
  bitOrder?: BitOrder
  maxOutputSize?: number
  // Throw on codes that cannot be derived from the previous code
  strict?: boolean
}

// Partial code left over when a chunk ended mid-code
interface CodeRemainder {
  data: number
  bits: number
}

const EMPTY = new Uint8Array(0)

/**
 * Resumable LZW decoder. Feed it the compressed stream in chunks of any size;
 * each call returns what those bytes decoded to. Concatenating the results in
 * order gives the full payload up to the end-of-information code.
 */
export class LzwDecoder {
  readonly initCodeSize: number
  readonly clearCode: number
  readonly endInfoCode: number
  readonly bitOrder: BitOrder

  private codeSize_: number
  private nextCode_: number
  private prevCode_: number | null = null
  private remainder_: CodeRemainder | null = null
  private dict_: LzwDictionary = new LzwDictionary()
  private strict_: boolean
  private maxOutputSize_: number | undefined
  private totalOut_: number = 0
  private finished_: boolean = false
  private disposed_: boolean = false

  constructor(initCodeSize: number, options?: LzwDecoderOptions) {
    if (!Number.isInteger(initCodeSize) || initCodeSize < 1 || initCodeSize >= MAX_CODE_SIZE) {
      throw new Error(`Invalid initial code size: ${initCodeSize}`)
    }
    this.initCodeSize = initCodeSize
    this.codeSize_ = initCodeSize
    this.clearCode = 1 << initCodeSize
    this.endInfoCode = this.clearCode + 1
    this.nextCode_ = this.clearCode + 2
    this.bitOrder = options?.bitOrder ?? 'little'
    this.strict_ = options?.strict ?? false
    this.maxOutputSize_ = options?.maxOutputSize
    this.reset()
  }

  get codeSize(): number {
    return this.codeSize_
  }

  // Bits per code in the stream right now
  get codeWidth(): number {
    return this.codeSize_ + 1
  }

  get nextCode(): number {
    return this.nextCode_
  }

  get prevCode(): number | null {
    return this.prevCode_
  }

  get dictionarySize(): number {
    return this.dict_.size
  }

  get pendingBits(): number {
    return this.remainder_?.bits ?? 0
  }

  get isFinished(): boolean {
    return this.finished_
  }

  // A copy; the stored entry stays owned by the dictionary
  entry(code: number): Uint8Array | undefined {
    return this.dict_.get(code)?.slice()
  }

  reset(): void {
    this.codeSize_ = this.initCodeSize
    this.nextCode_ = this.clearCode + 2
    this.dict_.reset(this.initCodeSize)
  }

  dispose(): void {
    this.dict_.release()
    this.remainder_ = null
    this.prevCode_ = null
    this.disposed_ = true
  }

  decode(chunk: Uint8Array | LzwInput): Uint8Array {
    if (this.disposed_) {
      throw new Error('Decoder has been disposed')
    }
    if (this.finished_) {
      return EMPTY
    }

    const input = chunk instanceof LzwInput ? chunk : new LzwInput(chunk)
    const br = new LzwBitReader(input, this.bitOrder)
    const out = new LzwOutput()

    let code = this.readCode(br)
    while (code >= 0) {
      const value = this.dict_.get(code)
      if (value !== undefined) {
        this.emit(out, value)
        const prev = this.previousValue()
        if (prev !== undefined) {
          this.learn(LzwDictionary.join(prev, value[0]))
        }
      } else if (code === this.clearCode) {
        this.reset()
      } else if (code === this.endInfoCode) {
        this.finished_ = true
        this.remainder_ = null
        return out.toUint8Array()
      } else {
        this.decodeUnknown(code, out)
      }

      this.prevCode_ = code
      code = this.readCode(br)
    }

    return out.toUint8Array()
  }

  // A code past the dictionary: the previous value plus its own first byte
  private decodeUnknown(code: number, out: LzwOutput): void {
    const prev = this.previousValue()
    if (this.strict_ && (prev === undefined || code !== this.nextCode_)) {
      throw new Error(`Invalid LZW code: ${code}`)
    }
    if (prev === undefined) {
      return
    }
    const value = LzwDictionary.join(prev, prev[0])
    this.learn(value)
    this.emit(out, value)
  }

  private previousValue(): Uint8Array | undefined {
    return this.prevCode_ === null ? undefined : this.dict_.get(this.prevCode_)
  }

  // Widens exactly when nextCode reaches the edge of the current code space
  private learn(value: Uint8Array): void {
    if (this.nextCode_ >= MAX_DICTIONARY_SIZE) {
      return
    }
    this.dict_.set(this.nextCode_, value)
    this.nextCode_++
    if (this.nextCode_ === 1 << (this.codeSize_ + 1) && this.codeSize_ + 1 < MAX_CODE_SIZE) {
      this.codeSize_++
    }
  }

  private emit(out: LzwOutput, value: Uint8Array): void {
    this.totalOut_ += value.length
    if (this.maxOutputSize_ !== undefined && this.totalOut_ > this.maxOutputSize_) {
      throw new Error(
        `Decompressed size ${this.totalOut_} exceeds limit ${this.maxOutputSize_}`
      )
    }
    out.write(value)
  }

  // Next full code, or -1 once the chunk runs dry (the partial code is kept)
  private readCode(br: LzwBitReader): number {
    const width = this.codeSize_ + 1
    const count: BitCount = { bits: 0 }
    const rem = this.remainder_
    let data: number
    let bits: number

    if (rem !== null) {
      const rest = br.readBits(width - rem.bits, count)
      data = this.bitOrder === 'little'
        ? rem.data | (rest << rem.bits)
        : (rem.data << count.bits) | rest
      bits = rem.bits + count.bits
    } else {
      data = br.readBits(width, count)
      bits = count.bits
    }

    if (bits < width) {
      this.remainder_ = bits > 0 ? { data, bits } : null
      return -1
    }
    this.remainder_ = null
    return data
  }
}
