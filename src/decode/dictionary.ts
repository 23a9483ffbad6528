// LZW code dictionary

export const MAX_CODE_SIZE = 12
export const MAX_DICTIONARY_SIZE = 1 << MAX_CODE_SIZE

// Every slot owns its buffer; nothing is shared between codes
export class LzwDictionary {
  private entries_: Map<number, Uint8Array> = new Map()

  static join(prefix: Uint8Array, suffix: number): Uint8Array {
    const value = new Uint8Array(prefix.length + 1)
    value.set(prefix)
    value[prefix.length] = suffix
    return value
  }

  get size(): number {
    return this.entries_.size
  }

  get(code: number): Uint8Array | undefined {
    return this.entries_.get(code)
  }

  set(code: number, value: Uint8Array): void {
    this.entries_.set(code, value)
  }

  // Root entries: one byte per code, the code's low byte
  reset(root_bits: number): void {
    this.release()
    const root_size = 1 << root_bits
    for (let i = 0; i < root_size; i++) {
      this.entries_.set(i, Uint8Array.of(i & 0xff))
    }
  }

  release(): void {
    this.entries_.clear()
  }
}
