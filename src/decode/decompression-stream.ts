/**
 * Web Streams wrapper around a single LzwDecoder, shaped like the platform
 * DecompressionStream.
 *
 * Usage:
 *   readable.pipeThrough(new LzwDecompressionStream(8))
 */

import { LzwDecoder, LzwDecoderOptions } from './engine'

export class LzwDecompressionStream {
  readonly readable: ReadableStream<Uint8Array>
  readonly writable: WritableStream<Uint8Array>

  constructor(initCodeSize: number, options?: LzwDecoderOptions) {
    const decoder = new LzwDecoder(initCodeSize, options)

    const { readable, writable } = new TransformStream<Uint8Array, Uint8Array>({
      transform(chunk, controller) {
        try {
          const result = decoder.decode(chunk)
          if (result.length > 0) controller.enqueue(result)
        } catch (error) {
          decoder.dispose()
          const message = error instanceof Error ? error.message : String(error)
          controller.error(new Error(`LZW decode failed: ${message}`))
        }
      },

      // Cancelled or aborted streams leave the decoder to garbage collection
      flush() {
        decoder.dispose()
      }
    })

    this.readable = readable
    this.writable = writable
  }
}
