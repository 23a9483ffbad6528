// Decode benchmark: one-shot vs chunked feeding
// Usage: npm run bench
//        BENCH_SAMPLES=50 npm run bench
import { bench, describe } from 'vitest'
import { performance } from 'node:perf_hooks'
import { LzwDecoder, lzwDecode } from '../src/index'
import { lzwEncode, makeXorshift32, randomBytes } from '../test/lib/codes'

const SAMPLE_COUNT = Number(process.env.BENCH_SAMPLES ?? '25')
const WARMUP_COUNT = Number(process.env.BENCH_WARMUP ?? '10')

interface Fixture {
  name: string
  compressed: Uint8Array
  originalSize: number
}

const nextU32 = makeXorshift32(0x5EED)
const sources: Array<{ name: string; data: Uint8Array }> = [
  { name: 'text', data: new TextEncoder().encode('The quick brown fox jumps over the lazy dog. '.repeat(2000)) },
  { name: 'indexed-16', data: randomBytes(256 * 1024, nextU32, 16) },
  { name: 'random-binary', data: randomBytes(256 * 1024, nextU32) },
]

const fixtures: Fixture[] = sources.map(({ name, data }) => ({
  name,
  compressed: lzwEncode(data, 8),
  originalSize: data.length,
}))

function decodeChunked(compressed: Uint8Array, chunkSize: number): number {
  const decoder = new LzwDecoder(8)
  let total = 0
  for (let pos = 0; pos < compressed.length; pos += chunkSize) {
    total += decoder.decode(compressed.subarray(pos, pos + chunkSize)).length
  }
  decoder.dispose()
  return total
}

console.log(`\n[bench] samples=${SAMPLE_COUNT} warmup=${WARMUP_COUNT}`)
for (const fixture of fixtures) {
  const whole = mean(collectSamples(() => lzwDecode(fixture.compressed, 8), WARMUP_COUNT, SAMPLE_COUNT))
  const chunked = mean(collectSamples(() => decodeChunked(fixture.compressed, 255), WARMUP_COUNT, SAMPLE_COUNT))
  const mbps = fixture.originalSize / 1024 / 1024 / (whole / 1000)
  console.log(
    `[cmp] ${fixture.name.padEnd(15)} whole=${whole.toFixed(2)}ms chunked=${chunked.toFixed(2)}ms ` +
    `${mbps.toFixed(1)} MB/s ratio=${(fixture.compressed.length / fixture.originalSize).toFixed(2)}`
  )
}
console.log('')

for (const chunkSize of [Infinity, 4096, 255]) {
  describe(chunkSize === Infinity ? 'one call' : `${chunkSize} B chunks`, () => {
    for (const fixture of fixtures) {
      const sizeLabel = `${(fixture.originalSize / 1024).toFixed(0)} KB`
      bench(`${fixture.name} (${sizeLabel})`, () => {
        if (chunkSize === Infinity) lzwDecode(fixture.compressed, 8)
        else decodeChunked(fixture.compressed, chunkSize)
      })
    }
  })
}

function collectSamples(fn: () => void, warmup: number, samples: number): number[] {
  for (let i = 0; i < warmup; i++) fn()
  const data: number[] = []
  for (let i = 0; i < samples; i++) {
    const start = performance.now()
    fn()
    data.push(performance.now() - start)
  }
  return data
}

function mean(v: number[]): number {
  return v.reduce((a, b) => a + b, 0) / v.length
}
