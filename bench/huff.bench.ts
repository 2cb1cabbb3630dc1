import { bench, describe } from 'vitest'
import * as zlib from 'node:zlib'
import { huffEncode } from '../src/encode/encode'
import { huffDecode } from '../src/decode/decode'

// Test data
const shortText = 'Hello, World!'
const mediumText = 'The quick brown fox jumps over the lazy dog. '.repeat(100)
const longText = mediumText.repeat(10)
const binary = new Uint8Array(64 * 1024)
let seed = 0x2545f491
for (let i = 0; i < binary.length; i++) {
  seed ^= seed << 13
  seed ^= seed >>> 17
  seed ^= seed << 5
  binary[i] = seed & 0xff
}

const inputs = [
  { name: 'short (13 B)', data: new TextEncoder().encode(shortText) },
  { name: 'medium (4.5 KB)', data: new TextEncoder().encode(mediumText) },
  { name: 'long (45 KB)', data: new TextEncoder().encode(longText) },
  { name: 'random (64 KB)', data: binary },
]

// Quick sanity check - print compression ratios against gzip
console.log('\nCompression ratios:')
for (const { name, data } of inputs) {
  const ours = huffEncode(data)
  const gzip = zlib.gzipSync(data)
  console.log(`${name}: huff=${ours.length} gzip=${gzip.length} (${(ours.length / data.length).toFixed(2)} of input)`)
}
console.log('')

describe('encode', () => {
  for (const { name, data } of inputs) {
    bench(`huff-lib ${name}`, () => {
      huffEncode(data)
    })
  }
})

describe('decode', () => {
  for (const { name, data } of inputs) {
    const encoded = huffEncode(data)
    bench(`huff-lib ${name}`, () => {
      huffDecode(encoded)
    })
  }
})
