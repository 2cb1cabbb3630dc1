// Symbol frequency counting for Huffman compression

import { BITS_PER_WORD, NUM_SYMBOLS, PSEUDO_EOF } from '../constants'
import type { BitInput } from '../io/streams'

// Consumes the whole input. PSEUDO_EOF is always counted exactly once so the
// tree has a leaf to terminate on, even for empty input.
export function collectCounts(input: BitInput): Uint32Array {
  const counts = new Uint32Array(NUM_SYMBOLS)
  for (;;) {
    const symbol = input.readBits(BITS_PER_WORD)
    if (symbol === -1) break
    counts[symbol]++
  }
  counts[PSEUDO_EOF] = 1
  return counts
}
