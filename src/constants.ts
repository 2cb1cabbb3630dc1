// Format constants for tree-framed Huffman streams

export const BITS_PER_WORD = 8
export const BITS_PER_INT = 32

// Leaf values in the header need one bit more than a word to hold PSEUDO_EOF
export const SYMBOL_BITS = BITS_PER_WORD + 1

export const ALPH_SIZE = 1 << BITS_PER_WORD        // 256 byte symbols
export const PSEUDO_EOF = ALPH_SIZE                // end-of-stream symbol
export const NUM_SYMBOLS = ALPH_SIZE + 1           // 257 including PSEUDO_EOF

// Magic numbers written as the first 32 bits of a stream
export const HUFF_NUMBER = 0xface8200 // legacy count-framed header
export const HUFF_TREE = 0xface8201   // tree-framed header

// Longest run handed to writeBits at once when emitting a code path
export const MAX_CODE_CHUNK_BITS = 24
