// Decode
export { huffDecode, decompress } from './decode/decode'
export type { HuffDecodeOptions, HuffDecodeStats } from './decode/decode'

// Encode
export { huffEncode, compress } from './encode/encode'
export type { HuffEncodeOptions, HuffEncodeStats } from './encode/encode'
export { collectCounts } from './encode/histogram'
export { buildTree } from './encode/huffman-tree'
export { deriveCodeTable } from './encode/code-table'
export type { CodeTable } from './encode/code-table'

// Tree and header
export { createLeaf, createInternal, leafSymbols } from './tree'
export type { HuffNode, HuffLeaf, HuffInternal } from './tree'
export { writeHeader, readHeader, headerBitLength } from './header'

// Bit streams
export { BitReader } from './io/bit-reader'
export { BitWriter } from './io/bit-writer'
export { HuffInput, isRewindable } from './io/streams'
export type { BitInput, BitOutput, RewindableBitInput } from './io/streams'

export {
  HuffError,
  MalformedStreamError,
  MalformedHeaderError,
  UnsupportedInputError,
  OutputLimitError,
} from './errors'
export { Logger, LogLevel } from './logger'
export type { LogEntry } from './logger'
export {
  ALPH_SIZE,
  BITS_PER_INT,
  BITS_PER_WORD,
  HUFF_NUMBER,
  HUFF_TREE,
  NUM_SYMBOLS,
  PSEUDO_EOF,
  SYMBOL_BITS,
} from './constants'
