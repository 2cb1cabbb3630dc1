// Main Huffman encoder API

import { BITS_PER_INT, BITS_PER_WORD, HUFF_TREE, PSEUDO_EOF } from '../constants'
import { UnsupportedInputError } from '../errors'
import { headerBitLength, writeHeader } from '../header'
import { BitReader } from '../io/bit-reader'
import { BitWriter } from '../io/bit-writer'
import { type BitInput, type BitOutput, type RewindableBitInput, isRewindable } from '../io/streams'
import { Logger } from '../logger'
import { type CodeRun, type CodeTable, codeToRuns, deriveCodeTable } from './code-table'
import { collectCounts } from './histogram'
import { buildTree } from './huffman-tree'

export interface HuffEncodeOptions {
  logger?: Logger
}

export interface HuffEncodeStats {
  inputBytes: number
  headerBits: number
  bodyBits: number    // symbol codes plus the PSEUDO_EOF code
  totalBits: number   // magic, header and body, before padding
}

// Two passes over input: count symbols, rewind, then emit codes.
// Rejects an input that cannot rewind before reading from it.
export function compress(
  input: BitInput,
  output: BitOutput,
  options: HuffEncodeOptions = {}
): HuffEncodeStats {
  if (!isRewindable(input)) {
    throw new UnsupportedInputError('Compression input must support reset()')
  }
  const logger = options.logger ?? Logger.getInstance()

  const counts = collectCounts(input)
  const root = buildTree(counts)
  const codes = deriveCodeTable(root)

  output.writeBits(BITS_PER_INT, HUFF_TREE)
  writeHeader(root, output)
  const headerBits = headerBitLength(root)

  input.reset()
  const { inputBytes, bodyBits } = writeCompressedBits(codes, input, output)
  output.close()

  const stats: HuffEncodeStats = {
    inputBytes,
    headerBits,
    bodyBits,
    totalBits: BITS_PER_INT + headerBits + bodyBits,
  }
  logger.debug('Huffman stream compressed', { ...stats })
  return stats
}

function writeCompressedBits(
  codes: CodeTable,
  input: RewindableBitInput,
  output: BitOutput
): { inputBytes: number; bodyBits: number } {
  const runs: Array<CodeRun[] | undefined> = codes.map((path) =>
    path === undefined ? undefined : codeToRuns(path)
  )
  let inputBytes = 0
  let bodyBits = 0

  for (;;) {
    const symbol = input.readBits(BITS_PER_WORD)
    const code = runs[symbol === -1 ? PSEUDO_EOF : symbol]
    if (code === undefined) {
      // Counts came from the same input, so every symbol has a leaf
      throw new Error(`No code for symbol ${symbol}; input changed between passes`)
    }
    for (const run of code) {
      output.writeBits(run.nBits, run.value)
      bodyBits += run.nBits
    }
    if (symbol === -1) break
    inputBytes++
  }
  return { inputBytes, bodyBits }
}

// Compress a byte array in one call
export function huffEncode(
  input: Uint8Array,
  options: HuffEncodeOptions = {}
): Uint8Array {
  const reader = BitReader.fromBytes(input)
  // Header plus codes rarely exceed the input by more than a few hundred bytes
  const writer = new BitWriter(input.length + 512)
  compress(reader, writer, options)
  return writer.finish()
}
