// Huffman decoding

import { BITS_PER_INT, BITS_PER_WORD, HUFF_NUMBER, HUFF_TREE, PSEUDO_EOF } from '../constants'
import { MalformedStreamError, OutputLimitError } from '../errors'
import { headerBitLength, readHeader } from '../header'
import { BitReader } from '../io/bit-reader'
import { BitWriter } from '../io/bit-writer'
import type { BitInput, BitOutput } from '../io/streams'
import { Logger } from '../logger'
import type { HuffInternal, HuffNode } from '../tree'

export interface HuffDecodeOptions {
  maxOutputSize?: number
  logger?: Logger
}

export interface HuffDecodeStats {
  outputBytes: number
  headerBits: number
  bodyBits: number
}

function formatMagic(value: number): string {
  return `0x${value.toString(16).padStart(8, '0')}`
}

function readMagic(input: BitInput): void {
  const magic = input.readBits(BITS_PER_INT)
  if (magic === HUFF_TREE) {
    return
  }
  if (magic === -1) {
    throw new MalformedStreamError('Input is too short to hold a stream header')
  }
  if (magic === HUFF_NUMBER) {
    throw new MalformedStreamError(
      `Count-framed header ${formatMagic(magic)} is not supported, expected ${formatMagic(HUFF_TREE)}`
    )
  }
  throw new MalformedStreamError(`Illegal header starts with ${magic} (${formatMagic(magic)})`)
}

// Walks from the root one bit at a time (0 left, 1 right), writing a symbol
// at each leaf and restarting, until the PSEUDO_EOF leaf is reached.
function readCompressedBits(
  root: HuffNode,
  input: BitInput,
  output: BitOutput,
  maxOutputSize: number
): { outputBytes: number; bodyBits: number } {
  if (root.kind === 'leaf') {
    // One-leaf tree: the only code is the empty path
    if (root.symbol === PSEUDO_EOF) {
      return { outputBytes: 0, bodyBits: 0 }
    }
    throw new MalformedStreamError(`Tree holds only symbol ${root.symbol} and no end of stream`)
  }

  let outputBytes = 0
  let bodyBits = 0
  let current: HuffInternal = root
  for (;;) {
    const bit = input.readBits(1)
    if (bit === -1) {
      throw new MalformedStreamError('Compressed data ended before the end-of-stream code')
    }
    bodyBits++
    const next = bit === 0 ? current.left : current.right
    if (next.kind === 'internal') {
      current = next
      continue
    }
    if (next.symbol === PSEUDO_EOF) {
      return { outputBytes, bodyBits }
    }
    if (outputBytes >= maxOutputSize) {
      throw new OutputLimitError(maxOutputSize)
    }
    output.writeBits(BITS_PER_WORD, next.symbol)
    outputBytes++
    current = root
  }
}

export function decompress(
  input: BitInput,
  output: BitOutput,
  options: HuffDecodeOptions = {}
): HuffDecodeStats {
  const logger = options.logger ?? Logger.getInstance()
  const maxOutputSize = options.maxOutputSize ?? Infinity

  readMagic(input)
  const root = readHeader(input)
  const { outputBytes, bodyBits } = readCompressedBits(root, input, output, maxOutputSize)
  output.close()

  const stats: HuffDecodeStats = {
    outputBytes,
    headerBits: headerBitLength(root),
    bodyBits,
  }
  logger.debug('Huffman stream decompressed', { ...stats })
  return stats
}

// Decompress a byte array in one call
export function huffDecode(
  buffer: Uint8Array,
  options: HuffDecodeOptions = {}
): Uint8Array {
  const reader = BitReader.fromBytes(buffer)
  const writer = new BitWriter(Math.max(64, buffer.length * 2))
  decompress(reader, writer, options)
  return writer.finish()
}
