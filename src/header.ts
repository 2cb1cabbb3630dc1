// Tree header serialization
//
// Preorder, one tag bit per node: an internal node is 0 followed by its left
// and right subtrees, a leaf is 1 followed by its symbol in SYMBOL_BITS bits.
// The shape is self-delimiting, so no length field precedes it.

import { NUM_SYMBOLS, SYMBOL_BITS } from './constants'
import { MalformedHeaderError } from './errors'
import type { BitInput, BitOutput } from './io/streams'
import { type HuffNode, createInternal, createLeaf } from './tree'

export function writeHeader(root: HuffNode, out: BitOutput): void {
  if (root.kind === 'leaf') {
    out.writeBits(1, 1)
    out.writeBits(SYMBOL_BITS, root.symbol)
    return
  }
  out.writeBits(1, 0)
  writeHeader(root.left, out)
  writeHeader(root.right, out)
}

// A tree over NUM_SYMBOLS leaves is never deeper than this
const MAX_TREE_DEPTH = NUM_SYMBOLS - 1

// Parsed nodes carry weight 0; only shape and symbols are stored
export function readHeader(input: BitInput, depth: number = 0): HuffNode {
  const tag = input.readBits(1)
  if (tag === -1) {
    throw new MalformedHeaderError('Header ended before the tree was complete')
  }
  if (tag === 0) {
    if (depth >= MAX_TREE_DEPTH) {
      throw new MalformedHeaderError(`Header tree is deeper than ${MAX_TREE_DEPTH} levels`)
    }
    const left = readHeader(input, depth + 1)
    const right = readHeader(input, depth + 1)
    return createInternal(left, right, 0)
  }
  const symbol = input.readBits(SYMBOL_BITS)
  if (symbol === -1) {
    throw new MalformedHeaderError('Header ended inside a leaf value')
  }
  if (symbol >= NUM_SYMBOLS) {
    throw new MalformedHeaderError(`Invalid leaf symbol ${symbol} in header`)
  }
  return createLeaf(symbol, 0)
}

export function headerBitLength(root: HuffNode): number {
  if (root.kind === 'leaf') {
    return 1 + SYMBOL_BITS
  }
  return 1 + headerBitLength(root.left) + headerBitLength(root.right)
}
