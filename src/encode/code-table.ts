// Code paths derived from a Huffman tree

import { MAX_CODE_CHUNK_BITS, NUM_SYMBOLS } from '../constants'
import type { HuffNode } from '../tree'

// Root-to-leaf path per symbol, '0' for left and '1' for right.
// Symbols without a leaf are undefined.
export type CodeTable = Array<string | undefined>

export interface CodeRun {
  nBits: number
  value: number
}

export function deriveCodeTable(root: HuffNode): CodeTable {
  const codes: CodeTable = new Array<string | undefined>(NUM_SYMBOLS).fill(undefined)
  assignCodes(codes, '', root)
  return codes
}

// A root leaf keeps the empty path
function assignCodes(codes: CodeTable, path: string, node: HuffNode): void {
  if (node.kind === 'leaf') {
    codes[node.symbol] = path
    return
  }
  assignCodes(codes, path + '0', node.left)
  assignCodes(codes, path + '1', node.right)
}

// Split a path into writeBits-sized pieces; long trees can yield codes over 32 bits
export function codeToRuns(path: string): CodeRun[] {
  const runs: CodeRun[] = []
  for (let i = 0; i < path.length; i += MAX_CODE_CHUNK_BITS) {
    const chunk = path.slice(i, i + MAX_CODE_CHUNK_BITS)
    runs.push({ nBits: chunk.length, value: parseInt(chunk, 2) })
  }
  return runs
}
