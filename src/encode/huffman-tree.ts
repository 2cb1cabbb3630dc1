// Huffman tree construction from symbol counts

import { ALPH_SIZE, PSEUDO_EOF } from '../constants'
import { type HuffNode, createInternal, createLeaf } from '../tree'
import { NodeHeap } from './node-heap'

// Greedy merge of the two lightest nodes until one remains. Leaves go in by
// ascending symbol with PSEUDO_EOF last; the first node popped becomes the
// left child. With no byte symbols the root is the PSEUDO_EOF leaf itself.
export function buildTree(counts: ArrayLike<number>): HuffNode {
  const heap = new NodeHeap()
  for (let i = 0; i < ALPH_SIZE; i++) {
    if (counts[i] > 0) {
      heap.push(createLeaf(i, counts[i]))
    }
  }
  heap.push(createLeaf(PSEUDO_EOF, Math.max(counts[PSEUDO_EOF] ?? 0, 1)))

  for (;;) {
    const left = heap.pop()
    if (left === undefined) {
      throw new Error('Huffman heap is empty')
    }
    const right = heap.pop()
    if (right === undefined) {
      return left
    }
    heap.push(createInternal(left, right))
  }
}
