// Min-heap of tree nodes for Huffman tree construction

import type { HuffNode } from '../tree'

interface HeapEntry {
  node: HuffNode
  seq: number
}

// Ordered by weight, then by insertion sequence, so equal weights pop
// first-in first-out and a given input always builds the same tree.
export class NodeHeap {
  private entries: HeapEntry[] = []
  private nextSeq: number = 0

  get length(): number {
    return this.entries.length
  }

  push(node: HuffNode): void {
    const entries = this.entries
    entries.push({ node, seq: this.nextSeq++ })
    let i = entries.length - 1
    while (i > 0) {
      const parent = (i - 1) >> 1
      if (!less(entries[i], entries[parent])) break
      swap(entries, i, parent)
      i = parent
    }
  }

  pop(): HuffNode | undefined {
    const entries = this.entries
    const top = entries[0]
    const last = entries.pop()
    if (top === undefined || last === undefined) return undefined
    if (entries.length === 0) return top.node

    entries[0] = last
    let i = 0
    for (;;) {
      const l = 2 * i + 1
      const r = l + 1
      let smallest = i
      if (l < entries.length && less(entries[l], entries[smallest])) smallest = l
      if (r < entries.length && less(entries[r], entries[smallest])) smallest = r
      if (smallest === i) break
      swap(entries, i, smallest)
      i = smallest
    }
    return top.node
  }
}

function less(a: HeapEntry, b: HeapEntry): boolean {
  if (a.node.weight !== b.node.weight) return a.node.weight < b.node.weight
  return a.seq < b.seq
}

function swap(entries: HeapEntry[], i: number, j: number): void {
  const tmp = entries[i]
  entries[i] = entries[j]
  entries[j] = tmp
}
