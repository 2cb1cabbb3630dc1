// Code tree node types shared by encoder and decoder

export interface HuffLeaf {
  readonly kind: 'leaf'
  readonly symbol: number
  readonly weight: number
}

export interface HuffInternal {
  readonly kind: 'internal'
  readonly weight: number
  readonly left: HuffNode
  readonly right: HuffNode
}

export type HuffNode = HuffLeaf | HuffInternal

export function createLeaf(symbol: number, weight: number): HuffLeaf {
  const leaf: HuffLeaf = { kind: 'leaf', symbol, weight }
  return Object.freeze(leaf)
}

// Weight is the sum of the children's unless given (parsed headers carry none)
export function createInternal(
  left: HuffNode,
  right: HuffNode,
  weight: number = left.weight + right.weight
): HuffInternal {
  const node: HuffInternal = { kind: 'internal', weight, left, right }
  return Object.freeze(node)
}

// Leaf symbols in left-to-right order
export function leafSymbols(root: HuffNode): number[] {
  const out: number[] = []
  const stack: HuffNode[] = [root]
  while (stack.length > 0) {
    const node = stack.pop()
    if (node === undefined) break
    if (node.kind === 'leaf') {
      out.push(node.symbol)
    } else {
      stack.push(node.right, node.left)
    }
  }
  return out
}
