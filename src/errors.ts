// Error types raised by the Huffman codec

export class HuffError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

// Input is not a valid compressed stream: wrong magic, or data ends before PSEUDO_EOF
export class MalformedStreamError extends HuffError {}

// Header bits ran out mid-tree, or a leaf carries a value that is not a symbol
export class MalformedHeaderError extends HuffError {}

// Compression reads its input twice and needs to rewind it
export class UnsupportedInputError extends HuffError {}

export class OutputLimitError extends HuffError {
  readonly limit: number

  constructor(limit: number) {
    super(`Decompressed size exceeds limit ${limit}`)
    this.limit = limit
  }
}
