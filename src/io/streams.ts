// Stream contracts consumed by the codec, and a byte buffer source

// Bits are read most significant first. readBits returns -1 once fewer than
// nBits remain; the stream is exhausted after that.
export interface BitInput {
  readBits(nBits: number): number
  reset?(): void
}

export interface RewindableBitInput extends BitInput {
  reset(): void
}

// writeBits takes the low nBits of value, most significant first.
// close pads the last partial byte with zero bits.
export interface BitOutput {
  writeBits(nBits: number, value: number): void
  close(): void
}

export function isRewindable(input: BitInput): input is RewindableBitInput {
  return typeof input.reset === 'function'
}

export class HuffInput {
  buffer: Uint8Array
  pos: number

  constructor(buffer: Uint8Array) {
    this.buffer = buffer
    this.pos = 0
  }

  read(buf: Uint8Array, i: number, count: number): number {
    const available = this.buffer.length - this.pos
    if (count > available) {
      count = available
    }
    buf.set(this.buffer.subarray(this.pos, this.pos + count), i)
    this.pos += count
    return count
  }

  rewind(): void {
    this.pos = 0
  }
}
