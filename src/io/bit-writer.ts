// Bit writing for Huffman compression

import type { BitOutput } from './streams'

const MAX_WRITE_BITS = 32

// Writes bits to a byte array MSB-first within each byte.
// Inverse of BitReader.
//
// Example: 3 bits 'RRR' written -> BYTE-0: RRR0 0000
// Writing 7 more 'SSSSSSS' -> BYTE-0: RRRS SSSS, BYTE-1: SS00 0000
export class BitWriter implements BitOutput {
  buffer: Uint8Array
  pos: number // bit position
  private flushedBytePos: number
  private closed: boolean

  constructor(initialSize: number = 4096) {
    this.buffer = new Uint8Array(Math.max(1, initialSize))
    this.pos = 0
    this.flushedBytePos = 0
    this.closed = false
  }

  private ensureCapacity(bits: number): void {
    const bytesNeeded = ((this.pos + bits + 7) >>> 3) + 1
    if (bytesNeeded > this.buffer.length) {
      const newSize = Math.max(this.buffer.length * 2, bytesNeeded)
      const newBuffer = new Uint8Array(newSize)
      newBuffer.set(this.buffer)
      this.buffer = newBuffer
    }
  }

  // Write the low nBits of value, up to 32
  writeBits(nBits: number, value: number): void {
    if (this.closed) {
      throw new Error('BitWriter is closed')
    }
    if (!Number.isInteger(nBits) || nBits < 0 || nBits > MAX_WRITE_BITS) {
      throw new RangeError(`Cannot write ${nBits} bits`)
    }
    if (nBits === 0) {
      return
    }
    this.ensureCapacity(nBits)

    const v = (value >>> 0) % 2 ** nBits
    let remaining = nBits
    while (remaining > 0) {
      const bytePos = this.pos >>> 3
      const free = 8 - (this.pos & 7)
      const take = Math.min(free, remaining)
      const chunk = Math.floor(v / 2 ** (remaining - take)) & ((1 << take) - 1)
      this.buffer[bytePos] |= chunk << (free - take)
      this.pos += take
      remaining -= take
    }
  }

  // Align to byte boundary, returns number of padding bits written
  alignToByte(): number {
    const padding = (8 - (this.pos & 7)) & 7
    if (padding > 0) {
      this.writeBits(padding, 0)
    }
    return padding
  }

  close(): void {
    if (this.closed) {
      return
    }
    this.alignToByte()
    this.closed = true
  }

  get isClosed(): boolean {
    return this.closed
  }

  get bitsWritten(): number {
    return this.pos
  }

  reset(): void {
    this.pos = 0
    this.flushedBytePos = 0
    this.closed = false
    this.buffer.fill(0)
  }

  // Return newly completed bytes since the last call.
  // Never returns a partially-written byte
  takeBytes(): Uint8Array {
    const end = this.pos >>> 3
    if (end <= this.flushedBytePos) return new Uint8Array(0)
    const out = this.buffer.slice(this.flushedBytePos, end)
    this.flushedBytePos = end
    return out
  }

  finish(): Uint8Array {
    // Round up to include partial final byte
    const byteLength = (this.pos + 7) >>> 3
    return this.buffer.slice(0, byteLength)
  }
}
