// Bit reading for Huffman decompression

import { HuffInput, type RewindableBitInput } from './streams'

const HUFF_READ_SIZE = 4096
const MAX_READ_BITS = 32

// MSB-first reader over a HuffInput. Bytes are pulled in READ_SIZE chunks;
// within a byte the highest bit comes out first.
export class BitReader implements RewindableBitInput {
  static readonly READ_SIZE = HUFF_READ_SIZE

  input_: HuffInput
  byte_buffer_: Uint8Array
  bytes_in_buffer_: number = 0
  byte_offset_: number = 0
  current_byte_: number = 0
  bits_left_: number = 0
  bits_read_: number = 0
  end_of_stream_reached_: boolean = false

  constructor(input: HuffInput) {
    this.input_ = input
    this.byte_buffer_ = new Uint8Array(HUFF_READ_SIZE)
  }

  static fromBytes(buffer: Uint8Array): BitReader {
    return new BitReader(new HuffInput(buffer))
  }

  get bitsRead(): number {
    return this.bits_read_
  }

  reset(): void {
    this.input_.rewind()
    this.bytes_in_buffer_ = 0
    this.byte_offset_ = 0
    this.current_byte_ = 0
    this.bits_left_ = 0
    this.bits_read_ = 0
    this.end_of_stream_reached_ = false
  }

  private readMoreInput(): boolean {
    if (this.end_of_stream_reached_) {
      return false
    }
    const len = this.input_.read(this.byte_buffer_, 0, HUFF_READ_SIZE)
    this.byte_offset_ = 0
    this.bytes_in_buffer_ = len
    if (len <= 0) {
      this.end_of_stream_reached_ = true
      return false
    }
    return true
  }

  private loadByte(): boolean {
    if (this.byte_offset_ >= this.bytes_in_buffer_ && !this.readMoreInput()) {
      return false
    }
    this.current_byte_ = this.byte_buffer_[this.byte_offset_++]
    this.bits_left_ = 8
    return true
  }

  readBits(n_bits: number): number {
    if (!Number.isInteger(n_bits) || n_bits < 1 || n_bits > MAX_READ_BITS) {
      throw new RangeError(`Cannot read ${n_bits} bits`)
    }
    // Multiply instead of shifting so 32-bit values stay unsigned
    let value = 0
    let remaining = n_bits
    while (remaining > 0) {
      if (this.bits_left_ === 0 && !this.loadByte()) {
        return -1
      }
      const take = Math.min(remaining, this.bits_left_)
      const shift = this.bits_left_ - take
      const bits = (this.current_byte_ >>> shift) & ((1 << take) - 1)
      value = value * (1 << take) + bits
      this.bits_left_ -= take
      remaining -= take
    }
    this.bits_read_ += n_bits
    return value
  }
}
