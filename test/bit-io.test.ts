import { describe, it, expect } from 'vitest'
import { BitReader } from '../src/io/bit-reader'
import { BitWriter } from '../src/io/bit-writer'
import { HuffInput } from '../src/io/streams'

describe('BitWriter', () => {
  it('packs bits most significant first', () => {
    const writer = new BitWriter()
    writer.writeBits(3, 0b101)
    writer.writeBits(7, 0b1100110)
    expect(writer.bitsWritten).toBe(10)
    expect(writer.finish()).toEqual(new Uint8Array([0xb9, 0x80]))
  })

  it('writes full 32-bit values', () => {
    const writer = new BitWriter(1)
    writer.writeBits(32, 0xface8201)
    expect(writer.finish()).toEqual(new Uint8Array([0xfa, 0xce, 0x82, 0x01]))
  })

  it('keeps only the low bits of the value', () => {
    const writer = new BitWriter()
    writer.writeBits(4, 0x1f)
    expect(writer.finish()).toEqual(new Uint8Array([0xf0]))
  })

  it('pads the final byte on close and rejects later writes', () => {
    const writer = new BitWriter()
    writer.writeBits(2, 0b11)
    writer.close()
    expect(writer.isClosed).toBe(true)
    expect(writer.bitsWritten).toBe(8)
    expect(writer.finish()).toEqual(new Uint8Array([0xc0]))
    expect(() => writer.writeBits(1, 1)).toThrow('BitWriter is closed')
  })

  it('ignores zero-length writes', () => {
    const writer = new BitWriter()
    writer.writeBits(0, 0xff)
    expect(writer.bitsWritten).toBe(0)
    expect(writer.finish().length).toBe(0)
  })

  it('rejects bit counts outside 0..32', () => {
    const writer = new BitWriter()
    expect(() => writer.writeBits(33, 0)).toThrow(RangeError)
    expect(() => writer.writeBits(-1, 0)).toThrow(RangeError)
  })

  it('grows past its initial size', () => {
    const writer = new BitWriter(1)
    for (let i = 0; i < 100; i++) {
      writer.writeBits(8, i)
    }
    const out = writer.finish()
    expect(out.length).toBe(100)
    expect(out[99]).toBe(99)
  })

  it('hands out only completed bytes from takeBytes', () => {
    const writer = new BitWriter()
    writer.writeBits(12, 0xabc)
    expect(writer.takeBytes()).toEqual(new Uint8Array([0xab]))
    writer.writeBits(4, 0xd)
    expect(writer.takeBytes()).toEqual(new Uint8Array([0xcd]))
    expect(writer.takeBytes().length).toBe(0)
  })

  it('starts over after reset', () => {
    const writer = new BitWriter()
    writer.writeBits(8, 0xff)
    writer.close()
    writer.reset()
    writer.writeBits(4, 0x3)
    expect(writer.finish()).toEqual(new Uint8Array([0x30]))
  })
})

describe('BitReader', () => {
  it('reads back what BitWriter packed', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0xb9, 0x80]))
    expect(reader.readBits(3)).toBe(0b101)
    expect(reader.readBits(7)).toBe(0b1100110)
    expect(reader.readBits(6)).toBe(0)
    expect(reader.bitsRead).toBe(16)
    expect(reader.readBits(1)).toBe(-1)
  })

  it('reads 32-bit values as unsigned', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0xfa, 0xce, 0x82, 0x01]))
    expect(reader.readBits(32)).toBe(0xface8201)
  })

  it('returns -1 when fewer bits remain than requested', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0xff]))
    expect(reader.readBits(9)).toBe(-1)
  })

  it('returns -1 on empty input', () => {
    const reader = new BitReader(new HuffInput(new Uint8Array(0)))
    expect(reader.readBits(8)).toBe(-1)
    expect(reader.bitsRead).toBe(0)
  })

  it('rewinds to the start on reset', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0x12, 0x34]))
    expect(reader.readBits(8)).toBe(0x12)
    expect(reader.readBits(8)).toBe(0x34)
    expect(reader.readBits(8)).toBe(-1)
    reader.reset()
    expect(reader.bitsRead).toBe(0)
    expect(reader.readBits(16)).toBe(0x1234)
  })

  it('reads across input chunk boundaries', () => {
    const size = BitReader.READ_SIZE * 2 + 17
    const data = new Uint8Array(size)
    for (let i = 0; i < size; i++) data[i] = (i * 7) & 0xff
    const reader = BitReader.fromBytes(data)
    const out = new Uint8Array(size)
    for (let i = 0; i < size; i++) {
      out[i] = reader.readBits(8)
    }
    expect(out).toEqual(data)
    expect(reader.readBits(8)).toBe(-1)
  })

  it('rejects bit counts outside 1..32', () => {
    const reader = BitReader.fromBytes(new Uint8Array([0]))
    expect(() => reader.readBits(0)).toThrow(RangeError)
    expect(() => reader.readBits(33)).toThrow(RangeError)
  })
})
