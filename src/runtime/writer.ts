// src/runtime/writer.ts
// Growable little-endian writer for TL wire values

import { BOOL_FALSE_ID, BOOL_TRUE_ID, VECTOR_ID } from "./ids";

const INT32_MIN = -0x8000_0000;
const INT32_MAX = 0x7fff_ffff;
const UINT32_MAX = 0xffff_ffff;
const MAX_BYTES_LENGTH = 0xff_ffff;

const utf8 = new TextEncoder();

function checkSigned(value: bigint, bits: number, name: string): void {
  if (BigInt.asIntN(bits, value) !== value) {
    throw new RangeError(`${name} out of range: ${value}`);
  }
}

/** Anything that can put itself on the wire with its constructor id. */
export interface Boxed {
  write(writer: BinaryWriter): void;
}

export class BinaryWriter {
  private buf: Uint8Array;
  private view: DataView;
  private length = 0;

  constructor(initialCapacity = 256) {
    this.buf = new Uint8Array(Math.max(16, initialCapacity));
    this.view = new DataView(this.buf.buffer);
  }

  /** Number of bytes written so far. */
  get size(): number {
    return this.length;
  }

  /**
   * Reserve `n` bytes and return the offset they start at. May replace
   * `buf` and `view`; callers must reserve before touching either.
   */
  private reserve(n: number): number {
    const needed = this.length + n;
    if (needed > this.buf.length) {
      let capacity = this.buf.length * 2;
      while (capacity < needed) capacity *= 2;
      const next = new Uint8Array(capacity);
      next.set(this.buf.subarray(0, this.length));
      this.buf = next;
      this.view = new DataView(next.buffer);
    }
    const offset = this.length;
    this.length = needed;
    return offset;
  }

  /** Signed 32-bit integer (TL `int`). */
  int(value: number): this {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new RangeError(`int out of range: ${value}`);
    }
    const offset = this.reserve(4);
    this.view.setInt32(offset, value, true);
    return this;
  }

  /** Unsigned 32-bit integer, used for constructor ids. */
  uint(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
      throw new RangeError(`uint out of range: ${value}`);
    }
    const offset = this.reserve(4);
    this.view.setUint32(offset, value, true);
    return this;
  }

  /** Signed 64-bit integer (TL `long`). */
  long(value: bigint): this {
    checkSigned(value, 64, "long");
    const offset = this.reserve(8);
    this.view.setBigInt64(offset, value, true);
    return this;
  }

  int128(value: bigint): this {
    checkSigned(value, 128, "int128");
    return this.wideInt(value, 128);
  }

  int256(value: bigint): this {
    checkSigned(value, 256, "int256");
    return this.wideInt(value, 256);
  }

  private wideInt(value: bigint, bits: number): this {
    const offset = this.reserve(bits / 8);
    let rest = BigInt.asUintN(bits, value);
    for (let i = 0; i < bits / 8; i++) {
      this.buf[offset + i] = Number(rest & 0xffn);
      rest >>= 8n;
    }
    return this;
  }

  double(value: number): this {
    const offset = this.reserve(8);
    this.view.setFloat64(offset, value, true);
    return this;
  }

  /** Boxed TL `Bool`. */
  bool(value: boolean): this {
    return this.uint(value ? BOOL_TRUE_ID : BOOL_FALSE_ID);
  }

  /**
   * TL `bytes`: a 1-byte length (or 0xfe plus a 3-byte length from 254 on),
   * the data, then zero padding to a multiple of 4.
   */
  bytes(data: Uint8Array): this {
    const len = data.length;
    if (len > MAX_BYTES_LENGTH) {
      throw new RangeError(`bytes too long: ${len}`);
    }

    let header: number;
    if (len <= 253) {
      const offset = this.reserve(1);
      this.buf[offset] = len;
      header = 1;
    } else {
      const offset = this.reserve(4);
      this.buf[offset] = 254;
      this.buf[offset + 1] = len & 0xff;
      this.buf[offset + 2] = (len >> 8) & 0xff;
      this.buf[offset + 3] = (len >> 16) & 0xff;
      header = 4;
    }

    this.raw(data);
    const padding = (4 - ((header + len) % 4)) % 4;
    this.reserve(padding);
    this.buf.fill(0, this.length - padding, this.length);
    return this;
  }

  /** TL `string`: UTF-8 text encoded as `bytes`. */
  string(value: string): this {
    return this.bytes(utf8.encode(value));
  }

  raw(data: Uint8Array): this {
    const offset = this.reserve(data.length);
    this.buf.set(data, offset);
    return this;
  }

  /** Boxed `Vector<T>`: vector id, count, items. */
  vector<T>(items: readonly T[], writeItem: (item: T, writer: BinaryWriter) => void): this {
    this.uint(VECTOR_ID);
    return this.bareVector(items, writeItem);
  }

  /** Bare `vector<T>`: count, items. */
  bareVector<T>(items: readonly T[], writeItem: (item: T, writer: BinaryWriter) => void): this {
    this.int(items.length);
    for (const item of items) {
      writeItem(item, this);
    }
    return this;
  }

  /** Write a value with its constructor id. */
  object(value: Boxed): this {
    value.write(this);
    return this;
  }

  /** Copy of the bytes written so far. */
  finish(): Uint8Array {
    return this.buf.slice(0, this.length);
  }
}
