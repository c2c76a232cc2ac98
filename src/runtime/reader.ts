// src/runtime/reader.ts
// Cursor over TL wire bytes

import { gunzipSync } from "node:zlib";
import { UnknownConstructorError, WireFormatError, WireUnderflowError } from "./errors";
import { BOOL_FALSE_ID, BOOL_TRUE_ID, GZIP_PACKED_ID, VECTOR_ID } from "./ids";
import type { TLObject } from "./object";
import type { ConstructorRegistry } from "./registry";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Reads TL values from a byte buffer, advancing by exactly the bytes each
 * value occupies. Boxed objects are resolved through the registry the reader
 * was created with.
 */
export class BinaryReader {
  private readonly view: DataView;
  private pos = 0;

  constructor(
    private readonly data: Uint8Array,
    readonly registry?: ConstructorRegistry
  ) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.data.length - this.pos;
  }

  /** Move the cursor to an absolute offset. */
  seek(offset: number): void {
    if (offset < 0 || offset > this.data.length) {
      throw new WireUnderflowError(0, offset, this.data.length);
    }
    this.pos = offset;
  }

  /** Claim `n` bytes and return the offset they start at. */
  private take(n: number): number {
    if (this.pos + n > this.data.length) {
      throw new WireUnderflowError(n, this.pos, this.remaining);
    }
    const start = this.pos;
    this.pos += n;
    return start;
  }

  int(): number {
    return this.view.getInt32(this.take(4), true);
  }

  uint(): number {
    return this.view.getUint32(this.take(4), true);
  }

  /** Next unsigned 32-bit value without consuming it. */
  peekUint(): number {
    if (this.remaining < 4) {
      throw new WireUnderflowError(4, this.pos, this.remaining);
    }
    return this.view.getUint32(this.pos, true);
  }

  long(): bigint {
    return this.view.getBigInt64(this.take(8), true);
  }

  int128(): bigint {
    return this.wideInt(128);
  }

  int256(): bigint {
    return this.wideInt(256);
  }

  private wideInt(bits: number): bigint {
    const width = bits / 8;
    const start = this.take(width);
    let value = 0n;
    for (let i = width - 1; i >= 0; i--) {
      value = (value << 8n) | BigInt(this.data[start + i]);
    }
    return BigInt.asIntN(bits, value);
  }

  double(): number {
    return this.view.getFloat64(this.take(8), true);
  }

  bool(): boolean {
    const start = this.pos;
    const id = this.peekUint();
    if (id === BOOL_TRUE_ID) {
      this.pos += 4;
      return true;
    }
    if (id === BOOL_FALSE_ID) {
      this.pos += 4;
      return false;
    }
    throw new UnknownConstructorError(id, "Bool", start);
  }

  bytes(): Uint8Array {
    const first = this.data[this.take(1)];
    let length: number;
    let header: number;

    if (first <= 253) {
      length = first;
      header = 1;
    } else if (first === 254) {
      const at = this.take(3);
      length = this.data[at] | (this.data[at + 1] << 8) | (this.data[at + 2] << 16);
      header = 4;
    } else {
      throw new WireFormatError("invalid bytes length prefix 0xff", this.pos - 1);
    }

    const value = this.raw(length);
    this.take((4 - ((header + length) % 4)) % 4);
    return value;
  }

  string(): string {
    const start = this.pos;
    const raw = this.bytes();
    try {
      return utf8.decode(raw);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new WireFormatError(`string is not valid UTF-8: ${reason}`, start);
    }
  }

  raw(n: number): Uint8Array {
    const start = this.take(n);
    return this.data.slice(start, start + n);
  }

  /** Boxed `Vector<T>`. The vector id is checked before anything is consumed. */
  vector<T>(readItem: (reader: BinaryReader) => T): T[] {
    const start = this.pos;
    const id = this.peekUint();
    if (id !== VECTOR_ID) {
      throw new UnknownConstructorError(id, "Vector", start);
    }
    this.pos += 4;
    return this.bareVector(readItem);
  }

  /** Bare `vector<T>`. */
  bareVector<T>(readItem: (reader: BinaryReader) => T): T[] {
    const start = this.pos;
    const count = this.int();
    if (count < 0) {
      throw new WireFormatError(`negative vector length ${count}`, start);
    }
    const items: T[] = [];
    for (let i = 0; i < count; i++) {
      items.push(readItem(this));
    }
    return items;
  }

  /**
   * Any boxed object. `gzip_packed` envelopes are unwrapped transparently.
   * An id the registry does not know leaves the cursor on that id.
   */
  object(): TLObject {
    const start = this.pos;
    const id = this.peekUint();

    if (id === GZIP_PACKED_ID) {
      return this.packed((inner) => inner.object());
    }

    const entry = this.registry?.get(id);
    if (!entry) {
      throw new UnknownConstructorError(id, "Object", start);
    }
    this.pos += 4;
    return entry.read(this);
  }

  /**
   * Decode the content of the `gzip_packed` envelope at the cursor. An
   * unknown id anywhere inside leaves this reader on the envelope and is
   * reported at the envelope's offset.
   */
  packed<T>(read: (inner: BinaryReader) => T): T {
    const start = this.pos;
    this.uint();
    try {
      return read(this.unpacked());
    } catch (err) {
      if (!(err instanceof UnknownConstructorError)) throw err;
      this.pos = start;
      throw new UnknownConstructorError(err.constructorId, err.expected, start);
    }
  }

  /**
   * Read the payload of a `gzip_packed` envelope (the id already consumed)
   * and return a reader over the decompressed bytes.
   */
  unpacked(): BinaryReader {
    const packed = this.bytes();
    return new BinaryReader(new Uint8Array(gunzipSync(packed)), this.registry);
  }
}
