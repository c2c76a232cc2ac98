// src/runtime/registry.ts
// Lookup table from constructor id to decoder, built by generated code

import type { TLObject } from "./object";
import { BinaryReader } from "./reader";

export type Decoder<T extends TLObject = TLObject> = (reader: BinaryReader) => T;

export interface RegistryEntry {
  readonly id: number;
  readonly qualname: string;
  readonly read: Decoder;
}

/**
 * Explicit id → decoder table. Generated `all.ts` builds one for the whole
 * schema; readers consult it for every boxed value.
 */
export class ConstructorRegistry {
  private readonly byId = new Map<number, RegistryEntry>();

  constructor(
    readonly layer: number,
    entries: readonly (readonly [number, string, Decoder])[] = []
  ) {
    for (const [id, qualname, read] of entries) {
      this.register(id, qualname, read);
    }
  }

  /**
   * Register a decoder. Throws on duplicate ids.
   */
  register(id: number, qualname: string, read: Decoder): this {
    const existing = this.byId.get(id);
    if (existing) {
      throw new Error(`Constructor id 0x${id.toString(16)} already registered for ${existing.qualname}`);
    }
    this.byId.set(id, { id, qualname, read });
    return this;
  }

  get(id: number): RegistryEntry | undefined {
    return this.byId.get(id);
  }

  has(id: number): boolean {
    return this.byId.has(id);
  }

  qualname(id: number): string | undefined {
    return this.byId.get(id)?.qualname;
  }

  get size(): number {
    return this.byId.size;
  }

  ids(): number[] {
    return Array.from(this.byId.keys());
  }

  /** Decode one boxed object from the start of `data`. */
  decode(data: Uint8Array): TLObject {
    return this.reader(data).object();
  }

  reader(data: Uint8Array): BinaryReader {
    return new BinaryReader(data, this);
  }
}
