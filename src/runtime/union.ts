// src/runtime/union.ts
// Base-type dispatch for generated code

import { UnknownConstructorError } from "./errors";
import { GZIP_PACKED_ID } from "./ids";
import type { TLObject } from "./object";
import type { BinaryReader } from "./reader";

/**
 * The set of constructors a base type admits, in schema order. `is` narrows
 * a decoded object to the union's TypeScript type.
 */
export interface UnionDescriptor<T extends TLObject> {
  readonly name: string;
  readonly ids: readonly number[];
  has(id: number): boolean;
  is(value: TLObject): value is T;
}

export function defineUnion<T extends TLObject>(name: string, ids: readonly number[]): UnionDescriptor<T> {
  const members = new Set(ids);
  return Object.freeze({
    name,
    ids: Object.freeze([...ids]),
    has: (id: number) => members.has(id),
    is: (value: TLObject): value is T => members.has(value.constructorId),
  });
}

/**
 * Decode a value of a base type: peek the id, check it belongs to the union,
 * then hand over to the registry's decoder. Unknown ids raise
 * UnknownConstructorError with the cursor still on the id.
 */
export function readUnion<T extends TLObject>(reader: BinaryReader, union: UnionDescriptor<T>): T {
  const start = reader.offset;
  const id = reader.peekUint();

  if (id === GZIP_PACKED_ID) {
    return reader.packed((inner) => readUnion(inner, union));
  }

  if (!union.has(id)) {
    throw new UnknownConstructorError(id, union.name, start);
  }

  const value = reader.object();
  if (!union.is(value)) {
    reader.seek(start);
    throw new UnknownConstructorError(id, union.name, start);
  }
  return value;
}
