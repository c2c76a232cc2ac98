// src/codec/schemaCodec.ts
// Encode/decode plain `{ _: qualname, ... }` objects straight from a TLModel

import type { Combinator, ParamType, TLModel } from "../model/types";
import { UnknownConstructorError } from "../runtime/errors";
import { GZIP_PACKED_ID } from "../runtime/ids";
import { BinaryReader } from "../runtime/reader";
import { BinaryWriter } from "../runtime/writer";

export type TLValue = number | bigint | string | boolean | Uint8Array | TLPlainObject | readonly TLValue[] | undefined;

export interface TLPlainObject {
  readonly _: string;
  readonly [field: string]: TLValue;
}

/** A value does not fit the schema type it is written as. */
export class EncodeError extends TypeError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(`EncodeError: ${message} at ${path}`);
    this.name = "EncodeError";
  }
}

export function isPlainObject(value: TLValue): value is TLPlainObject {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array) &&
    "_" in value &&
    typeof value._ === "string"
  );
}

/**
 * Schema-driven codec. Works from the model alone, so a schema can be
 * exercised on the wire without generating code for it.
 */
export class SchemaCodec {
  constructor(readonly model: TLModel) {}

  /** Boxed encoding: constructor id, then fields. */
  encode(value: TLPlainObject): Uint8Array {
    const writer = new BinaryWriter();
    this.writeBoxed(writer, value, value._);
    return writer.finish();
  }

  encodeBare(value: TLPlainObject): Uint8Array {
    const writer = new BinaryWriter();
    this.writeFields(writer, this.combinator(value._, value._), value, value._);
    return writer.finish();
  }

  decode(data: Uint8Array): TLPlainObject {
    return this.readBoxed(new BinaryReader(data), "Object", undefined);
  }

  /** Decode a bare constructor whose name is known from context. */
  decodeBare(data: Uint8Array, qualifiedName: string): TLPlainObject {
    return this.readFields(new BinaryReader(data), this.combinator(qualifiedName, qualifiedName));
  }

  /** Decode the answer to a function call. */
  decodeResult(functionName: string, data: Uint8Array): TLValue {
    const fn = this.model.functionsByName.get(functionName);
    if (!fn) {
      throw new EncodeError(`unknown function ${functionName}`, functionName);
    }
    return this.readValue(new BinaryReader(data), fn.returns);
  }

  // ─────────────────────────────────────────────────────────────────
  // Writing
  // ─────────────────────────────────────────────────────────────────

  private combinator(qualifiedName: string, path: string): Combinator {
    const c = this.model.constructorsByName.get(qualifiedName) ?? this.model.functionsByName.get(qualifiedName);
    if (!c) {
      throw new EncodeError(`unknown constructor ${qualifiedName}`, path);
    }
    return c;
  }

  private writeBoxed(writer: BinaryWriter, value: TLPlainObject, path: string, base?: string): void {
    const c = this.combinator(value._, path);
    if (base !== undefined && (c.kind !== "constructor" || c.belongsTo !== base)) {
      throw new EncodeError(`${value._} is not a constructor of ${base}`, path);
    }
    writer.uint(c.id);
    this.writeFields(writer, c, value, path);
  }

  private writeFields(writer: BinaryWriter, c: Combinator, value: TLPlainObject, path: string): void {
    for (const param of c.params) {
      const at = `${path}.${param.name}`;
      if (param.type.kind === "Bitmask") {
        writer.uint(flagsValue(c, param.name, value));
        continue;
      }
      if (param.type.kind === "Flag") {
        const field = value[param.name];
        if (param.type.inner.kind === "Primitive" && param.type.inner.name === "true") {
          if (field !== undefined && typeof field !== "boolean") {
            throw new EncodeError("expected boolean", at);
          }
          continue;
        }
        if (field !== undefined) {
          this.writeValue(writer, param.type.inner, field, at);
        }
        continue;
      }
      this.writeValue(writer, param.type, value[param.name], at);
    }
  }

  private writeValue(writer: BinaryWriter, type: ParamType, value: TLValue, path: string): void {
    switch (type.kind) {
      case "Primitive":
        return writePrimitive(writer, type.name, value, path);

      case "Vector": {
        if (!Array.isArray(value)) {
          throw new EncodeError("expected array", path);
        }
        const items: readonly TLValue[] = value;
        const itemType = type.item;
        const writeItem = (item: TLValue, w: BinaryWriter) => this.writeValue(w, itemType, item, `${path}[]`);
        if (type.boxed) writer.vector(items, writeItem);
        else writer.bareVector(items, writeItem);
        return;
      }

      case "Union":
        if (!isPlainObject(value)) {
          throw new EncodeError(`expected ${type.base}`, path);
        }
        return this.writeBoxed(writer, value, path, type.base);

      case "AnyObject":
        if (!isPlainObject(value)) {
          throw new EncodeError("expected object", path);
        }
        return this.writeBoxed(writer, value, path);

      case "Bare": {
        if (!isPlainObject(value) || value._ !== type.constructor) {
          throw new EncodeError(`expected ${type.constructor}`, path);
        }
        return this.writeFields(writer, this.combinator(type.constructor, path), value, path);
      }

      case "Bitmask":
      case "Flag":
        throw new EncodeError(`${type.kind} is only valid as a direct parameter`, path);
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Reading
  // ─────────────────────────────────────────────────────────────────

  private readBoxed(reader: BinaryReader, expected: string, base: readonly number[] | undefined): TLPlainObject {
    const start = reader.offset;
    const id = reader.peekUint();

    if (id === GZIP_PACKED_ID) {
      return reader.packed((inner) => this.readBoxed(inner, expected, base));
    }

    const c = this.model.byId.get(id);
    if (!c || (base !== undefined && !base.includes(id))) {
      throw new UnknownConstructorError(id, expected, start);
    }
    reader.uint();
    return this.readFields(reader, c);
  }

  private readFields(reader: BinaryReader, c: Combinator): TLPlainObject {
    const out: Record<string, TLValue> = {};
    const flags = new Map<string, number>();

    for (const param of c.params) {
      const type = param.type;
      if (type.kind === "Bitmask") {
        flags.set(param.name, reader.uint());
        continue;
      }
      if (type.kind === "Flag") {
        const set = ((flags.get(type.field) ?? 0) & (1 << type.bit)) !== 0;
        if (type.inner.kind === "Primitive" && type.inner.name === "true") {
          out[param.name] = set;
        } else if (set) {
          out[param.name] = this.readValue(reader, type.inner);
        }
        continue;
      }
      out[param.name] = this.readValue(reader, type);
    }

    return { ...out, _: c.qualifiedName };
  }

  private readValue(reader: BinaryReader, type: ParamType): TLValue {
    switch (type.kind) {
      case "Primitive":
        return readPrimitive(reader, type.name);
      case "Vector": {
        const itemType = type.item;
        const readItem = (r: BinaryReader) => this.readValue(r, itemType);
        return type.boxed ? reader.vector(readItem) : reader.bareVector(readItem);
      }
      case "Union": {
        const base = this.model.basesByName.get(type.base);
        return this.readBoxed(reader, type.base, base ? base.ids : []);
      }
      case "AnyObject":
        return this.readBoxed(reader, "Object", undefined);
      case "Bare":
        return this.readFields(reader, this.combinator(type.constructor, type.constructor));
      case "Bitmask":
        return reader.uint();
      case "Flag":
        return this.readValue(reader, type.inner);
    }
  }
}

/** The `#` word for `field`: one bit per conditional parameter that is present. */
export function flagsValue(c: Combinator, field: string, value: TLPlainObject): number {
  let flags = 0;
  for (const param of c.params) {
    if (param.type.kind !== "Flag" || param.type.field !== field) continue;
    const v = value[param.name];
    const isTrueFlag = param.type.inner.kind === "Primitive" && param.type.inner.name === "true";
    const present = isTrueFlag ? v === true : v !== undefined;
    if (present) flags |= 1 << param.type.bit;
  }
  return flags >>> 0;
}

function writePrimitive(writer: BinaryWriter, name: string, value: TLValue, path: string): void {
  switch (name) {
    case "int":
    case "double":
      if (typeof value !== "number") throw new EncodeError("expected number", path);
      if (name === "int") writer.int(value);
      else writer.double(value);
      return;
    case "long":
    case "int128":
    case "int256":
      if (typeof value !== "bigint") throw new EncodeError("expected bigint", path);
      if (name === "long") writer.long(value);
      else if (name === "int128") writer.int128(value);
      else writer.int256(value);
      return;
    case "string":
      if (typeof value !== "string") throw new EncodeError("expected string", path);
      writer.string(value);
      return;
    case "bytes":
      if (!(value instanceof Uint8Array)) throw new EncodeError("expected Uint8Array", path);
      writer.bytes(value);
      return;
    case "Bool":
      if (typeof value !== "boolean") throw new EncodeError("expected boolean", path);
      writer.bool(value);
      return;
    case "true":
      return;
    default:
      throw new EncodeError(`unknown primitive ${name}`, path);
  }
}

function readPrimitive(reader: BinaryReader, name: string): TLValue {
  switch (name) {
    case "int":
      return reader.int();
    case "double":
      return reader.double();
    case "long":
      return reader.long();
    case "int128":
      return reader.int128();
    case "int256":
      return reader.int256();
    case "string":
      return reader.string();
    case "bytes":
      return reader.bytes();
    case "Bool":
      return reader.bool();
    default:
      return true;
  }
}
