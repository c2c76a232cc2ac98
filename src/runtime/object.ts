// src/runtime/object.ts
// Base classes for generated constructors and functions

import type { BinaryReader } from "./reader";
import { BinaryWriter } from "./writer";

/**
 * One concrete TL constructor. Generated subclasses supply the id, the
 * qualified name and the bare field layout; boxing is handled here.
 */
export abstract class TLObject {
  abstract readonly constructorId: number;
  abstract readonly qualname: string;

  /** Write the fields in declared order, without the constructor id. */
  abstract writeBare(writer: BinaryWriter): void;

  /** Write the constructor id followed by the fields. */
  write(writer: BinaryWriter): void {
    writer.uint(this.constructorId);
    this.writeBare(writer);
  }

  encode(): Uint8Array {
    const writer = new BinaryWriter();
    this.write(writer);
    return writer.finish();
  }

  encodeBare(): Uint8Array {
    const writer = new BinaryWriter();
    this.writeBare(writer);
    return writer.finish();
  }

  toJSON(): Record<string, unknown> {
    const out: Record<string, unknown> = { _: this.qualname };
    for (const [key, value] of Object.entries(this)) {
      if (key === "constructorId" || key === "qualname" || value === undefined) continue;
      out[key] = jsonValue(value);
    }
    return out;
  }
}

/** A remote method. `readResult` decodes what the server answers with. */
export abstract class TLFunction<R> extends TLObject {
  abstract readResult(reader: BinaryReader): R;
}

function jsonValue(value: unknown): unknown {
  if (value instanceof TLObject) return value.toJSON();
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString("base64");
  if (Array.isArray(value)) return value.map(jsonValue);
  return value;
}
