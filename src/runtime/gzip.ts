// src/runtime/gzip.ts
// gzip_packed envelope: a boxed object compressed into a TL `bytes`

import { gzipSync } from "node:zlib";
import { GZIP_PACKED_ID } from "./ids";
import { TLObject } from "./object";
import type { BinaryWriter } from "./writer";

export class GzipPacked extends TLObject {
  static readonly ID = GZIP_PACKED_ID;
  readonly constructorId = GZIP_PACKED_ID;
  readonly qualname = "GzipPacked";

  constructor(readonly packedData: TLObject) {
    super();
  }

  writeBare(writer: BinaryWriter): void {
    writer.bytes(new Uint8Array(gzipSync(this.packedData.encode())));
  }
}
