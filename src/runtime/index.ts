// src/runtime/index.ts
// Wire runtime imported by generated code

export { BinaryReader } from "./reader";
export { BinaryWriter, type Boxed } from "./writer";
export { TLObject, TLFunction } from "./object";
export { ConstructorRegistry, type Decoder, type RegistryEntry } from "./registry";
export { defineUnion, readUnion, type UnionDescriptor } from "./union";
export { GzipPacked } from "./gzip";
export { UnknownConstructorError, WireFormatError, WireUnderflowError } from "./errors";
export { BOOL_FALSE_ID, BOOL_TRUE_ID, GZIP_PACKED_ID, VECTOR_ID } from "./ids";
export { ErrorTable, formatDescription } from "../errors/table";
export { RPCError, instantiateRpcError, type RPCErrorClass } from "../errors/rpcError";
export type { ErrorCodeGroup, ErrorEntry, ErrorKind } from "../errors/types";
