// src/index.ts
// tlgen - Public API
//
// Compiler interface for the CLI, build scripts and tests. Generated code
// imports its runtime from "tlgen/runtime" (src/runtime), not from here.

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE
// ═══════════════════════════════════════════════════════════════════════════════

export {
  compileSchema,
  generate,
  readInputs,
  runGeneration,
  type CompileOptions,
  type GenerateOptions,
  type GenerateResult,
  type SchemaSource,
} from "./pipeline";

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA, IDS & MODEL
// ═══════════════════════════════════════════════════════════════════════════════

export { parseSchema, BUILTIN_COMBINATORS, type ParseOptions } from "./schema/parse";
export type { ParsedSchema, RawDeclaration, RawParam, TypeExpr, Section } from "./schema/types";
export { crc32 } from "./ids/crc32";
export { computeId, resolveIds, type ResolvedDeclaration } from "./ids/resolve";
export { buildModel } from "./model/build";
export type {
  BaseType,
  Combinator,
  ConstructorDef,
  FunctionDef,
  Param,
  ParamType,
  PrimitiveName,
  TLModel,
} from "./model/types";
export { SchemaCodec, EncodeError, type TLPlainObject, type TLValue } from "./codec/schemaCodec";

// ═══════════════════════════════════════════════════════════════════════════════
// EMITTERS
// ═══════════════════════════════════════════════════════════════════════════════

export { emitModel, fileHeader, DEFAULT_RUNTIME_IMPORT, type EmitOptions, type GeneratedFile } from "./emit/emitter";
export { emitErrors, errorClassName, ERRORS_FILE } from "./emit/errorsEmitter";

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR TABLES
// ═══════════════════════════════════════════════════════════════════════════════

export { ErrorTable, compileErrorTable, formatDescription } from "./errors/table";
export { parseErrorPattern, matchWildcard, type ErrorPattern } from "./errors/pattern";
export { parseErrorTsv, parseErrorFileName, loadErrorSource, type ErrorSource } from "./errors/source";
export { RPCError, instantiateRpcError, type RPCErrorClass } from "./errors/rpcError";
export type { ErrorCodeGroup, ErrorEntry, ErrorEntrySource, ErrorKind } from "./errors/types";

// ═══════════════════════════════════════════════════════════════════════════════
// LAYER TRACKING
// ═══════════════════════════════════════════════════════════════════════════════

export { regenerate, readManifest, type GeneratedTree, type RegenerateRequest } from "./layer/tracker";
export { fingerprintFiles, sha256Text, MANIFEST_FILE, type Manifest } from "./layer/fingerprint";
export { withStagingDir } from "./layer/staging";
export {
  prepareUpstreamSchema,
  checkSchemaUpdate,
  applySchemaUpdate,
  diffSchemas,
  type SchemaDiff,
  type SchemaUpdateReport,
} from "./layer/diff";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG, LOGGING & OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./config";
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from "./log/logger";
export * from "./outcome";
