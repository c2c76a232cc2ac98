// src/pipeline.ts
// Schema text (+ error table) -> model -> generated files

import * as fs from "fs";
import type { TlgenConfig } from "./config/config";
import { DEFAULT_RUNTIME_IMPORT, emitModel, sortFiles, type GeneratedFile } from "./emit/emitter";
import { emitErrors } from "./emit/errorsEmitter";
import { loadErrorSource } from "./errors/source";
import type { ErrorCodeGroup } from "./errors/types";
import { resolveIds } from "./ids/resolve";
import { silentLogger, type Logger } from "./log/logger";
import { buildModel } from "./model/build";
import type { TLModel } from "./model/types";
import type { Diagnostic } from "./outcome/diagnostic";
import { formatDiagnostic } from "./outcome/diagnostic";
import { MissingLayerError } from "./outcome/errors";
import type { GenerationOutcome } from "./outcome/outcome";
import { parseSchema } from "./schema/parse";
import type { RawDeclaration } from "./schema/types";
import { regenerate } from "./layer/tracker";

export type SchemaSource = {
  text: string;
  file?: string;
};

export type CompileOptions = {
  requireLayer?: boolean;
  logger?: Logger;
};

/**
 * Parse, resolve ids and build the model. Each source is parsed on its
 * own (starting in the types section); declarations keep source order.
 * The layer is the highest one any source declares.
 */
export function compileSchema(sources: readonly SchemaSource[], options: CompileOptions = {}): TLModel {
  const log = (options.logger ?? silentLogger).child("schema");
  const declarations: RawDeclaration[] = [];
  let layer: number | undefined;

  for (const source of sources) {
    const parsed = parseSchema(source.text, { file: source.file });
    log.debug(
      `Parsed ${source.file ?? "<schema>"}: ${parsed.declarations.length} declarations, ${parsed.skipped.length} built-in`
    );
    for (const decl of parsed.declarations) {
      declarations.push({ ...decl, index: declarations.length });
    }
    if (parsed.layer !== undefined && (layer === undefined || parsed.layer > layer)) {
      layer = parsed.layer;
    }
  }

  if (options.requireLayer && layer === undefined) {
    throw new MissingLayerError(sources[0]?.file);
  }

  const resolved = resolveIds(declarations);
  const model = buildModel({ layer, declarations: resolved });
  log.debug(
    `Model at layer ${model.layer}: ${model.constructors.length} constructors, ${model.functions.length} functions, ${model.bases.length} base types`
  );
  return model;
}

export type GenerateOptions = CompileOptions & {
  schema: readonly SchemaSource[];
  errors?: readonly ErrorCodeGroup[];
  runtimeImport?: string;
};

export type GenerateResult = {
  readonly files: GeneratedFile[];
  readonly layer: number;
  readonly model: TLModel;
};

/** Compile everything in memory. Throws the first compile error. */
export function generate(options: GenerateOptions): GenerateResult {
  const log = (options.logger ?? silentLogger).child("emit");
  const runtimeImport = options.runtimeImport ?? DEFAULT_RUNTIME_IMPORT;
  const model = compileSchema(options.schema, options);

  const files = emitModel(model, { runtimeImport, withErrors: options.errors !== undefined });
  if (options.errors !== undefined) {
    files.push(emitErrors(options.errors, { runtimeImport, layer: model.layer }));
  }
  log.debug(`Emitted ${files.length} files`);

  return { files: sortFiles(files), layer: model.layer, model };
}

/** Read the inputs a config names. */
export function readInputs(config: TlgenConfig): {
  schema: SchemaSource[];
  errors?: readonly ErrorCodeGroup[];
  warnings: readonly Diagnostic[];
} {
  const schema = config.schema.paths.map((file) => ({ file, text: fs.readFileSync(file, "utf8") }));
  if (!config.errors.sourceDir) {
    return { schema, warnings: [] };
  }
  const source = loadErrorSource(config.errors.sourceDir);
  return { schema, errors: source.groups, warnings: source.warnings };
}

/**
 * Full run as the CLI performs it: read inputs, generate, then let the
 * tracker decide whether the output tree changes.
 */
export function runGeneration(
  config: TlgenConfig,
  options: { force?: boolean; logger?: Logger } = {}
): GenerationOutcome {
  const logger = options.logger ?? silentLogger;
  return regenerate({
    outDir: config.output.dir,
    force: options.force,
    logger,
    generate: () => {
      const inputs = readInputs(config);
      for (const w of inputs.warnings) {
        logger.warn(formatDiagnostic(w));
      }
      const result = generate({
        schema: inputs.schema,
        errors: inputs.errors,
        runtimeImport: config.output.runtimeImport,
        requireLayer: config.schema.requireLayer,
        logger,
      });
      return { files: result.files, layer: result.layer };
    },
  });
}
