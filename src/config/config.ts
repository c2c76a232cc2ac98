// src/config/config.ts
// Configuration for tlgen: defaults, environment, config file, CLI overrides

import * as fs from "fs";
import * as path from "path";
import { DEFAULT_RUNTIME_IMPORT } from "../emit/emitter";
import { isLogLevel, type LogLevel } from "../log/logger";

// =========================================================================
// Configuration Types
// =========================================================================

export type SchemaConfig = {
  /** `.tl` files, concatenated in this order */
  paths: string[];
  /** Fail when no `// LAYER N` marker is present */
  requireLayer: boolean;
};

export type ErrorsConfig = {
  /** Directory of `<code>_<NAME>.tsv` files; no errors.ts without it */
  sourceDir?: string;
};

export type OutputConfig = {
  dir: string;
  /** Module specifier the generated code imports the wire runtime from */
  runtimeImport: string;
};

export type LogConfig = {
  level: LogLevel;
};

export type TlgenConfig = {
  schema: SchemaConfig;
  errors: ErrorsConfig;
  output: OutputConfig;
  log: LogConfig;
};

/** A config source that only sets some values. */
export type TlgenConfigInput = {
  schema?: Partial<SchemaConfig>;
  errors?: Partial<ErrorsConfig>;
  output?: Partial<OutputConfig>;
  log?: Partial<LogConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONFIG: TlgenConfig = {
  schema: { paths: [], requireLayer: true },
  errors: {},
  output: { dir: "generated", runtimeImport: DEFAULT_RUNTIME_IMPORT },
  log: { level: "info" },
};

export const DEFAULT_CONFIG_FILES = ["tlgen.config.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Values set through `TLGEN_*` environment variables. `TLGEN_SCHEMA` holds
 * one or more paths separated by the platform path delimiter.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env, prefix = "TLGEN"): TlgenConfigInput {
  const out: TlgenConfigInput = {};

  const schema = env[`${prefix}_SCHEMA`];
  if (schema) {
    out.schema = { paths: schema.split(path.delimiter).filter((p) => p.length > 0) };
  }
  const errorsDir = env[`${prefix}_ERRORS_DIR`];
  if (errorsDir) {
    out.errors = { sourceDir: errorsDir };
  }
  const outDir = env[`${prefix}_OUT_DIR`];
  const runtimeImport = env[`${prefix}_RUNTIME_IMPORT`];
  if (outDir || runtimeImport) {
    out.output = {};
    if (outDir) out.output.dir = outDir;
    if (runtimeImport) out.output.runtimeImport = runtimeImport;
  }
  const level = env[`${prefix}_LOG_LEVEL`];
  if (level) {
    out.log = { level: parseLevel(level, `${prefix}_LOG_LEVEL`) };
  }

  return out;
}

/**
 * Load a JSON config file. Relative paths inside it are taken relative to
 * the file's directory.
 */
export function configFromFile(filePath: string): TlgenConfigInput {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject(data, path.dirname(path.resolve(filePath)));
}

/**
 * Create a config input from a plain object (e.g. parsed JSON). Keys may be
 * camelCase or snake_case. Values of the wrong type are ignored.
 */
export function configFromObject(data: Record<string, unknown>, baseDir?: string): TlgenConfigInput {
  const resolvePath = (p: string) => (baseDir ? path.resolve(baseDir, p) : p);
  const out: TlgenConfigInput = {};

  const schemaData = section(data, "schema");
  if (schemaData) {
    const paths = stringList(pick(schemaData, "paths"));
    const requireLayer = pick(schemaData, "requireLayer", "require_layer");
    out.schema = {};
    if (paths) out.schema.paths = paths.map(resolvePath);
    if (typeof requireLayer === "boolean") out.schema.requireLayer = requireLayer;
  }

  const errorsData = section(data, "errors");
  if (errorsData) {
    const sourceDir = pick(errorsData, "sourceDir", "source_dir");
    out.errors = typeof sourceDir === "string" ? { sourceDir: resolvePath(sourceDir) } : {};
  }

  const outputData = section(data, "output");
  if (outputData) {
    const dir = pick(outputData, "dir");
    const runtimeImport = pick(outputData, "runtimeImport", "runtime_import");
    out.output = {};
    if (typeof dir === "string") out.output.dir = resolvePath(dir);
    if (typeof runtimeImport === "string") out.output.runtimeImport = runtimeImport;
  }

  const logData = section(data, "log");
  if (logData) {
    const level = pick(logData, "level");
    out.log = typeof level === "string" ? { level: parseLevel(level, "log.level") } : {};
  }

  return out;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: TlgenConfigInput[]): TlgenConfig {
  const result: TlgenConfig = {
    schema: { ...DEFAULT_CONFIG.schema },
    errors: { ...DEFAULT_CONFIG.errors },
    output: { ...DEFAULT_CONFIG.output },
    log: { ...DEFAULT_CONFIG.log },
  };

  for (const cfg of configs) {
    if (cfg.schema) result.schema = { ...result.schema, ...defined(cfg.schema) };
    if (cfg.errors) result.errors = { ...result.errors, ...defined(cfg.errors) };
    if (cfg.output) result.output = { ...result.output, ...defined(cfg.output) };
    if (cfg.log) result.log = { ...result.log, ...defined(cfg.log) };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: CLI overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: TlgenConfigInput;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): TlgenConfig {
  const cwd = options?.cwd ?? process.cwd();
  const sources: TlgenConfigInput[] = [configFromEnv(options?.env)];

  if (options?.configFile) {
    sources.push(configFromFile(path.resolve(cwd, options.configFile)));
  } else {
    for (const name of DEFAULT_CONFIG_FILES) {
      const candidate = path.join(cwd, name);
      if (fs.existsSync(candidate)) {
        sources.push(configFromFile(candidate));
        break;
      }
    }
  }

  if (options?.overrides) {
    sources.push(options.overrides);
  }

  return mergeConfigs(...sources);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: TlgenConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.schema.paths.length === 0) {
    errors.push("No schema files configured. Pass --schema or set TLGEN_SCHEMA");
  }

  if (!config.output.dir) {
    errors.push("Output directory must not be empty");
  } else {
    const outDir = path.resolve(config.output.dir);
    const inputs = [...config.schema.paths, ...(config.errors.sourceDir ? [config.errors.sourceDir] : [])];
    for (const input of inputs) {
      if (isInside(path.resolve(input), outDir)) {
        errors.push(`Output directory ${config.output.dir} contains input ${input}; regeneration would delete it`);
      }
    }
  }

  if (config.output.runtimeImport.startsWith(".")) {
    warnings.push(
      `runtimeImport '${config.output.runtimeImport}' is relative; it resolves from each generated file, not from the output root`
    );
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

// =========================================================================
// Helpers
// =========================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = data[key];
  return isRecord(value) ? value : undefined;
}

function pick(data: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (data[key] !== undefined) return data[key];
  }
  return undefined;
}

function stringList(value: unknown): string[] | undefined {
  if (typeof value === "string") return [value];
  if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) return value;
  return undefined;
}

function parseLevel(value: string, source: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new Error(`Invalid log level '${value}' in ${source}`);
  }
  return value;
}

/** Drop keys whose value is undefined so they don't override. */
function defined<T extends object>(value: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (!isKeyOf(value, key)) continue;
    if (value[key] !== undefined) out[key] = value[key];
  }
  return out;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

function isInside(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}
