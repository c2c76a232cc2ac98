// bin/tlgen-cli-lib.ts
// Shared CLI utilities for the tlgen command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { loadConfig, validateConfig, type TlgenConfig, type TlgenConfigInput } from "../src/config";
import { ErrorTable } from "../src/errors/table";
import { loadErrorSource } from "../src/errors/source";
import { applySchemaUpdate, checkSchemaUpdate, prepareUpstreamSchema, type SchemaUpdateReport } from "../src/layer/diff";
import { createConsoleLogger, type LogLevel, type LogSink } from "../src/log/logger";
import { formatDiagnostic } from "../src/outcome/diagnostic";
import { formatId, TlgenError } from "../src/outcome/errors";
import { exitCodeFor, matchOutcome } from "../src/outcome/outcome";
import { runGeneration } from "../src/pipeline";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type Command = "generate" | "check-schema" | "resolve-error";

const COMMANDS: readonly Command[] = ["generate", "check-schema", "resolve-error"];

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  command?: Command;
  /** Arguments after the command that are not flags */
  positionals: string[];
  schema: string[];
  errors?: string;
  out?: string;
  runtime?: string;
  config?: string;
  force?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  /** Flags and words we did not recognise */
  unknown: string[];
};

/** Where the CLI writes. `runCli` never touches `process` directly. */
export type CliIO = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function isCommand(word: string): word is Command {
  return COMMANDS.some((c) => c === word);
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { positionals: [], schema: [], unknown: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--schema" || arg === "-s") {
      const value = args[++i];
      if (value !== undefined) result.schema.push(value);
    } else if (arg === "--errors" || arg === "-e") {
      result.errors = args[++i];
    } else if (arg === "--out" || arg === "-o") {
      result.out = args[++i];
    } else if (arg === "--runtime") {
      result.runtime = args[++i];
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
    } else if (arg === "--force" || arg === "-f") {
      result.force = true;
    } else if (arg === "--dry-run") {
      result.dryRun = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--quiet" || arg === "-q") {
      result.quiet = true;
    } else if (arg.startsWith("-") && !/^-\d/.test(arg)) {
      result.unknown.push(arg);
    } else if (!result.command) {
      if (isCommand(arg)) result.command = arg;
      else result.unknown.push(arg);
    } else {
      // Negative error codes (-503) are positionals, not flags
      result.positionals.push(arg);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
tlgen - TL schema and RPC error-table compiler

USAGE:
  tlgen generate [options]                 Compile schemas into a TypeScript tree
  tlgen check-schema <candidate> [options] Vendor an upstream schema if it changed
  tlgen resolve-error <code> <message>     Show how an RPC error resolves

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -s, --schema <file>                Schema file (repeatable, concatenated in order)
  -e, --errors <dir>                 Directory of <code>_<NAME>.tsv error tables
  -o, --out <dir>                    Output directory (default: generated)
      --runtime <specifier>          Module the generated code imports its runtime from
  -c, --config <file>                Config file (default: ./tlgen.config.json)
  -f, --force                        Regenerate even if unchanged or at a lower layer
      --dry-run                      check-schema: report, but do not write
      --verbose                      Log pipeline stages
  -q, --quiet                        Only log errors

EXIT CODES:
  generate       0 regenerated, 2 unchanged, 1 failed
  check-schema   0 updated (or would update), 2 unchanged, 1 error

ENVIRONMENT:
  TLGEN_SCHEMA, TLGEN_ERRORS_DIR, TLGEN_OUT_DIR, TLGEN_RUNTIME_IMPORT, TLGEN_LOG_LEVEL

EXAMPLES:
  tlgen generate --schema schema/api.tl --errors schema/errors --out src/tl
  tlgen check-schema downloads/api.tl --schema schema/api.tl --dry-run
  tlgen resolve-error 420 FLOOD_WAIT_30 --errors schema/errors
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Version from the nearest package.json named `tlgen` above `startDir`.
 * Sources run from `bin/`, the build from `dist/bin/`.
 */
export function getVersion(startDir: string = __dirname): string {
  for (let dir = startDir; ; dir = path.dirname(dir)) {
    const version = tlgenVersionIn(path.join(dir, "package.json"));
    if (version) return `tlgen v${version}`;
    if (path.dirname(dir) === dir) return "tlgen v0.1.0";
  }
}

function tlgenVersionIn(pkgPath: string): string | undefined {
  if (!fs.existsSync(pkgPath)) return undefined;
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
  if (typeof pkg !== "object" || pkg === null || !("name" in pkg) || pkg.name !== "tlgen") return undefined;
  return "version" in pkg && typeof pkg.version === "string" ? pkg.version : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function logLevelFor(args: Pick<CliArgs, "verbose" | "quiet">): LogLevel | undefined {
  if (args.verbose) return "debug";
  if (args.quiet) return "error";
  return undefined;
}

/** CLI flags as the last config layer. */
export function cliOverrides(args: CliArgs, cwd: string): TlgenConfigInput {
  const abs = (p: string) => path.resolve(cwd, p);
  return {
    schema: { paths: args.schema.length > 0 ? args.schema.map(abs) : undefined },
    errors: { sourceDir: args.errors ? abs(args.errors) : undefined },
    output: { dir: args.out ? abs(args.out) : undefined, runtimeImport: args.runtime },
    log: { level: logLevelFor(args) },
  };
}

export function buildConfig(args: CliArgs, options: { env?: NodeJS.ProcessEnv; cwd?: string } = {}): TlgenConfig {
  const cwd = options.cwd ?? process.cwd();
  return loadConfig({
    configFile: args.config,
    overrides: cliOverrides(args, cwd),
    env: options.env,
    cwd,
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

function ioSink(io: CliIO): LogSink {
  return (level, line) => (level === "error" || level === "warn" ? io.stderr(line) : io.stdout(line));
}

function runGenerate(args: CliArgs, io: CliIO): number {
  const config = buildConfig(args, io);
  const validation = validateConfig(config);
  for (const w of validation.warnings) io.stderr(`warning: ${w}`);
  if (!validation.valid) {
    for (const e of validation.errors) io.stderr(`error: ${e}`);
    return 1;
  }

  const logger = createConsoleLogger(config.log.level, "tlgen", ioSink(io));
  const outcome = runGeneration(config, { force: args.force, logger });

  matchOutcome(outcome, {
    regenerated: (r) => io.stdout(`Generated layer ${r.layer} into ${config.output.dir} (${r.written} files)`),
    unchanged: (u) => io.stdout(`Layer ${u.layer} is up to date`),
    failed: (f) => {
      for (const d of f.failure.diagnostics) io.stderr(formatDiagnostic(d));
    },
  });
  return exitCodeFor(outcome);
}

export function formatSchemaReport(report: SchemaUpdateReport): string[] {
  const layer = (n: number | undefined) => (n === undefined ? "?" : String(n));
  const lines = [
    report.status === "Initial"
      ? `No vendored schema; candidate is layer ${layer(report.candidateLayer)}`
      : `Layer ${layer(report.currentLayer)} -> ${layer(report.candidateLayer)}: ${report.status}`,
  ];
  for (const d of report.diff.added) lines.push(`  + ${d.section} ${d.name} ${formatId(d.id)}`);
  for (const d of report.diff.removed) lines.push(`  - ${d.section} ${d.name} ${formatId(d.id)}`);
  for (const d of report.diff.changed) {
    lines.push(`  ~ ${d.section} ${d.name} ${formatId(d.fromId)} -> ${formatId(d.toId)}`);
  }
  return lines;
}

function runCheckSchema(args: CliArgs, io: CliIO): number {
  const cwd = io.cwd ?? process.cwd();
  const [candidatePath] = args.positionals;
  if (!candidatePath) {
    io.stderr("error: check-schema needs a candidate schema file");
    return 1;
  }
  const vendoredPath = buildConfig(args, io).schema.paths[0];
  if (!vendoredPath) {
    io.stderr("error: no vendored schema configured. Pass --schema or set TLGEN_SCHEMA");
    return 1;
  }

  const candidate = prepareUpstreamSchema(fs.readFileSync(path.resolve(cwd, candidatePath), "utf8"));
  const vendored = fs.existsSync(vendoredPath) ? fs.readFileSync(vendoredPath, "utf8") : undefined;
  const report = checkSchemaUpdate(candidate, vendored);
  for (const line of formatSchemaReport(report)) io.stdout(line);

  if (report.status === "Unchanged") return 2;
  if (!args.dryRun) {
    applySchemaUpdate(vendoredPath, candidate);
    io.stdout(`Wrote ${vendoredPath}`);
  }
  return 0;
}

function runResolveError(args: CliArgs, io: CliIO): number {
  const [codeText, message] = args.positionals;
  if (codeText === undefined || message === undefined) {
    io.stderr("error: resolve-error needs <code> <message>");
    return 1;
  }
  const code = Number(codeText);
  if (!Number.isInteger(code)) {
    io.stderr(`error: '${codeText}' is not an integer error code`);
    return 1;
  }
  const sourceDir = buildConfig(args, io).errors.sourceDir;
  if (!sourceDir) {
    io.stderr("error: no error table configured. Pass --errors or set TLGEN_ERRORS_DIR");
    return 1;
  }

  const table = ErrorTable.compile(loadErrorSource(sourceDir).groups);
  io.stdout(JSON.stringify(table.resolve(code, message), null, 2));
  return 0;
}

/**
 * Run one CLI invocation and return its exit code. Compile and I/O errors
 * are printed as diagnostics.
 */
export function runCli(argv: string[], io: CliIO): number {
  const args = parseCliArgs(argv);

  if (args.help) {
    io.stdout(getHelpText());
    return 0;
  }
  if (args.version) {
    io.stdout(getVersion());
    return 0;
  }
  if (args.unknown.length > 0) {
    io.stderr(`error: unknown argument '${args.unknown[0]}' (see --help)`);
    return 1;
  }

  try {
    switch (args.command) {
      case "generate":
        return runGenerate(args, io);
      case "check-schema":
        return runCheckSchema(args, io);
      case "resolve-error":
        return runResolveError(args, io);
      case undefined:
        io.stderr("error: missing command (see --help)");
        return 1;
    }
  } catch (e) {
    if (e instanceof TlgenError) io.stderr(formatDiagnostic(e.toDiagnostic()));
    else io.stderr(`error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
}
