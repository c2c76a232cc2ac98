// src/emit/errorsEmitter.ts
// Error groups -> errors.ts (entry table, RPCError subclasses, resolve)

import { ErrorTable } from "../errors/table";
import type { ErrorCodeGroup } from "../errors/types";
import { fileHeader, type GeneratedFile } from "./emitter";
import { ImportSet, pascal } from "./naming";

export const ERRORS_FILE = "errors.ts";

const OWN_NAMES = ["ERROR_CODES", "ERROR_KINDS", "UnknownError", "errorTable", "resolve", "toRpcError"];

// Globals the module refers to, or that readers expect to be the real thing
const GLOBAL_NAMES = ["Array", "Error", "Map", "Number", "Object", "Promise", "ReadonlyMap", "Set", "String", "Symbol"];

/** `BAD_REQUEST` → `BadRequest`; `FLOOD_WAIT_X` → `FloodWait`. */
export function errorClassName(id: string): string {
  const words = id
    .split("_")
    .filter((part) => part !== "X" && part.length > 0)
    .map((part) => part.toLowerCase());
  const name = pascal(words.join("_"));
  return /^[A-Za-z_]/.test(name) ? name : `Error${name}`;
}

function docText(text: string): string {
  return text.replace(/\*\//g, "*\\/");
}

/**
 * Emit `errors.ts`. The groups are compiled first, so an ambiguous table
 * fails here rather than when the generated module loads.
 */
export function emitErrors(
  groups: readonly ErrorCodeGroup[],
  options: { runtimeImport: string; layer: number }
): GeneratedFile {
  ErrorTable.compile(groups);

  const imports = new ImportSet(OWN_NAMES);
  const errorTable = imports.use(options.runtimeImport, "ErrorTable");
  const rpcError = imports.use(options.runtimeImport, "RPCError");
  const instantiate = imports.use(options.runtimeImport, "instantiateRpcError");
  const errorKind = imports.use(options.runtimeImport, "ErrorKind", { typeOnly: true });
  const errorClass = imports.use(options.runtimeImport, "RPCErrorClass", { typeOnly: true });

  const taken = new Set<string>([...OWN_NAMES, ...GLOBAL_NAMES, errorTable, rpcError, instantiate, errorKind, errorClass]);
  const unique = (wanted: string, code: number): string => {
    let name = wanted;
    if (taken.has(name)) name = `${wanted}${Math.abs(code)}`;
    for (let n = 1; taken.has(name); n++) name = `${wanted}${Math.abs(code)}_${n}`;
    taken.add(name);
    return name;
  };

  const data: string[] = ["export const ERROR_CODES = ["];
  const classes: string[] = [];
  const kinds: string[] = [];

  for (const g of groups) {
    data.push("  {");
    data.push(`    code: ${g.code},`);
    data.push(`    name: ${JSON.stringify(g.name)},`);
    data.push("    entries: [");
    for (const e of g.entries) {
      data.push(`      { id: ${JSON.stringify(e.id)}, description: ${JSON.stringify(e.description)} },`);
    }
    data.push("    ],");
    data.push("  },");

    const groupClass = unique(errorClassName(g.name), g.code);
    classes.push(
      `/** ${g.code} ${docText(g.name)} */`,
      `export class ${groupClass} extends ${rpcError} {`,
      `  static readonly CODE = ${g.code};`,
      `  static readonly NAME = ${JSON.stringify(g.name)};`,
      "}",
      ""
    );
    kinds.push(`  [${JSON.stringify(String(g.code))}, ${groupClass}],`);

    for (const e of g.entries) {
      const entryClass = unique(errorClassName(e.id), g.code);
      if (e.description) classes.push(`/** ${docText(e.description)} */`);
      classes.push(
        `export class ${entryClass} extends ${groupClass} {`,
        `  static readonly ID = ${JSON.stringify(e.id)};`,
        `  static readonly MESSAGE = ${JSON.stringify(e.description)};`,
        "}",
        ""
      );
      kinds.push(`  [${JSON.stringify(`${g.code}:${e.id}`)}, ${entryClass}],`);
    }
  }
  data.push("];");

  const content = [
    fileHeader(options.layer),
    ...imports.render(),
    "",
    ...data,
    "",
    `export const errorTable = ${errorTable}.compile(ERROR_CODES);`,
    "",
    "/** A code the table does not list. */",
    `export class UnknownError extends ${rpcError} {`,
    `  static readonly NAME = "UNKNOWN";`,
    "}",
    "",
    ...classes,
    `/** \`code\` or \`code:ID\` → most specific class. */`,
    `export const ERROR_KINDS: ReadonlyMap<string, ${errorClass}> = new Map<string, ${errorClass}>([`,
    ...kinds,
    "]);",
    "",
    `export function resolve(code: number, message: string): ${errorKind} {`,
    "  return errorTable.resolve(code, message);",
    "}",
    "",
    `export function toRpcError(code: number, message: string, rpcName?: string): ${rpcError} {`,
    `  return ${instantiate}(errorTable.resolve(code, message), ERROR_KINDS, UnknownError, rpcName);`,
    "}",
    "",
  ].join("\n");

  return { path: ERRORS_FILE, content };
}
