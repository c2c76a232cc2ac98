// src/emit/emitter.ts
// TLModel -> TypeScript source files

import { formatId } from "../outcome/errors";
import {
  valueParams,
  type BaseType,
  type Combinator,
  type ConstructorDef,
  type FunctionDef,
  type Param,
  type ParamType,
  type PrimitiveName,
  type TLModel,
} from "../model/types";
import {
  baseTypeName,
  basePath,
  classAlias,
  className,
  constructorPath,
  functionPath,
  ImportSet,
  localName,
  relativeImport,
} from "./naming";

export type GeneratedFile = {
  readonly path: string;
  readonly content: string;
};

export type EmitOptions = {
  /** Module specifier generated files import the wire runtime from. */
  runtimeImport: string;
  /** Add `errors` to the root barrel (the caller emits `errors.ts`). */
  withErrors?: boolean;
};

export const DEFAULT_RUNTIME_IMPORT = "tlgen/runtime";

export function fileHeader(layer: number): string {
  return `// Generated by tlgen from TL layer ${layer}. Changes will be overwritten.\n`;
}

/**
 * Every file of the object model, sorted by path. Output depends only on
 * the model and the options.
 */
export function emitModel(model: TLModel, options: EmitOptions): GeneratedFile[] {
  const files: GeneratedFile[] = [];
  const ctx: EmitContext = { model, runtime: options.runtimeImport, header: fileHeader(model.layer) };

  for (const c of model.constructors) {
    files.push({ path: constructorPath(c), content: emitCombinator(ctx, c, constructorPath(c)) });
  }
  for (const f of model.functions) {
    files.push({ path: functionPath(f), content: emitCombinator(ctx, f, functionPath(f)) });
  }
  for (const b of model.bases) {
    files.push({ path: basePath(b), content: emitBase(ctx, b) });
  }

  files.push(...emitBarrels(ctx, "types", model.constructors, constructorPath));
  files.push(...emitBarrels(ctx, "functions", model.functions, functionPath));
  files.push({ path: "base/index.ts", content: emitBaseIndex(ctx) });
  files.push({ path: "layer.ts", content: `${ctx.header}\nexport const LAYER = ${model.layer};\n` });
  files.push({ path: "all.ts", content: emitAll(ctx) });
  files.push({ path: "index.ts", content: emitRootIndex(ctx, options.withErrors ?? false) });

  return sortFiles(files);
}

export function sortFiles(files: readonly GeneratedFile[]): GeneratedFile[] {
  return [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

type EmitContext = {
  readonly model: TLModel;
  readonly runtime: string;
  readonly header: string;
};

/** Per-file state: where the file lives and what it imports. */
class FileScope {
  readonly imports: ImportSet;

  constructor(
    readonly ctx: EmitContext,
    readonly file: string,
    reserved: string[]
  ) {
    this.imports = new ImportSet(reserved);
  }

  runtime(name: string, typeOnly = false): string {
    return this.imports.use(this.ctx.runtime, name, { typeOnly });
  }

  base(qualifiedName: string): string {
    const base = this.ctx.model.basesByName.get(qualifiedName);
    if (!base) {
      throw new Error(`no base type ${qualifiedName} in model`);
    }
    return this.imports.use(relativeImport(this.file, basePath(base)), baseTypeName(qualifiedName));
  }

  bareClass(qualifiedName: string): string {
    const target = this.ctx.model.constructorsByName.get(qualifiedName);
    if (!target) {
      throw new Error(`no constructor ${qualifiedName} in model`);
    }
    const targetPath = constructorPath(target);
    if (targetPath === this.file) {
      return className(target);
    }
    return this.imports.use(relativeImport(this.file, targetPath), className(target), { alias: classAlias(target) });
  }
}

// ─────────────────────────────────────────────────────────────────
// Type, read and write expressions
// ─────────────────────────────────────────────────────────────────

const PRIMITIVE_TS: Record<PrimitiveName, string> = {
  int: "number",
  double: "number",
  long: "bigint",
  int128: "bigint",
  int256: "bigint",
  string: "string",
  bytes: "Uint8Array",
  Bool: "boolean",
  true: "boolean",
};

function tsType(scope: FileScope, t: ParamType): string {
  switch (t.kind) {
    case "Primitive":
      return PRIMITIVE_TS[t.name];
    case "Bitmask":
      return "number";
    case "Vector":
      return `${tsType(scope, t.item)}[]`;
    case "Union":
      return scope.base(t.base);
    case "Bare":
      return scope.bareClass(t.constructor);
    case "AnyObject":
      return scope.runtime("TLObject", true);
    case "Flag":
      return tsType(scope, t.inner);
  }
}

function readExpr(scope: FileScope, t: ParamType, r: string): string {
  switch (t.kind) {
    case "Primitive":
      return t.name === "true" ? "true" : `${r}.${t.name === "Bool" ? "bool" : t.name}()`;
    case "Bitmask":
      return `${r}.uint()`;
    case "Vector":
      return `${r}.${t.boxed ? "vector" : "bareVector"}((r) => ${readExpr(scope, t.item, "r")})`;
    case "Union":
      return `${scope.runtime("readUnion")}(${r}, ${scope.base(t.base)})`;
    case "Bare":
      return `${scope.bareClass(t.constructor)}.read(${r})`;
    case "AnyObject":
      return `${r}.object()`;
    case "Flag":
      return readExpr(scope, t.inner, r);
  }
}

function writeExpr(scope: FileScope, t: ParamType, value: string, w: string): string {
  switch (t.kind) {
    case "Primitive":
      if (t.name === "true") return "";
      return `${w}.${t.name === "Bool" ? "bool" : t.name}(${value})`;
    case "Bitmask":
      return `${w}.uint(${value})`;
    case "Vector":
      return `${w}.${t.boxed ? "vector" : "bareVector"}(${value}, (item, w) => ${writeExpr(scope, t.item, "item", "w") || "undefined"})`;
    case "Union":
    case "AnyObject":
      return `${value}.write(${w})`;
    case "Bare":
      return `${value}.writeBare(${w})`;
    case "Flag":
      return writeExpr(scope, t.inner, value, w);
  }
}

const isTrueFlag = (t: ParamType): boolean =>
  t.kind === "Flag" && t.inner.kind === "Primitive" && t.inner.name === "true";

/** `name#id {X:Type} a:t b:t = R` as declared. */
function declarationLine(c: Combinator): string {
  const parts = [`${c.qualifiedName}#${c.id.toString(16).padStart(8, "0")}`];
  for (const tp of c.typeParams) parts.push(`{${tp}:Type}`);
  for (const p of c.params) parts.push(`${p.name}:${p.typeText}`);
  parts.push("=", c.kind === "function" ? c.returnsText : c.belongsTo);
  return parts.join(" ");
}

// ─────────────────────────────────────────────────────────────────
// One class per constructor / function
// ─────────────────────────────────────────────────────────────────

function emitCombinator(ctx: EmitContext, c: ConstructorDef | FunctionDef, file: string): string {
  const cls = className(c);
  const paramsName = `${cls}Params`;
  const scope = new FileScope(ctx, file, [cls, paramsName]);
  const fields = valueParams(c);
  const flagFields = new Set(
    c.params.flatMap((p) => (p.type.kind === "Flag" ? [p.type.field] : []))
  );

  const body: string[] = [];

  // Params interface
  const optional = (p: Param) => p.type.kind === "Flag";
  if (fields.length > 0) {
    body.push(`export interface ${paramsName} {`);
    for (const p of fields) {
      body.push(`  ${p.name}${optional(p) ? "?" : ""}: ${tsType(scope, p.type)};`);
    }
    body.push("}", "");
  }

  // Class head
  let resultType = "";
  if (c.kind === "function") {
    resultType = tsType(scope, c.returns);
    body.push(`export class ${cls} extends ${scope.runtime("TLFunction")}<${resultType}> {`);
  } else {
    body.push(`export class ${cls} extends ${scope.runtime("TLObject")} {`);
  }
  body.push(`  static readonly ID = ${formatId(c.id)};`);
  body.push(`  readonly constructorId = ${cls}.ID;`);
  body.push(`  readonly qualname = ${JSON.stringify(c.qualifiedName)};`);

  if (fields.length > 0) {
    body.push("");
    for (const p of fields) {
      const opt = optional(p) && !isTrueFlag(p.type);
      body.push(`  ${p.name}${opt ? "?" : ""}: ${tsType(scope, p.type)};`);
    }

    const allOptional = fields.every(optional);
    body.push("");
    body.push(`  constructor(params: ${paramsName}${allOptional ? " = {}" : ""}) {`);
    body.push("    super();");
    for (const p of fields) {
      body.push(`    this.${p.name} = params.${p.name}${isTrueFlag(p.type) ? " ?? false" : ""};`);
    }
    body.push("  }");
  }

  // read
  const reader = scope.runtime("BinaryReader", true);
  body.push("");
  body.push(`  static read(reader: ${reader}): ${cls} {`);
  for (const p of c.params) {
    const local = localName(p.name);
    const t = p.type;
    if (t.kind === "Bitmask") {
      body.push(flagFields.has(p.name) ? `    const ${local} = reader.uint();` : "    reader.uint();");
    } else if (t.kind === "Flag") {
      const test = `(${localName(t.field)} & ${bitMask(t.bit)}) !== 0`;
      body.push(
        isTrueFlag(t)
          ? `    const ${local} = ${test};`
          : `    const ${local} = ${test} ? ${readExpr(scope, t.inner, "reader")} : undefined;`
      );
    } else {
      body.push(`    const ${local} = ${readExpr(scope, t, "reader")};`);
    }
  }
  if (fields.length > 0) {
    const args = fields.map((p) => (localName(p.name) === p.name ? p.name : `${p.name}: ${localName(p.name)}`));
    body.push(`    return new ${cls}({ ${args.join(", ")} });`);
  } else {
    body.push(`    return new ${cls}();`);
  }
  body.push("  }");

  // writeBare
  const writer = scope.runtime("BinaryWriter", true);
  body.push("");
  body.push(`  writeBare(writer: ${writer}): void {`);
  for (const p of c.params) {
    const t = p.type;
    if (t.kind === "Bitmask") {
      const local = localName(p.name);
      const members = c.params.filter((q) => q.type.kind === "Flag" && q.type.field === p.name);
      if (members.length === 0) {
        body.push("    writer.uint(0);");
        continue;
      }
      body.push(`    let ${local} = 0;`);
      for (const q of members) {
        if (q.type.kind !== "Flag") continue;
        const present = isTrueFlag(q.type) ? `this.${q.name}` : `this.${q.name} !== undefined`;
        body.push(`    if (${present}) ${local} |= ${bitMask(q.type.bit)};`);
      }
      body.push(`    writer.uint(${local} >>> 0);`);
    } else if (t.kind === "Flag") {
      if (isTrueFlag(t)) continue;
      body.push(`    if (this.${p.name} !== undefined) ${writeExpr(scope, t.inner, `this.${p.name}`, "writer")};`);
    } else {
      const stmt = writeExpr(scope, t, `this.${p.name}`, "writer");
      if (stmt) body.push(`    ${stmt};`);
    }
  }
  body.push("  }");

  // readResult
  if (c.kind === "function") {
    body.push("");
    body.push(`  readResult(reader: ${reader}): ${resultType} {`);
    body.push(`    return ${readExpr(scope, c.returns, "reader")};`);
    body.push("  }");
  }

  body.push("}");

  return [
    ctx.header,
    ...scope.imports.render(),
    "",
    `/** \`${declarationLine(c)}\` */`,
    ...body,
    "",
  ].join("\n");
}

function bitMask(bit: number): string {
  return `(1 << ${bit})`;
}

// ─────────────────────────────────────────────────────────────────
// Base types
// ─────────────────────────────────────────────────────────────────

function emitBase(ctx: EmitContext, b: BaseType): string {
  const file = basePath(b);
  const name = baseTypeName(b.qualifiedName);
  const scope = new FileScope(ctx, file, [name]);
  const define = scope.runtime("defineUnion");

  const members = b.constructors.map((qualifiedName) => {
    const c = ctx.model.constructorsByName.get(qualifiedName);
    if (!c) {
      throw new Error(`base ${b.qualifiedName} lists unknown constructor ${qualifiedName}`);
    }
    return scope.imports.use(relativeImport(file, constructorPath(c)), className(c), {
      typeOnly: true,
      alias: classAlias(c),
    });
  });

  const ids = b.ids.map(formatId);
  return [
    ctx.header,
    ...scope.imports.render(),
    "",
    `/** Constructors of \`${b.qualifiedName}\`, in schema order. */`,
    `export type ${name} = ${members.join(" | ")};`,
    `export const ${name} = ${define}<${name}>(${JSON.stringify(b.qualifiedName)}, [${ids.join(", ")}]);`,
    "",
  ].join("\n");
}

function emitBaseIndex(ctx: EmitContext): string {
  const file = "base/index.ts";
  const scope = new FileScope(ctx, file, ["BASE_TYPES"]);
  const descriptor = scope.runtime("UnionDescriptor", true);
  const tlObject = scope.runtime("TLObject", true);

  const locals = ctx.model.bases.map((b) => {
    const name = baseTypeName(b.qualifiedName);
    const local = scope.imports.use(relativeImport(file, basePath(b)), name);
    return { name, local };
  });

  const lines = [ctx.header, ...scope.imports.render(), ""];
  if (locals.length > 0) {
    const specs = locals.map(({ name, local }) => (name === local ? name : `${local} as ${name}`));
    lines.push(`export { ${specs.join(", ")} };`, "");
  }
  lines.push(`export const BASE_TYPES: readonly ${descriptor}<${tlObject}>[] = [`);
  for (const { local } of locals) lines.push(`  ${local},`);
  lines.push("];", "");
  return lines.join("\n");
}

// ─────────────────────────────────────────────────────────────────
// Barrels, registry, root index
// ─────────────────────────────────────────────────────────────────

function emitBarrels(
  ctx: EmitContext,
  root: "types" | "functions",
  items: readonly Combinator[],
  pathOf: (c: Combinator) => string
): GeneratedFile[] {
  const byNamespace = new Map<string, Combinator[]>();
  for (const c of items) {
    const ns = c.namespace ?? "";
    const list = byNamespace.get(ns);
    if (list) list.push(c);
    else byNamespace.set(ns, [c]);
  }

  const files: GeneratedFile[] = [];
  const rootLines = [ctx.header];
  for (const c of byNamespace.get("") ?? []) {
    rootLines.push(`export { ${className(c)} } from "${relativeImport(`${root}/index.ts`, pathOf(c))}";`);
  }

  for (const ns of ctx.model.namespaces) {
    const list = byNamespace.get(ns);
    if (!list) continue;
    const file = `${root}/${ns}/index.ts`;
    const lines = [ctx.header];
    for (const c of list) {
      lines.push(`export { ${className(c)} } from "${relativeImport(file, pathOf(c))}";`);
    }
    lines.push("");
    files.push({ path: file, content: lines.join("\n") });
    rootLines.push(`export * as ${ns} from "./${ns}";`);
  }

  if (rootLines.length === 1) rootLines.push("export {};");
  rootLines.push("");
  files.push({ path: `${root}/index.ts`, content: rootLines.join("\n") });
  return files;
}

function emitAll(ctx: EmitContext): string {
  const file = "all.ts";
  const scope = new FileScope(ctx, file, ["registry"]);
  const registry = scope.runtime("ConstructorRegistry");
  const layer = scope.imports.use("./layer", "LAYER");

  const entries: string[] = [];
  const add = (c: Combinator, targetPath: string) => {
    const local = scope.imports.use(relativeImport(file, targetPath), className(c), {
      alias: `${c.kind === "function" ? "Fn" : ""}${classAlias(c)}`,
    });
    entries.push(`  [${formatId(c.id)}, ${JSON.stringify(c.qualifiedName)}, ${local}.read],`);
  };
  for (const c of ctx.model.constructors) add(c, constructorPath(c));
  for (const f of ctx.model.functions) add(f, functionPath(f));

  return [
    ctx.header,
    ...scope.imports.render(),
    "",
    "/** Decoder for every constructor and function id of this layer. */",
    `export const registry = new ${registry}(${layer}, [`,
    ...entries,
    "]);",
    "",
  ].join("\n");
}

function emitRootIndex(ctx: EmitContext, withErrors: boolean): string {
  const lines = [
    ctx.header,
    `export { LAYER } from "./layer";`,
    `export { registry } from "./all";`,
    `export { BASE_TYPES } from "./base";`,
    `export * as base from "./base";`,
    `export * as functions from "./functions";`,
    `export * as types from "./types";`,
  ];
  if (withErrors) lines.push(`export * as errors from "./errors";`);
  lines.push("");
  return lines.join("\n");
}
