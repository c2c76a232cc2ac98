// src/emit/naming.ts
// File paths and TypeScript identifiers for generated code

import * as path from "node:path";
import { splitQualified, type BaseType, type Combinator } from "../model/types";

/** `input_peer_empty` and `inputPeerEmpty` both become `InputPeerEmpty`. */
export function pascal(name: string): string {
  return name
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join("");
}

/** Class name inside the combinator's own file. */
export function className(c: Pick<Combinator, "name">): string {
  return pascal(c.name);
}

/** Globally unique alias for a constructor or function class. */
export function classAlias(c: Pick<Combinator, "namespace" | "name">): string {
  return c.namespace ? `${pascal(c.namespace)}${pascal(c.name)}` : pascal(c.name);
}

/** Name of a base type's union alias and descriptor, unique across namespaces. */
export function baseTypeName(qualifiedName: string): string {
  const { namespace, name } = splitQualified(qualifiedName);
  return `Type${namespace ? pascal(namespace) : ""}${pascal(name)}`;
}

export function constructorPath(c: Pick<Combinator, "namespace" | "name">): string {
  return modulePath("types", c.namespace, pascal(c.name));
}

export function functionPath(c: Pick<Combinator, "namespace" | "name">): string {
  return modulePath("functions", c.namespace, pascal(c.name));
}

export function basePath(b: Pick<BaseType, "namespace" | "name">): string {
  return modulePath("base", b.namespace, pascal(b.name));
}

function modulePath(root: string, namespace: string | undefined, file: string): string {
  return namespace ? `${root}/${namespace}/${file}.ts` : `${root}/${file}.ts`;
}

/** Extensionless relative import from one generated file to another. */
export function relativeImport(fromFile: string, toFile: string): string {
  const rel = path.posix.relative(path.posix.dirname(fromFile), toFile.replace(/\.ts$/, ""));
  return rel.startsWith(".") ? rel : `./${rel}`;
}

const RESERVED = new Set([
  "break", "case", "catch", "class", "const", "continue", "debugger", "default", "delete", "do",
  "else", "enum", "export", "extends", "false", "finally", "for", "function", "if", "import", "in",
  "instanceof", "new", "null", "return", "super", "switch", "this", "throw", "true", "try", "typeof",
  "var", "void", "while", "with", "yield", "let", "static", "implements", "interface", "package",
  "private", "protected", "public", "await", "arguments", "eval",
  // names the generated methods use themselves
  "reader", "writer", "params",
]);

/** A parameter name that is safe as a local variable. */
export function localName(name: string): string {
  return RESERVED.has(name) ? `${name}_` : name;
}

/**
 * Tracks what one generated file imports. Local names are unique within the
 * file: a requested name that is already taken gets a numeric suffix.
 */
export class ImportSet {
  private readonly taken = new Set<string>();
  private readonly bySource = new Map<string, Map<string, { local: string; typeOnly: boolean }>>();

  constructor(reserved: Iterable<string> = []) {
    for (const name of reserved) this.taken.add(name);
  }

  use(source: string, exported: string, options: { typeOnly?: boolean; alias?: string } = {}): string {
    let names = this.bySource.get(source);
    if (!names) {
      names = new Map();
      this.bySource.set(source, names);
    }

    const existing = names.get(exported);
    if (existing) {
      if (!options.typeOnly) existing.typeOnly = false;
      return existing.local;
    }

    const wanted = options.alias ?? exported;
    let local = wanted;
    for (let n = 1; this.taken.has(local); n++) {
      local = `${wanted}_${n}`;
    }
    this.taken.add(local);
    names.set(exported, { local, typeOnly: options.typeOnly ?? false });
    return local;
  }

  /** Import declarations, sources and names sorted. */
  render(): string[] {
    const lines: string[] = [];
    for (const source of [...this.bySource.keys()].sort()) {
      const names = this.bySource.get(source);
      if (!names || names.size === 0) continue;

      const entries = [...names.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      const allTypes = entries.every(([, n]) => n.typeOnly);
      const specs = entries.map(([exported, n]) => {
        const spec = exported === n.local ? exported : `${exported} as ${n.local}`;
        return !allTypes && n.typeOnly ? `type ${spec}` : spec;
      });
      lines.push(`import ${allTypes ? "type " : ""}{ ${specs.join(", ")} } from "${source}";`);
    }
    return lines;
  }
}
