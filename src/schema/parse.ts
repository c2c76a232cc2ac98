// src/schema/parse.ts
// TL schema text -> ordered raw declarations

import type { Span } from "../outcome/diagnostic";
import { MissingLayerError, SchemaSyntaxError } from "../outcome/errors";
import type { ParsedSchema, RawDeclaration, RawParam, Section, SkippedDeclaration, TypeExpr } from "./types";

/** Combinators the wire runtime implements itself. */
export const BUILTIN_COMBINATORS: ReadonlySet<string> = new Set(["boolFalse", "boolTrue", "true", "vector"]);

const LAYER_RE = /^\s*\/\/\s*LAYER\s+(\d+)\s*$/;
const SECTION_RE = /^---(\w+)---$/;
const HEAD_RE = /^([A-Za-z_]\w*(?:\.[A-Za-z_]\w*)?)(?:#(.*))?$/;
const TYPE_PARAM_RE = /^\{([A-Za-z_]\w*):Type\}$/;
const PARAM_RE = /^([A-Za-z_]\w*):(.*)$/;
const IDENT_RE = /^[A-Za-z_]\w*(?:\.[A-Za-z_]\w*)?$/;
const CONDITIONAL_RE = /^([A-Za-z_]\w*)\.([^?]*)\?(.*)$/;
const VECTOR_RE = /^([Vv]ector)<(.*)>$/;

type Word = { text: string; line: number; col: number };

export type ParseOptions = {
  file?: string;
  /** Fail when the text has no `// LAYER N` marker. */
  requireLayer?: boolean;
};

export function parseSchema(source: string, options: ParseOptions = {}): ParsedSchema {
  const file = options.file;
  const declarations: RawDeclaration[] = [];
  const skipped: SkippedDeclaration[] = [];
  let layer: number | undefined;
  let section: Section = "types";
  let pending: Word[] = [];

  const spanOf = (w: Word, offset = 0, length = w.text.length - offset): Span => ({
    file,
    line: w.line,
    column: w.col + offset,
    endColumn: w.col + offset + length,
  });

  const fail = (detail: string, w: Word, offset = 0, length?: number): never => {
    throw new SchemaSyntaxError(detail, w.text.slice(offset, length === undefined ? undefined : offset + length) || w.text, spanOf(w, offset, length));
  };

  const lines = source.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const line = lines[i];

    const layerMatch = LAYER_RE.exec(line);
    if (layerMatch) {
      layer = parseInt(layerMatch[1], 10);
      continue;
    }

    const commentAt = line.indexOf("//");
    const code = commentAt >= 0 ? line.slice(0, commentAt) : line;
    const trimmed = code.trim();
    if (!trimmed) continue;

    const sectionMatch = SECTION_RE.exec(trimmed);
    if (sectionMatch) {
      if (pending.length > 0) {
        fail("unterminated declaration (missing ';')", pending[0]);
      }
      const name = sectionMatch[1];
      if (name !== "types" && name !== "functions") {
        fail(`unknown section '${name}'`, { text: trimmed, line: lineNo, col: code.indexOf(trimmed) + 1 });
      }
      section = name === "functions" ? "functions" : "types";
      continue;
    }

    for (const word of splitWords(code, lineNo)) {
      const semi = word.text.indexOf(";");
      if (semi < 0) {
        pending.push(word);
        continue;
      }
      if (semi !== word.text.length - 1) {
        fail("unexpected text after ';'", word, semi + 1);
      }
      if (semi > 0) {
        pending.push({ ...word, text: word.text.slice(0, semi) });
      }
      if (pending.length === 0) {
        fail("empty declaration", word);
      }
      const decl = parseDeclaration(pending, section, declarations.length + skipped.length);
      if ("reason" in decl) skipped.push(decl);
      else declarations.push(decl);
      pending = [];
    }
  }

  if (pending.length > 0) {
    fail("unterminated declaration (missing ';')", pending[0]);
  }

  if (options.requireLayer && layer === undefined) {
    throw new MissingLayerError(file);
  }

  return Object.freeze({
    file,
    layer,
    declarations: Object.freeze(declarations),
    skipped: Object.freeze(skipped),
  });

  // ─────────────────────────────────────────────────────────────────
  // One declaration: head, {X:Type}..., params..., '=', result
  // ─────────────────────────────────────────────────────────────────

  function parseDeclaration(words: Word[], sect: Section, index: number): RawDeclaration | SkippedDeclaration {
    const head = words[0];
    const headMatch = HEAD_RE.exec(head.text);
    if (!headMatch) {
      return fail("malformed combinator name", head);
    }

    const qualifiedName = headMatch[1];
    if (BUILTIN_COMBINATORS.has(qualifiedName)) {
      return { name: qualifiedName, line: head.line, reason: "built-in combinator" };
    }

    let explicitId: number | undefined;
    if (headMatch[2] !== undefined) {
      if (!/^[0-9a-fA-F]{1,8}$/.test(headMatch[2])) {
        fail("malformed constructor id", head, qualifiedName.length + 1);
      }
      explicitId = parseInt(headMatch[2], 16) >>> 0;
    }

    const dot = qualifiedName.indexOf(".");
    const namespace = dot >= 0 ? qualifiedName.slice(0, dot) : undefined;
    const name = dot >= 0 ? qualifiedName.slice(dot + 1) : qualifiedName;

    const eq = words.findIndex((w) => w.text === "=");
    if (eq < 0) {
      return fail("missing '=' before result type", words[words.length - 1]);
    }

    const typeParams: string[] = [];
    const params: RawParam[] = [];
    const signature: string[] = [qualifiedName];

    for (const w of words.slice(1, eq)) {
      const tp = TYPE_PARAM_RE.exec(w.text);
      if (tp) {
        typeParams.push(tp[1]);
        signature.push(`${tp[1]}:Type`);
        continue;
      }

      const pm = PARAM_RE.exec(w.text);
      if (!pm) {
        return fail("malformed parameter (expected name:type)", w);
      }
      const [, paramName, typeText] = pm;
      if (params.some((p) => p.name === paramName)) {
        fail(`duplicate parameter '${paramName}'`, w, 0, paramName.length);
      }

      const type = parseTypeExpr(typeText, w, paramName.length + 1, typeParams, params, true);
      params.push({ name: paramName, type, typeText, span: spanOf(w) });

      if (type.tag === "Conditional" && type.inner.tag === "Named" && type.inner.name === "true") {
        continue;
      }
      signature.push(`${paramName}:${canonicalTypeText(type, typeText)}`);
    }

    const resultWords = words.slice(eq + 1);
    if (resultWords.length !== 1) {
      return fail("malformed result type", resultWords[1] ?? words[eq]);
    }
    const resultWord = resultWords[0];
    const result = parseTypeExpr(resultWord.text, resultWord, 0, typeParams, [], false);
    if (result.tag !== "Named" && result.tag !== "Vector" && !(result.tag === "Generic" && !result.bang)) {
      fail("result must be a type name", resultWord);
    }
    if (sect === "types" && result.tag !== "Named") {
      fail("constructor must belong to a named type", resultWord);
    }
    if (result.tag === "Named" && result.bare) {
      fail("result type cannot be bare", resultWord);
    }
    signature.push("=", resultWord.text);

    return Object.freeze({
      section: sect,
      namespace,
      name,
      qualifiedName,
      explicitId,
      typeParams: Object.freeze(typeParams),
      params: Object.freeze(params),
      result,
      resultText: resultWord.text,
      signature: signature.join(" ").replace(/</g, " ").replace(/>/g, ""),
      index,
      span: spanOf(head),
    });
  }

  function parseTypeExpr(
    text: string,
    w: Word,
    offset: number,
    typeParams: readonly string[],
    previous: readonly RawParam[],
    allowConditional: boolean
  ): TypeExpr {
    if (text === "#") {
      return { tag: "Bitmask" };
    }

    const cond = CONDITIONAL_RE.exec(text);
    if (cond) {
      const [, field, bitText, innerText] = cond;
      if (!allowConditional) {
        fail("flags condition not allowed here", w, offset);
      }
      if (!/^\d+$/.test(bitText)) {
        fail(`flags bit '${bitText}' is not a number`, w, offset + field.length + 1, bitText.length);
      }
      const bit = parseInt(bitText, 10);
      if (bit >= 32) {
        fail(`flags bit ${bit} is out of range 0..31`, w, offset + field.length + 1, bitText.length);
      }
      const flagsParam = previous.find((p) => p.name === field);
      if (!flagsParam || flagsParam.type.tag !== "Bitmask") {
        fail(`flags field '${field}' is not a preceding # parameter`, w, offset, field.length);
      }
      const innerOffset = offset + field.length + bitText.length + 2;
      const inner = parseTypeExpr(innerText, w, innerOffset, typeParams, previous, false);
      if (inner.tag === "Bitmask") {
        fail("a bitmask cannot be conditional", w, innerOffset);
      }
      return { tag: "Conditional", field, bit, inner };
    }

    if (text.startsWith("!")) {
      const name = text.slice(1);
      if (!typeParams.includes(name)) {
        fail(`generic '!${name}' has no {${name}:Type} declaration`, w, offset);
      }
      return { tag: "Generic", name, bang: true };
    }

    if (text.startsWith("%")) {
      const name = text.slice(1);
      if (!IDENT_RE.test(name)) {
        fail("malformed bare type reference", w, offset);
      }
      return { tag: "Named", name, bare: true };
    }

    const vec = VECTOR_RE.exec(text);
    if (vec) {
      const item = parseTypeExpr(vec[2], w, offset + vec[1].length + 1, typeParams, previous, false);
      if (item.tag === "Bitmask" || item.tag === "Conditional") {
        fail("malformed vector item type", w, offset);
      }
      return { tag: "Vector", boxed: vec[1] === "Vector", item };
    }

    if (!IDENT_RE.test(text)) {
      return fail("malformed type reference", w, offset);
    }
    if (typeParams.includes(text)) {
      return { tag: "Generic", name: text, bang: false };
    }
    return { tag: "Named", name: text, bare: false };
  }
}

/** `bytes` and `string` share a wire layout; ids are computed as if `string`. */
function canonicalTypeText(type: TypeExpr, text: string): string {
  if (type.tag === "Named" && type.name === "bytes" && !type.bare) {
    return "string";
  }
  if (type.tag === "Conditional" && type.inner.tag === "Named" && type.inner.name === "bytes") {
    return `${type.field}.${type.bit}?string`;
  }
  return text;
}

function splitWords(code: string, line: number): Word[] {
  const words: Word[] = [];
  const re = /\S+/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(code)) !== null) {
    words.push({ text: m[0], line, col: m.index + 1 });
  }
  return words;
}
