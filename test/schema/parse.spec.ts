// test/schema/parse.spec.ts
// Tests for TL schema text parsing

import { describe, it, expect } from "vitest";
import { parseSchema } from "../../src/schema/parse";
import { MissingLayerError, SchemaSyntaxError } from "../../src/outcome/errors";
import { readApiSchema, thrownBy } from "../helpers/fixtures";

describe("parseSchema", () => {
  describe("Fixture schema", () => {
    const parsed = parseSchema(readApiSchema(), { file: "api.tl" });

    it("should read the layer marker", () => {
      expect(parsed.layer).toBe(7);
      expect(parsed.file).toBe("api.tl");
    });

    it("should skip built-in combinators", () => {
      expect(parsed.skipped.map((s) => s.name)).toEqual(["boolFalse", "boolTrue", "true", "vector"]);
      expect(parsed.skipped[0].reason).toBe("built-in combinator");
    });

    it("should keep declarations in source order across sections", () => {
      expect(parsed.declarations.map((d) => d.qualifiedName)).toEqual([
        "peerUser",
        "peerChat",
        "inputPeerEmpty",
        "inputPeerUser",
        "messageEntityBold",
        "messageEntityUrl",
        "message",
        "messageEmpty",
        "messages.messages",
        "sample.flagged",
        "sample.numbers",
        "sample.pair",
        "pong",
        "ping",
        "invokeWithLayer",
        "messages.getHistory",
        "messages.getMessages",
      ]);
      expect(parsed.declarations.filter((d) => d.section === "functions").map((d) => d.name)).toEqual([
        "ping",
        "invokeWithLayer",
        "getHistory",
        "getMessages",
      ]);
    });

    it("should split namespaces off qualified names", () => {
      const getHistory = parsed.declarations.find((d) => d.qualifiedName === "messages.getHistory");
      expect(getHistory?.namespace).toBe("messages");
      expect(getHistory?.name).toBe("getHistory");
      expect(parsed.declarations[0].namespace).toBeUndefined();
    });

    it("should parse explicit ids as unsigned", () => {
      const message = parsed.declarations.find((d) => d.qualifiedName === "message");
      expect(message?.explicitId).toBe(0x136730aa);
      const empty = parsed.declarations.find((d) => d.qualifiedName === "messageEmpty");
      expect(empty?.explicitId).toBeUndefined();
    });

    it("should parse flag-conditional parameters", () => {
      const message = parsed.declarations.find((d) => d.qualifiedName === "message");
      expect(message?.params.map((p) => p.name)).toEqual([
        "flags",
        "out",
        "id",
        "peer_id",
        "reply_to",
        "message",
        "entities",
      ]);
      expect(message?.params[0].type).toEqual({ tag: "Bitmask" });
      expect(message?.params[1].type).toEqual({
        tag: "Conditional",
        field: "flags",
        bit: 1,
        inner: { tag: "Named", name: "true", bare: false },
      });
      expect(message?.params[6].type).toEqual({
        tag: "Conditional",
        field: "flags",
        bit: 7,
        inner: { tag: "Vector", boxed: true, item: { tag: "Named", name: "MessageEntity", bare: false } },
      });
    });

    it("should build canonical signatures", () => {
      const bySig = (name: string) => parsed.declarations.find((d) => d.qualifiedName === name)?.signature;
      expect(bySig("message")).toBe(
        "message flags:# id:int peer_id:Peer reply_to:flags.3?int message:string entities:flags.7?Vector MessageEntity = Message"
      );
      expect(bySig("sample.numbers")).toBe(
        "sample.numbers small:int big:long huge:int128 ratio:double blob:string yes:Bool = sample.Numbers"
      );
      expect(bySig("sample.pair")).toBe("sample.pair first:%sample.Numbers ids:vector long = sample.Pair");
      expect(bySig("invokeWithLayer")).toBe("invokeWithLayer X:Type layer:int query:!X = X");
      expect(bySig("messages.getMessages")).toBe("messages.getMessages id:Vector int = Vector Message");
    });

    it("should parse generics and bare references", () => {
      const invoke = parsed.declarations.find((d) => d.qualifiedName === "invokeWithLayer");
      expect(invoke?.typeParams).toEqual(["X"]);
      expect(invoke?.params[1].type).toEqual({ tag: "Generic", name: "X", bang: true });
      expect(invoke?.result).toEqual({ tag: "Generic", name: "X", bang: false });

      const pair = parsed.declarations.find((d) => d.qualifiedName === "sample.pair");
      expect(pair?.params[0].type).toEqual({ tag: "Named", name: "sample.Numbers", bare: true });
      expect(pair?.params[1].type).toEqual({ tag: "Vector", boxed: false, item: { tag: "Named", name: "long", bare: false } });
    });

    it("should record source spans", () => {
      expect(parsed.declarations[0].span).toEqual({ file: "api.tl", line: 10, column: 1, endColumn: 18 });
    });
  });

  describe("Layout", () => {
    it("should ignore comments and blank lines", () => {
      const parsed = parseSchema("// a comment\n\nfoo x:int = Foo; // trailing\n");
      expect(parsed.declarations).toHaveLength(1);
      expect(parsed.layer).toBeUndefined();
    });

    it("should allow a declaration to span lines", () => {
      const parsed = parseSchema("foo\n  x:int\n  y:string\n  = Foo;");
      expect(parsed.declarations[0].signature).toBe("foo x:int y:string = Foo");
    });

    it("should allow several declarations on one line", () => {
      const parsed = parseSchema("a = A; b = B;");
      expect(parsed.declarations.map((d) => d.name)).toEqual(["a", "b"]);
    });

    it("should drop true-flags from signatures but keep them as params", () => {
      const parsed = parseSchema("foo flags:# silent:flags.0?true = Foo;");
      expect(parsed.declarations[0].signature).toBe("foo flags:# = Foo");
      expect(parsed.declarations[0].params).toHaveLength(2);
    });

    it("should write conditional bytes as string in the signature", () => {
      const parsed = parseSchema("foo flags:# data:flags.2?bytes = Foo;");
      expect(parsed.declarations[0].signature).toBe("foo flags:# data:flags.2?string = Foo");
    });
  });

  describe("Errors", () => {
    it("should reject a malformed constructor id", () => {
      const err = thrownBy(() => parseSchema("\n\nfoo#zz = Bar;"));
      expect(err).toBeInstanceOf(SchemaSyntaxError);
      if (err instanceof SchemaSyntaxError) {
        expect(err.message).toBe("SchemaSyntaxError: malformed constructor id at line 3, column 5 (near 'zz')");
        expect(err.span?.line).toBe(3);
        expect(err.code).toBe("E0001");
      }
    });

    it("should reject an unterminated declaration", () => {
      expect(() => parseSchema("foo = Bar")).toThrow("unterminated declaration (missing ';')");
      expect(() => parseSchema("foo = Bar\n---functions---\n")).toThrow("unterminated declaration");
    });

    it("should reject text after ';'", () => {
      expect(() => parseSchema("foo = Bar;x")).toThrow("unexpected text after ';'");
    });

    it("should reject an unknown section", () => {
      expect(() => parseSchema("---weird---")).toThrow("unknown section 'weird'");
    });

    it("should reject a missing '='", () => {
      expect(() => parseSchema("foo x:int Bar;")).toThrow("missing '=' before result type");
    });

    it("should reject duplicate parameters", () => {
      expect(() => parseSchema("foo x:int x:int = Foo;")).toThrow("duplicate parameter 'x'");
    });

    it("should reject conditions on a field that is not a preceding bitmask", () => {
      expect(() => parseSchema("foo x:flags.0?int = Foo;")).toThrow(
        "flags field 'flags' is not a preceding # parameter"
      );
      expect(() => parseSchema("foo flags:int x:flags.0?int = Foo;")).toThrow(SchemaSyntaxError);
    });

    it("should reject flag bits outside 0..31", () => {
      expect(() => parseSchema("foo flags:# x:flags.32?int = Foo;")).toThrow("flags bit 32 is out of range 0..31");
      expect(() => parseSchema("foo flags:# x:flags.a?int = Foo;")).toThrow("flags bit 'a' is not a number");
    });

    it("should reject bad result types", () => {
      expect(() => parseSchema("foo = Vector<int>;")).toThrow("constructor must belong to a named type");
      expect(() => parseSchema("foo = %Bar;")).toThrow("result type cannot be bare");
      expect(() => parseSchema("foo = A B;")).toThrow("malformed result type");
    });

    it("should reject an undeclared generic", () => {
      expect(() => parseSchema("---functions---\nfoo q:!X = X;")).toThrow("generic '!X' has no {X:Type} declaration");
    });

    it("should require a layer marker when asked", () => {
      expect(() => parseSchema("foo = Foo;", { requireLayer: true, file: "a.tl" })).toThrow(MissingLayerError);
      expect(parseSchema("// LAYER 3\nfoo = Foo;", { requireLayer: true }).layer).toBe(3);
    });
  });
});
