// test/layer/diff.spec.ts
// Tests for upstream schema preparation and update reports

import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { computeId } from "../../src/ids/resolve";
import {
  applySchemaUpdate,
  checkSchemaUpdate,
  diffSchemas,
  extractLayer,
  prepareUpstreamSchema,
  SCHEMA_HEADER,
} from "../../src/layer/diff";
import { sha256Text } from "../../src/layer/fingerprint";
import { parseSchema } from "../../src/schema/parse";
import { makeTempDir, removeDir } from "../helpers/fixtures";

const upstream = [
  "---types---",
  "boolFalse#bc799737 = Bool;",
  "boolTrue#997275b5 = Bool;",
  "foo = Foo;",
  "",
  "bar x:int = Bar;",
  "---functions---",
  "getFoo = Foo;",
  "// LAYER 9",
  "",
].join("\r\n");

describe("prepareUpstreamSchema", () => {
  const prepared = prepareUpstreamSchema(upstream);

  it("should put the fixed header first and drop built-in lines", () => {
    expect(prepared).toBe(
      `${SCHEMA_HEADER}\nfoo = Foo;\n\nbar x:int = Bar;\n\n---functions---\ngetFoo = Foo;\n// LAYER 9\n`
    );
  });

  it("should leave text already in vendored form as it is", () => {
    expect(prepareUpstreamSchema(prepared)).toBe(prepared);
  });

  it("should produce a schema the parser accepts", () => {
    const parsed = parseSchema(prepared);
    expect(parsed.layer).toBe(9);
    expect(parsed.declarations.map((d) => d.qualifiedName)).toEqual(["foo", "bar", "getFoo"]);
    expect(parsed.skipped).toEqual([]);
  });

  it("should handle a schema without functions", () => {
    expect(prepareUpstreamSchema("foo = Foo;\n")).toBe(`${SCHEMA_HEADER}\nfoo = Foo;`);
  });
});

describe("extractLayer", () => {
  it("should find the layer comment anywhere", () => {
    expect(extractLayer("a = A;\n// LAYER 181\n")).toBe(181);
    expect(extractLayer("a = A;")).toBeUndefined();
  });
});

describe("checkSchemaUpdate", () => {
  const current = "// LAYER 1\nfoo = Foo;\nbar x:int = Bar;\nold = Old;\n";
  const candidate = "// LAYER 2\nfoo = Foo;\nbar x:long = Bar;\nbaz = Baz;\n---functions---\nget = Foo;\n";

  it("should report every declaration as added the first time", () => {
    const report = checkSchemaUpdate(current);
    expect(report.status).toBe("Initial");
    expect(report.candidateLayer).toBe(1);
    expect(report.currentHash).toBeUndefined();
    expect(report.candidateHash).toBe(sha256Text(current));
    expect(report.diff.added.map((d) => d.name)).toEqual(["bar", "foo", "old"]);
  });

  it("should report identical text as unchanged", () => {
    const report = checkSchemaUpdate(current, current);
    expect(report.status).toBe("Unchanged");
    expect(report.currentLayer).toBe(1);
    expect(report.diff).toEqual({ added: [], removed: [], changed: [] });
  });

  it("should list added, removed and re-numbered declarations", () => {
    const report = checkSchemaUpdate(candidate, current);
    expect(report.status).toBe("Changed");
    expect(report.currentLayer).toBe(1);
    expect(report.candidateLayer).toBe(2);
    expect(report.diff.added).toEqual([
      { section: "types", name: "baz", id: computeId({ signature: "baz = Baz" }) },
      { section: "functions", name: "get", id: computeId({ signature: "get = Foo" }) },
    ]);
    expect(report.diff.removed).toEqual([{ section: "types", name: "old", id: computeId({ signature: "old = Old" }) }]);
    expect(report.diff.changed).toEqual([
      {
        section: "types",
        name: "bar",
        fromId: computeId({ signature: "bar x:int = Bar" }),
        toId: computeId({ signature: "bar x:long = Bar" }),
      },
    ]);
  });

  it("should treat a comment-only change as changed with an empty diff", () => {
    const report = checkSchemaUpdate(`${current}// note\n`, current);
    expect(report.status).toBe("Changed");
    expect(diffSchemas(current, `${current}// note\n`)).toEqual({ added: [], removed: [], changed: [] });
  });
});

describe("applySchemaUpdate", () => {
  it("should replace the vendored file", () => {
    const dir = makeTempDir();
    try {
      const file = path.join(dir, "schema", "api.tl");
      applySchemaUpdate(file, "first");
      applySchemaUpdate(file, "second");
      expect(fs.readFileSync(file, "utf8")).toBe("second");
      expect(fs.readdirSync(path.dirname(file))).toEqual(["api.tl"]);
    } finally {
      removeDir(dir);
    }
  });
});
