// test/config/config.spec.ts
// Tests for config sources, their priority and validation

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  validateConfig,
} from "../../src/config";
import { makeTempDir, removeDir } from "../helpers/fixtures";

describe("Configuration", () => {
  describe("Defaults", () => {
    it("should generate into ./generated importing tlgen/runtime", () => {
      expect(DEFAULT_CONFIG.output).toEqual({ dir: "generated", runtimeImport: "tlgen/runtime" });
      expect(DEFAULT_CONFIG.schema).toEqual({ paths: [], requireLayer: true });
      expect(DEFAULT_CONFIG.log.level).toBe("info");
    });
  });

  describe("Environment", () => {
    it("should read TLGEN_* variables", () => {
      const env = {
        TLGEN_SCHEMA: ["a.tl", "", "b.tl"].join(path.delimiter),
        TLGEN_ERRORS_DIR: "errors",
        TLGEN_OUT_DIR: "out",
        TLGEN_LOG_LEVEL: "warn",
      };
      expect(configFromEnv(env)).toEqual({
        schema: { paths: ["a.tl", "b.tl"] },
        errors: { sourceDir: "errors" },
        output: { dir: "out" },
        log: { level: "warn" },
      });
    });

    it("should return nothing for an empty environment", () => {
      expect(configFromEnv({})).toEqual({});
    });

    it("should reject an unknown log level", () => {
      expect(() => configFromEnv({ TLGEN_LOG_LEVEL: "loud" })).toThrow(
        "Invalid log level 'loud' in TLGEN_LOG_LEVEL"
      );
    });
  });

  describe("Objects and files", () => {
    it("should accept camelCase and snake_case keys", () => {
      expect(
        configFromObject({
          schema: { paths: "api.tl", require_layer: false },
          errors: { source_dir: "errors" },
          output: { runtime_import: "@app/tl-runtime" },
        })
      ).toEqual({
        schema: { paths: ["api.tl"], requireLayer: false },
        errors: { sourceDir: "errors" },
        output: { runtimeImport: "@app/tl-runtime" },
      });
    });

    it("should resolve paths against a base directory", () => {
      const input = configFromObject({ schema: { paths: ["a.tl"] }, output: { dir: "out" } }, "/work/proj");
      expect(input.schema?.paths).toEqual([path.resolve("/work/proj", "a.tl")]);
      expect(input.output?.dir).toBe(path.resolve("/work/proj", "out"));
    });

    it("should ignore values of the wrong type", () => {
      expect(configFromObject({ schema: { paths: [1, 2], requireLayer: "yes" }, output: 5 })).toEqual({ schema: {} });
    });

    describe("Files", () => {
      let dir = "";
      beforeEach(() => {
        dir = makeTempDir();
      });
      afterEach(() => {
        removeDir(dir);
      });

      it("should load JSON relative to the file", () => {
        const file = path.join(dir, "tlgen.config.json");
        fs.writeFileSync(file, JSON.stringify({ schema: { paths: ["schema/api.tl"] }, log: { level: "debug" } }));
        expect(configFromFile(file)).toEqual({
          schema: { paths: [path.join(dir, "schema", "api.tl")] },
          log: { level: "debug" },
        });
      });

      it("should reject missing files, other formats and non-objects", () => {
        expect(() => configFromFile(path.join(dir, "none.json"))).toThrow("Config file not found");
        fs.writeFileSync(path.join(dir, "c.yaml"), "a: 1");
        expect(() => configFromFile(path.join(dir, "c.yaml"))).toThrow("Unsupported config file format: .yaml");
        fs.writeFileSync(path.join(dir, "c.json"), "[1]");
        expect(() => configFromFile(path.join(dir, "c.json"))).toThrow("Config file must contain a JSON object");
      });

      it("should let CLI overrides beat the file and the file beat the environment", () => {
        fs.writeFileSync(
          path.join(dir, "tlgen.config.json"),
          JSON.stringify({ output: { dir: "from-file", runtimeImport: "file-rt" } })
        );
        const config = loadConfig({
          cwd: dir,
          env: { TLGEN_OUT_DIR: "from-env", TLGEN_SCHEMA: "env.tl", TLGEN_RUNTIME_IMPORT: "env-rt" },
          overrides: { output: { dir: "from-cli", runtimeImport: undefined } },
        });
        expect(config.output).toEqual({ dir: "from-cli", runtimeImport: "file-rt" });
        expect(config.schema.paths).toEqual(["env.tl"]);
      });

      it("should load an explicit config file relative to cwd", () => {
        fs.writeFileSync(path.join(dir, "other.json"), JSON.stringify({ errors: { sourceDir: "errs" } }));
        const config = loadConfig({ cwd: dir, env: {}, configFile: "other.json" });
        expect(config.errors.sourceDir).toBe(path.join(dir, "errs"));
      });
    });
  });

  describe("Merging", () => {
    it("should not let undefined values override", () => {
      const config = mergeConfigs({ log: { level: "warn" } }, { log: { level: undefined } });
      expect(config.log.level).toBe("warn");
    });

    it("should not mutate the defaults", () => {
      mergeConfigs({ schema: { paths: ["x.tl"] } });
      expect(DEFAULT_CONFIG.schema.paths).toEqual([]);
    });
  });

  describe("Validation", () => {
    it("should require a schema", () => {
      const result = validateConfig(mergeConfigs());
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(["No schema files configured. Pass --schema or set TLGEN_SCHEMA"]);
    });

    it("should reject an output directory that contains an input", () => {
      const result = validateConfig(
        mergeConfigs({ schema: { paths: ["/work/out/api.tl"] }, output: { dir: "/work/out" } })
      );
      expect(result.errors).toEqual([
        "Output directory /work/out contains input /work/out/api.tl; regeneration would delete it",
      ]);
    });

    it("should warn about a relative runtime import", () => {
      const result = validateConfig(
        mergeConfigs({ schema: { paths: ["/work/api.tl"] }, output: { dir: "/work/out", runtimeImport: "../rt" } })
      );
      expect(result.valid).toBe(true);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0]).toContain("runtimeImport '../rt' is relative");
    });
  });
});
