/**
 * Tests for configuration loading and resolution
 */

import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { findConfig, loadConfig, resolveConfig, validateConfig } from "./config.js";
import type { ComponentizeConfig } from "./types.js";

describe("Config", () => {
  describe("resolveConfig", () => {
    it("should apply defaults", () => {
      const result = resolveConfig({}, {}, "/work");

      expect(result).to.deep.equal({
        entryFile: undefined,
        functionName: "default",
        projectRoot: "/work",
        outputFile: undefined,
        outputDirectory: "/work/components",
        baseImage: undefined,
        defaultBaseImage: undefined,
        packagesToInstall: [],
        captureStrategy: "source",
        modulesToCapture: [],
        extraCode: [],
        verbose: false,
        quiet: false,
      });
    });

    it("should use config values", () => {
      const config: ComponentizeConfig = {
        baseImage: "node:20-alpine",
        defaultBaseImage: "node:22-slim",
        packagesToInstall: ["lodash"],
        captureStrategy: "closure",
        modulesToCapture: ["src/math"],
        extraCode: ['const _os = require("node:os");'],
        outputDirectory: "build/components",
      };

      const result = resolveConfig(config, {}, "/work");
      expect(result.baseImage).to.equal("node:20-alpine");
      expect(result.defaultBaseImage).to.equal("node:22-slim");
      expect(result.packagesToInstall).to.deep.equal(["lodash"]);
      expect(result.captureStrategy).to.equal("closure");
      expect(result.modulesToCapture).to.deep.equal(["src/math"]);
      expect(result.extraCode).to.deep.equal(['const _os = require("node:os");']);
      expect(result.outputDirectory).to.equal("/work/build/components");
    });

    it("should override config with CLI options", () => {
      const config: ComponentizeConfig = {
        baseImage: "node:20-alpine",
        packagesToInstall: ["lodash"],
        captureStrategy: "closure",
        modulesToCapture: ["src/math"],
      };

      const result = resolveConfig(
        config,
        {
          baseImage: "node:22-slim",
          packages: ["zod"],
          strategy: "source",
          capture: ["src/io"],
          functionName: "train",
          verbose: true,
        },
        "/work"
      );

      expect(result.baseImage).to.equal("node:22-slim");
      expect(result.packagesToInstall).to.deep.equal(["zod"]);
      expect(result.captureStrategy).to.equal("source");
      expect(result.modulesToCapture).to.deep.equal(["src/io"]);
      expect(result.functionName).to.equal("train");
      expect(result.verbose).to.equal(true);
    });

    it("should resolve CLI paths against the working directory", () => {
      const result = resolveConfig(
        {},
        { out: "train.yaml" },
        "/work",
        "src/train.ts",
        "/work/pipelines"
      );

      expect(result.entryFile).to.equal("/work/pipelines/src/train.ts");
      expect(result.outputFile).to.equal("/work/pipelines/train.yaml");
    });
  });

  describe("validateConfig", () => {
    it("should accept an empty object", () => {
      expect(validateConfig({}).ok).to.equal(true);
    });

    it("should reject values that are not objects", () => {
      expect(validateConfig([])).to.deep.equal({
        ok: false,
        error: "the configuration must be a JSON object",
      });
    });

    it("should reject fields of the wrong type", () => {
      expect(validateConfig({ packagesToInstall: "lodash" })).to.deep.equal({
        ok: false,
        error: "'packagesToInstall' must be an array of strings",
      });
      expect(validateConfig({ captureStrategy: "pickle" })).to.deep.equal({
        ok: false,
        error: `'captureStrategy' must be "source" or "closure"`,
      });
    });
  });

  describe("loadConfig and findConfig", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "componentize-config-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should find componentize.json in a parent directory", () => {
      const configPath = path.join(tempDir, "componentize.json");
      fs.writeFileSync(configPath, "{}");
      const nested = path.join(tempDir, "src", "pipelines");
      fs.mkdirSync(nested, { recursive: true });

      expect(findConfig(nested)).to.equal(configPath);
    });

    it("should load a valid file", () => {
      const configPath = path.join(tempDir, "componentize.json");
      fs.writeFileSync(configPath, JSON.stringify({ baseImage: "node:20-alpine" }));

      const result = loadConfig(configPath);
      expect(result.ok && result.value.baseImage).to.equal("node:20-alpine");
    });

    it("should report a missing file", () => {
      const result = loadConfig(path.join(tempDir, "missing.json"));
      expect(!result.ok && result.error.code).to.equal("CMP4001");
    });

    it("should report invalid JSON", () => {
      const configPath = path.join(tempDir, "componentize.json");
      fs.writeFileSync(configPath, "{ baseImage: ");

      const result = loadConfig(configPath);
      expect(!result.ok && result.error.code).to.equal("CMP4002");
    });

    it("should report invalid fields", () => {
      const configPath = path.join(tempDir, "componentize.json");
      fs.writeFileSync(configPath, JSON.stringify({ extraCode: [1] }));

      const result = loadConfig(configPath);
      expect(!result.ok && result.error.message).to.equal(
        `${configPath}: 'extraCode' must be an array of strings`
      );
    });
  });
});
