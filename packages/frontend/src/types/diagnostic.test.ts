/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  singleDiagnostic,
  isError,
} from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("createDiagnostic", () => {
    it("should create a diagnostic with all fields", () => {
      const diagnostic = createDiagnostic(
        "CMP1001",
        "error",
        "Default values are not supported for file parameters",
        {
          file: "math.ts",
          line: 3,
          column: 22,
          length: 8,
        },
        "Remove the initializer"
      );

      expect(diagnostic.code).to.equal("CMP1001");
      expect(diagnostic.severity).to.equal("error");
      expect(diagnostic.location?.file).to.equal("math.ts");
      expect(diagnostic.hint).to.equal("Remove the initializer");
    });

    it("should create a diagnostic without optional fields", () => {
      const diagnostic = createDiagnostic("CMP3001", "warning", "Not found");

      expect(diagnostic.location).to.be.undefined;
      expect(diagnostic.hint).to.be.undefined;
    });
  });

  describe("formatDiagnostic", () => {
    it("should format diagnostic with location", () => {
      const diagnostic = createDiagnostic(
        "CMP2003",
        "error",
        "Default value must be a literal",
        {
          file: "/src/train.ts",
          line: 5,
          column: 10,
          length: 15,
        }
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "/src/train.ts:5:10 error CMP2003: Default value must be a literal"
      );
    });

    it("should format diagnostic without location", () => {
      const diagnostic = createDiagnostic("CMP4001", "error", "Missing file");

      expect(formatDiagnostic(diagnostic)).to.equal(
        "error CMP4001: Missing file"
      );
    });

    it("should append the hint", () => {
      const diagnostic = createDiagnostic(
        "CMP1002",
        "error",
        "Conflicting base image",
        undefined,
        "Drop one of them"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "error CMP1002: Conflicting base image Hint: Drop one of them"
      );
    });
  });

  describe("DiagnosticsCollector", () => {
    it("should start empty", () => {
      const collector = createDiagnosticsCollector();
      expect(collector.diagnostics).to.have.length(0);
      expect(collector.hasErrors).to.equal(false);
    });

    it("should track errors but not warnings", () => {
      const withWarning = addDiagnostic(
        createDiagnosticsCollector(),
        createDiagnostic("CMP3001", "warning", "w")
      );
      expect(withWarning.hasErrors).to.equal(false);

      const withError = addDiagnostic(
        withWarning,
        createDiagnostic("CMP3001", "error", "e")
      );
      expect(withError.hasErrors).to.equal(true);
      expect(withError.diagnostics).to.have.length(2);
    });

    it("should merge collectors in order", () => {
      const first = singleDiagnostic(createDiagnostic("CMP1001", "error", "a"));
      const second = singleDiagnostic(
        createDiagnostic("CMP2003", "warning", "b")
      );

      const merged = mergeDiagnostics(first, second);
      expect(merged.diagnostics.map((d) => d.code)).to.deep.equal([
        "CMP1001",
        "CMP2003",
      ]);
      expect(merged.hasErrors).to.equal(true);
    });
  });

  describe("isError", () => {
    it("should only accept error severity", () => {
      expect(isError(createDiagnostic("CMP1001", "error", ""))).to.equal(true);
      expect(isError(createDiagnostic("CMP1001", "info", ""))).to.equal(false);
    });
  });
});
