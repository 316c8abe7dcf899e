import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createProgram, createProgramFromSources } from "./creation.js";

describe("Program Creation", () => {
  it("should load in-memory sources", () => {
    const result = createProgramFromSources(
      new Map([["/project/src/add.ts", "export const add = (a: number) => a;"]]),
      { projectRoot: "/project" }
    );

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.sourceFiles.map((sf) => sf.fileName)).to.deep.equal([
      "/project/src/add.ts",
    ]);
  });

  it("should report syntax errors", () => {
    const result = createProgramFromSources(
      new Map([["/project/src/broken.ts", "export function (a: number {"]]),
      { projectRoot: "/project" }
    );

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.hasErrors).to.equal(true);
    expect(result.error.diagnostics[0]?.code).to.equal("CMP2001");
    expect(result.error.diagnostics[0]?.location?.file).to.equal(
      "/project/src/broken.ts"
    );
  });

  it("should report a missing file", () => {
    const result = createProgram(["missing.ts"], { projectRoot: "/nowhere" });

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.diagnostics).to.have.length(1);
    expect(result.error.diagnostics[0]?.code).to.equal("CMP3002");
    expect(result.error.diagnostics[0]?.message).to.equal(
      `Source file not found: ${path.resolve("/nowhere", "missing.ts")}`
    );
  });

  it("should load files from disk", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "component-program-"));
    try {
      fs.writeFileSync(
        path.join(dir, "add.ts"),
        "export function add(a: number, b: number): number { return a + b; }\n"
      );
      const result = createProgram(["add.ts"], { projectRoot: dir });

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.sourceFiles).to.have.length(1);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
