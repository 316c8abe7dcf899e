import { describe, it } from "mocha";
import { expect } from "chai";
import { createProgramFromSources } from "./creation.js";
import { findFunction } from "./queries.js";
import type { ComponentProgram } from "./types.js";

const SOURCE = `
export function train(epochs: number): void {}

export const evaluate = (score: number): number => score;

function helper(): void {}

const renamedLocal = function (x: string): string { return x; };

export { renamedLocal as publicName };

export default function main(): void {}
`;

const program = (source: string): ComponentProgram => {
  const result = createProgramFromSources(
    new Map([["/project/src/tasks.ts", source]]),
    { projectRoot: "/project" }
  );
  if (!result.ok) throw new Error("Expected the source to parse");
  return result.value;
};

const lookup = (source: string, exportName: string) =>
  findFunction(program(source), "src/tasks.ts", exportName);

describe("Program Queries", () => {
  describe("findFunction", () => {
    it("should find an exported function declaration", () => {
      const result = lookup(SOURCE, "train");
      expect(result.ok && result.value.name).to.equal("train");
      expect(result.ok && result.value.node.parameters.length).to.equal(1);
    });

    it("should find an exported const arrow function", () => {
      const result = lookup(SOURCE, "evaluate");
      expect(result.ok && result.value.name).to.equal("evaluate");
    });

    it("should follow export specifiers", () => {
      const result = lookup(SOURCE, "publicName");
      expect(result.ok && result.value.name).to.equal("renamedLocal");
      expect(result.ok && result.value.exportName).to.equal("publicName");
    });

    it("should find the default export", () => {
      const result = lookup(SOURCE, "default");
      expect(result.ok && result.value.name).to.equal("main");
      expect(result.ok && result.value.exportName).to.equal("default");
    });

    it("should follow a default export assignment", () => {
      const result = lookup(
        "const run = (n: number): number => n;\nexport default run;",
        "default"
      );
      expect(result.ok && result.value.name).to.equal("run");
    });

    it("should not find unexported functions", () => {
      const result = lookup(SOURCE, "helper");
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.diagnostics[0]?.code).to.equal("CMP3001");
      expect(result.error.diagnostics[0]?.message).to.equal(
        "No exported function 'helper' in /project/src/tasks.ts"
      );
    });

    it("should report files outside the program", () => {
      const result = findFunction(program(SOURCE), "src/other.ts", "train");
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.diagnostics[0]?.code).to.equal("CMP3002");
    });
  });
});
