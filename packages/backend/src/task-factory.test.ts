import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import YAML from "yaml";
import { createComponentSpec } from "./assembler.js";
import {
  createTaskFactory,
  defaultPathGenerator,
  functionToTaskFactory,
  resolveCommandLine,
} from "./task-factory.js";
import { loadTarget } from "./test-harness.js";

const SCALE = `
import type { InputPath, OutputPath } from "@componentize/frontend";

export function scale(
  dataPath: InputPath<"CSV">,
  reportPath: OutputPath<"Text">,
  factor: number = 2,
  label?: string
): number {
  return factor;
}
`;

const specOf = (source: string, exportName: string) => {
  const result = createComponentSpec(loadTarget(source, exportName));
  if (!result.ok) {
    throw new Error(result.error.diagnostics.map((d) => d.message).join("\n"));
  }
  return result.value;
};

const codesOf = (result: ReturnType<typeof resolveCommandLine>): readonly string[] =>
  result.ok ? [] : result.error.diagnostics.map((d) => d.code);

describe("Task Factory", () => {
  it("should stage inputs and collect outputs under /tmp", () => {
    expect(defaultPathGenerator("input", "data")).to.equal("/tmp/inputs/data/data");
    expect(defaultPathGenerator("output", "Output")).to.equal(
      "/tmp/outputs/Output/data"
    );
  });

  it("should resolve values and paths", () => {
    const task = resolveCommandLine(specOf(SCALE, "scale"), {
      data: "a,b\n1,2\n",
      factor: 3,
    });

    expect(task.ok).to.equal(true);
    if (!task.ok) return;
    expect(task.value.args).to.deep.equal([
      "--data",
      "/tmp/inputs/data/data",
      "--factor",
      "3",
      "--report",
      "/tmp/outputs/report/data",
      "----output-paths",
      "/tmp/outputs/Output/data",
    ]);
    expect(task.value.inputPaths).to.deep.equal({ data: "/tmp/inputs/data/data" });
    expect(task.value.artifactArguments).to.deep.equal({ data: "a,b\n1,2\n" });
    expect(task.value.outputPaths).to.deep.equal({
      report: "/tmp/outputs/report/data",
      Output: "/tmp/outputs/Output/data",
    });
    expect(task.value.image).to.equal("node:20-slim");
    expect(task.value.command.slice(0, 2)).to.deep.equal(["node", "-e"]);
  });

  it("should include an optional input only when it is passed", () => {
    const factory = createTaskFactory(specOf(SCALE, "scale"));

    const task = factory({ data: "x", label: "run-1" }, (kind, name) => `/${kind}/${name}`);

    expect(task.ok && task.value.args).to.deep.equal([
      "--data",
      "/input/data",
      "--label",
      "run-1",
      "--report",
      "/output/report",
      "----output-paths",
      "/output/Output",
    ]);
  });

  it("should report missing required inputs", () => {
    expect(codesOf(resolveCommandLine(specOf(SCALE, "scale"), {}))).to.deep.equal([
      "CMP5001",
    ]);
  });

  it("should report unknown arguments", () => {
    expect(
      codesOf(resolveCommandLine(specOf(SCALE, "scale"), { data: "x", scale: 1 }))
    ).to.deep.equal(["CMP5002"]);
  });

  it("should report arguments its type cannot serialize", () => {
    expect(
      codesOf(resolveCommandLine(specOf(SCALE, "scale"), { data: "x", factor: true }))
    ).to.deep.equal(["CMP5003"]);
  });

  it("should write the component file it is asked for", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "componentize-task-"));
    try {
      const file = path.join(dir, "components", "scale.yaml");
      const factory = functionToTaskFactory(loadTarget(SCALE, "scale"), {
        outputComponentFile: file,
      });

      expect(factory.ok).to.equal(true);
      const document: unknown = YAML.parse(fs.readFileSync(file, "utf-8"));
      expect(document).to.have.property("name", "Scale");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
