import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import YAML from "yaml";
import { buildCommand } from "./build.js";
import { resolveConfig } from "../config.js";

const ADD = `/**
 * Adds two numbers.
 */
export function add(a: number, b: number = 1): number {
  return a + b;
}
`;

describe("build command", () => {
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = fs.mkdtempSync(path.join(os.tmpdir(), "componentize-build-"));
    fs.mkdirSync(path.join(projectRoot, "src"));
  });

  afterEach(() => {
    fs.rmSync(projectRoot, { recursive: true, force: true });
  });

  const readComponent = (file: string): unknown =>
    YAML.parse(fs.readFileSync(file, "utf-8"));

  it("should write the component into the output directory", () => {
    fs.writeFileSync(path.join(projectRoot, "src", "add.ts"), ADD);
    const config = resolveConfig(
      {},
      { functionName: "add", quiet: true },
      projectRoot,
      "src/add.ts"
    );

    const result = buildCommand(config);

    const expected = path.join(projectRoot, "components", "add.yaml");
    expect(result.ok && result.value).to.deep.equal({
      componentFile: expected,
      componentName: "Add",
    });
    expect(readComponent(expected)).to.deep.include({
      name: "Add",
      description: "Adds two numbers.\n",
      inputs: [
        { name: "a", type: "Float" },
        { name: "b", type: "Float", default: "1", optional: true },
      ],
      outputs: [{ name: "Output", type: "Float" }],
    });
  });

  it("should honor the @componentFile tag", () => {
    fs.writeFileSync(
      path.join(projectRoot, "src", "add.ts"),
      `/** @componentFile out/adder.yaml */
export function add(a: number, b: number): number {
  return a + b;
}
`
    );
    const config = resolveConfig(
      {},
      { functionName: "add", quiet: true },
      projectRoot,
      "src/add.ts"
    );

    const result = buildCommand(config);

    expect(result.ok && result.value.componentFile).to.equal(
      path.join(projectRoot, "out", "adder.yaml")
    );
  });

  it("should report a missing function", () => {
    fs.writeFileSync(path.join(projectRoot, "src", "add.ts"), ADD);
    const config = resolveConfig(
      {},
      { functionName: "subtract", quiet: true },
      projectRoot,
      "src/add.ts"
    );

    const result = buildCommand(config);

    expect(!result.ok && result.error.diagnostics.map((d) => d.code)).to.deep.equal([
      "CMP3001",
    ]);
  });

  it("should require a source file", () => {
    const result = buildCommand(resolveConfig({}, { quiet: true }, projectRoot));

    expect(!result.ok && result.error.diagnostics.map((d) => d.code)).to.deep.equal([
      "CMP3002",
    ]);
  });
});
