import { describe, it } from "mocha";
import { expect } from "chai";
import YAML from "yaml";
import type { ComponentSpec } from "@componentize/frontend";
import { argumentToDict, componentToDict, dumpComponent } from "./serialize.js";

const SPEC: ComponentSpec = {
  name: "Scale",
  description: "Scales a value.\n",
  inputs: [
    {
      name: "value",
      type: "Float",
      optional: false,
      passingStyle: { kind: "value" },
      parameterName: "value",
    },
    {
      name: "factor",
      type: "Float",
      optional: true,
      default: "2",
      passingStyle: { kind: "value" },
      parameterName: "factor",
    },
  ],
  outputs: [{ name: "Output", type: "Float", passingStyle: { kind: "returnValue" } }],
  implementation: {
    container: {
      image: "node:20-slim",
      command: ["node", "-e", "program\n", "--"],
      args: [
        "--value",
        { kind: "inputValue", name: "value" },
        {
          kind: "ifThen",
          condition: { kind: "isPresent", name: "factor" },
          then: ["--factor", { kind: "inputValue", name: "factor" }],
        },
        "----output-paths",
        { kind: "outputPath", name: "Output" },
      ],
    },
  },
};

describe("Component Serialization", () => {
  it("should write placeholders as single-key objects", () => {
    expect(argumentToDict({ kind: "inputPath", name: "data" })).to.deep.equal({
      inputPath: "data",
    });
    expect(
      argumentToDict({
        kind: "ifThen",
        condition: { kind: "isPresent", name: "x" },
        then: ["--x"],
        else: ["--no-x"],
      })
    ).to.deep.equal({
      if: { cond: { isPresent: "x" }, then: ["--x"], else: ["--no-x"] },
    });
  });

  it("should leave compile-time details out of the document", () => {
    expect(componentToDict(SPEC)).to.deep.equal({
      name: "Scale",
      description: "Scales a value.\n",
      inputs: [
        { name: "value", type: "Float" },
        { name: "factor", type: "Float", default: "2", optional: true },
      ],
      outputs: [{ name: "Output", type: "Float" }],
      implementation: {
        container: {
          image: "node:20-slim",
          command: ["node", "-e", "program\n", "--"],
          args: [
            "--value",
            { inputValue: "value" },
            {
              if: {
                cond: { isPresent: "factor" },
                then: ["--factor", { inputValue: "factor" }],
              },
            },
            "----output-paths",
            { outputPath: "Output" },
          ],
        },
      },
    });
  });

  it("should omit empty interfaces", () => {
    expect(
      componentToDict({ name: "Noop", inputs: [], outputs: [] })
    ).to.deep.equal({ name: "Noop" });
  });

  it("should dump YAML that reads back as the document", () => {
    expect(YAML.parse(dumpComponent(SPEC))).to.deep.equal(componentToDict(SPEC));
  });

  it("should dump block-style YAML", () => {
    expect(
      dumpComponent({
        name: "Add",
        inputs: [
          {
            name: "a",
            type: "Float",
            optional: false,
            passingStyle: { kind: "value" },
            parameterName: "a",
          },
        ],
        outputs: [],
      })
    ).to.equal("name: Add\ninputs:\n  - name: a\n    type: Float\n");
  });
});
