import { describe, it } from "mocha";
import { expect } from "chai";
import { defaultTypeRegistry } from "@componentize/frontend";
import { createShimContext, emitOptionType, emitScaffold } from "./scaffold.js";

const context = createShimContext(defaultTypeRegistry);

describe("Shim scaffold", () => {
  describe("emitOptionType", () => {
    it("should decode values with the registered deserializer", () => {
      const [type, next] = emitOptionType({ kind: "value" }, "Boolean", context);
      expect(type).to.equal("_deserializeBoolean");
      expect([...next.definitions.keys()]).to.deep.equal(["_deserializeBoolean"]);
    });

    it("should fall back to plain text", () => {
      expect(emitOptionType({ kind: "value" }, "Model", context)[0]).to.equal(
        "String"
      );
      expect(emitOptionType({ kind: "value" }, undefined, context)[0]).to.equal(
        "String"
      );
      expect(emitOptionType({ kind: "inputPath" }, "CSV", context)[0]).to.equal(
        "String"
      );
    });

    it("should open streams by mode", () => {
      expect(
        emitOptionType({ kind: "inputFile", mode: "text" }, undefined, context)[0]
      ).to.equal("_openTextInputStream");

      const [type, next] = emitOptionType(
        { kind: "outputFile", mode: "binary" },
        undefined,
        context
      );
      expect(type).to.equal("_openBinaryOutputStream");
      expect([...next.definitions.keys()]).to.deep.equal([
        "_makeParentDirsAndReturnPath",
        "_openBinaryOutputStream",
      ]);
    });

    it("should create parent directories for output paths", () => {
      expect(
        emitOptionType({ kind: "outputPath" }, undefined, context)[0]
      ).to.equal("_makeParentDirsAndReturnPath");
    });

    it("should reject return values", () => {
      expect(() =>
        emitOptionType({ kind: "returnValue" }, "Float", context)
      ).to.throw("ICE: Unsupported passing style 'returnValue'");
    });
  });

  describe("emitScaffold", () => {
    it("should define one option per input and file output", () => {
      const [text, next] = emitScaffold(
        "Train",
        [
          {
            name: "epochs",
            type: "Integer",
            optional: true,
            default: "10",
            passingStyle: { kind: "value" },
            parameterName: "epochs",
          },
        ],
        [
          {
            name: "model",
            passingStyle: { kind: "outputPath" },
            parameterName: "model_path",
          },
        ],
        1,
        context
      );

      expect(text.split("\n")).to.deep.equal([
        'const _parser = _createParser("Train");',
        '_parser.addArgument("--epochs", { dest: "epochs", type: _deserializeInteger, required: false });',
        '_parser.addArgument("--model", { dest: "model_path", type: _makeParentDirsAndReturnPath, required: true });',
        '_parser.addArgument("----output-paths", { dest: "_outputPaths", type: String, required: true, nargs: 1 });',
        "const _parsedArgs = _parser.parse(process.argv.slice(1));",
      ]);
      expect([...next.definitions.keys()]).to.deep.equal([
        "_createParser",
        "_deserializeInteger",
        "_makeParentDirsAndReturnPath",
      ]);
    });
  });
});
