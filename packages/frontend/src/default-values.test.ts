import { describe, it } from "mocha";
import { expect } from "chai";
import * as ts from "typescript";
import { evaluateDefault } from "./default-values.js";

const initializer = (text: string): ts.Expression => {
  const sourceFile = ts.createSourceFile(
    "/defaults.ts",
    `const value = ${text};`,
    ts.ScriptTarget.ES2022,
    true
  );
  const [statement] = sourceFile.statements;
  const expression =
    statement && ts.isVariableStatement(statement)
      ? statement.declarationList.declarations[0]?.initializer
      : undefined;
  if (!expression) {
    throw new Error("Expected an initializer");
  }
  return expression;
};

const evaluate = (text: string) => evaluateDefault(initializer(text));

describe("Default Values", () => {
  it("should evaluate primitive literals", () => {
    expect(evaluate("42")).to.deep.equal({ ok: true, value: 42 });
    expect(evaluate("-1.5")).to.deep.equal({ ok: true, value: -1.5 });
    expect(evaluate("+5")).to.deep.equal({ ok: true, value: 5 });
    expect(evaluate("'hi'")).to.deep.equal({ ok: true, value: "hi" });
    expect(evaluate("`plain`")).to.deep.equal({ ok: true, value: "plain" });
    expect(evaluate("true")).to.deep.equal({ ok: true, value: true });
    expect(evaluate("null")).to.deep.equal({ ok: true, value: null });
  });

  it("should evaluate bigint literals", () => {
    expect(evaluate("10n")).to.deep.equal({ ok: true, value: 10n });
    expect(evaluate("-10n")).to.deep.equal({ ok: true, value: -10n });
  });

  it("should treat undefined as no value", () => {
    const result = evaluate("undefined");
    expect(result.ok).to.equal(true);
    expect(result.ok && result.value).to.equal(undefined);
  });

  it("should evaluate array and object literals", () => {
    expect(evaluate("[1, undefined, 'a']")).to.deep.equal({
      ok: true,
      value: [1, null, "a"],
    });
    expect(evaluate("{ a: 1, 'b': [true], 3: null, c: undefined }")).to.deep.equal({
      ok: true,
      value: { a: 1, b: [true], "3": null },
    });
  });

  it("should look through assertions", () => {
    expect(evaluate("(3 as number)")).to.deep.equal({ ok: true, value: 3 });
    expect(evaluate("[1] satisfies number[]")).to.deep.equal({
      ok: true,
      value: [1],
    });
  });

  it("should point at the first non-literal node", () => {
    const result = evaluate("[1, compute()]");
    expect(result.ok).to.equal(false);
    expect(!result.ok && result.node.getText()).to.equal("compute()");
  });

  it("should reject computed and spread members", () => {
    expect(evaluate("{ ...base }").ok).to.equal(false);
    expect(evaluate("{ [key]: 1 }").ok).to.equal(false);
    expect(evaluate("-'a'").ok).to.equal(false);
    expect(evaluate("Math.PI").ok).to.equal(false);
  });
});
