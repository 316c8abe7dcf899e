import { describe, it } from "mocha";
import { expect } from "chai";
import * as ts from "typescript";
import { getAttachments, getDocComment } from "./jsdoc.js";

const firstStatement = (source: string): ts.Statement => {
  const sourceFile = ts.createSourceFile(
    "/component.ts",
    source,
    ts.ScriptTarget.ES2022,
    true
  );
  const [statement] = sourceFile.statements;
  if (!statement) throw new Error("Expected a statement");
  return statement;
};

describe("JSDoc attachments", () => {
  it("should read the comment text without tags", () => {
    const statement = firstStatement(`
/**
 * Adds two numbers.
 * Returns the sum.
 * @componentName Adder
 */
export function add(a: number, b: number): number { return a + b; }
`);
    expect(getDocComment(statement)).to.equal(
      "Adds two numbers.\nReturns the sum."
    );
  });

  it("should return undefined without a comment", () => {
    const statement = firstStatement(
      "export function add(a: number): number { return a; }"
    );
    expect(getDocComment(statement)).to.equal(undefined);
    expect(getAttachments(statement)).to.deep.equal({});
  });

  it("should read attachment tags", () => {
    const statement = firstStatement(`
/**
 * @componentName Adder
 * @description Adds things
 * @baseImage node:20-alpine
 * @componentFile out/adder.yaml
 * @param a first operand
 */
export function add(a: number): number { return a; }
`);
    expect(getAttachments(statement)).to.deep.equal({
      name: "Adder",
      description: "Adds things",
      baseImage: "node:20-alpine",
      componentFile: "out/adder.yaml",
    });
  });

  it("should read tags on a const arrow function", () => {
    const statement = firstStatement(`
/** @componentName Scaler */
export const scale = (value: number): number => value * 2;
`);
    expect(getAttachments(statement)).to.deep.equal({ name: "Scaler" });
  });
});
