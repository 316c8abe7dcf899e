/**
 * Compile-time evaluation of parameter defaults
 *
 * Defaults are materialized once, at analysis time, so only literal
 * initializers are accepted.
 */

import * as ts from "typescript";
import type { ConstantValue } from "./data-passing.js";

/**
 * `undefined` marks a default that makes the input optional without a value
 */
export type DefaultValue = ConstantValue | undefined;

export type EvaluatedDefault =
  | { readonly ok: true; readonly value: DefaultValue }
  | { readonly ok: false; readonly node: ts.Node };

const failure = (node: ts.Node): EvaluatedDefault => ({ ok: false, node });
const success = (value: DefaultValue): EvaluatedDefault => ({
  ok: true,
  value,
});

const propertyKey = (name: ts.PropertyName): string | undefined => {
  if (
    ts.isIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name)
  ) {
    return name.text;
  }
  return undefined;
};

const evaluateArray = (node: ts.ArrayLiteralExpression): EvaluatedDefault => {
  const items: ConstantValue[] = [];
  for (const element of node.elements) {
    const item = evaluateDefault(element);
    if (!item.ok) return item;
    // JSON has no undefined
    items.push(item.value ?? null);
  }
  return success(items);
};

const evaluateObject = (
  node: ts.ObjectLiteralExpression
): EvaluatedDefault => {
  const entries: [string, ConstantValue][] = [];
  for (const property of node.properties) {
    if (!ts.isPropertyAssignment(property)) {
      return failure(property);
    }
    const key = propertyKey(property.name);
    if (key === undefined) {
      return failure(property.name);
    }
    const value = evaluateDefault(property.initializer);
    if (!value.ok) return value;
    if (value.value !== undefined) {
      entries.push([key, value.value]);
    }
  }
  return success(Object.fromEntries(entries));
};

/**
 * Evaluate a default initializer made of literals
 */
export const evaluateDefault = (node: ts.Expression): EvaluatedDefault => {
  if (ts.isParenthesizedExpression(node) || ts.isAsExpression(node)) {
    return evaluateDefault(node.expression);
  }
  if (ts.isSatisfiesExpression(node)) {
    return evaluateDefault(node.expression);
  }

  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
    return success(node.text);
  }
  if (ts.isNumericLiteral(node)) {
    return success(Number(node.text));
  }
  if (ts.isBigIntLiteral(node)) {
    return success(BigInt(node.text.slice(0, -1)));
  }

  switch (node.kind) {
    case ts.SyntaxKind.TrueKeyword:
      return success(true);
    case ts.SyntaxKind.FalseKeyword:
      return success(false);
    case ts.SyntaxKind.NullKeyword:
      return success(null);
  }

  if (ts.isIdentifier(node) && node.text === "undefined") {
    return success(undefined);
  }

  if (
    ts.isPrefixUnaryExpression(node) &&
    (node.operator === ts.SyntaxKind.MinusToken ||
      node.operator === ts.SyntaxKind.PlusToken)
  ) {
    const operand = evaluateDefault(node.operand);
    if (!operand.ok) return operand;
    const sign = node.operator === ts.SyntaxKind.MinusToken ? -1 : 1;
    if (typeof operand.value === "number") {
      return success(sign * operand.value);
    }
    if (typeof operand.value === "bigint") {
      return success(BigInt(sign) * operand.value);
    }
    return failure(node);
  }

  if (ts.isArrayLiteralExpression(node)) {
    return evaluateArray(node);
  }
  if (ts.isObjectLiteralExpression(node)) {
    return evaluateObject(node);
  }

  return failure(node);
};
