/**
 * Type mapper - maps parameter and return annotations to type names
 */

import * as ts from "typescript";

/**
 * Syntax-free view of an annotation
 */
export type TypeAnnotation =
  | { readonly kind: "none" }
  | { readonly kind: "keyword"; readonly name: string }
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "array"; readonly text: string }
  | { readonly kind: "reference"; readonly name: string; readonly text: string }
  | { readonly kind: "text"; readonly text: string };

/**
 * Built-in annotation → type name table.
 *
 * Keyed by TypeScript keywords and reference names, and by a few string
 * forms so that `InputPath<"number">` normalizes the same way as `number`.
 */
export const BUILTIN_TYPE_NAMES: ReadonlyMap<string, string> = new Map([
  ["string", "String"],
  ["number", "Float"],
  ["bigint", "Integer"],
  ["boolean", "Boolean"],
  ["object", "JsonObject"],
  ["Array", "JsonArray"],
  ["ReadonlyArray", "JsonArray"],
  ["Record", "JsonObject"],
  ["integer", "Integer"],
  ["float", "Float"],
  ["json", "JsonObject"],
]);

const NOT_A_TYPE = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.AnyKeyword,
  ts.SyntaxKind.UnknownKeyword,
]);

const KEYWORDS = new Map<ts.SyntaxKind, string>([
  [ts.SyntaxKind.StringKeyword, "string"],
  [ts.SyntaxKind.NumberKeyword, "number"],
  [ts.SyntaxKind.BigIntKeyword, "bigint"],
  [ts.SyntaxKind.BooleanKeyword, "boolean"],
  [ts.SyntaxKind.ObjectKeyword, "object"],
]);

const isNullish = (node: ts.TypeNode): boolean =>
  node.kind === ts.SyntaxKind.UndefinedKeyword ||
  (ts.isLiteralTypeNode(node) &&
    node.literal.kind === ts.SyntaxKind.NullKeyword);

/**
 * Rightmost identifier of a (possibly qualified) type name
 */
export const typeReferenceName = (name: ts.EntityName): string =>
  ts.isIdentifier(name) ? name.text : name.right.text;

/**
 * Build a TypeAnnotation from a type node
 */
export const toTypeAnnotation = (node: ts.TypeNode | undefined): TypeAnnotation => {
  if (!node || NOT_A_TYPE.has(node.kind)) {
    return { kind: "none" };
  }

  if (ts.isParenthesizedTypeNode(node)) {
    return toTypeAnnotation(node.type);
  }

  const keyword = KEYWORDS.get(node.kind);
  if (keyword) {
    return { kind: "keyword", name: keyword };
  }

  if (ts.isLiteralTypeNode(node) && ts.isStringLiteral(node.literal)) {
    return { kind: "literal", text: node.literal.text };
  }

  if (ts.isArrayTypeNode(node) || ts.isTupleTypeNode(node)) {
    return { kind: "array", text: node.getText() };
  }

  if (ts.isTypeLiteralNode(node)) {
    return { kind: "keyword", name: "object" };
  }

  if (ts.isTypeReferenceNode(node)) {
    return {
      kind: "reference",
      name: typeReferenceName(node.typeName),
      text: node.getText(),
    };
  }

  // `number | undefined` describes an optional number
  if (ts.isUnionTypeNode(node)) {
    const members = node.types.filter((member) => !isNullish(member));
    const [only] = members;
    if (members.length === 1 && only) {
      return toTypeAnnotation(only);
    }
  }

  return { kind: "text", text: node.getText() };
};

/**
 * Resolve an annotation to a type name, or undefined for untyped values
 */
export const resolveTypeName = (
  annotation: TypeAnnotation,
  typeNames: ReadonlyMap<string, string> = BUILTIN_TYPE_NAMES
): string | undefined => {
  const typeName = ((): string | undefined => {
    switch (annotation.kind) {
      case "none":
        return undefined;
      case "keyword":
        return typeNames.get(annotation.name) ?? annotation.name;
      case "array":
        return typeNames.get("Array") ?? annotation.text;
      case "reference":
        return typeNames.get(annotation.name) ?? annotation.text;
      case "literal":
      case "text":
        return annotation.text;
    }
  })();

  if (typeName === undefined) {
    return undefined;
  }

  // The table is also keyed by string forms
  return typeNames.get(typeName) ?? typeName;
};
