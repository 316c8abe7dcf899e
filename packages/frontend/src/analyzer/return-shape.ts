/**
 * Return annotation analysis
 */

import * as ts from "typescript";
import {
  TypeAnnotation,
  toTypeAnnotation,
  typeReferenceName,
} from "../type-mapper.js";

export type ReturnField = {
  readonly name: string;
  readonly annotation: TypeAnnotation;
};

/**
 * - `none`: no annotation, or `void` / `never` / `undefined` / `null`
 * - `single`: one value
 * - `tuple`: a labeled tuple, e.g. `[sum: number, product: number]`
 * - `record`: an object type with named properties
 */
export type ReturnShape =
  | { readonly kind: "none" }
  | { readonly kind: "single"; readonly annotation: TypeAnnotation }
  | { readonly kind: "tuple"; readonly fields: readonly ReturnField[] }
  | { readonly kind: "record"; readonly fields: readonly ReturnField[] };

const EMPTY_KINDS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.VoidKeyword,
  ts.SyntaxKind.NeverKeyword,
  ts.SyntaxKind.UndefinedKeyword,
]);

// Aliases can refer to aliases; stop following after this many hops
const MAX_ALIAS_DEPTH = 8;

const isEmptyReturn = (node: ts.TypeNode): boolean =>
  EMPTY_KINDS.has(node.kind) ||
  (ts.isLiteralTypeNode(node) &&
    node.literal.kind === ts.SyntaxKind.NullKeyword);

const propertyFields = (
  members: ts.NodeArray<ts.TypeElement>
): readonly ReturnField[] | undefined => {
  const fields: ReturnField[] = [];
  for (const member of members) {
    if (
      !ts.isPropertySignature(member) ||
      !(ts.isIdentifier(member.name) || ts.isStringLiteral(member.name))
    ) {
      return undefined;
    }
    fields.push({
      name: member.name.text,
      annotation: toTypeAnnotation(member.type),
    });
  }
  return fields.length > 0 ? fields : undefined;
};

const tupleFields = (node: ts.TupleTypeNode): readonly ReturnField[] | undefined => {
  const fields: ReturnField[] = [];
  for (const element of node.elements) {
    if (!ts.isNamedTupleMember(element) || element.dotDotDotToken) {
      return undefined;
    }
    fields.push({
      name: element.name.text,
      annotation: toTypeAnnotation(element.type),
    });
  }
  return fields.length > 0 ? fields : undefined;
};

const unwrapPromise = (node: ts.TypeNode): ts.TypeNode => {
  if (
    ts.isTypeReferenceNode(node) &&
    typeReferenceName(node.typeName) === "Promise"
  ) {
    const inner = node.typeArguments?.[0];
    return inner ? unwrapPromise(inner) : node;
  }
  return node;
};

const declarationOf = (
  node: ts.TypeReferenceNode,
  checker: ts.TypeChecker
): ts.Declaration | undefined => {
  const symbol = checker.getSymbolAtLocation(node.typeName);
  if (!symbol) return undefined;
  const target =
    symbol.flags & ts.SymbolFlags.Alias ? checker.getAliasedSymbol(symbol) : symbol;
  return target.declarations?.[0];
};

const shapeOf = (
  node: ts.TypeNode,
  checker: ts.TypeChecker,
  depth: number
): ReturnShape => {
  if (ts.isParenthesizedTypeNode(node)) {
    return shapeOf(node.type, checker, depth);
  }

  if (isEmptyReturn(node)) {
    return { kind: "none" };
  }

  if (ts.isTupleTypeNode(node)) {
    const fields = tupleFields(node);
    if (fields) return { kind: "tuple", fields };
  }

  if (ts.isTypeLiteralNode(node)) {
    const fields = propertyFields(node.members);
    if (fields) return { kind: "record", fields };
  }

  if (ts.isTypeReferenceNode(node) && depth < MAX_ALIAS_DEPTH) {
    const declaration = declarationOf(node, checker);
    if (declaration && ts.isTypeAliasDeclaration(declaration)) {
      const aliased = shapeOf(declaration.type, checker, depth + 1);
      if (aliased.kind === "tuple" || aliased.kind === "record") {
        return aliased;
      }
    }
    if (declaration && ts.isInterfaceDeclaration(declaration)) {
      const fields = propertyFields(declaration.members);
      if (fields) return { kind: "record", fields };
    }
  }

  return { kind: "single", annotation: toTypeAnnotation(node) };
};

/**
 * Analyze a function's declared return type (`Promise<T>` counts as `T`)
 */
export const analyzeReturnShape = (
  typeNode: ts.TypeNode | undefined,
  checker: ts.TypeChecker
): ReturnShape =>
  typeNode ? shapeOf(unwrapPromise(typeNode), checker, 0) : { kind: "none" };
