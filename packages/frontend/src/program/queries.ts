/**
 * Program query functions
 */

import * as ts from "typescript";
import * as path from "node:path";
import { Result, ok, error } from "../types/result.js";
import {
  DiagnosticsCollector,
  createDiagnostic,
  singleDiagnostic,
} from "../types/diagnostic.js";
import { ComponentProgram, FunctionTarget } from "./types.js";

/**
 * Get a source file from the program by file path
 */
export const getSourceFile = (
  program: ComponentProgram,
  filePath: string
): ts.SourceFile | null => {
  const absolutePath = path.resolve(program.options.projectRoot, filePath);
  return program.program.getSourceFile(absolutePath) ?? null;
};

const hasModifier = (node: ts.Node, kind: ts.SyntaxKind): boolean =>
  ts.canHaveModifiers(node) &&
  (ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false);

const isExported = (node: ts.Node): boolean =>
  hasModifier(node, ts.SyntaxKind.ExportKeyword);

const isDefaultExport = (node: ts.Node): boolean =>
  isExported(node) && hasModifier(node, ts.SyntaxKind.DefaultKeyword);

/**
 * Local name behind an export name, following `export { local as name }`
 */
const resolveLocalName = (
  sourceFile: ts.SourceFile,
  exportName: string
): string | undefined => {
  for (const statement of sourceFile.statements) {
    if (
      ts.isExportDeclaration(statement) &&
      !statement.moduleSpecifier &&
      statement.exportClause &&
      ts.isNamedExports(statement.exportClause)
    ) {
      for (const specifier of statement.exportClause.elements) {
        if (specifier.name.text === exportName) {
          return (specifier.propertyName ?? specifier.name).text;
        }
      }
    }
    if (
      exportName === "default" &&
      ts.isExportAssignment(statement) &&
      ts.isIdentifier(statement.expression)
    ) {
      return statement.expression.text;
    }
  }
  return undefined;
};

const findDeclaration = (
  sourceFile: ts.SourceFile,
  program: ComponentProgram,
  exportName: string,
  matches: (name: string, statement: ts.Statement) => boolean
): FunctionTarget | undefined => {
  for (const statement of sourceFile.statements) {
    if (
      ts.isFunctionDeclaration(statement) &&
      statement.name &&
      statement.body &&
      matches(statement.name.text, statement)
    ) {
      return {
        name: statement.name.text,
        exportName,
        node: statement,
        statement,
        sourceFile,
        program,
      };
    }

    if (ts.isVariableStatement(statement)) {
      for (const declaration of statement.declarationList.declarations) {
        const initializer = declaration.initializer;
        if (
          ts.isIdentifier(declaration.name) &&
          initializer &&
          (ts.isArrowFunction(initializer) ||
            ts.isFunctionExpression(initializer)) &&
          matches(declaration.name.text, statement)
        ) {
          return {
            name: declaration.name.text,
            exportName,
            node: initializer,
            statement,
            sourceFile,
            program,
          };
        }
      }
    }
  }
  return undefined;
};

/**
 * Locate an exported function (declaration or `const` arrow function)
 */
export const findFunction = (
  program: ComponentProgram,
  filePath: string,
  exportName: string
): Result<FunctionTarget, DiagnosticsCollector> => {
  const sourceFile = getSourceFile(program, filePath);
  if (!sourceFile) {
    return error(
      singleDiagnostic(
        createDiagnostic(
          "CMP3002",
          "error",
          `Source file not found in program: ${filePath}`
        )
      )
    );
  }

  const exported =
    findDeclaration(sourceFile, program, exportName, (name, statement) =>
      exportName === "default"
        ? isDefaultExport(statement)
        : name === exportName && isExported(statement)
    ) ??
    ((): FunctionTarget | undefined => {
      const localName = resolveLocalName(sourceFile, exportName);
      return localName === undefined
        ? undefined
        : findDeclaration(
            sourceFile,
            program,
            exportName,
            (name) => name === localName
          );
    })();

  if (!exported) {
    return error(
      singleDiagnostic(
        createDiagnostic(
          "CMP3001",
          "error",
          `No exported function '${exportName}' in ${sourceFile.fileName}`,
          undefined,
          "Export a function declaration or a const bound to an arrow function"
        )
      )
    );
  }

  return ok(exported);
};
