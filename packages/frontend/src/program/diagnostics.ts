/**
 * TypeScript diagnostics collection and conversion
 */

import * as ts from "typescript";
import {
  Diagnostic,
  DiagnosticsCollector,
  SourceLocation,
  createDiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
} from "../types/diagnostic.js";

/**
 * Collect syntax errors of the given source files.
 *
 * Semantic errors are left to the user's own type-check.
 */
export const collectSyntaxDiagnostics = (
  program: ts.Program,
  sourceFiles: readonly ts.SourceFile[]
): DiagnosticsCollector =>
  sourceFiles
    .flatMap((sourceFile) => program.getSyntacticDiagnostics(sourceFile))
    .reduce((collector, tsDiag) => {
      const diagnostic = convertTsDiagnostic(tsDiag);
      return diagnostic ? addDiagnostic(collector, diagnostic) : collector;
    }, createDiagnosticsCollector());

/**
 * Convert TypeScript diagnostic to a component compiler diagnostic
 */
export const convertTsDiagnostic = (
  tsDiag: ts.Diagnostic
): Diagnostic | null => {
  if (tsDiag.category === ts.DiagnosticCategory.Suggestion) {
    return null;
  }

  const severity =
    tsDiag.category === ts.DiagnosticCategory.Error
      ? "error"
      : tsDiag.category === ts.DiagnosticCategory.Warning
        ? "warning"
        : "info";

  const message = ts.flattenDiagnosticMessageText(tsDiag.messageText, "\n");

  const location =
    tsDiag.file && tsDiag.start !== undefined
      ? getSourceLocation(tsDiag.file, tsDiag.start, tsDiag.length ?? 1)
      : undefined;

  return createDiagnostic("CMP2001", severity, message, location);
};

/**
 * Get source location information from TypeScript source file
 */
export const getSourceLocation = (
  file: ts.SourceFile,
  start: number,
  length: number
): SourceLocation => {
  const { line, character } = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: line + 1,
    column: character + 1,
    length,
  };
};

/**
 * Source location of a node
 */
export const getNodeLocation = (node: ts.Node): SourceLocation => {
  const sourceFile = node.getSourceFile();
  const start = node.getStart(sourceFile);
  return getSourceLocation(sourceFile, start, node.getEnd() - start);
};
