/**
 * Component frontend - TypeScript function analysis
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  singleDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/component.js";

export * from "./markers.js";
export * from "./type-mapper.js";
export * from "./data-passing.js";
export * from "./naming.js";
export * from "./default-values.js";
export * from "./jsdoc.js";
export * from "./program/index.js";
export * from "./analyzer/index.js";

import type { CompilerOptions, FunctionTarget } from "./program/types.js";
import { createProgram } from "./program/creation.js";
import { findFunction } from "./program/queries.js";
import type { DiagnosticsCollector } from "./types/diagnostic.js";
import { Result, flatMap } from "./types/result.js";

/**
 * Main entry point: load a module and locate one of its exported functions
 */
export const loadFunction = (
  filePath: string,
  exportName: string,
  options: CompilerOptions
): Result<FunctionTarget, DiagnosticsCollector> =>
  flatMap(createProgram([filePath], options), (program) =>
    findFunction(program, filePath, exportName)
  );
