/**
 * Program - Public API
 */

export type {
  CompilerOptions,
  ComponentProgram,
  FunctionNode,
  FunctionTarget,
} from "./types.js";
export { defaultTsConfig } from "./config.js";
export {
  collectSyntaxDiagnostics,
  convertTsDiagnostic,
  getSourceLocation,
  getNodeLocation,
} from "./diagnostics.js";
export {
  createProgram,
  createProgramFromSources,
  createCompilerOptions,
} from "./creation.js";
export { getSourceFile, findFunction } from "./queries.js";
