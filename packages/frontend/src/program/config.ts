/**
 * TypeScript compiler configuration
 */

import * as ts from "typescript";

/**
 * Default TypeScript compiler options for analysis.
 *
 * Only syntax and declared annotations are read, so imports of packages
 * that are installed in the container but not here do not block analysis.
 */
export const defaultTsConfig: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  strict: true,
  esModuleInterop: true,
  skipLibCheck: true,
  allowJs: false,
  noEmit: true,
  resolveJsonModule: false,
  allowImportingTsExtensions: true,
};
