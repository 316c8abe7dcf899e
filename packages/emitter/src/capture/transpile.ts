/**
 * TypeScript → JavaScript transpilation of captured code
 */

import * as ts from "typescript";

const TRANSPILE_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.CommonJS,
  esModuleInterop: true,
  removeComments: false,
};

/**
 * Strip types from a module, producing CommonJS
 */
export const transpileToCommonJs = (text: string, fileName: string): string =>
  ts.transpileModule(text, {
    compilerOptions: TRANSPILE_OPTIONS,
    fileName,
  }).outputText;
