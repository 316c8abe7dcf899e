/**
 * Program type definitions
 */

import * as ts from "typescript";

export type CompilerOptions = {
  /** Directory that module paths (e.g. modules to capture) are relative to */
  readonly projectRoot: string;
  readonly strict?: boolean;
  readonly verbose?: boolean;
};

export type ComponentProgram = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  readonly options: CompilerOptions;
  readonly compilerOptions: ts.CompilerOptions;
  readonly host: ts.ModuleResolutionHost;
  readonly sourceFiles: readonly ts.SourceFile[];
};

export type FunctionNode =
  | ts.FunctionDeclaration
  | ts.ArrowFunction
  | ts.FunctionExpression;

/**
 * An exported function located in a program
 */
export type FunctionTarget = {
  /** Identifier the function is declared under */
  readonly name: string;
  /** Name the defining module exports it as (`default` for a default export) */
  readonly exportName: string;
  readonly node: FunctionNode;
  /** Statement holding the function (carries JSDoc and is copied verbatim) */
  readonly statement: ts.FunctionDeclaration | ts.VariableStatement;
  readonly sourceFile: ts.SourceFile;
  readonly program: ComponentProgram;
};
