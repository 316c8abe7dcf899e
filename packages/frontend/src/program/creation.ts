/**
 * Program creation
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as fs from "node:fs";
import { Result, ok, error } from "../types/result.js";
import {
  DiagnosticsCollector,
  createDiagnostic,
  singleDiagnostic,
} from "../types/diagnostic.js";
import { CompilerOptions, ComponentProgram } from "./types.js";
import { defaultTsConfig } from "./config.js";
import { collectSyntaxDiagnostics } from "./diagnostics.js";

/**
 * Create TypeScript compiler options from component compiler options
 */
export const createCompilerOptions = (
  options: CompilerOptions
): ts.CompilerOptions => ({
  ...defaultTsConfig,
  strict: options.strict ?? true,
  rootDir: options.projectRoot,
});

const finishProgram = (
  program: ts.Program,
  rootPaths: readonly string[],
  options: CompilerOptions,
  compilerOptions: ts.CompilerOptions,
  host: ts.ModuleResolutionHost
): Result<ComponentProgram, DiagnosticsCollector> => {
  const sourceFiles = program
    .getSourceFiles()
    .filter((sf) => !sf.isDeclarationFile && rootPaths.includes(sf.fileName));

  if (options.verbose) {
    for (const sourceFile of program.getSourceFiles()) {
      if (!sourceFile.isDeclarationFile) {
        console.log(`Loaded ${sourceFile.fileName}`);
      }
    }
  }

  const diagnostics = collectSyntaxDiagnostics(program, sourceFiles);
  if (diagnostics.hasErrors) {
    return error(diagnostics);
  }

  return ok({
    program,
    checker: program.getTypeChecker(),
    options,
    compilerOptions,
    host,
    sourceFiles,
  });
};

/**
 * Create a program from TypeScript source files on disk
 */
export const createProgram = (
  filePaths: readonly string[],
  options: CompilerOptions
): Result<ComponentProgram, DiagnosticsCollector> => {
  const absolutePaths = filePaths.map((fp) =>
    path.resolve(options.projectRoot, fp)
  );

  const missing = absolutePaths.find((fp) => !fs.existsSync(fp));
  if (missing !== undefined) {
    return error(
      singleDiagnostic(
        createDiagnostic("CMP3002", "error", `Source file not found: ${missing}`)
      )
    );
  }

  const compilerOptions = createCompilerOptions(options);
  const host = ts.createCompilerHost(compilerOptions);
  const program = ts.createProgram(absolutePaths, compilerOptions, host);

  return finishProgram(program, absolutePaths, options, compilerOptions, host);
};

/**
 * Create a program from in-memory sources, keyed by absolute path.
 *
 * No default library is loaded; analysis only reads syntax and the
 * declarations of the given files.
 */
export const createProgramFromSources = (
  sources: ReadonlyMap<string, string>,
  options: CompilerOptions
): Result<ComponentProgram, DiagnosticsCollector> => {
  const compilerOptions: ts.CompilerOptions = {
    ...createCompilerOptions(options),
    noLib: true,
    types: [],
  };

  const sourceFiles = new Map<string, ts.SourceFile>();
  const getSourceFile = (fileName: string): ts.SourceFile | undefined => {
    const cached = sourceFiles.get(fileName);
    if (cached) return cached;
    const text = sources.get(fileName);
    if (text === undefined) return undefined;
    const sourceFile = ts.createSourceFile(
      fileName,
      text,
      ts.ScriptTarget.ES2022,
      true,
      ts.ScriptKind.TS
    );
    sourceFiles.set(fileName, sourceFile);
    return sourceFile;
  };

  const host: ts.CompilerHost = {
    getSourceFile,
    writeFile: () => {},
    getCurrentDirectory: () => options.projectRoot,
    getDirectories: () => [],
    fileExists: (fileName) => sources.has(fileName),
    readFile: (fileName) => sources.get(fileName),
    getCanonicalFileName: (fileName) => fileName,
    useCaseSensitiveFileNames: () => true,
    getNewLine: () => "\n",
    getDefaultLibFileName: () => "lib.d.ts",
  };

  const rootPaths = [...sources.keys()];
  const program = ts.createProgram(rootPaths, compilerOptions, host);

  return finishProgram(program, rootPaths, options, compilerOptions, host);
};
