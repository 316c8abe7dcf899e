/**
 * Helpers for tests that start from TypeScript source text
 */

import {
  FunctionSignature,
  FunctionTarget,
  analyzeSignature,
  createProgramFromSources,
  findFunction,
} from "@componentize/frontend";

export type AnalyzedSource = {
  readonly target: FunctionTarget;
  readonly signature: FunctionSignature;
};

export const PROJECT_ROOT = "/project";

/**
 * Analyze `exportName` from in-memory modules keyed by project-relative path;
 * the first module is the defining one
 */
export const analyzeModules = (
  modules: Readonly<Record<string, string>>,
  exportName: string
): AnalyzedSource => {
  const entries = Object.entries(modules);
  const [first] = entries;
  if (!first) {
    throw new Error("Expected at least one module");
  }

  const program = createProgramFromSources(
    new Map(entries.map(([file, text]) => [`${PROJECT_ROOT}/${file}`, text])),
    { projectRoot: PROJECT_ROOT }
  );
  if (!program.ok) {
    throw new Error(
      program.error.diagnostics.map((d) => d.message).join("\n")
    );
  }

  const target = findFunction(program.value, first[0], exportName);
  if (!target.ok) {
    throw new Error(`Function '${exportName}' not found`);
  }

  const signature = analyzeSignature(target.value);
  if (!signature.ok) {
    throw new Error(
      signature.error.diagnostics.map((d) => d.message).join("\n")
    );
  }

  return { target: target.value, signature: signature.value };
};

export const analyzeSource = (
  source: string,
  exportName: string
): AnalyzedSource => analyzeModules({ "src/component.ts": source }, exportName);
