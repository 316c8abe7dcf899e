/**
 * Helpers for tests that compile in-memory modules
 */

import {
  FunctionTarget,
  createProgramFromSources,
  findFunction,
} from "@componentize/frontend";

export const PROJECT_ROOT = "/project";
export const COMPONENT_FILE = "src/component.ts";

export const loadTarget = (source: string, exportName: string): FunctionTarget => {
  const program = createProgramFromSources(
    new Map([[`${PROJECT_ROOT}/${COMPONENT_FILE}`, source]]),
    { projectRoot: PROJECT_ROOT }
  );
  if (!program.ok) {
    throw new Error(program.error.diagnostics.map((d) => d.message).join("\n"));
  }

  const target = findFunction(program.value, COMPONENT_FILE, exportName);
  if (!target.ok) {
    throw new Error(`Function '${exportName}' not found`);
  }
  return target.value;
};
