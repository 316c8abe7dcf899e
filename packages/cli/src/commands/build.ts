/**
 * componentize build command - compile a function into a component file
 */

import { join, resolve } from "node:path";
import {
  DiagnosticsCollector,
  Result,
  createDiagnostic,
  error,
  formatDiagnostic,
  loadFunction,
  ok,
  singleDiagnostic,
} from "@componentize/frontend";
import { compileComponent, writeComponentFile } from "@componentize/backend";
import type { ResolvedConfig } from "../types.js";

export type BuildResult = {
  readonly componentFile: string;
  readonly componentName: string;
};

/**
 * Compile the configured function and write its component file.
 *
 * The file is the `--out` path, else the function's `@componentFile` tag
 * (relative to the project root), else `<outputDirectory>/<function>.yaml`.
 */
export const buildCommand = (
  config: ResolvedConfig
): Result<BuildResult, DiagnosticsCollector> => {
  const { entryFile, functionName, quiet, verbose } = config;
  if (entryFile === undefined) {
    return error(
      singleDiagnostic(
        createDiagnostic(
          "CMP3002",
          "error",
          "No source file given",
          undefined,
          "Usage: componentize build <file> --function <name>"
        )
      )
    );
  }

  if (verbose) {
    console.log(`Loading '${functionName}' from ${entryFile}`);
  }

  const target = loadFunction(entryFile, functionName, {
    projectRoot: config.projectRoot,
    verbose,
  });
  if (!target.ok) {
    return target;
  }

  const compiled = compileComponent(target.value, {
    baseImage: config.baseImage,
    defaultBaseImage: config.defaultBaseImage,
    packagesToInstall: config.packagesToInstall,
    captureStrategy: config.captureStrategy,
    modulesToCapture: config.modulesToCapture,
    extraCode: config.extraCode,
  });
  if (!compiled.ok) {
    return compiled;
  }

  const { spec, signature } = compiled.value;
  for (const warning of signature.warnings) {
    console.error(formatDiagnostic(warning));
  }

  const attached = signature.attachments.componentFile;
  const componentFile =
    config.outputFile ??
    (attached === undefined ? undefined : resolve(config.projectRoot, attached)) ??
    join(config.outputDirectory, `${functionName}.yaml`);
  writeComponentFile(spec, componentFile);

  if (!quiet) {
    console.log(`✓ Compiled component '${spec.name}'`);
    console.log(`  Created: ${componentFile}`);
  }
  if (verbose) {
    const { inputs, outputs } = spec;
    console.log(`  Inputs: ${inputs.map((input) => input.name).join(", ") || "(none)"}`);
    console.log(`  Outputs: ${outputs.map((output) => output.name).join(", ") || "(none)"}`);
    console.log(`  Image: ${spec.implementation?.container.image ?? ""}`);
  }

  return ok({ componentFile, componentName: spec.name });
};
