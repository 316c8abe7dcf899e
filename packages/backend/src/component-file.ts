/**
 * Component files - specifications written as YAML
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  ComponentSpec,
  DiagnosticsCollector,
  FunctionTarget,
  Result,
  map,
} from "@componentize/frontend";
import type { ComponentOptions } from "./types.js";
import { createComponentSpec } from "./assembler.js";
import { dumpComponent } from "./serialize.js";

export const writeComponentFile = (
  spec: ComponentSpec,
  filePath: string
): void => {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, dumpComponent(spec), "utf-8");
};

/**
 * Compile a function into component YAML text
 */
export const componentToText = (
  target: FunctionTarget,
  options: ComponentOptions = {}
): Result<string, DiagnosticsCollector> =>
  map(createComponentSpec(target, options), dumpComponent);

/**
 * Compile a function and write its component file
 */
export const componentToFile = (
  target: FunctionTarget,
  filePath: string,
  options: ComponentOptions = {}
): Result<ComponentSpec, DiagnosticsCollector> =>
  map(createComponentSpec(target, options), (spec) => {
    writeComponentFile(spec, filePath);
    return spec;
  });
