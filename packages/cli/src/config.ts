/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  Diagnostic,
  Result,
  createDiagnostic,
  error,
  ok,
} from "@componentize/frontend";
import type { CaptureStrategyKind } from "@componentize/emitter";
import type { ComponentizeConfig, CliOptions, ResolvedConfig } from "./types.js";
import { CONFIG_FILE_NAME, DEFAULT_OUTPUT_DIRECTORY } from "./cli/constants.js";

type FieldResult<T> = Result<T | undefined, string>;

const stringField = (
  record: Readonly<Record<string, unknown>>,
  key: string
): FieldResult<string> => {
  const value = record[key];
  if (value === undefined || typeof value === "string") return ok(value);
  return error(`'${key}' must be a string`);
};

const stringListField = (
  record: Readonly<Record<string, unknown>>,
  key: string
): FieldResult<readonly string[]> => {
  const value = record[key];
  if (value === undefined) return ok(undefined);
  if (Array.isArray(value)) {
    const items = value.filter((item): item is string => typeof item === "string");
    if (items.length === value.length) return ok(items);
  }
  return error(`'${key}' must be an array of strings`);
};

const strategyField = (
  record: Readonly<Record<string, unknown>>
): FieldResult<CaptureStrategyKind> => {
  const value = record.captureStrategy;
  if (value === undefined || value === "source" || value === "closure") {
    return ok(value);
  }
  return error(`'captureStrategy' must be "source" or "closure"`);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Check the shape of a parsed config file
 */
export const validateConfig = (
  value: unknown
): Result<ComponentizeConfig, string> => {
  if (!isRecord(value)) {
    return error("the configuration must be a JSON object");
  }

  const schema = stringField(value, "$schema");
  const baseImage = stringField(value, "baseImage");
  const defaultBaseImage = stringField(value, "defaultBaseImage");
  const outputDirectory = stringField(value, "outputDirectory");
  const packagesToInstall = stringListField(value, "packagesToInstall");
  const modulesToCapture = stringListField(value, "modulesToCapture");
  const extraCode = stringListField(value, "extraCode");
  const captureStrategy = strategyField(value);

  for (const field of [
    schema,
    baseImage,
    defaultBaseImage,
    outputDirectory,
    packagesToInstall,
    modulesToCapture,
    extraCode,
    captureStrategy,
  ]) {
    if (!field.ok) return error(field.error);
  }

  return ok({
    $schema: schema.ok ? schema.value : undefined,
    baseImage: baseImage.ok ? baseImage.value : undefined,
    defaultBaseImage: defaultBaseImage.ok ? defaultBaseImage.value : undefined,
    outputDirectory: outputDirectory.ok ? outputDirectory.value : undefined,
    packagesToInstall: packagesToInstall.ok ? packagesToInstall.value : undefined,
    modulesToCapture: modulesToCapture.ok ? modulesToCapture.value : undefined,
    extraCode: extraCode.ok ? extraCode.value : undefined,
    captureStrategy: captureStrategy.ok ? captureStrategy.value : undefined,
  });
};

/**
 * Load componentize.json
 */
export const loadConfig = (
  configPath: string
): Result<ComponentizeConfig, Diagnostic> => {
  if (!existsSync(configPath)) {
    return error(
      createDiagnostic(
        "CMP4001",
        "error",
        `Config file not found: ${configPath}`
      )
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (e) {
    return error(
      createDiagnostic(
        "CMP4002",
        "error",
        `Failed to parse ${configPath}: ${e instanceof Error ? e.message : String(e)}`
      )
    );
  }

  const config = validateConfig(parsed);
  if (!config.ok) {
    return error(
      createDiagnostic("CMP4003", "error", `${configPath}: ${config.error}`)
    );
  }
  return config;
};

/**
 * Find componentize.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find componentize.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args
 * @param projectRoot - Directory containing componentize.json; relative paths in the file resolve against it
 * @param cwd - Directory relative CLI paths resolve against
 */
export const resolveConfig = (
  config: ComponentizeConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  entryFile?: string,
  cwd: string = projectRoot
): ResolvedConfig => ({
  entryFile: entryFile === undefined ? undefined : resolve(cwd, entryFile),
  functionName: cliOptions.functionName || "default",
  projectRoot,
  outputFile: cliOptions.out ? resolve(cwd, cliOptions.out) : undefined,
  outputDirectory: resolve(
    projectRoot,
    config.outputDirectory ?? DEFAULT_OUTPUT_DIRECTORY
  ),
  baseImage: cliOptions.baseImage || config.baseImage,
  defaultBaseImage: config.defaultBaseImage,
  packagesToInstall: cliOptions.packages ?? config.packagesToInstall ?? [],
  captureStrategy: cliOptions.strategy ?? config.captureStrategy ?? "source",
  modulesToCapture: cliOptions.capture ?? config.modulesToCapture ?? [],
  extraCode: config.extraCode ?? [],
  verbose: cliOptions.verbose ?? false,
  quiet: cliOptions.quiet ?? false,
});
