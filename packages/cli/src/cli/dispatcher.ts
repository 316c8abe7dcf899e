/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { DiagnosticsCollector, formatDiagnostic } from "@componentize/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { buildCommand } from "../commands/build.js";
import type { ComponentizeConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Exit codes
 */
export const EXIT_CODES = {
  success: 0,
  configError: 1,
  usageError: 2,
  buildError: 6,
} as const;

const reportDiagnostics = (collector: DiagnosticsCollector): void => {
  for (const diagnostic of collector.diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.error !== undefined) {
    console.error(`Error: ${parsed.error}`);
    console.error("Run 'componentize --help' for usage information");
    return EXIT_CODES.usageError;
  }

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`componentize v${VERSION}`);
    return EXIT_CODES.success;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_CODES.success;
  }

  // Load config (optional unless named explicitly)
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: ComponentizeConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(formatDiagnostic(configResult.error));
      return EXIT_CODES.configError;
    }
    fileConfig = configResult.value;
  }

  // Project root is the directory containing componentize.json
  const projectRoot = configPath ? dirname(configPath) : cwd;

  const config = resolveConfig(
    fileConfig,
    parsed.options,
    projectRoot,
    parsed.entryFile,
    cwd
  );

  // Dispatch to command handlers
  switch (parsed.command) {
    case "build": {
      const result = buildCommand(config);
      if (!result.ok) {
        reportDiagnostics(result.error);
        return EXIT_CODES.buildError;
      }
      return EXIT_CODES.success;
    }

    default:
      console.error(`Error: Unknown command '${parsed.command}'`);
      console.error("Run 'componentize --help' for usage information");
      return EXIT_CODES.usageError;
  }
};
