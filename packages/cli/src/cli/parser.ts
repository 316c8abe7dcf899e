/**
 * CLI argument parser
 */

import type { CaptureStrategyKind } from "@componentize/emitter";
import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  entryFile?: string;
  options: CliOptions;
  /** Set when an option value could not be parsed */
  error?: string;
};

const isCaptureStrategy = (value: string): value is CaptureStrategyKind =>
  value === "source" || value === "closure";

const splitList = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let entryFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command (the module to compile)
    if (command && !entryFile && !arg.startsWith("-")) {
      entryFile = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-f":
      case "--function":
        options.functionName = args[++i] ?? "";
        break;
      case "-o":
      case "--out":
        options.out = args[++i] ?? "";
        break;
      case "--base-image":
        options.baseImage = args[++i] ?? "";
        break;
      case "--packages":
        options.packages = [
          ...(options.packages ?? []),
          ...splitList(args[++i]),
        ];
        break;
      case "--capture":
        options.capture = [...(options.capture ?? []), ...splitList(args[++i])];
        break;
      case "-s":
      case "--strategy": {
        const strategy = args[++i] ?? "";
        if (!isCaptureStrategy(strategy)) {
          return {
            command,
            entryFile,
            options,
            error: `Unknown capture strategy '${strategy}' (expected 'source' or 'closure')`,
          };
        }
        options.strategy = strategy;
        break;
      }
      default:
        return { command, entryFile, options, error: `Unknown option '${arg}'` };
    }
  }

  return { command, entryFile, options };
};
