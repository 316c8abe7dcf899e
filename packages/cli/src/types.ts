/**
 * Type definitions for CLI
 */

import type { CaptureStrategyKind } from "@componentize/emitter";

/**
 * Configuration file (componentize.json)
 */
export type ComponentizeConfig = {
  readonly $schema?: string;
  readonly baseImage?: string;
  readonly defaultBaseImage?: string;
  readonly packagesToInstall?: readonly string[];
  readonly captureStrategy?: CaptureStrategyKind;
  readonly modulesToCapture?: readonly string[];
  readonly extraCode?: readonly string[];
  /** Where component files go when no output file is named */
  readonly outputDirectory?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  functionName?: string;
  out?: string;
  baseImage?: string;
  packages?: string[];
  strategy?: CaptureStrategyKind;
  capture?: string[];
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly entryFile: string | undefined;
  readonly functionName: string;
  /** Directory containing componentize.json (or the working directory) */
  readonly projectRoot: string;
  readonly outputFile: string | undefined;
  readonly outputDirectory: string;
  readonly baseImage: string | undefined;
  readonly defaultBaseImage: string | undefined;
  readonly packagesToInstall: readonly string[];
  readonly captureStrategy: CaptureStrategyKind;
  readonly modulesToCapture: readonly string[];
  readonly extraCode: readonly string[];
  readonly verbose: boolean;
  readonly quiet: boolean;
};
