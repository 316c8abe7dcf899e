/**
 * Capture strategy types
 */

import type {
  Diagnostic,
  FunctionTarget,
  Result,
} from "@componentize/frontend";

export type CaptureStrategyKind = "source" | "closure";

/**
 * Embeds a function's executable body into the generated program.
 *
 * Whatever the strategy, running the fragment leaves the function bound
 * under its original name.
 */
export type CaptureStrategy = {
  readonly kind: CaptureStrategyKind;
  readonly capture: (target: FunctionTarget) => Result<string, Diagnostic>;
};

export type CaptureOptions = {
  /**
   * Modules (paths relative to the project root) captured along with the
   * defining module; only used by the closure strategy
   */
  readonly modulesToCapture?: readonly string[];
  /** Node.js version recorded in closure captures (default: this process) */
  readonly producerVersion?: string;
};
