/**
 * Shared constants for the component emitter
 */

/**
 * Flag collecting the destination paths of every return-style output.
 *
 * Four dashes keep it out of the namespace of per-parameter flags, which
 * are derived from identifiers and start with exactly two.
 */
export const OUTPUT_PATHS_FLAG = "----output-paths";

/** Parsed-argument key for the return-style output paths */
export const OUTPUT_PATHS_DEST = "_outputPaths";

/** Interpreter invocation that runs the generated program */
export const NODE_EVAL_COMMAND: readonly string[] = ["node", "-e"];

/** Ends the interpreter's own options; everything after goes to the program */
export const PROGRAM_ARGUMENTS_SEPARATOR = "--";
