/**
 * CLI - Public API
 */

export { VERSION, CONFIG_FILE_NAME } from "./constants.js";
export { showHelp } from "./help.js";
export { parseArgs } from "./parser.js";
export type { ParsedArgs } from "./parser.js";
export { EXIT_CODES, runCli } from "./dispatcher.js";
