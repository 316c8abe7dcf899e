/**
 * Shim generator - Public API
 */

export {
  SHIM_BLOCK_ORDER,
  collapseBlankLines,
  joinShimBlocks,
} from "./blocks.js";
export type { ShimBlockName, ShimBlocks } from "./blocks.js";
export {
  ARGUMENT_PARSER_DEFINITION,
  CLOSE_STREAMS_DEFINITION,
  PARENT_DIRS_DEFINITION,
  RUNTIME_DEFINITION,
  inputStreamFactory,
  outputStreamFactory,
  renderDefinitions,
  requireDefinition,
  requireSource,
} from "./support.js";
export type { SupportDefinitions } from "./support.js";
export {
  createShimContext,
  emitOptionType,
  emitScaffold,
  outputEncoder,
  valueDecoder,
} from "./scaffold.js";
export type { ShimContext } from "./scaffold.js";
export { generateShim, generateShimText } from "./generator.js";
export type { ShimOptions } from "./generator.js";
