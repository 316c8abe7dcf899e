/**
 * Shim program blocks and the join step
 */

/**
 * Blocks of a generated program, in program order
 */
export const SHIM_BLOCK_ORDER = [
  "definitions",
  "preamble",
  "body",
  "scaffold",
  "invocation",
  "serialization",
  "epilogue",
] as const;

export type ShimBlockName = (typeof SHIM_BLOCK_ORDER)[number];

export type ShimBlocks = Readonly<Record<ShimBlockName, string>>;

/**
 * Reduce every run of blank lines to a single blank line
 */
export const collapseBlankLines = (text: string): string =>
  text.replace(/\n(?:[ \t]*\n){2,}/g, "\n\n");

/**
 * Join the blocks into the program text, ending with one newline
 */
export const joinShimBlocks = (blocks: ShimBlocks): string =>
  `${collapseBlankLines(
    SHIM_BLOCK_ORDER.map((name) => blocks[name].trim())
      .filter((block) => block.length > 0)
      .join("\n\n")
  )}\n`;
