/**
 * Command template placeholder constructors
 */

import type { CommandArgument, Placeholder } from "@componentize/frontend";

export const inputValue = (name: string): Placeholder => ({
  kind: "inputValue",
  name,
});

export const inputPath = (name: string): Placeholder => ({
  kind: "inputPath",
  name,
});

export const outputPath = (name: string): Placeholder => ({
  kind: "outputPath",
  name,
});

export const isPresent = (name: string): Placeholder => ({
  kind: "isPresent",
  name,
});

export const ifThen = (
  condition: Placeholder,
  then: readonly CommandArgument[],
  otherwise?: readonly CommandArgument[]
): Placeholder =>
  otherwise === undefined
    ? { kind: "ifThen", condition, then }
    : { kind: "ifThen", condition, then, else: otherwise };
