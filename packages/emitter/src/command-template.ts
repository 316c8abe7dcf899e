/**
 * Command template builder
 *
 * Lays out the container arguments for a component:
 *
 * 1. every input, in declaration order
 * 2. every file-style output, in declaration order
 * 3. the shared return-output flag followed by one path per return output
 *
 * Optional inputs are wrapped in a presence guard that the binder evaluates
 * against the arguments of a concrete task.
 */

import {
  CommandArgument,
  InputDescriptor,
  OutputDescriptor,
  Placeholder,
  toFlagName,
} from "@componentize/frontend";
import { OUTPUT_PATHS_FLAG } from "./constants.js";
import {
  ifThen,
  inputPath,
  inputValue,
  isPresent,
  outputPath,
} from "./placeholders.js";

const inputPlaceholder = (input: InputDescriptor): Placeholder => {
  switch (input.passingStyle.kind) {
    case "value":
      return inputValue(input.name);
    case "inputPath":
    case "inputFile":
      return inputPath(input.name);
    default: {
      const exhaustive: never = input.passingStyle;
      throw new Error(
        `ICE: Unsupported passing style ${JSON.stringify(exhaustive)} for input '${input.name}'`
      );
    }
  }
};

const inputArguments = (input: InputDescriptor): readonly CommandArgument[] => {
  const pair = [toFlagName(input.name), inputPlaceholder(input)];
  return input.optional ? [ifThen(isPresent(input.name), pair)] : pair;
};

export const isReturnOutput = (output: OutputDescriptor): boolean =>
  output.passingStyle.kind === "returnValue";

/**
 * Build the `args` template for the given descriptors
 */
export const buildCommandTemplate = (
  inputs: readonly InputDescriptor[],
  outputs: readonly OutputDescriptor[]
): readonly CommandArgument[] => {
  const fileOutputs = outputs.filter((output) => !isReturnOutput(output));
  const returnOutputs = outputs.filter(isReturnOutput);

  return [
    ...inputs.flatMap(inputArguments),
    ...fileOutputs.flatMap((output) => [
      toFlagName(output.name),
      outputPath(output.name),
    ]),
    ...(returnOutputs.length > 0
      ? [
          OUTPUT_PATHS_FLAG,
          ...returnOutputs.map((output) => outputPath(output.name)),
        ]
      : []),
  ];
};
