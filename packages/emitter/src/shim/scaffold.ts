/**
 * Argument-parsing scaffold
 *
 * One parser option per input and per file-style output, plus the shared
 * option collecting exactly one path per return-style output. Each option decodes its
 * text into what the function expects for the parameter's passing style.
 */

import {
  CodecSource,
  InputDescriptor,
  OutputDescriptor,
  PassingStyle,
  TypeRegistry,
  toFlagName,
} from "@componentize/frontend";
import { OUTPUT_PATHS_DEST, OUTPUT_PATHS_FLAG } from "../constants.js";
import {
  ARGUMENT_PARSER_DEFINITION,
  PARENT_DIRS_DEFINITION,
  SupportDefinitions,
  inputStreamFactory,
  outputStreamFactory,
  requireDefinition,
  requireSource,
} from "./support.js";

export type ShimContext = {
  readonly definitions: SupportDefinitions;
  readonly registry: TypeRegistry;
};

export const createShimContext = (registry: TypeRegistry): ShimContext => ({
  definitions: new Map(),
  registry,
});

const PLAIN_TEXT: CodecSource = { expression: "String" };

const PARENT_DIRS: CodecSource = {
  expression: "_makeParentDirsAndReturnPath",
  definition: PARENT_DIRS_DEFINITION,
};

/**
 * Decoder of a by-value input; plain text when the type has no codec
 */
export const valueDecoder = (
  typeName: string | undefined,
  registry: TypeRegistry
): CodecSource =>
  (typeName === undefined
    ? undefined
    : registry.codecs.get(typeName)?.deserializerSource) ?? PLAIN_TEXT;

/**
 * Encoder of a return-style output; plain text when the type has no codec
 */
export const outputEncoder = (
  typeName: string | undefined,
  registry: TypeRegistry
): CodecSource =>
  (typeName === undefined
    ? undefined
    : registry.codecs.get(typeName)?.serializerSource) ?? PLAIN_TEXT;

const withSource = (
  context: ShimContext,
  source: CodecSource
): [string, ShimContext] => [
  source.expression,
  { ...context, definitions: requireSource(context.definitions, source) },
];

/**
 * Decoder expression for a parameter's passing style
 */
export const emitOptionType = (
  style: PassingStyle,
  typeName: string | undefined,
  context: ShimContext
): [string, ShimContext] => {
  switch (style.kind) {
    case "value":
      return withSource(context, valueDecoder(typeName, context.registry));
    case "inputPath":
      return withSource(context, PLAIN_TEXT);
    case "inputFile":
      return withSource(context, inputStreamFactory(style.mode));
    case "outputPath":
      return withSource(context, PARENT_DIRS);
    case "outputFile":
      // The stream factory creates parent directories first
      return withSource(
        withSource(context, PARENT_DIRS)[1],
        outputStreamFactory(style.mode)
      );
    case "returnValue":
      throw new Error(
        "ICE: Unsupported passing style 'returnValue' for a parameter option"
      );
    default: {
      const exhaustive: never = style;
      throw new Error(
        `ICE: Unsupported passing style ${JSON.stringify(exhaustive)}`
      );
    }
  }
};

const emitOption = (
  flag: string,
  dest: string,
  type: string,
  required: boolean,
  count?: number
): string =>
  `_parser.addArgument(${JSON.stringify(flag)}, { dest: ${JSON.stringify(dest)}, type: ${type}, required: ${required}${count === undefined ? "" : `, nargs: ${count}`} });`;

const emitInputOption = (
  input: InputDescriptor,
  context: ShimContext
): [string, ShimContext] => {
  const [type, next] = emitOptionType(input.passingStyle, input.type, context);
  return [
    emitOption(toFlagName(input.name), input.parameterName, type, !input.optional),
    next,
  ];
};

const emitOutputOption = (
  output: OutputDescriptor,
  context: ShimContext
): [string, ShimContext] => {
  if (output.parameterName === undefined) {
    throw new Error(
      `ICE: File-style output '${output.name}' is not bound to a parameter`
    );
  }
  const [type, next] = emitOptionType(output.passingStyle, output.type, context);
  return [emitOption(toFlagName(output.name), output.parameterName, type, true), next];
};

/**
 * Emit the parser definition and the parse call
 */
export const emitScaffold = (
  componentName: string,
  inputs: readonly InputDescriptor[],
  fileOutputs: readonly OutputDescriptor[],
  returnOutputCount: number,
  context: ShimContext
): [string, ShimContext] => {
  let currentContext: ShimContext = {
    ...context,
    definitions: requireDefinition(
      context.definitions,
      "_createParser",
      ARGUMENT_PARSER_DEFINITION
    ),
  };
  const lines = [`const _parser = _createParser(${JSON.stringify(componentName)});`];

  for (const input of inputs) {
    const [line, next] = emitInputOption(input, currentContext);
    lines.push(line);
    currentContext = next;
  }

  for (const output of fileOutputs) {
    const [line, next] = emitOutputOption(output, currentContext);
    lines.push(line);
    currentContext = next;
  }

  if (returnOutputCount > 0) {
    lines.push(
      emitOption(OUTPUT_PATHS_FLAG, OUTPUT_PATHS_DEST, "String", true, returnOutputCount)
    );
  }

  lines.push("const _parsedArgs = _parser.parse(process.argv.slice(1));");
  return [lines.join("\n"), currentContext];
};
