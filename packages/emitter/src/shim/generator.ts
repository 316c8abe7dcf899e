/**
 * Shim generator - the program run inside the container
 *
 * The program decodes its command-line arguments, calls the captured
 * function, and writes every return-style output to the path the
 * orchestrator passed for it.
 */

import {
  FunctionSignature,
  OutputDescriptor,
  TypeRegistry,
  defaultTypeRegistry,
} from "@componentize/frontend";
import { OUTPUT_PATHS_DEST } from "../constants.js";
import { isReturnOutput } from "../command-template.js";
import { ShimBlocks, joinShimBlocks } from "./blocks.js";
import {
  CLOSE_STREAMS_DEFINITION,
  renderDefinitions,
  requireDefinition,
  requireSource,
} from "./support.js";
import {
  ShimContext,
  createShimContext,
  emitScaffold,
  outputEncoder,
} from "./scaffold.js";

export type ShimOptions = {
  readonly signature: FunctionSignature;
  /** Program fragment binding the function under its name */
  readonly body: string;
  /** Code placed before the function, e.g. imports it relies on */
  readonly extraCode?: readonly string[];
  readonly registry?: TypeRegistry;
};

const parsedArgument = (key: string): string =>
  `_parsedArgs[${JSON.stringify(key)}]`;

const normalizeResult = (
  signature: FunctionSignature,
  returnOutputs: readonly OutputDescriptor[]
): string => {
  switch (signature.returnConvention) {
    case "none":
      return "[]";
    case "single":
      // Strings and arrays are values too, never indexed into
      return "[_result]";
    case "tuple":
      return "_result";
    case "record":
      return `[${returnOutputs
        .map((output) => `_result[${JSON.stringify(output.returnField ?? output.name)}]`)
        .join(", ")}]`;
  }
};

const emitInvocation = (
  signature: FunctionSignature,
  returnOutputs: readonly OutputDescriptor[],
  context: ShimContext
): [string, ShimContext] => {
  const call = `${signature.functionName}(${signature.parameterNames
    .map(parsedArgument)
    .join(", ")})`;
  const streamOutputs = signature.spec.outputs.filter(
    (output) =>
      output.passingStyle.kind === "outputFile" &&
      output.parameterName !== undefined
  );

  const lines = [
    "const _invoke = async () => {",
    signature.returnConvention === "none"
      ? `  await ${call};`
      : `  const _result = await ${call};`,
  ];

  let currentContext = context;
  if (streamOutputs.length > 0) {
    lines.push(
      `  await _closeStreams([${streamOutputs
        .map((output) => parsedArgument(output.parameterName ?? output.name))
        .join(", ")}]);`
    );
    currentContext = {
      ...context,
      definitions: requireDefinition(
        context.definitions,
        "_closeStreams",
        CLOSE_STREAMS_DEFINITION
      ),
    };
  }

  lines.push(`  return ${normalizeResult(signature, returnOutputs)};`, "};");
  return [lines.join("\n"), currentContext];
};

const emitSerialization = (
  returnOutputs: readonly OutputDescriptor[],
  context: ShimContext
): [string, ShimContext] => {
  let definitions = context.definitions;
  const encoders = returnOutputs.map((output) => {
    const source = outputEncoder(output.type, context.registry);
    definitions = requireSource(definitions, source);
    return source.expression;
  });

  const text =
    encoders.length === 0
      ? "const _outputSerializers = [];"
      : `const _outputSerializers = [\n${encoders.map((e) => `  ${e},`).join("\n")}\n];`;
  return [text, { ...context, definitions }];
};

const EPILOGUE = `_invoke()
  .then((outputs) => {
    const outputPaths = ${parsedArgument(OUTPUT_PATHS_DEST)} ?? [];
    outputPaths.forEach((outputFile, index) => {
      _fs.mkdirSync(_path.dirname(outputFile), { recursive: true });
      _fs.writeFileSync(outputFile, _outputSerializers[index](outputs[index]));
    });
  })
  .catch((error) => {
    console.error(error);
    process.exit(1);
  });`;

/**
 * Generate the program blocks for an analyzed function
 */
export const generateShim = (options: ShimOptions): ShimBlocks => {
  const { signature } = options;
  const registry = options.registry ?? defaultTypeRegistry;
  const fileOutputs = signature.spec.outputs.filter(
    (output) => !isReturnOutput(output)
  );
  const returnOutputs = signature.spec.outputs.filter(isReturnOutput);

  const [scaffold, afterScaffold] = emitScaffold(
    signature.spec.name,
    signature.spec.inputs,
    fileOutputs,
    returnOutputs.length,
    createShimContext(registry)
  );
  const [invocation, afterInvocation] = emitInvocation(
    signature,
    returnOutputs,
    afterScaffold
  );
  const [serialization, finalContext] = emitSerialization(
    returnOutputs,
    afterInvocation
  );

  return {
    definitions: renderDefinitions(finalContext.definitions),
    preamble: (options.extraCode ?? []).join("\n"),
    body: options.body,
    scaffold,
    invocation,
    serialization,
    epilogue: EPILOGUE,
  };
};

/**
 * Generate the program text for an analyzed function
 */
export const generateShimText = (options: ShimOptions): string =>
  joinShimBlocks(generateShim(options));
