/**
 * Component assembler - analyzed function → complete specification
 */

import {
  ComponentSpec,
  DiagnosticsCollector,
  FunctionTarget,
  Result,
  analyzeSignature,
  defaultTypeRegistry,
  map,
  mapError,
  ok,
  singleDiagnostic,
} from "@componentize/frontend";
import {
  NODE_EVAL_COMMAND,
  PROGRAM_ARGUMENTS_SEPARATOR,
  buildCommandTemplate,
  createCaptureStrategy,
  generateShimText,
} from "@componentize/emitter";
import type { CompiledComponent, ComponentOptions } from "./types.js";
import { resolveBaseImage } from "./base-image.js";
import { packageInstallPrefix } from "./install.js";

/**
 * Compile a function into a component.
 *
 * The container command runs the generated program with `node -e`; the
 * arguments after `--` come from the command template.
 */
export const compileComponent = (
  target: FunctionTarget,
  options: ComponentOptions = {}
): Result<CompiledComponent, DiagnosticsCollector> => {
  const registry = options.registry ?? defaultTypeRegistry;
  const analyzed = analyzeSignature(target, registry);
  if (!analyzed.ok) {
    return analyzed;
  }
  const signature = analyzed.value;

  const image = mapError(
    resolveBaseImage(
      options.baseImage,
      signature.attachments.baseImage,
      options.defaultBaseImage
    ),
    singleDiagnostic
  );
  if (!image.ok) {
    return image;
  }

  const strategy = createCaptureStrategy(options.captureStrategy ?? "source", {
    modulesToCapture: options.modulesToCapture,
    producerVersion: options.producerVersion,
  });
  const body = mapError(strategy.capture(target), singleDiagnostic);
  if (!body.ok) {
    return body;
  }

  const program = generateShimText({
    signature,
    body: body.value,
    extraCode: options.extraCode,
    registry,
  });

  const { inputs, outputs } = signature.spec;
  return ok({
    spec: {
      ...signature.spec,
      implementation: {
        container: {
          image: image.value,
          command: [
            ...packageInstallPrefix(options.packagesToInstall ?? []),
            ...NODE_EVAL_COMMAND,
            program,
            PROGRAM_ARGUMENTS_SEPARATOR,
          ],
          args: buildCommandTemplate(inputs, outputs),
        },
      },
    },
    signature,
  });
};

/**
 * Compile a function into a component specification
 */
export const createComponentSpec = (
  target: FunctionTarget,
  options: ComponentOptions = {}
): Result<ComponentSpec, DiagnosticsCollector> =>
  map(compileComponent(target, options), (compiled) => compiled.spec);
