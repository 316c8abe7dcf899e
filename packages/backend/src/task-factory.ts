/**
 * Task factory - binds a component to the arguments of one task
 *
 * Resolves every placeholder of the command template: values are
 * serialized, paths come from the path generator and presence guards are
 * evaluated against the arguments that were passed.
 */

import * as path from "node:path";
import {
  CommandArgument,
  ComponentSpec,
  ConstantValue,
  DiagnosticsCollector,
  FunctionTarget,
  InputDescriptor,
  Placeholder,
  Result,
  TypeRegistry,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  defaultTypeRegistry,
  error,
  inferTypeName,
  ok,
  serializeValue,
} from "@componentize/frontend";
import type {
  ComponentTask,
  PathGenerator,
  TaskArguments,
  TaskFactoryOptions,
} from "./types.js";
import { compileComponent } from "./assembler.js";
import { writeComponentFile } from "./component-file.js";

export type TaskFactory = (
  args: TaskArguments,
  pathGenerator?: PathGenerator
) => Result<ComponentTask, DiagnosticsCollector>;

/**
 * `/tmp/inputs/<name>/data` and `/tmp/outputs/<name>/data`
 */
export const defaultPathGenerator: PathGenerator = (kind, name) =>
  `/tmp/${kind}s/${name}/data`;

type Binding = {
  readonly values: ReadonlyMap<string, string>;
  readonly pathGenerator: PathGenerator;
  readonly inputPaths: Record<string, string>;
  readonly outputPaths: Record<string, string>;
};

const bindInputs = (
  spec: ComponentSpec,
  args: TaskArguments,
  registry: TypeRegistry
): Result<ReadonlyMap<string, string>, DiagnosticsCollector> => {
  const known = new Map<string, InputDescriptor>(
    spec.inputs.map((input) => [input.name, input])
  );
  let diagnostics = createDiagnosticsCollector();

  for (const name of Object.keys(args)) {
    if (!known.has(name)) {
      diagnostics = addDiagnostic(
        diagnostics,
        createDiagnostic(
          "CMP5002",
          "error",
          `Component '${spec.name}' has no input named '${name}'`
        )
      );
    }
  }

  const values = new Map<string, string>();
  for (const input of spec.inputs) {
    const value: ConstantValue | undefined = args[input.name];
    if (value === undefined || value === null) {
      if (!input.optional) {
        diagnostics = addDiagnostic(
          diagnostics,
          createDiagnostic(
            "CMP5001",
            "error",
            `Component '${spec.name}' requires input '${input.name}'`
          )
        );
      }
      continue;
    }

    const serialized = serializeValue(
      value,
      input.type ?? inferTypeName(value),
      registry
    );
    if (!serialized.ok) {
      diagnostics = addDiagnostic(
        diagnostics,
        createDiagnostic(
          "CMP5003",
          "error",
          `Argument for input '${input.name}': ${serialized.error}`
        )
      );
      continue;
    }
    values.set(input.name, serialized.value);
  }

  return diagnostics.hasErrors ? error(diagnostics) : ok(values);
};

const resolvePlaceholder = (
  placeholder: Placeholder,
  binding: Binding
): readonly string[] => {
  switch (placeholder.kind) {
    case "inputValue": {
      const value = binding.values.get(placeholder.name);
      return value === undefined ? [] : [value];
    }
    case "inputPath": {
      const inputPath = binding.pathGenerator("input", placeholder.name);
      binding.inputPaths[placeholder.name] = inputPath;
      return [inputPath];
    }
    case "outputPath": {
      const outputPath = binding.pathGenerator("output", placeholder.name);
      binding.outputPaths[placeholder.name] = outputPath;
      return [outputPath];
    }
    case "isPresent":
      return [String(binding.values.has(placeholder.name))];
    case "ifThen":
      return (
        isTrue(placeholder.condition, binding)
          ? placeholder.then
          : placeholder.else ?? []
      ).flatMap((argument) => resolveArgument(argument, binding));
  }
};

const isTrue = (condition: Placeholder, binding: Binding): boolean =>
  condition.kind === "isPresent"
    ? binding.values.has(condition.name)
    : resolvePlaceholder(condition, binding).join("") === "true";

const resolveArgument = (
  argument: CommandArgument,
  binding: Binding
): readonly string[] =>
  typeof argument === "string" ? [argument] : resolvePlaceholder(argument, binding);

/**
 * Resolve a component's command line for the given arguments.
 *
 * Omitted optional inputs drop out of the command line together with their
 * flag, so the function's own default applies.
 */
export const resolveCommandLine = (
  spec: ComponentSpec,
  args: TaskArguments,
  pathGenerator: PathGenerator = defaultPathGenerator,
  registry: TypeRegistry = defaultTypeRegistry
): Result<ComponentTask, DiagnosticsCollector> => {
  const container = spec.implementation?.container;
  if (!container) {
    throw new Error(`ICE: Component '${spec.name}' has no implementation`);
  }

  const values = bindInputs(spec, args, registry);
  if (!values.ok) {
    return values;
  }

  const binding: Binding = {
    values: values.value,
    pathGenerator,
    inputPaths: {},
    outputPaths: {},
  };
  const command = container.command.flatMap((argument) =>
    resolveArgument(argument, binding)
  );
  const resolvedArgs = container.args.flatMap((argument) =>
    resolveArgument(argument, binding)
  );

  const artifactArguments: Record<string, string> = {};
  for (const name of Object.keys(binding.inputPaths)) {
    const value = binding.values.get(name);
    if (value !== undefined) {
      artifactArguments[name] = value;
    }
  }

  return ok({
    name: spec.name,
    image: container.image,
    command,
    args: resolvedArgs,
    inputPaths: binding.inputPaths,
    artifactArguments,
    outputPaths: binding.outputPaths,
  });
};

/**
 * Create a factory producing tasks of a component
 */
export const createTaskFactory =
  (spec: ComponentSpec, registry: TypeRegistry = defaultTypeRegistry): TaskFactory =>
  (args, pathGenerator) =>
    resolveCommandLine(spec, args, pathGenerator, registry);

/**
 * Compile a function and return a factory for its tasks.
 *
 * The specification is also written to `outputComponentFile`, or to the file
 * named by the function's `@componentFile` tag.
 */
export const functionToTaskFactory = (
  target: FunctionTarget,
  options: TaskFactoryOptions = {}
): Result<TaskFactory, DiagnosticsCollector> => {
  const compiled = compileComponent(target, options);
  if (!compiled.ok) {
    return compiled;
  }

  const { spec, signature } = compiled.value;
  const componentFile =
    options.outputComponentFile ?? signature.attachments.componentFile;
  if (componentFile !== undefined) {
    writeComponentFile(spec, path.resolve(componentFile));
  }

  return ok(createTaskFactory(spec, options.registry));
};
