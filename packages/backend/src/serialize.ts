/**
 * Component specification serialization
 *
 * Produces the document layout orchestrators read:
 *
 * ```yaml
 * name: Add
 * inputs:
 *   - { name: a, type: Float }
 * outputs:
 *   - { name: Output, type: Float }
 * implementation:
 *   container:
 *     image: node:20-slim
 *     command: [node, -e, "...", --]
 *     args: [--a, { inputValue: a }, ----output-paths, { outputPath: Output }]
 * ```
 *
 * Passing styles and parameter bindings are compile-time details and are
 * not part of the document.
 */

import YAML from "yaml";
import type {
  CommandArgument,
  ComponentSpec,
  InputDescriptor,
  OutputDescriptor,
  Placeholder,
} from "@componentize/frontend";

export type SerializedArgument = string | { readonly [key: string]: unknown };

type Document = Record<string, unknown>;

const placeholderToDict = (placeholder: Placeholder): Document => {
  switch (placeholder.kind) {
    case "inputValue":
      return { inputValue: placeholder.name };
    case "inputPath":
      return { inputPath: placeholder.name };
    case "outputPath":
      return { outputPath: placeholder.name };
    case "isPresent":
      return { isPresent: placeholder.name };
    case "ifThen": {
      const branches: Document = {
        cond: placeholderToDict(placeholder.condition),
        then: placeholder.then.map(argumentToDict),
      };
      if (placeholder.else !== undefined) {
        branches.else = placeholder.else.map(argumentToDict);
      }
      return { if: branches };
    }
  }
};

export const argumentToDict = (argument: CommandArgument): SerializedArgument =>
  typeof argument === "string" ? argument : placeholderToDict(argument);

const inputToDict = (input: InputDescriptor): Document => {
  const entry: Document = { name: input.name };
  if (input.type !== undefined) entry.type = input.type;
  if (input.default !== undefined) entry.default = input.default;
  if (input.optional) entry.optional = true;
  return entry;
};

const outputToDict = (output: OutputDescriptor): Document => {
  const entry: Document = { name: output.name };
  if (output.type !== undefined) entry.type = output.type;
  return entry;
};

/**
 * Plain-object form of a specification; absent fields are left out
 */
export const componentToDict = (spec: ComponentSpec): Document => {
  const document: Document = { name: spec.name };
  if (spec.description !== undefined) {
    document.description = spec.description;
  }
  if (spec.inputs.length > 0) {
    document.inputs = spec.inputs.map(inputToDict);
  }
  if (spec.outputs.length > 0) {
    document.outputs = spec.outputs.map(outputToDict);
  }
  if (spec.implementation) {
    const { image, command, args } = spec.implementation.container;
    document.implementation = {
      container: {
        image,
        command: command.map(argumentToDict),
        args: args.map(argumentToDict),
      },
    };
  }
  return document;
};

/**
 * Serialize a specification as YAML
 */
export const dumpComponent = (spec: ComponentSpec): string =>
  YAML.stringify(componentToDict(spec), { lineWidth: 0 });
