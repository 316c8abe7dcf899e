/**
 * Signature analysis - function signature → component interface
 */

import * as ts from "typescript";
import type {
  ComponentAttachments,
  ComponentSpec,
  InputDescriptor,
  OutputDescriptor,
} from "../types/component.js";
import type { FunctionTarget } from "../program/types.js";
import {
  Diagnostic,
  DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import { Result, ok, error } from "../types/result.js";
import { getNodeLocation } from "../program/diagnostics.js";
import { resolveTypeName } from "../type-mapper.js";
import {
  TypeRegistry,
  defaultTypeRegistry,
  inferTypeName,
  serializeValue,
} from "../data-passing.js";
import { evaluateDefault } from "../default-values.js";
import {
  humanizeFunctionName,
  makeNameUnique,
  stripFileSuffixes,
} from "../naming.js";
import { getAttachments, getDocComment } from "../jsdoc.js";
import { classifyParameter, isOutputStyle, isPathStyle } from "./passing-style.js";
import { ReturnShape, analyzeReturnShape } from "./return-shape.js";

/**
 * Name of the output produced by a single (non-structured) return value
 */
export const SINGLE_OUTPUT_NAME = "Output";

export type ReturnConvention = ReturnShape["kind"];

/**
 * Everything later stages need to know about the analyzed function
 */
export type FunctionSignature = {
  /** Interface of the component (no implementation yet) */
  readonly spec: ComponentSpec;
  /** Identifier the function is bound to in the generated program */
  readonly functionName: string;
  /** Parameter names in declaration order, for positional invocation */
  readonly parameterNames: readonly string[];
  readonly returnConvention: ReturnConvention;
  readonly attachments: ComponentAttachments;
  /** Warnings raised during analysis */
  readonly warnings: readonly Diagnostic[];
};

type ParameterContext = {
  readonly registry: TypeRegistry;
  readonly inputNames: Set<string>;
  readonly outputNames: Set<string>;
};

type ParameterResult = {
  readonly input?: InputDescriptor;
  readonly output?: OutputDescriptor;
  readonly diagnostics: readonly Diagnostic[];
};

const analyzeDefault = (
  parameter: ts.ParameterDeclaration,
  initializer: ts.Expression,
  typeName: string | undefined,
  registry: TypeRegistry
): { readonly default?: string; readonly diagnostics: readonly Diagnostic[] } => {
  const evaluated = evaluateDefault(initializer);
  if (!evaluated.ok) {
    return {
      diagnostics: [
        createDiagnostic(
          "CMP2003",
          "error",
          `Default value of '${parameter.name.getText()}' must be a literal`,
          getNodeLocation(evaluated.node),
          "Defaults are serialized when the component is compiled"
        ),
      ],
    };
  }

  const value = evaluated.value;
  if (value === undefined || value === null) {
    return { diagnostics: [] };
  }

  const diagnostics: Diagnostic[] = [];
  const effectiveType = typeName ?? inferTypeName(value);
  if (typeName === undefined) {
    diagnostics.push(
      createDiagnostic(
        "CMP2005",
        "warning",
        `Missing type name of '${parameter.name.getText()}' was inferred as "${effectiveType}" from its default value`,
        getNodeLocation(parameter)
      )
    );
  }

  const serialized = serializeValue(value, effectiveType, registry);
  if (!serialized.ok) {
    return {
      diagnostics: [
        ...diagnostics,
        createDiagnostic(
          "CMP2006",
          "error",
          serialized.error,
          getNodeLocation(initializer)
        ),
      ],
    };
  }

  return { default: serialized.value, diagnostics };
};

const analyzeParameter = (
  parameter: ts.ParameterDeclaration,
  context: ParameterContext
): ParameterResult => {
  if (!ts.isIdentifier(parameter.name) || parameter.dotDotDotToken) {
    return {
      diagnostics: [
        createDiagnostic(
          "CMP2004",
          "error",
          `Unsupported parameter '${parameter.getText()}'`,
          getNodeLocation(parameter),
          "Use plain named parameters; rest and destructured parameters cannot be bound to command-line arguments"
        ),
      ],
    };
  }

  const parameterName = parameter.name.text;
  const { passingStyle, isMarker, annotation } = classifyParameter(
    parameter.type
  );
  const hasDefault =
    parameter.initializer !== undefined || parameter.questionToken !== undefined;

  if (isMarker && hasDefault) {
    return {
      diagnostics: [
        createDiagnostic(
          "CMP1001",
          "error",
          `Default values for file inputs and outputs are not supported (parameter '${parameterName}')`,
          getNodeLocation(parameter),
          "File and stream parameters are always required"
        ),
      ],
    };
  }

  const ioName = isMarker
    ? stripFileSuffixes(parameterName, isPathStyle(passingStyle))
    : parameterName;
  const typeName = resolveTypeName(annotation, context.registry.typeNames);

  if (isOutputStyle(passingStyle)) {
    const name = makeNameUnique(ioName, context.outputNames);
    context.outputNames.add(name);
    return {
      output: { name, type: typeName, passingStyle, parameterName },
      diagnostics: [],
    };
  }

  const name = makeNameUnique(ioName, context.inputNames);
  context.inputNames.add(name);

  const defaulted =
    hasDefault && parameter.initializer
      ? analyzeDefault(
          parameter,
          parameter.initializer,
          typeName,
          context.registry
        )
      : { diagnostics: [] };

  return {
    input: {
      name,
      type: typeName,
      optional: hasDefault,
      default: defaulted.default,
      passingStyle,
      parameterName,
    },
    diagnostics: defaulted.diagnostics,
  };
};

const returnOutputs = (
  shape: ReturnShape,
  outputNames: Set<string>,
  registry: TypeRegistry
): readonly OutputDescriptor[] => {
  switch (shape.kind) {
    case "none":
      return [];
    case "single": {
      // Even `(outputPath: OutputPath) => string` must get distinct names
      const name = makeNameUnique(SINGLE_OUTPUT_NAME, outputNames);
      outputNames.add(name);
      return [
        {
          name,
          type: resolveTypeName(shape.annotation, registry.typeNames),
          passingStyle: { kind: "returnValue" },
        },
      ];
    }
    case "tuple":
    case "record":
      return shape.fields.map((field) => {
        const name = makeNameUnique(field.name, outputNames);
        outputNames.add(name);
        return {
          name,
          type: resolveTypeName(field.annotation, registry.typeNames),
          passingStyle: { kind: "returnValue" },
          returnField: field.name,
        };
      });
  }
};

const describeFunction = (
  target: FunctionTarget,
  attachments: ComponentAttachments
): { readonly name: string; readonly description?: string } => {
  const description = attachments.description ?? getDocComment(target.statement);
  return {
    name: attachments.name ?? humanizeFunctionName(target.name),
    description: description ? `${description.trim()}\n` : undefined,
  };
};

/**
 * Analyze a function's signature into a component interface.
 *
 * Inputs and outputs are named in separate namespaces; a name already taken
 * in a namespace is suffixed (`number`, `number_2`, ...).
 */
export const analyzeSignature = (
  target: FunctionTarget,
  registry: TypeRegistry = defaultTypeRegistry
): Result<FunctionSignature, DiagnosticsCollector> => {
  const context: ParameterContext = {
    registry,
    inputNames: new Set(),
    outputNames: new Set(),
  };

  const inputs: InputDescriptor[] = [];
  const outputs: OutputDescriptor[] = [];
  const parameterNames: string[] = [];
  let diagnostics = createDiagnosticsCollector();

  for (const parameter of target.node.parameters) {
    // A `this` annotation is not a real parameter
    if (ts.isIdentifier(parameter.name) && parameter.name.text === "this") {
      continue;
    }

    const result = analyzeParameter(parameter, context);
    diagnostics = result.diagnostics.reduce(addDiagnostic, diagnostics);
    if (result.input) {
      inputs.push(result.input);
      parameterNames.push(result.input.parameterName);
    }
    if (result.output?.parameterName) {
      outputs.push(result.output);
      parameterNames.push(result.output.parameterName);
    }
  }

  const shape = analyzeReturnShape(target.node.type, target.program.checker);
  outputs.push(...returnOutputs(shape, context.outputNames, registry));

  if (diagnostics.hasErrors) {
    return error(diagnostics);
  }

  const attachments = getAttachments(target.statement);
  const { name, description } = describeFunction(target, attachments);

  return ok({
    spec: { name, description, inputs, outputs },
    functionName: target.name,
    parameterNames,
    returnConvention: shape.kind,
    attachments,
    warnings: diagnostics.diagnostics,
  });
};
