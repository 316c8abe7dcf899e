/**
 * Type definitions for component assembly and task binding
 */

import type {
  ComponentSpec,
  ConstantValue,
  FunctionSignature,
  TypeRegistry,
} from "@componentize/frontend";
import type { CaptureStrategyKind } from "@componentize/emitter";

/**
 * A base image, or a function producing one when it is needed
 */
export type BaseImageSource = string | (() => string);

/**
 * Options for turning a function into a component
 */
export type ComponentOptions = {
  /** Image to run in; conflicts with a different `@baseImage` tag */
  readonly baseImage?: string;
  /** Image used when neither `baseImage` nor `@baseImage` is set */
  readonly defaultBaseImage?: BaseImageSource;
  /** npm packages installed in the container before the function runs */
  readonly packagesToInstall?: readonly string[];
  /** How the function body gets into the program (default: `source`) */
  readonly captureStrategy?: CaptureStrategyKind;
  /** Extra modules captured with the closure strategy */
  readonly modulesToCapture?: readonly string[];
  /** Code placed before the function, e.g. `require` calls it relies on */
  readonly extraCode?: readonly string[];
  readonly registry?: TypeRegistry;
  /** Node.js version recorded in closure captures */
  readonly producerVersion?: string;
};

export type TaskFactoryOptions = ComponentOptions & {
  /** Also write the specification here (overrides `@componentFile`) */
  readonly outputComponentFile?: string;
};

/**
 * A compiled component together with what analysis learned on the way
 */
export type CompiledComponent = {
  readonly spec: ComponentSpec;
  readonly signature: FunctionSignature;
};

/**
 * Argument values of one task, keyed by input name
 */
export type TaskArguments = Readonly<Record<string, ConstantValue>>;

export type PathKind = "input" | "output";

/**
 * Chooses where the orchestrator stages an input or collects an output
 */
export type PathGenerator = (kind: PathKind, name: string) => string;

/**
 * A component bound to concrete arguments
 */
export type ComponentTask = {
  readonly name: string;
  readonly image: string;
  readonly command: readonly string[];
  readonly args: readonly string[];
  /** Paths where path-style inputs must be staged */
  readonly inputPaths: Readonly<Record<string, string>>;
  /** Serialized data for each path-style input */
  readonly artifactArguments: Readonly<Record<string, string>>;
  /** Paths where outputs will be found after the task runs */
  readonly outputPaths: Readonly<Record<string, string>>;
};
