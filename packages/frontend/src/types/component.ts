/**
 * Component specification types
 *
 * These are the values produced by one compilation: the descriptors from
 * signature analysis, the command template placeholders and the assembled
 * specification that collaborators serialize or turn into tasks.
 */

export type StreamMode = "text" | "binary";

/**
 * How a parameter's data crosses the process boundary.
 *
 * Resolved once during analysis; every later stage switches on `kind`.
 */
export type PassingStyle =
  | { readonly kind: "value" }
  | { readonly kind: "inputPath" }
  | { readonly kind: "inputFile"; readonly mode: StreamMode }
  | { readonly kind: "outputPath" }
  | { readonly kind: "outputFile"; readonly mode: StreamMode }
  | { readonly kind: "returnValue" };

export type InputPassingStyle = Extract<
  PassingStyle,
  { readonly kind: "value" | "inputPath" | "inputFile" }
>;

export type FileOutputPassingStyle = Extract<
  PassingStyle,
  { readonly kind: "outputPath" | "outputFile" }
>;

/** Styles a parameter can have (everything but `returnValue`) */
export type ParameterPassingStyle = InputPassingStyle | FileOutputPassingStyle;

export type OutputPassingStyle = Extract<
  PassingStyle,
  { readonly kind: "returnValue" | "outputPath" | "outputFile" }
>;

export type InputDescriptor = {
  readonly name: string;
  readonly type?: string;
  readonly optional: boolean;
  /** Serialized default, only for optional inputs with a non-null default */
  readonly default?: string;
  readonly passingStyle: InputPassingStyle;
  /** The function parameter this input binds to (may differ from `name`) */
  readonly parameterName: string;
};

export type OutputDescriptor = {
  readonly name: string;
  readonly type?: string;
  readonly passingStyle: OutputPassingStyle;
  /** Set for file-style outputs passed through a parameter */
  readonly parameterName?: string;
  /** Set for outputs taken from a field of a multi-field return value */
  readonly returnField?: string;
};

/**
 * Command template placeholders, resolved later by a binder
 */
export type Placeholder =
  | { readonly kind: "inputValue"; readonly name: string }
  | { readonly kind: "inputPath"; readonly name: string }
  | { readonly kind: "outputPath"; readonly name: string }
  | { readonly kind: "isPresent"; readonly name: string }
  | {
      readonly kind: "ifThen";
      readonly condition: Placeholder;
      readonly then: readonly CommandArgument[];
      readonly else?: readonly CommandArgument[];
    };

export type CommandArgument = string | Placeholder;

export type ContainerSpec = {
  readonly image: string;
  readonly command: readonly CommandArgument[];
  readonly args: readonly CommandArgument[];
};

export type ComponentImplementation = {
  readonly container: ContainerSpec;
};

export type ComponentSpec = {
  readonly name: string;
  readonly description?: string;
  readonly inputs: readonly InputDescriptor[];
  readonly outputs: readonly OutputDescriptor[];
  readonly implementation?: ComponentImplementation;
};

/**
 * Overrides attached to a function through JSDoc tags
 */
export type ComponentAttachments = {
  readonly name?: string;
  readonly description?: string;
  readonly baseImage?: string;
  readonly componentFile?: string;
};
