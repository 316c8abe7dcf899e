/**
 * Component backend - specification assembly, serialization and binding
 */

export { compileComponent, createComponentSpec } from "./assembler.js";
export {
  DEFAULT_BASE_IMAGE,
  getDefaultBaseImage,
  resolveBaseImage,
  setDefaultBaseImage,
} from "./base-image.js";
export { USER_PREFIX, installCommand, packageInstallPrefix } from "./install.js";
export { argumentToDict, componentToDict, dumpComponent } from "./serialize.js";
export type { SerializedArgument } from "./serialize.js";
export {
  componentToFile,
  componentToText,
  writeComponentFile,
} from "./component-file.js";
export {
  createTaskFactory,
  defaultPathGenerator,
  functionToTaskFactory,
  resolveCommandLine,
} from "./task-factory.js";
export type { TaskFactory } from "./task-factory.js";

export type {
  BaseImageSource,
  CompiledComponent,
  ComponentOptions,
  ComponentTask,
  PathGenerator,
  PathKind,
  TaskArguments,
  TaskFactoryOptions,
} from "./types.js";
