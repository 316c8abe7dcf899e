/**
 * Component emitter - command templates, capture and shim generation
 */

export * from "./constants.js";
export * from "./placeholders.js";
export * from "./command-template.js";
export * from "./capture/index.js";
export * from "./shim/index.js";
