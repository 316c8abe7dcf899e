/**
 * Analyzer - Public API
 */

export {
  classifyParameter,
  isOutputStyle,
  isPathStyle,
} from "./passing-style.js";
export type { ParameterClassification } from "./passing-style.js";
export { analyzeReturnShape } from "./return-shape.js";
export type { ReturnField, ReturnShape } from "./return-shape.js";
export { SINGLE_OUTPUT_NAME, analyzeSignature } from "./signature.js";
export type { FunctionSignature, ReturnConvention } from "./signature.js";
