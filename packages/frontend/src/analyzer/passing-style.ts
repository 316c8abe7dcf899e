/**
 * Parameter passing-style classification
 */

import * as ts from "typescript";
import type {
  FileOutputPassingStyle,
  ParameterPassingStyle,
} from "../types/component.js";
import { MARKER_PASSING_STYLES, isMarkerName } from "../markers.js";
import {
  TypeAnnotation,
  toTypeAnnotation,
  typeReferenceName,
} from "../type-mapper.js";

export type ParameterClassification = {
  readonly passingStyle: ParameterPassingStyle;
  /** True when the annotation was one of the passing-style markers */
  readonly isMarker: boolean;
  /** Annotation of the data itself (the marker's type argument) */
  readonly annotation: TypeAnnotation;
};

/**
 * Classify a parameter by its type annotation.
 *
 * `InputPath<"CSV">` and `io.OutputTextFile<number>` are markers; anything
 * else is passed by value.
 */
export const classifyParameter = (
  typeNode: ts.TypeNode | undefined
): ParameterClassification => {
  if (typeNode && ts.isTypeReferenceNode(typeNode)) {
    const name = typeReferenceName(typeNode.typeName);
    const markerStyle = isMarkerName(name)
      ? MARKER_PASSING_STYLES.get(name)
      : undefined;
    if (markerStyle) {
      return {
        passingStyle: markerStyle,
        isMarker: true,
        annotation: toTypeAnnotation(typeNode.typeArguments?.[0]),
      };
    }
  }

  return {
    passingStyle: { kind: "value" },
    isMarker: false,
    annotation: toTypeAnnotation(typeNode),
  };
};

export const isOutputStyle = (
  style: ParameterPassingStyle
): style is FileOutputPassingStyle =>
  style.kind === "outputPath" || style.kind === "outputFile";

export const isPathStyle = (style: ParameterPassingStyle): boolean =>
  style.kind === "inputPath" || style.kind === "outputPath";
