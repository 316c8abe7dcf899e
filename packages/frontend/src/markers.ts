/**
 * Passing-style markers
 *
 * Annotate a parameter with one of these to receive a file path or an open
 * stream instead of the data itself:
 *
 * ```ts
 * import type { InputPath, OutputPath } from "@componentize/frontend";
 *
 * export function trainModel(
 *   datasetPath: InputPath<"CSV">,
 *   modelPath: OutputPath<"Model">,
 *   epochs = 10
 * ): void { ... }
 * ```
 *
 * The type argument names the data type (a string literal names it
 * directly). The exposed input and output names drop the `Path`/`File`
 * suffix, so the component above takes `dataset` and produces `model`.
 */

import type { Readable, Writable } from "node:stream";
import type { ParameterPassingStyle } from "./types/component.js";

declare const dataType: unique symbol;

type Tagged<Base, T> = Base & { readonly [dataType]?: T };

export type InputPath<T = unknown> = Tagged<string, T>;
export type InputTextFile<T = unknown> = Tagged<Readable, T>;
export type InputBinaryFile<T = unknown> = Tagged<Readable, T>;
export type OutputPath<T = unknown> = Tagged<string, T>;
export type OutputTextFile<T = unknown> = Tagged<Writable, T>;
export type OutputBinaryFile<T = unknown> = Tagged<Writable, T>;

export type MarkerName =
  | "InputPath"
  | "InputTextFile"
  | "InputBinaryFile"
  | "OutputPath"
  | "OutputTextFile"
  | "OutputBinaryFile";

export const MARKER_PASSING_STYLES: ReadonlyMap<
  MarkerName,
  ParameterPassingStyle
> = new Map<MarkerName, ParameterPassingStyle>([
    ["InputPath", { kind: "inputPath" }],
    ["InputTextFile", { kind: "inputFile", mode: "text" }],
    ["InputBinaryFile", { kind: "inputFile", mode: "binary" }],
    ["OutputPath", { kind: "outputPath" }],
    ["OutputTextFile", { kind: "outputFile", mode: "text" }],
    ["OutputBinaryFile", { kind: "outputFile", mode: "binary" }],
  ]);

export const isMarkerName = (name: string): name is MarkerName =>
  [...MARKER_PASSING_STYLES.keys()].some((marker) => marker === name);
