/**
 * Base image resolution
 */

import {
  Diagnostic,
  Result,
  createDiagnostic,
  error,
  ok,
} from "@componentize/frontend";
import type { BaseImageSource } from "./types.js";

export const DEFAULT_BASE_IMAGE = "node:20-slim";

let defaultBaseImage: BaseImageSource = DEFAULT_BASE_IMAGE;

/**
 * Change the image used by components that name none
 */
export const setDefaultBaseImage = (image: BaseImageSource): void => {
  defaultBaseImage = image;
};

export const getDefaultBaseImage = (): BaseImageSource => defaultBaseImage;

const evaluate = (source: BaseImageSource): string =>
  typeof source === "function" ? source() : source;

/**
 * Pick the image a component runs in.
 *
 * An explicit image and an `@baseImage` tag must agree; otherwise the first
 * of explicit, tagged, `fallback` and the process default wins. A function
 * default is only called when it is the one picked.
 */
export const resolveBaseImage = (
  explicit: string | undefined,
  attached: string | undefined,
  fallback?: BaseImageSource
): Result<string, Diagnostic> => {
  if (explicit !== undefined && attached !== undefined && explicit !== attached) {
    return error(
      createDiagnostic(
        "CMP1002",
        "error",
        `Base image "${explicit}" conflicts with the @baseImage tag "${attached}"`,
        undefined,
        "Remove one of them, or make them name the same image"
      )
    );
  }

  return ok(explicit ?? attached ?? evaluate(fallback ?? defaultBaseImage));
};
