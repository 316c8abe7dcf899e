/**
 * Capture strategies - Public API
 */

export type {
  CaptureOptions,
  CaptureStrategy,
  CaptureStrategyKind,
} from "./types.js";
export {
  createSourceCopyCapture,
  dedentSource,
  sourceLines,
  stripExportModifiers,
} from "./source-copy.js";
export {
  createClosureCapture,
  captureModules,
  decodePayload,
  encodePayload,
  externalPackages,
  moduleKey,
  packageName,
  renderClosureLoader,
} from "./closure.js";
export type { CapturedModule, ClosurePayload } from "./closure.js";
export {
  FORMAT_BOUNDARY,
  VERSION_GUARD_DEFINITION,
  renderVersionGuard,
} from "./version-guard.js";

import type {
  CaptureOptions,
  CaptureStrategy,
  CaptureStrategyKind,
} from "./types.js";
import { createSourceCopyCapture } from "./source-copy.js";
import { createClosureCapture } from "./closure.js";

export const createCaptureStrategy = (
  kind: CaptureStrategyKind,
  options: CaptureOptions = {}
): CaptureStrategy => {
  switch (kind) {
    case "source":
      return createSourceCopyCapture();
    case "closure":
      return createClosureCapture(options);
  }
};
