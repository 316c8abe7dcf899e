/**
 * Diagnostic types for the component compiler
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Configuration errors (CMP1001-CMP1099)
  | "CMP1001" // Default value on a file or stream parameter
  | "CMP1002" // Base image conflicts with the @baseImage tag
  // Signature errors (CMP2001-CMP2099)
  | "CMP2001" // TypeScript syntax error in the defining module
  | "CMP2003" // Default value is not a literal
  | "CMP2004" // Unsupported parameter form (rest, destructuring)
  | "CMP2005" // Default value type inferred from the value
  | "CMP2006" // Default value cannot be serialized
  // Lookup errors (CMP3001-CMP3099)
  | "CMP3001" // Exported function not found
  | "CMP3002" // Source file not found
  // Config file errors (CMP4001-CMP4099)
  | "CMP4001" // Config file not found
  | "CMP4002" // Invalid JSON in config file
  | "CMP4003" // Invalid config field
  // Binding errors (CMP5001-CMP5099)
  | "CMP5001" // Required argument missing
  | "CMP5002" // Unknown argument
  | "CMP5003" // Argument cannot be serialized
  // Capture errors (CMP6001-CMP6099)
  | "CMP6001"; // Closure capture failed

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const mergeDiagnostics = (
  collector1: DiagnosticsCollector,
  collector2: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...collector1.diagnostics, ...collector2.diagnostics],
  hasErrors: collector1.hasErrors || collector2.hasErrors,
});

/**
 * Wrap a single diagnostic into a collector
 */
export const singleDiagnostic = (
  diagnostic: Diagnostic
): DiagnosticsCollector =>
  addDiagnostic(createDiagnosticsCollector(), diagnostic);
