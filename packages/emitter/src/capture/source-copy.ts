/**
 * Source-copy capture: embed the function's own source text
 */

import * as ts from "typescript";
import { FunctionTarget, ok } from "@componentize/frontend";
import type { CaptureStrategy } from "./types.js";
import { transpileToCommonJs } from "./transpile.js";

const leadingIndentation = (line: string): string =>
  line.slice(0, line.length - line.trimStart().length);

/**
 * Literal source lines of the statement declaring the function, without
 * its doc comment
 */
export const sourceLines = (target: FunctionTarget): readonly string[] => {
  const { sourceFile, statement } = target;
  const start = statement.getStart(sourceFile);
  const lineStart = sourceFile.getPositionOfLineAndCharacter(
    sourceFile.getLineAndCharacterOfPosition(start).line,
    0
  );
  return sourceFile.text.slice(lineStart, statement.getEnd()).split(/\r?\n/);
};

/**
 * Drop leading decorator lines and strip the first line's indentation from
 * every line
 */
export const dedentSource = (lines: readonly string[]): string => {
  const firstCode = lines.findIndex((line) => !line.trimStart().startsWith("@"));
  const code = firstCode < 0 ? [] : lines.slice(firstCode);
  const indentation = leadingIndentation(code[0] ?? "");
  return code
    .map((line) =>
      line.startsWith(indentation) ? line.slice(indentation.length) : line
    )
    .join("\n");
};

const isModuleModifier = (modifier: ts.ModifierLike): boolean =>
  modifier.kind === ts.SyntaxKind.ExportKeyword ||
  modifier.kind === ts.SyntaxKind.DefaultKeyword;

/**
 * Remove `export` / `export default` so the declaration binds a local name
 */
export const stripExportModifiers = (text: string): string => {
  const sourceFile = ts.createSourceFile(
    "captured.ts",
    text,
    ts.ScriptTarget.ES2022,
    true
  );
  const [statement] = sourceFile.statements;
  const modifiers =
    statement && ts.canHaveModifiers(statement)
      ? (ts.getModifiers(statement) ?? []).filter(isModuleModifier)
      : [];

  // Remove back to front so earlier positions stay valid
  return [...modifiers]
    .reverse()
    .reduce(
      (result, modifier) =>
        result.slice(0, modifier.getStart(sourceFile)) +
        result.slice(modifier.getEnd()).replace(/^[ \t]+/, ""),
      text
    );
};

export const createSourceCopyCapture = (): CaptureStrategy => ({
  kind: "source",
  capture: (target) => {
    const text = stripExportModifiers(dedentSource(sourceLines(target)));
    return ok(transpileToCommonJs(text, target.sourceFile.fileName).trim());
  },
});
