/**
 * Closure capture: ship the compiled defining module inside the program
 *
 * The defining module and the modules listed for capture are compiled to
 * CommonJS, serialized with `node:v8`, gzipped and base64-encoded. The
 * generated loader checks the container's Node.js version, installs the
 * packages the captured code requires, evaluates the modules with a
 * private loader and binds the export under the function's name.
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as v8 from "node:v8";
import * as zlib from "node:zlib";
import { builtinModules } from "node:module";
import {
  Diagnostic,
  FunctionTarget,
  Result,
  collect,
  createDiagnostic,
  error,
  ok,
} from "@componentize/frontend";
import type { CaptureOptions, CaptureStrategy } from "./types.js";
import { transpileToCommonJs } from "./transpile.js";
import { renderVersionGuard } from "./version-guard.js";

export type CapturedModule = {
  /** Project-relative path without extension, e.g. `src/math` */
  readonly key: string;
  readonly code: string;
};

export type ClosurePayload = {
  readonly entry: string;
  readonly exportName: string;
  readonly modules: Readonly<Record<string, string>>;
};

const EXTENSION = /\.(?:[cm]?[jt]sx?|d\.ts)$/;

/**
 * Module key of a file: project-relative, POSIX separators, no extension
 */
export const moduleKey = (projectRoot: string, filePath: string): string =>
  path
    .relative(projectRoot, path.resolve(projectRoot, filePath))
    .split(path.sep)
    .join("/")
    .replace(EXTENSION, "");

const isBuiltin = (specifier: string): boolean =>
  specifier.startsWith("node:") || builtinModules.includes(specifier);

/**
 * Package name of a bare specifier (`lodash/fp` → `lodash`,
 * `@scope/pkg/sub` → `@scope/pkg`)
 */
export const packageName = (specifier: string): string => {
  const segments = specifier.split("/");
  return specifier.startsWith("@")
    ? segments.slice(0, 2).join("/")
    : (segments[0] ?? specifier);
};

/**
 * Packages a module requires from outside the project
 */
export const externalPackages = (code: string): readonly string[] =>
  ts
    .preProcessFile(code, true, true)
    .importedFiles.map((file) => file.fileName)
    .filter(
      (specifier) =>
        !specifier.startsWith(".") &&
        !specifier.startsWith("/") &&
        !isBuiltin(specifier)
    )
    .map(packageName);

const captureFailure = (message: string): Diagnostic =>
  createDiagnostic(
    "CMP6001",
    "error",
    message,
    undefined,
    "Paths in modulesToCapture are relative to the project root"
  );

const readModule = (
  target: FunctionTarget,
  modulePath: string
): Result<CapturedModule, Diagnostic> => {
  const { projectRoot } = target.program.options;
  const absolutePath = path.resolve(projectRoot, modulePath);
  const text =
    absolutePath === target.sourceFile.fileName
      ? target.sourceFile.text
      : target.program.host.readFile(absolutePath);

  if (text === undefined) {
    return error(captureFailure(`Cannot read module to capture: ${modulePath}`));
  }

  return ok({
    key: moduleKey(projectRoot, absolutePath),
    code: transpileToCommonJs(text, absolutePath),
  });
};

/**
 * Compile the defining module and the listed modules, defining module first
 */
export const captureModules = (
  target: FunctionTarget,
  modulesToCapture: readonly string[] = []
): Result<readonly CapturedModule[], Diagnostic> => {
  const { projectRoot } = target.program.options;
  const paths = [target.sourceFile.fileName, ...modulesToCapture];
  const unique = paths.filter(
    (modulePath, index) =>
      paths.findIndex(
        (other) =>
          path.resolve(projectRoot, other) === path.resolve(projectRoot, modulePath)
      ) === index
  );
  return collect(unique.map((modulePath) => readModule(target, modulePath)));
};

export const encodePayload = (payload: ClosurePayload): string =>
  zlib.gzipSync(v8.serialize(payload)).toString("base64");

export const decodePayload = (encoded: string): unknown =>
  v8.deserialize(zlib.gunzipSync(Buffer.from(encoded, "base64")));

const INSTALL_DEFINITION = `const _globalRequires = [];
const _ensurePackages = (names) => {
  const missing = names.filter((name) => {
    try {
      require.resolve(name);
      return false;
    } catch (_error) {
      return true;
    }
  });
  if (missing.length === 0) return;
  const { execFileSync } = require("node:child_process");
  const { createRequire } = require("node:module");
  const userPrefix = _path.join(require("node:os").homedir(), ".npm-global");
  const install = ["install", "--global", "--no-audit", "--no-fund", ...missing];
  try {
    execFileSync("npm", install, { stdio: "inherit" });
  } catch (_error) {
    execFileSync("npm", [...install, "--prefix", userPrefix], { stdio: "inherit" });
  }
  const globalRoot = execFileSync("npm", ["root", "--global"]).toString().trim();
  for (const root of [globalRoot, _path.join(userPrefix, "lib", "node_modules")]) {
    _globalRequires.push(createRequire(_path.join(root, "noop.js")));
  }
};`;

const LOADER_DEFINITION = `const _capturedCache = new Map();
const _resolveCaptured = (from, specifier) => {
  if (!specifier.startsWith(".")) return undefined;
  const base = _path.posix
    .join(_path.posix.dirname(from), specifier)
    .replace(/\\.(?:[cm]?[jt]sx?)$/, "");
  return [base, base + "/index"].find((key) => key in _captured.modules);
};
const _requireExternal = (specifier) => {
  for (const load of _globalRequires) {
    try {
      return load(specifier);
    } catch (error) {
      if (error.code !== "MODULE_NOT_FOUND") throw error;
    }
  }
  return require(specifier);
};
const _loadCaptured = (key) => {
  const cached = _capturedCache.get(key);
  if (cached) return cached.exports;
  const module = { exports: {} };
  _capturedCache.set(key, module);
  const localRequire = (specifier) => {
    const target = _resolveCaptured(key, specifier);
    return target === undefined ? _requireExternal(specifier) : _loadCaptured(target);
  };
  const evaluate = new Function("exports", "require", "module", "__filename", "__dirname", _captured.modules[key]);
  evaluate(module.exports, localRequire, module, key, _path.posix.dirname(key));
  return module.exports;
};`;

/**
 * Loader fragment binding the captured function under `functionName`
 */
export const renderClosureLoader = (
  functionName: string,
  encodedPayload: string,
  packages: readonly string[],
  producerVersion: string
): string =>
  [
    renderVersionGuard(producerVersion),
    INSTALL_DEFINITION,
    `_ensurePackages(${JSON.stringify(packages)});`,
    `const _captured = require("node:v8").deserialize(
  require("node:zlib").gunzipSync(Buffer.from(${JSON.stringify(encodedPayload)}, "base64"))
);`,
    LOADER_DEFINITION,
    `const ${functionName} = _loadCaptured(_captured.entry)[_captured.exportName];`,
  ].join("\n");

export const createClosureCapture = (
  options: CaptureOptions = {}
): CaptureStrategy => ({
  kind: "closure",
  capture: (target) => {
    const modules = captureModules(target, options.modulesToCapture);
    if (!modules.ok) {
      return modules;
    }

    const [entry] = modules.value;
    if (!entry) {
      return error(captureFailure("Nothing to capture"));
    }

    const packages = [
      ...new Set(modules.value.flatMap((module) => externalPackages(module.code))),
    ].sort();

    const payload: ClosurePayload = {
      entry: entry.key,
      exportName: target.exportName,
      modules: Object.fromEntries(
        modules.value.map((module) => [module.key, module.code])
      ),
    };

    return ok(
      renderClosureLoader(
        target.name,
        encodePayload(payload),
        packages,
        options.producerVersion ?? process.versions.node
      )
    );
  },
});
