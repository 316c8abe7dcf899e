/**
 * Naming rules for component inputs, outputs and titles
 */

/**
 * Make `name` unique within `existing` by appending `_2`, `_3`, ...
 */
export const makeNameUnique = (
  name: string,
  existing: ReadonlySet<string>,
  delimiter = "_"
): string => {
  if (!existing.has(name)) {
    return name;
  }
  for (let index = 2; ; index++) {
    const candidate = `${name}${delimiter}${index}`;
    if (!existing.has(candidate)) {
      return candidate;
    }
  }
};

const stripSuffix = (name: string, suffixes: readonly string[]): string => {
  for (const suffix of suffixes) {
    if (name.length > suffix.length && name.endsWith(suffix)) {
      return name.slice(0, -suffix.length);
    }
  }
  return name;
};

/**
 * Externally visible name of a file or stream parameter.
 *
 * Callers pass data, not paths, so `modelPath` or `model_file_path` is
 * exposed as `model`.
 */
export const stripFileSuffixes = (name: string, isPathStyle: boolean): string => {
  const withoutPath = isPathStyle ? stripSuffix(name, ["_path", "Path"]) : name;
  return stripSuffix(withoutPath, ["_file", "File"]);
};

/**
 * Human-readable component name from a function identifier:
 * `add_two_numbers` and `addTwoNumbers` both become "Add two numbers"
 */
export const humanizeFunctionName = (name: string): string => {
  const spaced = name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/_/g, " ")
    .replace(/ +/g, " ")
    .trim()
    .toLowerCase();
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
};

/**
 * Command-line flag for an input or file-style output
 */
export const toFlagName = (name: string): string =>
  `--${name.replace(/_/g, "-")}`;
