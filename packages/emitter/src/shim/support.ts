/**
 * Support definitions embedded in generated programs
 *
 * Definitions are requested while the scaffold is built and emitted once
 * each, in the order they were first requested.
 */

import type { CodecSource, StreamMode } from "@componentize/frontend";

export type SupportDefinitions = ReadonlyMap<string, string>;

/** Always emitted first; everything else builds on these */
export const RUNTIME_DEFINITION = `const _fs = require("node:fs");
const _path = require("node:path");`;

export const ARGUMENT_PARSER_DEFINITION = `const _createParser = (description) => {
  const options = [];
  const findOption = (flag) => options.find((option) => option.flag === flag);
  const fail = (message) => {
    throw new Error(description + ": " + message);
  };
  return {
    addArgument: (flag, { dest, type = String, required = false, nargs }) => {
      options.push({ flag, dest, type, required, count: nargs });
    },
    parse: (argv) => {
      const parsed = Object.create(null);
      for (let index = 0; index < argv.length; index++) {
        const option = findOption(argv[index]);
        if (!option) fail("unrecognized argument " + argv[index]);
        if (option.count !== undefined) {
          const values = [];
          while (index + 1 < argv.length && !findOption(argv[index + 1])) {
            index += 1;
            values.push(option.type(argv[index]));
          }
          if (values.length !== option.count) {
            fail("argument " + option.flag + " expects " + option.count + (option.count === 1 ? " value" : " values"));
          }
          parsed[option.dest] = values;
        } else {
          if (index + 1 >= argv.length) fail("argument " + option.flag + " expects a value");
          index += 1;
          parsed[option.dest] = option.type(argv[index]);
        }
      }
      const missing = options.filter((option) => option.required && !(option.dest in parsed));
      if (missing.length > 0) {
        fail("the following arguments are required: " + missing.map((option) => option.flag).join(", "));
      }
      return parsed;
    },
  };
};`;

export const PARENT_DIRS_DEFINITION = `const _makeParentDirsAndReturnPath = (filePath) => {
  _fs.mkdirSync(_path.dirname(filePath), { recursive: true });
  return filePath;
};`;

export const CLOSE_STREAMS_DEFINITION = `const _closeStreams = (streams) =>
  Promise.all(
    streams.map(
      (stream) =>
        new Promise((resolve, reject) => {
          stream.once("error", reject);
          stream.end(resolve);
        })
    )
  );`;

const inputStreamName = (mode: StreamMode): string =>
  mode === "text" ? "_openTextInputStream" : "_openBinaryInputStream";

const outputStreamName = (mode: StreamMode): string =>
  mode === "text" ? "_openTextOutputStream" : "_openBinaryOutputStream";

const encodingOption = (mode: StreamMode): string =>
  mode === "text" ? `, { encoding: "utf8" }` : "";

export const inputStreamFactory = (mode: StreamMode): CodecSource => ({
  expression: inputStreamName(mode),
  definition: `const ${inputStreamName(mode)} = (filePath) => _fs.createReadStream(filePath${encodingOption(mode)});`,
});

export const outputStreamFactory = (mode: StreamMode): CodecSource => ({
  expression: outputStreamName(mode),
  definition: `const ${outputStreamName(mode)} = (filePath) =>
  _fs.createWriteStream(_makeParentDirsAndReturnPath(filePath)${encodingOption(mode)});`,
});

/**
 * Request a definition; a name already present keeps its first position
 */
export const requireDefinition = (
  definitions: SupportDefinitions,
  name: string,
  definition: string
): SupportDefinitions =>
  definitions.has(name)
    ? definitions
    : new Map([...definitions, [name, definition]]);

/**
 * Request the definition behind a codec source, if it has one
 */
export const requireSource = (
  definitions: SupportDefinitions,
  source: CodecSource
): SupportDefinitions =>
  source.definition === undefined
    ? definitions
    : requireDefinition(definitions, source.expression, source.definition);

export const renderDefinitions = (definitions: SupportDefinitions): string =>
  [RUNTIME_DEFINITION, ...definitions.values()].join("\n\n");
