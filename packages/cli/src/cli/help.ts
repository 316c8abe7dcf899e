/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
Componentize - TypeScript functions to container components v${VERSION}

USAGE:
  componentize <command> [options]

COMMANDS:
  build <file>              Compile an exported function into a component file
  help                      Show help
  version                   Show version

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: componentize.json)

BUILD OPTIONS:
  -f, --function <name>     Exported function to compile (default: default)
  -o, --out <file>          Component file to write
  --base-image <image>      Container image to run the function in
  --packages <a,b>          npm packages to install before running
  -s, --strategy <kind>     Capture strategy: source or closure
  --capture <m1,m2>         Extra modules captured with the closure strategy

EXAMPLES:
  componentize build src/add.ts --function add
  componentize build src/train.ts -f train --packages lodash -o train.yaml
  componentize build src/model.ts -f fit --strategy closure --capture src/utils
`);
};
