/**
 * Package pre-install wrapper
 *
 * Prepends a shell step that installs npm packages globally before the real
 * command runs. When the global prefix is not writable the install falls back
 * to a prefix under the home directory, and both locations are put on
 * `NODE_PATH` so `require` finds the packages.
 */

export const USER_PREFIX = "$HOME/.npm-global";

const shellQuote = (word: string): string =>
  `'${word.replace(/'/g, `'\\''`)}'`;

export const installCommand = (packages: readonly string[]): string =>
  ["npm install --global --no-audit --no-fund", ...packages.map(shellQuote)].join(
    " "
  );

/**
 * Command prefix installing `packages`; empty when there is nothing to install
 */
export const packageInstallPrefix = (
  packages: readonly string[]
): readonly string[] => {
  if (packages.length === 0) {
    return [];
  }

  const install = installCommand(packages);
  const nodePath = `"$(npm root --global):${USER_PREFIX}/lib/node_modules"`;
  return [
    "sh",
    "-c",
    `(${install} || ${install} --prefix "${USER_PREFIX}") && NODE_PATH=${nodePath} "$0" "$@"`,
  ];
};
