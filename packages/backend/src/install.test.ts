import { describe, it } from "mocha";
import { expect } from "chai";
import { installCommand, packageInstallPrefix } from "./install.js";

describe("Package install prefix", () => {
  it("should be empty without packages", () => {
    expect(packageInstallPrefix([])).to.deep.equal([]);
  });

  it("should fall back to a user prefix and extend NODE_PATH", () => {
    expect(packageInstallPrefix(["lodash", "yaml@2"])).to.deep.equal([
      "sh",
      "-c",
      `(npm install --global --no-audit --no-fund 'lodash' 'yaml@2' || npm install --global --no-audit --no-fund 'lodash' 'yaml@2' --prefix "$HOME/.npm-global") && NODE_PATH="$(npm root --global):$HOME/.npm-global/lib/node_modules" "$0" "$@"`,
    ]);
  });

  it("should quote package specs for the shell", () => {
    expect(installCommand(["it's"])).to.equal(
      `npm install --global --no-audit --no-fund 'it'\\''s'`
    );
  });
});
