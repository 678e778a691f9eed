import { expect } from "chai";
import { exitCodeFor, parseArgs, stringFlag } from "../../src/cli/shared";
import { CommandError, ConfigError } from "../../src/types/errors";

describe("parseArgs", () => {
  it("parses valued and boolean flags", () => {
    const { flags, positionals } = parseArgs([
      "--config",
      "deploy.yml",
      "--dry-run",
      "extra",
      "--skip-register",
    ]);
    expect(flags).to.deep.equal({ config: "deploy.yml", "dry-run": true, "skip-register": true });
    expect(positionals).to.deep.equal(["extra"]);
  });

  it("accepts --key=value", () => {
    expect(parseArgs(["--config=ci/deploy.yml"]).flags).to.deep.equal({ config: "ci/deploy.yml" });
  });

  it("treats a trailing valued flag as boolean", () => {
    const { flags } = parseArgs(["--config"]);
    expect(flags).to.deep.equal({ config: true });
    expect(stringFlag(flags, "config")).to.equal(undefined);
  });
});

describe("exitCodeFor", () => {
  it("propagates the failing command's exit status", () => {
    expect(exitCodeFor(new CommandError("python", ["setup.py", "upload"], 3))).to.equal(3);
  });

  it("uses 1 for every other failure", () => {
    expect(exitCodeFor(new ConfigError("bad"))).to.equal(1);
    expect(exitCodeFor("boom")).to.equal(1);
  });
});

describe("CommandError", () => {
  it("names the command line in its message", () => {
    expect(new CommandError("python", ["setup.py", "register"], 1).message).to.equal(
      "python setup.py register exited with code 1",
    );
  });
});
