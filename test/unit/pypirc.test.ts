import { expect } from "chai";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { renderPypirc, withPypirc } from "../../src/core/pypirc";

const index = { name: "pypi", repository: "https://upload.pypi.org/legacy/" };

describe("renderPypirc", () => {
  it("substitutes the credential values", () => {
    const text = renderPypirc({ username: "alice", password: "secret123" }, index);
    expect(text).to.equal(
      [
        "[distutils]",
        "index-servers=pypi",
        "",
        "[pypi]",
        "repository=https://upload.pypi.org/legacy/",
        "username=alice",
        "password=secret123",
        "",
      ].join("\n"),
    );
    expect(text).not.to.include("$PYPI_USERNAME");
  });
});

describe("withPypirc", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "pypi-deploy-rc-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("exposes the file only while the callback runs", async () => {
    const file = path.join(dir, "nested", ".pypirc");
    const seen = await withPypirc(file, "[distutils]\n", async () =>
      fs.readFileSync(file, "utf8"),
    );
    expect(seen).to.equal("[distutils]\n");
    expect(fs.existsSync(file)).to.equal(false);
  });

  it("writes the file readable by the owner only", async () => {
    const file = path.join(dir, ".pypirc");
    const mode = await withPypirc(file, "x", async () => fs.statSync(file).mode & 0o777);
    expect(mode).to.equal(0o600);
  });

  it("removes the file when the callback fails", async () => {
    const file = path.join(dir, ".pypirc");
    let caught: unknown;
    try {
      await withPypirc(file, "x", async () => {
        throw new Error("upload failed");
      });
    } catch (err) {
      caught = err;
    }
    expect(caught).to.be.instanceOf(Error);
    expect(caught instanceof Error ? caught.message : "").to.equal("upload failed");
    expect(fs.existsSync(file)).to.equal(false);
  });

  it("restores a pre-existing file", async () => {
    const file = path.join(dir, ".pypirc");
    fs.writeFileSync(file, "[distutils]\nindex-servers=internal\n");
    await withPypirc(file, "replacement", async () => {
      expect(fs.readFileSync(file, "utf8")).to.equal("replacement");
    });
    expect(fs.readFileSync(file, "utf8")).to.equal("[distutils]\nindex-servers=internal\n");
  });

  it("restores the mode of a pre-existing file", async () => {
    const file = path.join(dir, ".pypirc");
    fs.writeFileSync(file, "[distutils]\n");
    fs.chmodSync(file, 0o640);
    await withPypirc(file, "replacement", async () => {
      expect(fs.statSync(file).mode & 0o777).to.equal(0o600);
    });
    expect(fs.statSync(file).mode & 0o777).to.equal(0o640);
  });

  it("restores the previous file as soon as SIGTERM arrives", async () => {
    const file = path.join(dir, ".pypirc");
    fs.writeFileSync(file, "[distutils]\nindex-servers=internal\n");
    fs.chmodSync(file, 0o644);
    const sigintListeners = process.listenerCount("SIGINT");
    const sigtermListeners = process.listenerCount("SIGTERM");
    // another listener keeps the re-raised signal from ending the test run
    const keepAlive = () => undefined;
    process.on("SIGTERM", keepAlive);
    try {
      await withPypirc(file, "username=alice\npassword=secret123\n", async () => {
        process.emit("SIGTERM", "SIGTERM");
        expect(fs.readFileSync(file, "utf8")).to.equal("[distutils]\nindex-servers=internal\n");
        expect(fs.statSync(file).mode & 0o777).to.equal(0o644);
      });
    } finally {
      process.removeListener("SIGTERM", keepAlive);
    }
    expect(fs.readFileSync(file, "utf8")).to.equal("[distutils]\nindex-servers=internal\n");
    expect(process.listenerCount("SIGTERM")).to.equal(sigtermListeners);
    expect(process.listenerCount("SIGINT")).to.equal(sigintListeners);
  });

  it("removes fresh credentials when SIGINT arrives", async () => {
    const file = path.join(dir, ".pypirc");
    const keepAlive = () => undefined;
    process.on("SIGINT", keepAlive);
    try {
      await withPypirc(file, "password=secret123\n", async () => {
        process.emit("SIGINT", "SIGINT");
        expect(fs.existsSync(file)).to.equal(false);
      });
    } finally {
      process.removeListener("SIGINT", keepAlive);
    }
    expect(fs.existsSync(file)).to.equal(false);
  });
});
