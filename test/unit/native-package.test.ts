import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import { createMemoryLogger } from "../../src/core/logger";
import { DebianPackager, NativePackageBuilder } from "../../src/core/native-package";
import { StagingArea } from "../../src/core/staging";
import { FakePackager, createProjectRepo, recordingRunner, removeDir, tempDir } from "../helpers/fakes";

describe("NativePackageBuilder", () => {
  let repo: string;
  let root: string;
  let staging: StagingArea;
  let packager: FakePackager;

  beforeEach(() => {
    repo = createProjectRepo();
    root = tempDir();
    staging = StagingArea.create(path.join(root, "dist-2.4"));
    packager = new FakePackager(repo);
  });
  afterEach(() => {
    removeDir(repo);
    removeDir(root);
  });

  function stageSource(name: string): void {
    const file = path.join(root, name);
    fs.writeFileSync(file, "archive");
    staging.add(file, "primary");
  }

  function builder(): NativePackageBuilder {
    return new NativePackageBuilder({
      packager,
      projectName: "Sample",
      metadataDir: path.join(repo, "debian"),
      logger: createMemoryLogger(),
      tmpRoot: root,
    });
  }

  it("builds one package from the source distribution with the metadata overlaid", async () => {
    stageSource("Sample-2.4.tar.gz");
    const result = await builder().run("2.4", staging);

    if (!result.ok) throw result.error;
    expect(result.value.fileName).to.equal("sample_2.4-1_all.deb");
    expect(result.value.kind).to.equal("NativePackage");
    expect(result.value.origin).to.equal("native-package");
    expect(packager.overlays).to.deep.equal(["control"]);
    expect(staging.artifacts.map((a) => a.fileName)).to.deep.equal([
      "Sample-2.4.tar.gz",
      "sample_2.4-1_all.deb",
    ]);
    expect(fs.readdirSync(root).filter((n) => n.startsWith("release-native-"))).to.deep.equal([]);
  });

  it("fails with PackagingFailed when no source distribution for the version is staged", async () => {
    stageSource("Sample-2.3.tar.gz");
    const result = await builder().run("2.4", staging);
    if (result.ok) throw new Error("expected failure");
    expect(result.error.kind).to.equal("PackagingFailed");
    expect(result.error.message).to.equal("No source distribution Sample-2.4.tar.gz in staging.");
  });

  it("fails with PackagingFailed when the toolchain fails, and cleans up", async () => {
    stageSource("Sample-2.4.tar.gz");
    packager.fail = true;
    const result = await builder().run("2.4", staging);
    if (result.ok) throw new Error("expected failure");
    expect(result.error.kind).to.equal("PackagingFailed");
    expect(result.error.message).to.match(/debian\/rules build failed$/);
    expect(staging.artifacts).to.have.length(1);
    expect(fs.readdirSync(root).filter((n) => n.startsWith("release-native-"))).to.deep.equal([]);
  });
});

describe("DebianPackager", () => {
  const identity = {
    nameVariable: "DEBFULLNAME",
    emailVariable: "DEBEMAIL",
    fullName: "Test Maintainer",
    email: "maintainer@example.org",
  };

  function packager(runner: ReturnType<typeof recordingRunner>["runner"]) {
    return new DebianPackager({
      repoRoot: "/work/sample",
      packageName: "sample",
      metadataDir: "debian",
      revision: "1",
      architecture: "all",
      license: "apache",
      identity,
      baseEnv: { PATH: "/usr/bin" },
      runner,
    });
  }

  it("records the upstream version with dch and reports the changed file", async () => {
    const { runner, calls } = recordingRunner();
    const changed = await packager(runner).recordUpstreamVersion("2.4");

    expect(changed).to.deep.equal(["debian/changelog"]);
    expect(calls.map((c) => [c.file, ...c.args])).to.deep.equal([
      ["dch", "-v", "2.4-1", "New upstream version."],
      ["dch", "-r", ""],
    ]);
    expect(calls[0]?.opts.cwd).to.equal("/work/sample");
    expect(calls[0]?.opts.env?.["DEBFULLNAME"]).to.equal("Test Maintainer");
    expect(calls[0]?.opts.env?.["DEBEMAIL"]).to.equal("maintainer@example.org");
  });

  it("unpacks into the workspace and names the source tree after the archive", async () => {
    const { runner, calls } = recordingRunner();
    const dir = await packager(runner).unpack("/ws/Sample-2.4.tar.gz", "/ws");
    expect(dir).to.equal(path.join("/ws", "Sample-2.4"));
    expect(calls[0]?.args).to.deep.equal(["xf", "/ws/Sample-2.4.tar.gz", "-C", "/ws"]);
  });

  it("tolerates dh_make failing when the tree already has packaging metadata", async () => {
    const ws = tempDir();
    try {
      const sourceDir = path.join(ws, "Sample-2.4");
      fs.mkdirSync(path.join(sourceDir, "debian"), { recursive: true });
      const { runner, calls } = recordingRunner((call) => {
        if (call.file === "dh_make") return { ok: false, exitCode: 1 };
        if (call.file === "dpkg-buildpackage") {
          fs.writeFileSync(path.join(ws, "sample_2.4-1_all.deb"), "deb");
        }
        return {};
      });

      const built = await packager(runner).build(
        sourceDir,
        path.join(ws, "Sample-2.4.tar.gz"),
        "2.4",
      );

      expect(built).to.equal(path.join(ws, "sample_2.4-1_all.deb"));
      expect(calls.map((c) => [c.file, ...c.args])).to.deep.equal([
        [
          "dh_make",
          "-p",
          "sample_2.4",
          "--createorig",
          "-f",
          path.join("..", "Sample-2.4.tar.gz"),
          "-i",
          "-c",
          "apache",
          "-y",
        ],
        ["dpkg-buildpackage", "-us", "-uc"],
      ]);
    } finally {
      removeDir(ws);
    }
  });

  it("fails when the expected package was not produced", async () => {
    const ws = tempDir();
    try {
      const sourceDir = path.join(ws, "Sample-2.4");
      fs.mkdirSync(sourceDir);
      const { runner } = recordingRunner();
      let thrown: unknown;
      try {
        await packager(runner).build(sourceDir, path.join(ws, "Sample-2.4.tar.gz"), "2.4");
      } catch (err) {
        thrown = err;
      }
      expect(thrown).to.be.instanceOf(Error);
      expect(thrown).to.have.property("code", "ENOENT");
    } finally {
      removeDir(ws);
    }
  });
});
