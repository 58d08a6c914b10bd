import { expect } from "chai";
import { VersionFile } from "../../src/core/version";
import { NEXT_VERSION_COMMIT_MESSAGE, bumpToNextVersion } from "../../src/core/version-bump";
import {
  FakeVcs,
  ScriptedPrompter,
  createProjectRepo,
  readVersionLine,
  removeDir,
} from "../helpers/fakes";

describe("bumpToNextVersion", () => {
  let repo: string;
  let versionFile: VersionFile;

  beforeEach(() => {
    repo = createProjectRepo();
    versionFile = new VersionFile(repo, {
      path: "sample/__init__.py",
      pattern: "^__version__ = '(.*)'$",
      replacement: "__version__ = '{version}'",
    });
  });
  afterEach(() => removeDir(repo));

  it("writes and commits the version the operator enters", async () => {
    const prompter = new ScriptedPrompter([" 2.5-dev\n"]);
    const vcs = new FakeVcs();
    const result = await bumpToNextVersion({ prompter, versionFile, vcs });

    if (!result.ok) throw result.error;
    expect(result.value).to.equal("2.5-dev");
    expect(prompter.questions).to.deep.equal(["Please enter next version number: "]);
    expect(readVersionLine(repo)).to.equal("__version__ = '2.5-dev'");
    expect(vcs.commits).to.deep.equal([
      { files: ["sample/__init__.py"], message: NEXT_VERSION_COMMIT_MESSAGE },
    ]);
  });

  it("rejects an empty answer and leaves the file alone", async () => {
    const vcs = new FakeVcs();
    const result = await bumpToNextVersion({
      prompter: new ScriptedPrompter(["  "]),
      versionFile,
      vcs,
    });

    if (result.ok) throw new Error("expected failure");
    expect(result.error.kind).to.equal("InvalidVersion");
    expect(readVersionLine(repo)).to.equal("__version__ = '2.3'");
    expect(vcs.commits).to.deep.equal([]);
  });

  it("fails when the input ends before an answer", async () => {
    const vcs = new FakeVcs();
    const result = await bumpToNextVersion({ prompter: new ScriptedPrompter([]), versionFile, vcs });

    if (result.ok) throw new Error("expected failure");
    expect(result.error.kind).to.equal("InvalidVersion");
    expect(result.error.message).to.equal(
      "Input ended before a next version number was entered.",
    );
    expect(vcs.commits).to.deep.equal([]);
  });

  it("maps a failed commit to RepositoryUpdateFailed", async () => {
    const vcs = new FakeVcs();
    vcs.commit = async () => {
      throw new Error("index.lock exists");
    };
    const result = await bumpToNextVersion({
      prompter: new ScriptedPrompter(["2.5-dev"]),
      versionFile,
      vcs,
    });
    if (result.ok) throw new Error("expected failure");
    expect(result.error.kind).to.equal("RepositoryUpdateFailed");
    expect(result.error.message).to.equal(
      "Recording next version 2.5-dev failed: index.lock exists",
    );
  });
});
