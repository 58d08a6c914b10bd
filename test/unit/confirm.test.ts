import { expect } from "chai";
import { PassThrough } from "node:stream";
import {
  PromptClosedError,
  confirmRelease,
  createTerminalPrompter,
  isAffirmative,
} from "../../src/core/confirm";
import { ScriptedPrompter } from "../helpers/fakes";

describe("isAffirmative", () => {
  it("accepts y and yes in any case", () => {
    for (const answer of ["y", "Y", "yes", "YES", " y "]) {
      expect(isAffirmative(answer), answer).to.equal(true);
    }
  });

  it("treats anything else as a decline", () => {
    for (const answer of ["n", "no", "", "yep", "y es", "sure"]) {
      expect(isAffirmative(answer), answer).to.equal(false);
    }
  });
});

describe("confirmRelease", () => {
  it("asks once about the version being released", async () => {
    const prompter = new ScriptedPrompter(["y"]);
    expect(await confirmRelease(prompter, "2.4")).to.equal(true);
    expect(prompter.questions).to.deep.equal([
      "Everything finished, do you want to release version '2.4' publicly? (y/n) ",
    ]);
  });

  it("declines on an empty answer", async () => {
    expect(await confirmRelease(new ScriptedPrompter([""]), "2.4")).to.equal(false);
  });

  it("declines when the input ends without an answer", async () => {
    expect(await confirmRelease(new ScriptedPrompter([]), "2.4")).to.equal(false);
  });
});

describe("createTerminalPrompter", () => {
  it("reads one line per question", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = createTerminalPrompter(input, output);
    try {
      const answer = prompter.ask("next? ");
      input.write("2.5-dev\n");
      expect(await answer).to.equal("2.5-dev");
    } finally {
      prompter.close();
    }
  });

  it("keeps lines that arrive before the next question", async () => {
    const input = new PassThrough();
    const prompter = createTerminalPrompter(input, new PassThrough());
    try {
      const first = prompter.ask("release? ");
      input.write("y\n2.5-dev\n");
      expect(await first).to.equal("y");
      await new Promise((resolve) => setTimeout(resolve, 20));
      expect(await prompter.ask("next? ")).to.equal("2.5-dev");
    } finally {
      prompter.close();
    }
  });

  it("answers piped input that ended before the question was asked", async () => {
    const input = new PassThrough();
    const prompter = createTerminalPrompter(input, new PassThrough());
    const first = prompter.ask("release? ");
    input.end("y\n2.5-dev\n");
    expect(await first).to.equal("y");
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(await prompter.ask("next? ")).to.equal("2.5-dev");
    prompter.close();
  });

  it("rejects a pending question when the input ends", async () => {
    const input = new PassThrough();
    const prompter = createTerminalPrompter(input, new PassThrough());
    const answer = prompter.ask("release? ");
    input.end();
    let thrown: unknown;
    try {
      await answer;
    } catch (err) {
      thrown = err;
    }
    expect(thrown).to.be.instanceOf(PromptClosedError);

    let later: unknown;
    try {
      await prompter.ask("next? ");
    } catch (err) {
      later = err;
    }
    expect(later).to.be.instanceOf(PromptClosedError);
  });
});
