import {
  InvalidVersionError,
  ReleaseError,
  RepositoryUpdateError,
  describeError,
} from "../types/errors";
import { fail, ok, type StageResult } from "../types/release";
import { PromptClosedError, type Prompter } from "./confirm";
import type { VersionControl } from "./git";
import type { VersionFile } from "./version";

export const NEXT_VERSION_COMMIT_MESSAGE = "Prepare version number for next development cycle.";

export interface BumpDeps {
  prompter: Prompter;
  versionFile: VersionFile;
  vcs: VersionControl;
}

// The next version is written as typed; only an empty answer is rejected.
export async function bumpToNextVersion(deps: BumpDeps): Promise<StageResult<string>> {
  let next: string;
  try {
    next = (await deps.prompter.ask("Please enter next version number: ")).trim();
  } catch (err) {
    if (!(err instanceof PromptClosedError)) throw err;
    return fail(new InvalidVersionError("Input ended before a next version number was entered."));
  }
  if (!next) {
    return fail(new InvalidVersionError("Next version number must not be empty."));
  }
  try {
    deps.versionFile.writeVersion(next);
    await deps.vcs.commit([deps.versionFile.relativePath], NEXT_VERSION_COMMIT_MESSAGE);
  } catch (err) {
    if (err instanceof ReleaseError) return fail(err);
    return fail(
      new RepositoryUpdateError(`Recording next version ${next} failed: ${describeError(err)}`, {
        cause: err,
      }),
    );
  }
  return ok(next);
}
