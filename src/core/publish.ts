import { PublishError, describeError } from "../types/errors";
import { fail, ok, type StageResult } from "../types/release";
import { runChecked, runCommand, type CommandRunner } from "./exec";
import type { VersionControl } from "./git";
import type { Logger } from "./logger";
import type { StagingArea } from "./staging";

/** "Upload artifacts" to the public distribution channel. */
export interface ArtifactUploader {
  upload(files: readonly string[]): Promise<void>;
}

export interface TwineUploaderOptions {
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export class TwineUploader implements ArtifactUploader {
  private readonly runner: CommandRunner;

  constructor(private readonly opts: TwineUploaderOptions = {}) {
    this.runner = opts.runner ?? runCommand;
  }

  async upload(files: readonly string[]): Promise<void> {
    await runChecked(this.runner, "twine", ["upload", ...files], {
      env: this.opts.env,
      timeoutMs: this.opts.timeoutMs,
    });
  }
}

/** Distributions and their signatures; native packages are not uploaded. */
export function uploadSet(staging: StagingArea): string[] {
  return staging.artifacts
    .filter((a) => a.kind !== "NativePackage")
    .flatMap((a) => (a.signaturePath ? [a.path, a.signaturePath] : [a.path]));
}

export interface PublishDeps {
  vcs: VersionControl;
  uploader: ArtifactUploader;
  logger: Logger;
}

/**
 * Pushes tags, then uploads. There is no retry and nothing is undone: when
 * the upload fails the tag stays pushed.
 */
export async function publishRelease(
  staging: StagingArea,
  deps: PublishDeps,
): Promise<StageResult<string[]>> {
  const unsigned = staging.unsigned();
  if (unsigned.length > 0) {
    return fail(
      new PublishError(
        `Refusing to publish unsigned artifacts: ${unsigned.map((a) => a.fileName).join(", ")}`,
      ),
    );
  }

  try {
    await deps.vcs.pushTags();
  } catch (err) {
    return fail(new PublishError(`Pushing tags failed: ${describeError(err)}`, { cause: err }));
  }
  deps.logger.info("tags pushed");

  const files = uploadSet(staging);
  try {
    await deps.uploader.upload(files);
  } catch (err) {
    return fail(
      new PublishError(
        `Upload failed after the tag was pushed: ${describeError(err)}`,
        { cause: err },
      ),
    );
  }
  deps.logger.info(`uploaded ${files.length} file(s)`);
  return ok(files);
}
