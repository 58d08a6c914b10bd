import { SigningError, describeError } from "../types/errors";
import { fail, ok, type Artifact, type StageResult } from "../types/release";
import { runChecked, runCommand, type CommandRunner } from "./exec";
import type { Logger } from "./logger";
import type { StagingArea } from "./staging";

export const SIGNATURE_SUFFIX = ".asc";

/** "Sign artifact": writes a detached signature and resolves to its path. */
export interface ArtifactSigner {
  sign(file: string): Promise<string>;
}

export interface GpgSignerOptions {
  key?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  runner?: CommandRunner;
}

/** ASCII-armored detached signatures; `--yes` makes re-signing overwrite. */
export class GpgSigner implements ArtifactSigner {
  private readonly runner: CommandRunner;

  constructor(private readonly opts: GpgSignerOptions = {}) {
    this.runner = opts.runner ?? runCommand;
  }

  async sign(file: string): Promise<string> {
    const key = this.opts.key ? ["--local-user", this.opts.key] : [];
    await runChecked(
      this.runner,
      "gpg",
      ["--batch", "--yes", "--armor", ...key, "--detach-sign", file],
      { env: this.opts.env, timeoutMs: this.opts.timeoutMs },
    );
    return `${file}${SIGNATURE_SUFFIX}`;
  }
}

/** Signs every staged artifact, in staging order, stopping at the first failure. */
export async function signStagedArtifacts(
  staging: StagingArea,
  signer: ArtifactSigner,
  logger: Logger,
): Promise<StageResult<Artifact[]>> {
  for (const artifact of staging.artifacts) {
    try {
      const signature = await signer.sign(artifact.path);
      staging.markSigned(artifact, signature);
      logger.info(`signed ${artifact.fileName}`);
    } catch (err) {
      return fail(
        new SigningError(`Signing ${artifact.fileName} failed: ${describeError(err)}`, {
          cause: err,
        }),
      );
    }
  }
  return ok([...staging.artifacts]);
}
