import * as path from "node:path";
import type { ReleaseSettings } from "./config";
import type { Prompter } from "./confirm";
import { EnvironmentBuilder } from "./environment";
import { runCommand, type CommandRunner } from "./exec";
import { GitRepository } from "./git";
import type { Logger } from "./logger";
import { DebianPackager } from "./native-package";
import type { ReleaseCollaborators } from "./pipeline";
import { TwineUploader } from "./publish";
import { GpgSigner } from "./signer";

/** The real toolchain: git, virtualenv, dch/dpkg, gpg and twine. */
export function createDefaultCollaborators(
  settings: ReleaseSettings,
  io: { prompter: Prompter; logger: Logger; runner?: CommandRunner },
): ReleaseCollaborators {
  const runner = io.runner ?? runCommand;
  const env = { ...settings.baseEnv };
  const timeoutMs = settings.commandTimeoutMs;
  const vcs = new GitRepository({
    cwd: settings.repoRoot,
    env,
    signingKey: settings.signing.key,
    runner,
  });
  return {
    vcs,
    toolchain: new EnvironmentBuilder({
      vcs,
      checkoutName: settings.project.packageName,
      baseEnv: settings.baseEnv,
      runner,
      logger: io.logger,
    }),
    packager: new DebianPackager({
      repoRoot: settings.repoRoot,
      packageName: settings.project.packageName,
      metadataDir: path.posix.normalize(settings.nativePackage.metadataDir),
      revision: settings.nativePackage.revision,
      architecture: settings.nativePackage.architecture,
      license: settings.nativePackage.license,
      identity: settings.identity,
      baseEnv: settings.baseEnv,
      timeoutMs,
      runner,
    }),
    signer: new GpgSigner({ key: settings.signing.key, env, timeoutMs, runner }),
    uploader: new TwineUploader({ env, timeoutMs, runner }),
    prompter: io.prompter,
    logger: io.logger,
  };
}
