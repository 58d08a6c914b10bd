import * as path from "node:path";
import {
  BuildFailedError,
  ConfigError,
  PackagingError,
  PublishError,
  ReleaseError,
  RepositoryUpdateError,
  SigningError,
  describeError,
} from "../types/errors";
import {
  fail,
  ok,
  type PipelineResult,
  type Release,
  type StageName,
  type StageResult,
} from "../types/release";
import { BuildMatrixRunner } from "./build-matrix";
import { fillTemplate, stagingDirFor, type ReleaseSettings } from "./config";
import { confirmRelease, type Prompter } from "./confirm";
import type { EnvironmentToolchain } from "./environment";
import type { VersionControl } from "./git";
import type { Logger } from "./logger";
import { NativePackageBuilder, type NativePackager } from "./native-package";
import { checkPreconditions } from "./preconditions";
import { prepareSources } from "./prepare-sources";
import { publishRelease, type ArtifactUploader } from "./publish";
import { signStagedArtifacts, type ArtifactSigner } from "./signer";
import { StagingArea } from "./staging";
import { bumpToNextVersion } from "./version-bump";
import { VersionFile, validateTargetVersion } from "./version";

export interface ReleaseCollaborators {
  vcs: VersionControl;
  toolchain: EnvironmentToolchain;
  packager: NativePackager;
  signer: ArtifactSigner;
  uploader: ArtifactUploader;
  prompter: Prompter;
  logger: Logger;
}

/** Mutable state threaded through the stages of one run. */
export interface ReleaseContext {
  readonly settings: ReleaseSettings;
  readonly targetVersion: string;
  readonly versionFile: VersionFile;
  currentVersion?: string;
  release?: Release;
  staging?: StagingArea;
  nextVersion?: string;
}

/** "halt" ends the run successfully without running later stages. */
export type StageOutcome = "continue" | "halt";

export interface ReleaseStage {
  readonly name: StageName;
  readonly description: string;
  run(ctx: ReleaseContext): Promise<StageResult<StageOutcome>>;
  /** Failure kind for anything the stage throws instead of returning. */
  onError(err: unknown): ReleaseError;
}

const CONTINUE = ok<StageOutcome>("continue");

function then<T>(result: StageResult<T>, apply?: (value: T) => void): StageResult<StageOutcome> {
  if (!result.ok) return result;
  apply?.(result.value);
  return CONTINUE;
}

function stagingOf(ctx: ReleaseContext): StagingArea {
  if (!ctx.staging) throw new Error("staging area has not been created yet");
  return ctx.staging;
}

function wrap(
  factory: new (message: string, options?: { cause?: unknown }) => ReleaseError,
  what: string,
): (err: unknown) => ReleaseError {
  return (err) => new factory(`${what}: ${describeError(err)}`, { cause: err });
}

export function createStages(deps: ReleaseCollaborators): ReleaseStage[] {
  const { vcs, logger } = deps;
  return [
    {
      name: "validate-version",
      description: "check the requested version against the current one",
      onError: wrap(ConfigError, "Cannot read the current version"),
      async run(ctx) {
        const current = ctx.versionFile.readVersion();
        ctx.currentVersion = current;
        return then(validateTargetVersion(current, ctx.targetVersion));
      },
    },
    {
      name: "check-preconditions",
      description: "changelog entry, clean tree, packaging identity and tools",
      onError: wrap(ConfigError, "Precondition check failed"),
      async run(ctx) {
        const result = await checkPreconditions(ctx.settings, vcs, ctx.targetVersion);
        return then(result, (excerpt) => {
          ctx.release = Object.freeze({
            currentVersion: ctx.currentVersion ?? "",
            targetVersion: ctx.targetVersion,
            changelogExcerpt: excerpt,
          });
        });
      },
    },
    {
      name: "prepare-sources",
      description: "write and commit the release version",
      onError: wrap(RepositoryUpdateError, "Preparing sources failed"),
      async run(ctx) {
        const result = await prepareSources({
          version: ctx.targetVersion,
          versionFile: ctx.versionFile,
          packager: deps.packager,
          vcs,
        });
        return then(result, (files) => logger.info(`committed ${files.join(", ")}`));
      },
    },
    {
      name: "build-matrix",
      description: "test and build in every configured environment",
      onError: wrap(BuildFailedError, "Build matrix failed"),
      async run(ctx) {
        ctx.staging = StagingArea.create(stagingDirFor(ctx.settings, ctx.targetVersion));
        const runner = new BuildMatrixRunner({
          toolchain: deps.toolchain,
          logger,
          parallel: ctx.settings.parallel,
        });
        return then(await runner.run(ctx.settings.environments, ctx.staging));
      },
    },
    {
      name: "native-package",
      description: "build the native system package from the source distribution",
      onError: wrap(PackagingError, "Native packaging failed"),
      async run(ctx) {
        const builder = new NativePackageBuilder({
          packager: deps.packager,
          projectName: ctx.settings.project.name,
          metadataDir: path.resolve(ctx.settings.repoRoot, ctx.settings.nativePackage.metadataDir),
          logger,
        });
        const result = await builder.run(ctx.targetVersion, stagingOf(ctx));
        return then(result, (pkg) => logger.info(`staged ${pkg.fileName}`));
      },
    },
    {
      name: "sign-artifacts",
      description: "detached signatures for every staged artifact",
      onError: wrap(SigningError, "Signing failed"),
      async run(ctx) {
        return then(await signStagedArtifacts(stagingOf(ctx), deps.signer, logger));
      },
    },
    {
      name: "tag-release",
      description: "create the signed release tag",
      onError: wrap(RepositoryUpdateError, "Tagging failed"),
      async run(ctx) {
        const message = fillTemplate(ctx.settings.tagMessage, { version: ctx.targetVersion });
        await vcs.createSignedTag(ctx.targetVersion, message);
        return CONTINUE;
      },
    },
    {
      name: "confirm",
      description: "ask the operator before publishing",
      onError: wrap(PublishError, "No confirmation obtained, nothing was published"),
      async run(ctx) {
        if (await confirmRelease(deps.prompter, ctx.targetVersion)) return CONTINUE;
        logger.info(
          `release of ${ctx.targetVersion} declined; artifacts kept in ${stagingOf(ctx).dir}`,
        );
        return ok<StageOutcome>("halt");
      },
    },
    {
      name: "publish",
      description: "push tags and upload distributions",
      onError: wrap(PublishError, "Publishing failed"),
      async run(ctx) {
        return then(await publishRelease(stagingOf(ctx), { vcs, uploader: deps.uploader, logger }));
      },
    },
    {
      name: "bump-version",
      description: "record the next development version",
      onError: wrap(RepositoryUpdateError, "Recording the next version failed"),
      async run(ctx) {
        const result = await bumpToNextVersion({
          prompter: deps.prompter,
          versionFile: ctx.versionFile,
          vcs,
        });
        return then(result, (next) => {
          ctx.nextVersion = next;
        });
      },
    },
  ];
}

export class ReleasePipeline {
  readonly stages: readonly ReleaseStage[];

  constructor(
    private readonly settings: ReleaseSettings,
    private readonly deps: ReleaseCollaborators,
    stages?: readonly ReleaseStage[],
  ) {
    this.stages = stages ?? createStages(deps);
  }

  async run(targetVersion: string): Promise<PipelineResult> {
    const { logger } = this.deps;
    const ctx: ReleaseContext = {
      settings: this.settings,
      targetVersion,
      versionFile: new VersionFile(this.settings.repoRoot, this.settings.versionFile),
    };
    const completedStages: StageName[] = [];
    const finish = (
      status: PipelineResult["status"],
      error?: ReleaseError,
    ): PipelineResult => ({
      status,
      completedStageIndex: completedStages.length - 1,
      completedStages: [...completedStages],
      release: ctx.release,
      stagingDir: ctx.staging?.dir,
      nextVersion: ctx.nextVersion,
      error,
    });

    logger.info(`releasing ${this.settings.project.name} ${targetVersion}`);
    for (const stage of this.stages) {
      logger.info(`stage '${stage.name}' started (${stage.description})`);
      let result: StageResult<StageOutcome>;
      try {
        result = await stage.run(ctx);
      } catch (err) {
        result = fail(err instanceof ReleaseError ? err : stage.onError(err));
      }
      if (!result.ok) {
        logger.error(
          `stage '${stage.name}' failed (${result.error.kind}): ${result.error.message}`,
        );
        return finish("failed", result.error);
      }
      completedStages.push(stage.name);
      logger.info(`stage '${stage.name}' completed`);
      if (result.value === "halt") {
        return finish("declined");
      }
    }

    const where = this.settings.releaseNotesUrl ?? "the project's release page";
    if (ctx.release) {
      logger.info(`changelog entry: ${ctx.release.changelogExcerpt}`);
    }
    logger.info(
      `released ${targetVersion}. Please create a release on ${where} with the notes from ` +
        `${this.settings.changelog.path} and the files from ${ctx.staging?.dir ?? "the staging directory"}.`,
    );
    return finish("released");
  }
}

export function exitCodeFor(result: PipelineResult): number {
  return result.status === "failed" ? 1 : 0;
}
