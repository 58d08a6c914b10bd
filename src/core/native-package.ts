import { access, copyFile, cp, mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { PackagingError, ReleaseError, describeError } from "../types/errors";
import { fail, ok, type Artifact, type StageResult } from "../types/release";
import type { Identity } from "./config";
import { runChecked, runCommand, type CommandRunner } from "./exec";
import type { Logger } from "./logger";
import type { StagingArea } from "./staging";

export const NATIVE_PACKAGE_ORIGIN = "native-package";

/** "Build native package": the native packaging toolchain, narrowed. */
export interface NativePackager {
  /**
   * Records the new upstream version in the packaging metadata of the
   * repository. Resolves to the repository-relative files it changed.
   */
  recordUpstreamVersion(version: string): Promise<string[]>;
  /** Unpacks a source archive inside `workspace`; resolves to the source tree. */
  unpack(archive: string, workspace: string): Promise<string>;
  /** Builds the package from a prepared source tree; resolves to its path. */
  build(sourceDir: string, archive: string, version: string): Promise<string>;
}

export function sourceArchiveName(projectName: string, version: string): string {
  return `${projectName}-${version}.tar.gz`;
}

export interface NativePackageBuilderOptions {
  packager: NativePackager;
  projectName: string;
  /** Absolute path of the packaging metadata directory to overlay. */
  metadataDir: string;
  logger: Logger;
  tmpRoot?: string;
}

export class NativePackageBuilder {
  constructor(private readonly opts: NativePackageBuilderOptions) {}

  async run(version: string, staging: StagingArea): Promise<StageResult<Artifact>> {
    const archiveName = sourceArchiveName(this.opts.projectName, version);
    const source = staging.find(
      (a) => a.kind === "SourceDistribution" && a.fileName === archiveName,
    );
    if (!source) {
      return fail(new PackagingError(`No source distribution ${archiveName} in staging.`));
    }

    const workspace = await mkdtemp(
      path.join(this.opts.tmpRoot ?? os.tmpdir(), "release-native-"),
    );
    try {
      const archive = path.join(workspace, archiveName);
      await copyFile(source.path, archive);
      const sourceDir = await this.opts.packager.unpack(archive, workspace);
      await cp(
        this.opts.metadataDir,
        path.join(sourceDir, path.basename(this.opts.metadataDir)),
        { recursive: true },
      );
      this.opts.logger.info(`building native package from ${archiveName}`);
      const built = await this.opts.packager.build(sourceDir, archive, version);
      return ok(staging.add(built, NATIVE_PACKAGE_ORIGIN, "NativePackage"));
    } catch (err) {
      if (err instanceof ReleaseError) return fail(err);
      return fail(
        new PackagingError(`Native package build failed: ${describeError(err)}`, { cause: err }),
      );
    } finally {
      await rm(workspace, { recursive: true, force: true });
    }
  }
}

export interface DebianPackagerOptions {
  repoRoot: string;
  packageName: string;
  metadataDir: string;
  revision: string;
  architecture: string;
  license: string;
  identity: Identity;
  baseEnv: Readonly<Record<string, string>>;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export class DebianPackager implements NativePackager {
  private readonly runner: CommandRunner;

  constructor(private readonly opts: DebianPackagerOptions) {
    this.runner = opts.runner ?? runCommand;
  }

  async recordUpstreamVersion(version: string): Promise<string[]> {
    const cwd = this.opts.repoRoot;
    await this.run("dch", ["-v", `${version}-${this.opts.revision}`, "New upstream version."], cwd);
    await this.run("dch", ["-r", ""], cwd);
    return [path.posix.join(this.opts.metadataDir, "changelog")];
  }

  async unpack(archive: string, workspace: string): Promise<string> {
    await this.run("tar", ["xf", archive, "-C", workspace], workspace);
    return path.join(workspace, path.basename(archive).replace(/\.tar\.gz$/, ""));
  }

  async build(sourceDir: string, archive: string, version: string): Promise<string> {
    const { packageName, revision, architecture, license } = this.opts;
    // dh_make refuses to touch an existing debian/ directory; that is expected
    const dhMake = await this.runner(
      "dh_make",
      [
        "-p",
        `${packageName}_${version}`,
        "--createorig",
        "-f",
        path.relative(sourceDir, archive),
        "-i",
        "-c",
        license,
        "-y",
      ],
      { cwd: sourceDir, env: this.env(), timeoutMs: this.opts.timeoutMs },
    );
    if (!dhMake.ok) {
      await access(path.join(sourceDir, "debian"));
    }
    await this.run("dpkg-buildpackage", ["-us", "-uc"], sourceDir);
    const produced = path.join(
      path.dirname(sourceDir),
      `${packageName}_${version}-${revision}_${architecture}.deb`,
    );
    await access(produced);
    return produced;
  }

  private async run(file: string, args: string[], cwd: string): Promise<void> {
    await runChecked(this.runner, file, args, {
      cwd,
      env: this.env(),
      timeoutMs: this.opts.timeoutMs,
    });
  }

  private env(): NodeJS.ProcessEnv {
    const { identity } = this.opts;
    return {
      ...this.opts.baseEnv,
      [identity.nameVariable]: identity.fullName,
      [identity.emailVariable]: identity.email,
    };
  }
}
