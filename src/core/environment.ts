import { mkdtemp, readdir, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { Environment, EnvironmentSpec } from "../types/release";
import { runChecked, runCommand, type CommandRunner } from "./exec";
import type { VersionControl } from "./git";
import type { Logger } from "./logger";

/**
 * "Run build in environment": everything the build matrix needs from an
 * isolated runtime. Implementations throw on failure; the matrix decides
 * which failure kind that is.
 */
export interface EnvironmentToolchain {
  provision(spec: EnvironmentSpec): Promise<Environment>;
  runTests(env: Environment, spec: EnvironmentSpec): Promise<void>;
  /** Absolute paths of the artifacts the build produced. */
  buildArtifacts(env: Environment, spec: EnvironmentSpec): Promise<string[]>;
  dispose(env: Environment): Promise<void>;
}

export interface EnvironmentBuilderOptions {
  vcs: VersionControl;
  /** Directory name of the checkout inside each workspace. */
  checkoutName: string;
  baseEnv: Readonly<Record<string, string>>;
  runner?: CommandRunner;
  tmpRoot?: string;
  /** Echoes install, test and build output line by line as `[id] line`. */
  logger?: Logger;
}

/**
 * Provisions a virtualenv per matrix entry in a fresh temporary directory
 * and clones the repository's current commit into it, so the build never
 * sees the working tree.
 */
export class EnvironmentBuilder implements EnvironmentToolchain {
  private readonly runner: CommandRunner;

  constructor(private readonly opts: EnvironmentBuilderOptions) {
    this.runner = opts.runner ?? runCommand;
  }

  async provision(spec: EnvironmentSpec): Promise<Environment> {
    const workspace = await mkdtemp(
      path.join(this.opts.tmpRoot ?? os.tmpdir(), `release-${spec.id}-`),
    );
    const runtimeDir = path.join(workspace, "env");
    const env: Environment = {
      id: spec.id,
      workspace,
      runtime: spec.runtime,
      projectDir: path.join(workspace, this.opts.checkoutName),
      binDir: path.join(runtimeDir, "bin"),
    };
    try {
      const isolation = spec.systemPackages ? ["--system-site-packages"] : [];
      await runChecked(
        this.runner,
        "virtualenv",
        ["-p", spec.runtime, ...isolation, runtimeDir],
        { cwd: workspace, env: { ...this.opts.baseEnv }, timeoutMs: spec.timeoutMs },
      );
      await this.opts.vcs.cloneInto(env.projectDir);
      await this.runAll(env, spec.install, spec.timeoutMs);
    } catch (err) {
      // partial environments are never reused
      await this.dispose(env);
      throw err;
    }
    return env;
  }

  async runTests(env: Environment, spec: EnvironmentSpec): Promise<void> {
    await this.runAll(env, spec.test, spec.timeoutMs);
  }

  async buildArtifacts(env: Environment, spec: EnvironmentSpec): Promise<string[]> {
    await this.runAll(env, spec.build, spec.timeoutMs);
    const outputDir = path.join(env.projectDir, spec.outputDir);
    let entries: string[];
    try {
      entries = await readdir(outputDir);
    } catch {
      return [];
    }
    return entries.sort().map((name) => path.join(outputDir, name));
  }

  async dispose(env: Environment): Promise<void> {
    await rm(env.workspace, { recursive: true, force: true });
  }

  private async runAll(
    env: Environment,
    commands: readonly string[][],
    timeoutMs: number | undefined,
  ): Promise<void> {
    for (const [file, ...args] of commands) {
      if (!file) continue;
      await runChecked(this.runner, file, args, {
        cwd: env.projectDir,
        env: this.activated(env),
        timeoutMs,
        onOutput: this.echo(env),
      });
    }
  }

  private echo(env: Environment): ((chunk: string) => void) | undefined {
    const { logger } = this.opts;
    if (!logger) return undefined;
    return (chunk) => {
      for (const line of chunk.split(/\r?\n/)) {
        if (line.trim()) logger.info(`[${env.id}] ${line}`);
      }
    };
  }

  /** The equivalent of sourcing the virtualenv's activate script. */
  private activated(env: Environment): NodeJS.ProcessEnv {
    const inherited = this.opts.baseEnv["PATH"];
    return {
      ...this.opts.baseEnv,
      VIRTUAL_ENV: path.dirname(env.binDir),
      PATH: inherited ? `${env.binDir}${path.delimiter}${inherited}` : env.binDir,
    };
  }
}
