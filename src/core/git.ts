import { runChecked, runCommand, type CommandRunner } from "./exec";

/** The version-control operations the release pipeline relies on. */
export interface VersionControl {
  /** True when tracked files have uncommitted changes; untracked files do not count. */
  hasLocalChanges(): Promise<boolean>;
  commit(files: readonly string[], message: string): Promise<void>;
  createSignedTag(name: string, message: string): Promise<void>;
  pushTags(): Promise<void>;
  /** Fresh clone of the current commit, independent of the working tree. */
  cloneInto(destination: string): Promise<void>;
}

export interface GitRepositoryOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  signingKey?: string;
  runner?: CommandRunner;
}

export class GitRepository implements VersionControl {
  private readonly runner: CommandRunner;

  constructor(private readonly opts: GitRepositoryOptions) {
    this.runner = opts.runner ?? runCommand;
  }

  async hasLocalChanges(): Promise<boolean> {
    const status = await this.git(["status", "--untracked-files=no", "--short"]);
    return status.trim().length > 0;
  }

  async commit(files: readonly string[], message: string): Promise<void> {
    await this.git(["commit", "-m", message, "--", ...files]);
  }

  async createSignedTag(name: string, message: string): Promise<void> {
    const key = this.opts.signingKey ? ["-u", this.opts.signingKey] : ["-s"];
    await this.git(["tag", ...key, name, "-m", message]);
  }

  async pushTags(): Promise<void> {
    await this.git(["push", "--tags"]);
  }

  async cloneInto(destination: string): Promise<void> {
    await this.git(["clone", `file://${this.opts.cwd}`, destination]);
  }

  private async git(args: string[]): Promise<string> {
    const result = await runChecked(this.runner, "git", args, {
      cwd: this.opts.cwd,
      env: this.opts.env,
    });
    return result.output;
  }
}
