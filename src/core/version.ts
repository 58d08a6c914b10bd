import * as fs from "node:fs";
import * as path from "node:path";
import {
  ConfigError,
  InvalidVersionError,
  NoOpVersionError,
  describeError,
} from "../types/errors";
import { fail, ok, type StageResult } from "../types/release";
import { fillTemplate } from "./config";

export const DEVELOPMENT_MARKER = "dev";
const STABLE_VERSION = /^[0-9][0-9A-Za-z.+-]*$/;

export interface VersionFileOptions {
  path: string;
  pattern: string;
  replacement: string;
}

/** Reads and rewrites the version recorded in the project metadata file. */
export class VersionFile {
  readonly file: string;
  private readonly pattern: RegExp;

  constructor(
    repoRoot: string,
    private readonly opts: VersionFileOptions,
  ) {
    this.file = path.resolve(repoRoot, opts.path);
    this.pattern = new RegExp(opts.pattern, "m");
  }

  /** Path relative to the repository root, as version control sees it. */
  get relativePath(): string {
    return this.opts.path;
  }

  readVersion(): string {
    const match = this.pattern.exec(this.read());
    const version = match?.[1]?.trim();
    if (!version) {
      throw new ConfigError(
        `No version matching /${this.opts.pattern}/ found in ${this.opts.path}`,
      );
    }
    return version;
  }

  writeVersion(version: string): void {
    const content = this.read();
    if (!this.pattern.test(content)) {
      throw new ConfigError(
        `No line matching /${this.opts.pattern}/ to update in ${this.opts.path}`,
      );
    }
    const line = fillTemplate(this.opts.replacement, { version });
    fs.writeFileSync(this.file, content.replace(this.pattern, () => line));
  }

  private read(): string {
    try {
      return fs.readFileSync(this.file, "utf8");
    } catch (err) {
      throw new ConfigError(`Cannot read ${this.opts.path}: ${describeError(err)}`, {
        cause: err,
      });
    }
  }
}

/**
 * Checks a requested release version against the current one.
 * Pure: reads nothing, writes nothing.
 */
export function validateTargetVersion(
  currentVersion: string,
  targetVersion: string,
): StageResult<string> {
  if (targetVersion.includes(DEVELOPMENT_MARKER)) {
    return fail(
      new InvalidVersionError(`Cannot release development version '${targetVersion}'.`),
    );
  }
  if (!STABLE_VERSION.test(targetVersion)) {
    return fail(
      new InvalidVersionError(
        `'${targetVersion}' is not a release version (expected digits, dots and an optional suffix).`,
      ),
    );
  }
  if (targetVersion === currentVersion) {
    return fail(new NoOpVersionError(`Version ${targetVersion} already exists.`));
  }
  return ok(targetVersion);
}
