import * as fs from "node:fs";
import * as path from "node:path";
import {
  ConfigError,
  DirtyWorkingTreeError,
  MissingChangelogEntryError,
  MissingIdentityError,
  MissingToolError,
  describeError,
} from "../types/errors";
import { fail, ok, type StageResult } from "../types/release";
import { fillTemplate, type ReleaseSettings } from "./config";
import type { VersionControl } from "./git";

export function changelogEntryFor(settings: ReleaseSettings, version: string): string {
  return fillTemplate(settings.changelog.entry, {
    name: settings.project.name,
    version,
  });
}

/**
 * Returns the first changelog line containing the entry text literally,
 * or undefined when there is none.
 */
export function findChangelogEntry(content: string, entry: string): string | undefined {
  return content.split(/\r?\n/).find((line) => line.includes(entry))?.trim();
}

export function resolveExecutable(
  name: string,
  searchPath: readonly string[],
): string | undefined {
  for (const dir of searchPath) {
    const candidate = path.join(dir, name);
    try {
      fs.accessSync(candidate, fs.constants.X_OK);
      if (fs.statSync(candidate).isFile()) return candidate;
    } catch {
      // not in this directory
    }
  }
  return undefined;
}

/**
 * Read-only readiness checks, evaluated in order and stopping at the first
 * failure, changelog first.
 * Resolves to the changelog line that documents the release.
 */
export async function checkPreconditions(
  settings: ReleaseSettings,
  vcs: VersionControl,
  targetVersion: string,
): Promise<StageResult<string>> {
  const changelogFile = path.resolve(settings.repoRoot, settings.changelog.path);
  let changelog: string;
  try {
    changelog = fs.readFileSync(changelogFile, "utf8");
  } catch (err) {
    return fail(
      new ConfigError(`Cannot read ${settings.changelog.path}: ${describeError(err)}`, {
        cause: err,
      }),
    );
  }
  const entry = changelogEntryFor(settings, targetVersion);
  const excerpt = findChangelogEntry(changelog, entry);
  if (!excerpt) {
    return fail(
      new MissingChangelogEntryError(
        `Cannot release version without changelog, please add an entry "${entry}" to ${settings.changelog.path}.`,
      ),
    );
  }

  if (await vcs.hasLocalChanges()) {
    return fail(
      new DirtyWorkingTreeError("Cannot release with local changes, please commit or stash them."),
    );
  }

  const { identity } = settings;
  if (!identity.fullName) {
    return fail(
      new MissingIdentityError(
        `Please define environment variable ${identity.nameVariable} with the name to use for the native package.`,
      ),
    );
  }
  if (!identity.email) {
    return fail(
      new MissingIdentityError(
        `Please define environment variable ${identity.emailVariable} with the e-mail address to use for the native package.`,
      ),
    );
  }

  for (const tool of settings.requiredTools) {
    if (!resolveExecutable(tool.name, settings.searchPath)) {
      const hint = tool.hint ? `, ${tool.hint}` : "";
      return fail(new MissingToolError(`Please install ${tool.name}${hint}.`));
    }
  }

  return ok(excerpt);
}
