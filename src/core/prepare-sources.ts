import { ReleaseError, RepositoryUpdateError, describeError } from "../types/errors";
import { fail, ok, type StageResult } from "../types/release";
import type { VersionControl } from "./git";
import type { NativePackager } from "./native-package";
import type { VersionFile } from "./version";

export interface PrepareSourcesInput {
  version: string;
  versionFile: VersionFile;
  packager: NativePackager;
  vcs: VersionControl;
}

/**
 * Writes the release version into the project metadata and the packaging
 * changelog, then commits exactly those files as "Release <version>".
 * Resolves to the committed paths.
 */
export async function prepareSources(
  input: PrepareSourcesInput,
): Promise<StageResult<string[]>> {
  const { version, versionFile, packager, vcs } = input;
  try {
    versionFile.writeVersion(version);
    const packagingFiles = await packager.recordUpstreamVersion(version);
    const files = [...packagingFiles, versionFile.relativePath];
    await vcs.commit(files, `Release ${version}`);
    return ok(files);
  } catch (err) {
    if (err instanceof ReleaseError) return fail(err);
    return fail(
      new RepositoryUpdateError(`Preparing sources for ${version} failed: ${describeError(err)}`, {
        cause: err,
      }),
    );
  }
}
