import * as fs from "node:fs";
import * as path from "node:path";
import { ArtifactCollisionError } from "../types/errors";
import type { Artifact, ArtifactKind } from "../types/release";

const SOURCE_ARCHIVE = /\.(tar\.gz|tgz|tar\.bz2|tar\.xz|zip)$/;

export function classifyArtifact(fileName: string): ArtifactKind {
  if (fileName.endsWith(".whl")) return "WheelDistribution";
  if (SOURCE_ARCHIVE.test(fileName)) return "SourceDistribution";
  return "BinaryDistribution";
}

/**
 * The per-release staging directory and the ordered list of artifacts
 * copied into it. Copies are synchronous, so concurrent build
 * environments still add one artifact at a time.
 */
export class StagingArea {
  private readonly items: Artifact[] = [];

  private constructor(readonly dir: string) {}

  /** Creates the directory, discarding whatever a previous attempt left there. */
  static create(dir: string): StagingArea {
    fs.rmSync(dir, { recursive: true, force: true });
    fs.mkdirSync(dir, { recursive: true });
    return new StagingArea(dir);
  }

  get artifacts(): readonly Artifact[] {
    return this.items;
  }

  add(source: string, origin: string, kind = classifyArtifact(path.basename(source))): Artifact {
    const fileName = path.basename(source);
    const existing = this.items.find((a) => a.fileName === fileName);
    const target = path.join(this.dir, fileName);
    if (existing || fs.existsSync(target)) {
      throw new ArtifactCollisionError(
        `Artifact ${fileName} from '${origin}' would overwrite one from '${existing?.origin ?? "unknown"}'.`,
      );
    }
    fs.copyFileSync(source, target, fs.constants.COPYFILE_EXCL);
    const artifact: Artifact = { path: target, fileName, kind, origin, signed: false };
    this.items.push(artifact);
    return artifact;
  }

  /** Reorders the list only; staged files are left as they are. */
  sortBy(compare: (a: Artifact, b: Artifact) => number): void {
    this.items.sort(compare);
  }

  find(predicate: (artifact: Artifact) => boolean): Artifact | undefined {
    return this.items.find(predicate);
  }

  markSigned(artifact: Artifact, signaturePath: string): void {
    artifact.signed = true;
    artifact.signaturePath = signaturePath;
  }

  unsigned(): Artifact[] {
    return this.items.filter((a) => !a.signed);
  }
}
