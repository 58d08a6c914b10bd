import type { ReleaseError } from "./errors";

export interface Release {
  readonly currentVersion: string;
  readonly targetVersion: string;
  readonly changelogExcerpt: string;
}

export type ArtifactKind =
  | "SourceDistribution"
  | "BinaryDistribution"
  | "WheelDistribution"
  | "NativePackage";

export interface Artifact {
  readonly path: string;
  readonly fileName: string;
  readonly kind: ArtifactKind;
  readonly origin: string; // environment id, or "native-package"
  signed: boolean;
  signaturePath?: string;
}

/** One entry of the build matrix, as configured. */
export interface EnvironmentSpec {
  id: string;
  runtime: string;
  systemPackages: boolean;
  install: string[][];
  test: string[][];
  build: string[][];
  outputDir: string;
  timeoutMs?: number;
}

/** A provisioned, disposable build environment. */
export interface Environment {
  readonly id: string;
  readonly workspace: string;
  readonly runtime: string;
  readonly projectDir: string;
  readonly binDir: string;
}

export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ReleaseError };

export function ok<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: ReleaseError): StageResult<T> {
  return { ok: false, error };
}

export type StageName =
  | "validate-version"
  | "check-preconditions"
  | "prepare-sources"
  | "build-matrix"
  | "native-package"
  | "sign-artifacts"
  | "tag-release"
  | "confirm"
  | "publish"
  | "bump-version";

export type PipelineStatus = "released" | "declined" | "failed";

export interface PipelineResult {
  status: PipelineStatus;
  completedStageIndex: number;
  completedStages: StageName[];
  /** Set once the readiness checks have passed. */
  release?: Release;
  stagingDir?: string;
  nextVersion?: string;
  error?: ReleaseError;
}
