export type ReleaseErrorKind =
  | "InvalidVersion"
  | "NoOpVersion"
  | "MissingChangelogEntry"
  | "DirtyWorkingTree"
  | "MissingIdentity"
  | "MissingTool"
  | "EnvironmentSetupFailed"
  | "TestFailure"
  | "BuildFailed"
  | "ArtifactCollision"
  | "PackagingFailed"
  | "SigningFailed"
  | "RepositoryUpdateFailed"
  | "PublishFailed"
  | "ConfigError";

export abstract class ReleaseError extends Error {
  abstract readonly kind: ReleaseErrorKind;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InvalidVersionError extends ReleaseError {
  readonly kind = "InvalidVersion";
  constructor(message: string) {
    super(message);
    this.name = "InvalidVersionError";
  }
}
export class NoOpVersionError extends ReleaseError {
  readonly kind = "NoOpVersion";
  constructor(message: string) {
    super(message);
    this.name = "NoOpVersionError";
  }
}
export class MissingChangelogEntryError extends ReleaseError {
  readonly kind = "MissingChangelogEntry";
  constructor(message: string) {
    super(message);
    this.name = "MissingChangelogEntryError";
  }
}
export class DirtyWorkingTreeError extends ReleaseError {
  readonly kind = "DirtyWorkingTree";
  constructor(message: string) {
    super(message);
    this.name = "DirtyWorkingTreeError";
  }
}
export class MissingIdentityError extends ReleaseError {
  readonly kind = "MissingIdentity";
  constructor(message: string) {
    super(message);
    this.name = "MissingIdentityError";
  }
}
export class MissingToolError extends ReleaseError {
  readonly kind = "MissingTool";
  constructor(message: string) {
    super(message);
    this.name = "MissingToolError";
  }
}
export class EnvironmentSetupError extends ReleaseError {
  readonly kind = "EnvironmentSetupFailed";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EnvironmentSetupError";
  }
}
export class TestFailureError extends ReleaseError {
  readonly kind = "TestFailure";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TestFailureError";
  }
}
export class BuildFailedError extends ReleaseError {
  readonly kind = "BuildFailed";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BuildFailedError";
  }
}
export class ArtifactCollisionError extends ReleaseError {
  readonly kind = "ArtifactCollision";
  constructor(message: string) {
    super(message);
    this.name = "ArtifactCollisionError";
  }
}
export class PackagingError extends ReleaseError {
  readonly kind = "PackagingFailed";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PackagingError";
  }
}
export class SigningError extends ReleaseError {
  readonly kind = "SigningFailed";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SigningError";
  }
}
export class RepositoryUpdateError extends ReleaseError {
  readonly kind = "RepositoryUpdateFailed";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RepositoryUpdateError";
  }
}
export class PublishError extends ReleaseError {
  readonly kind = "PublishFailed";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PublishError";
  }
}
export class ConfigError extends ReleaseError {
  readonly kind = "ConfigError";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
