export * from "./core/config";
export * from "./core/exec";
export * from "./core/logger";
export * from "./core/git";
export * from "./core/version";
export * from "./core/preconditions";
export * from "./core/prepare-sources";
export * from "./core/staging";
export * from "./core/environment";
export * from "./core/build-matrix";
export * from "./core/native-package";
export * from "./core/signer";
export * from "./core/confirm";
export * from "./core/publish";
export * from "./core/version-bump";
export * from "./core/pipeline";
export * from "./core/defaults";
export * from "./types/release";
export * from "./types/errors";
