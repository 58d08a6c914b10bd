import {
  BuildFailedError,
  EnvironmentSetupError,
  ReleaseError,
  TestFailureError,
  describeError,
} from "../types/errors";
import {
  fail,
  ok,
  type Artifact,
  type Environment,
  type EnvironmentSpec,
  type StageResult,
} from "../types/release";
import type { EnvironmentToolchain } from "./environment";
import type { Logger } from "./logger";
import type { StagingArea } from "./staging";

export interface BuildMatrixOptions {
  toolchain: EnvironmentToolchain;
  logger: Logger;
  parallel?: boolean;
}

/**
 * Builds and tests the same commit in every configured environment and
 * stages what each one produces. Sequential by default; in parallel mode the
 * first failure wins and later results are discarded.
 */
export class BuildMatrixRunner {
  constructor(private readonly opts: BuildMatrixOptions) {}

  async run(
    specs: readonly EnvironmentSpec[],
    staging: StagingArea,
  ): Promise<StageResult<Artifact[]>> {
    if (this.opts.parallel && specs.length > 1) {
      return this.runParallel(specs, staging);
    }
    const staged: Artifact[] = [];
    for (const spec of specs) {
      const result = await this.runEnvironment(spec, staging, () => false);
      if (!result.ok) return result;
      staged.push(...result.value);
    }
    return ok(staged);
  }

  private async runParallel(
    specs: readonly EnvironmentSpec[],
    staging: StagingArea,
  ): Promise<StageResult<Artifact[]>> {
    let firstFailure: ReleaseError | undefined;
    const results = await Promise.all(
      specs.map(async (spec) => {
        const result = await this.runEnvironment(
          spec,
          staging,
          () => firstFailure !== undefined,
        );
        if (!result.ok && !firstFailure) firstFailure = result.error;
        return result;
      }),
    );
    if (firstFailure) return fail(firstFailure);
    // configuration order, regardless of completion order
    const byConfiguration = (a: Artifact, b: Artifact): number =>
      indexOf(specs, a.origin) - indexOf(specs, b.origin);
    staging.sortBy(byConfiguration);
    return ok(results.flatMap((r) => (r.ok ? r.value : [])).sort(byConfiguration));
  }

  private async runEnvironment(
    spec: EnvironmentSpec,
    staging: StagingArea,
    discarded: () => boolean,
  ): Promise<StageResult<Artifact[]>> {
    const { toolchain, logger } = this.opts;
    logger.info(`[${spec.id}] provisioning ${spec.runtime}`);
    let env: Environment;
    try {
      env = await toolchain.provision(spec);
    } catch (err) {
      return fail(
        new EnvironmentSetupError(
          `Environment '${spec.id}' could not be set up: ${describeError(err)}`,
          { cause: err },
        ),
      );
    }
    try {
      logger.info(`[${spec.id}] running tests`);
      try {
        await toolchain.runTests(env, spec);
      } catch (err) {
        return fail(
          new TestFailureError(`Tests failed in environment '${spec.id}': ${describeError(err)}`, {
            cause: err,
          }),
        );
      }

      logger.info(`[${spec.id}] building artifacts`);
      let files: string[];
      try {
        files = await toolchain.buildArtifacts(env, spec);
      } catch (err) {
        return fail(
          new BuildFailedError(`Build failed in environment '${spec.id}': ${describeError(err)}`, {
            cause: err,
          }),
        );
      }
      if (files.length === 0) {
        return fail(new BuildFailedError(`Environment '${spec.id}' produced no artifacts.`));
      }
      if (discarded()) {
        logger.warn(`[${spec.id}] another environment failed, discarding its artifacts`);
        return ok([]);
      }

      const staged: Artifact[] = [];
      for (const file of files) {
        try {
          staged.push(staging.add(file, spec.id));
        } catch (err) {
          if (err instanceof ReleaseError) return fail(err);
          return fail(
            new BuildFailedError(`Cannot stage ${file}: ${describeError(err)}`, { cause: err }),
          );
        }
      }
      logger.info(`[${spec.id}] staged ${staged.map((a) => a.fileName).join(", ")}`);
      return ok(staged);
    } finally {
      await toolchain.dispose(env);
    }
  }
}

function indexOf(specs: readonly EnvironmentSpec[], id: string): number {
  return specs.findIndex((s) => s.id === id);
}
