#!/usr/bin/env node
import { Command, CommanderError, type OutputConfiguration } from "commander";
import { DEFAULT_CONFIG_FILE, loadSettings, type ReleaseSettings } from "../core/config";
import { createTerminalPrompter, type Prompter } from "../core/confirm";
import { createDefaultCollaborators } from "../core/defaults";
import { createConsoleLogger, type Logger } from "../core/logger";
import { ReleasePipeline, exitCodeFor, type ReleaseCollaborators } from "../core/pipeline";
import { ReleaseError, describeError } from "../types/errors";

interface CliOptions {
  config: string;
  cwd: string;
  parallel?: boolean;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  prompter?: Prompter;
  output?: OutputConfiguration;
  collaborators?: (
    settings: ReleaseSettings,
    io: { prompter: Prompter; logger: Logger },
  ) => ReleaseCollaborators;
}

export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command()
    .name("release-pipeline")
    .description(
      "Build, package, sign and publish one release of the project in the current repository.",
    )
    .argument("<version>", "version to release, e.g. 2.4")
    .option("-c, --config <file>", "release configuration file", DEFAULT_CONFIG_FILE)
    .option("-C, --cwd <dir>", "repository root", process.cwd())
    .option("--parallel", "build the environments of the matrix concurrently")
    .showHelpAfterError()
    .exitOverride();
  if (output) program.configureOutput(output);
  return program;
}

/** Resolves to the process exit code. */
export async function main(argv: string[] = process.argv, deps: CliDeps = {}): Promise<number> {
  const program = createProgram(deps.output);
  try {
    program.parse(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  const [version] = program.args;
  const opts = program.opts<CliOptions>();
  const logger = deps.logger ?? createConsoleLogger();
  if (!version) {
    logger.error("Please specify the version to release.");
    return 1;
  }

  let settings: ReleaseSettings;
  try {
    settings = loadSettings({
      repoRoot: opts.cwd,
      configFile: opts.config,
      env: deps.env ?? process.env,
      overrides: opts.parallel ? { parallel: true } : undefined,
    });
  } catch (err) {
    if (!(err instanceof ReleaseError)) throw err;
    logger.error(`failed (${err.kind}): ${err.message}`);
    return 1;
  }

  const prompter = deps.prompter ?? createTerminalPrompter();
  const collaborators = deps.collaborators ?? createDefaultCollaborators;
  try {
    const pipeline = new ReleasePipeline(settings, collaborators(settings, { prompter, logger }));
    const result = await pipeline.run(version);
    if (result.error) {
      logger.error(`failed (${result.error.kind}): ${result.error.message}`);
    }
    return exitCodeFor(result);
  } finally {
    prompter.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      const kind = err instanceof ReleaseError ? ` (${err.kind})` : "";
      console.error(`[release] failed${kind}: ${describeError(err)}`);
      process.exit(1);
    });
}
