import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);
const MAX_BUFFER = 64 * 1024 * 1024;
const OUTPUT_TAIL_LINES = 20;

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  /** Receives stdout and stderr as they arrive, before the command exits. */
  onOutput?: (chunk: string) => void;
}

export interface CommandResult {
  ok: boolean;
  exitCode: number;
  output: string;
  durationMs: number;
  timedOut: boolean;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  opts?: CommandOptions,
) => Promise<CommandResult>;

interface ExecFailure {
  code?: number | string;
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
  message: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    ("stdout" in error || "code" in error)
  );
}

export const runCommand: CommandRunner = async (file, args, opts = {}) => {
  const startedAt = Date.now();
  try {
    const running = execFileAsync(file, [...args], {
      cwd: opts.cwd,
      env: opts.env,
      timeout: opts.timeoutMs ?? 0,
      maxBuffer: MAX_BUFFER,
      windowsHide: true,
    });
    // commands never read from the operator: a prompt sees end of input
    running.child.stdin?.end();
    const { onOutput } = opts;
    if (onOutput) {
      const forward = (chunk: Buffer | string): void => onOutput(chunk.toString());
      running.child.stdout?.on("data", forward);
      running.child.stderr?.on("data", forward);
    }
    const { stdout, stderr } = await running;
    return {
      ok: true,
      exitCode: 0,
      output: [stdout, stderr].filter(Boolean).join("\n").trim(),
      durationMs: Date.now() - startedAt,
      timedOut: false,
    };
  } catch (error: unknown) {
    if (!isExecFailure(error)) {
      throw error;
    }
    const output = [error.stdout, error.stderr, error.message]
      .filter((part): part is string => typeof part === "string" && part.length > 0)
      .join("\n")
      .trim();
    return {
      ok: false,
      exitCode: typeof error.code === "number" ? error.code : 1,
      output,
      durationMs: Date.now() - startedAt,
      timedOut: Boolean(error.killed) && opts.timeoutMs !== undefined,
    };
  }
};

export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly result: CommandResult,
  ) {
    super(
      result.timedOut
        ? `\`${command}\` timed out after ${result.durationMs}ms`
        : `\`${command}\` exited with code ${result.exitCode}${formatTail(result.output)}`,
    );
    this.name = "CommandFailedError";
  }
}

function formatTail(output: string): string {
  if (!output) return "";
  const lines = output.split("\n");
  return "\n" + lines.slice(-OUTPUT_TAIL_LINES).join("\n");
}

export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args]
    .map((a) => (/^[\w@%+=:,./-]+$/.test(a) ? a : JSON.stringify(a)))
    .join(" ");
}

/** Runs a command and throws CommandFailedError when it does not succeed. */
export async function runChecked(
  runner: CommandRunner,
  file: string,
  args: readonly string[],
  opts?: CommandOptions,
): Promise<CommandResult> {
  const result = await runner(file, args, opts);
  if (!result.ok) {
    throw new CommandFailedError(formatCommand(file, args), result);
  }
  return result;
}
