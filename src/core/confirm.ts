import { createInterface, type Interface } from "node:readline";

/** A line-oriented question to the operator. */
export interface Prompter {
  /** Rejects with PromptClosedError once the input has ended. */
  ask(question: string): Promise<string>;
  close(): void;
}

export class PromptClosedError extends Error {
  constructor() {
    super("Input ended before an answer was given.");
    this.name = "PromptClosedError";
  }
}

interface PendingQuestion {
  resolve(answer: string): void;
  reject(err: Error): void;
}

/**
 * Reads answers line by line from `input`. Lines typed (or piped) ahead of a
 * question are queued and answer the next questions in order.
 */
export function createTerminalPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const answers: string[] = [];
  const pending: PendingQuestion[] = [];
  let rl: Interface | undefined;
  let ended = false;

  function open(): Interface {
    if (rl) return rl;
    const created = createInterface({ input, output });
    created.on("line", (line) => {
      const next = pending.shift();
      if (next) next.resolve(line);
      else answers.push(line);
    });
    created.on("close", () => {
      ended = true;
      for (const question of pending.splice(0)) question.reject(new PromptClosedError());
    });
    rl = created;
    return created;
  }

  return {
    ask(question) {
      const reader = open();
      if (!ended) {
        reader.setPrompt(question);
        reader.prompt();
      }
      const queued = answers.shift();
      if (queued !== undefined) return Promise.resolve(queued);
      if (ended) return Promise.reject(new PromptClosedError());
      return new Promise<string>((resolve, reject) => {
        pending.push({ resolve, reject });
      });
    },
    close() {
      if (!ended) rl?.close();
    },
  };
}

const AFFIRMATIVE = /^y(es)?$/i;

export function isAffirmative(answer: string): boolean {
  return AFFIRMATIVE.test(answer.trim());
}

/**
 * The one checkpoint between "prepared" and "published". Anything but an
 * explicit yes is a decline, and so is input that ends without an answer.
 */
export async function confirmRelease(prompter: Prompter, version: string): Promise<boolean> {
  let answer: string;
  try {
    answer = await prompter.ask(
      `Everything finished, do you want to release version '${version}' publicly? (y/n) `,
    );
  } catch (err) {
    if (err instanceof PromptClosedError) return false;
    throw err;
  }
  return isAffirmative(answer);
}
