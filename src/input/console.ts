import { createInterface } from "readline/promises";
import type { Interface } from "readline/promises";
import { OperatorInterruptError } from "../errors";

export interface Prompter {
  ask(question: string): Promise<string>;
  say(message: string): void;
  warn(message: string): void;
}

export function isYes(answer: string): boolean {
  return answer.trim().toLowerCase().startsWith("y");
}

export type ConsoleStreams = {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
};

type Waiter = {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
};

/**
 * Prompts on stdin/stdout. Lines that arrive before their question (piped
 * input, a multi-line paste) are queued for the next `ask`. Ctrl+C calls
 * `onInterrupt`, which is expected to abort `signal`; a pending question
 * then rejects with OperatorInterruptError, as does asking past end of input.
 */
export class ConsolePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly lines: string[] = [];
  private waiter: Waiter | null = null;
  private closed = false;

  constructor(
    private readonly signal: AbortSignal,
    onInterrupt: () => void,
    streams: ConsoleStreams = {}
  ) {
    this.output = streams.output ?? process.stdout;
    this.rl = createInterface({
      input: streams.input ?? process.stdin,
      output: this.output,
    });
    this.rl.on("SIGINT", onInterrupt);
    this.rl.on("line", (line) => {
      const waiter = this.waiter;
      this.waiter = null;
      if (waiter) waiter.resolve(line);
      else this.lines.push(line);
    });
    this.rl.on("close", () => {
      this.closed = true;
      this.rejectPending();
    });
    signal.addEventListener("abort", () => this.rejectPending(), {
      once: true,
    });
  }

  async ask(question: string): Promise<string> {
    if (this.signal.aborted) throw new OperatorInterruptError();

    if (this.closed) {
      this.output.write(question);
    } else {
      this.rl.setPrompt(question);
      this.rl.prompt();
    }

    const queued = this.lines.shift();
    if (queued !== undefined) return queued;
    if (this.closed) throw new OperatorInterruptError();

    return new Promise<string>((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  say(message: string) {
    console.log(message);
  }

  warn(message: string) {
    console.error(message);
  }

  close() {
    if (!this.closed) this.rl.close();
  }

  private rejectPending() {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(new OperatorInterruptError());
  }
}
