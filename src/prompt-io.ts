/**
 * Lightweight prompt utilities using node:readline.
 *
 * One line reader serves every question of a run, so answers piped on stdin
 * are read in order. End of input counts as "no".
 * Prompts are written to stderr so stdout carries only data.
 */

import { createInterface, type Interface } from "node:readline";

/** Ask a yes/no question; resolves true only for an explicit yes. */
export type Confirm = (message: string) => Promise<boolean>;

/**
 * True when the answer is "y" (case-insensitive, surrounding spaces ignored).
 */
export function isYes(answer: string): boolean {
  return answer.trim().toLowerCase() === "y";
}

/**
 * Queue of input lines; `next()` resolves null once the input has ended.
 */
class LineReader {
  private readonly rl: Interface;
  private readonly buffered: string[] = [];
  private readonly waiting: ((line: string | null) => void)[] = [];
  private closed = false;

  constructor(input: NodeJS.ReadableStream) {
    this.rl = createInterface({ input, terminal: false });
    this.rl.on("line", (line) => {
      const waiter = this.waiting.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.buffered.push(line);
      }
    });
    this.rl.on("close", () => {
      this.closed = true;
      for (const waiter of this.waiting.splice(0)) {
        waiter(null);
      }
    });
  }

  next(): Promise<string | null> {
    const line = this.buffered.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * y/N prompt over a pair of streams. The reader is opened on the first
 * question and held until `close()`.
 */
export class TerminalPrompt {
  private reader: LineReader | null = null;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stderr
  ) {}

  readonly confirm: Confirm = async (message) => {
    const reader = (this.reader ??= new LineReader(this.input));
    this.output.write(`${message} (y/N): `);
    const answer = await reader.next();
    if (answer === null) {
      this.output.write("\n");
      return false;
    }
    return isYes(answer);
  };

  /** Release stdin so the process can exit. */
  close(): void {
    this.reader?.close();
    this.reader = null;
  }
}
