/**
 * Confirmation gates consulted by the pipeline between phases.
 */

import { createInterface, type Interface } from "node:readline";

import type { ConfirmationGate } from "./types.js";

/** Answers every prompt the same way. Used for `--yes` and tests. */
export class AutoConfirmGate implements ConfirmationGate {
  readonly prompts: string[] = [];

  constructor(private readonly answer = true) {}

  async confirm(prompt: string): Promise<boolean> {
    this.prompts.push(prompt);
    return this.answer;
  }
}

/**
 * Asks on the terminal; only "y" or "yes" proceed. One line interface serves
 * every prompt, so answers piped in ahead of time are read in order. Once the
 * input has ended, every further prompt is answered no.
 */
export class PromptGate implements ConfirmationGate {
  private rl: Interface | null = null;
  private readonly pending: string[] = [];
  private waiter: ((line: string | null) => void) | null = null;
  private ended = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stderr,
  ) {}

  async confirm(prompt: string): Promise<boolean> {
    this.open();
    this.output.write(`${prompt} [y/N] `);
    const answer = await this.nextLine();
    return answer !== null && isYes(answer);
  }

  close(): void {
    this.rl?.close();
  }

  private open(): void {
    if (this.rl || this.ended) return;
    const rl = createInterface({ input: this.input, terminal: false });
    rl.on("line", (line) => {
      if (this.waiter) this.settle(line);
      else this.pending.push(line);
    });
    rl.on("close", () => {
      this.ended = true;
      this.rl = null;
      if (this.waiter) this.settle(null);
    });
    this.rl = rl;
  }

  private nextLine(): Promise<string | null> {
    const buffered = this.pending.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  private settle(line: string | null): void {
    const resolve = this.waiter;
    this.waiter = null;
    resolve?.(line);
  }
}

export function isYes(answer: string): boolean {
  return ["y", "yes"].includes(answer.trim().toLowerCase());
}
