import { createInterface, type Interface } from "readline";
import type { Readable, Writable } from "stream";
import type { FieldResult } from "../../packages/utils/src";

export class InputClosedError extends Error {
  constructor() {
    super("Input ended before planning finished");
    this.name = "InputClosedError";
  }
}

/**
 * Line-oriented prompts over any readable stream. Lines are pulled one at a
 * time so piped input is not dropped between questions.
 */
export class Prompter {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(input: Readable, private readonly output: Writable) {
    this.rl = createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  write(text: string): void {
    this.output.write(text);
  }

  async ask(question: string): Promise<string> {
    this.output.write(question);
    const next = await this.lines.next();
    if (next.done) {
      throw new InputClosedError();
    }
    return next.value;
  }

  async askUntilValid<T>(question: string, validate: (raw: string) => FieldResult<T>): Promise<T> {
    for (;;) {
      const result = validate(await this.ask(question));
      if (result.valid) {
        return result.value;
      }
      this.output.write(`${result.error}\n`);
    }
  }

  close(): void {
    this.rl.close();
  }
}
