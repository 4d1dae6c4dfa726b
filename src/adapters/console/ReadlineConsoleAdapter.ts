import { createInterface, type Interface } from 'node:readline';
import type { ConsolePort } from '../../ports/ConsolePort.js';

export class ReadlineConsoleAdapter implements ConsolePort {
  private readonly rl: Interface;
  // Buffered, so lines piped in ahead of the prompt are not lost.
  private readonly lines: AsyncIterator<string>;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, crlfDelay: Infinity });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async readLine(prompt: string): Promise<string | undefined> {
    if (this.closed) {
      return undefined;
    }
    this.output.write(prompt);
    const next = await this.lines.next();
    if (next.done) {
      this.closed = true;
      // Input ended on the prompt line (Ctrl-C, Ctrl-D); finish it.
      this.output.write('\n');
      return undefined;
    }
    return next.value;
  }

  print(text: string): void {
    this.output.write(`${text}\n`);
  }

  // Lines piped in before end of input are still read; close() drops them.
  close(): void {
    this.closed = true;
    this.rl.close();
  }

  isClosed(): boolean {
    return this.closed;
  }
}
