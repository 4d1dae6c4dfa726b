import type { ConsolePort } from '../../ports/ConsolePort.js';

/** In-memory console fed from a list of lines; runs out like end-of-input. */
export class ScriptedConsole implements ConsolePort {
  readonly printed: string[] = [];
  readonly prompts: string[] = [];
  closed = false;

  constructor(private readonly lines: string[]) {}

  async readLine(prompt: string): Promise<string | undefined> {
    if (this.closed) {
      return undefined;
    }
    this.prompts.push(prompt);
    const line = this.lines.shift();
    if (line === undefined) {
      this.closed = true;
    }
    return line;
  }

  print(text: string): void {
    this.printed.push(text);
  }

  close(): void {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  get output(): string {
    return this.printed.join('\n');
  }
}
