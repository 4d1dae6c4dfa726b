export interface ConsolePort {
  /** Resolves to `undefined` once input has ended or the console was closed. */
  readLine(prompt: string): Promise<string | undefined>;
  print(text: string): void;
  close(): void;
  /** True after `close()` or end of input; no further lines will arrive. */
  isClosed(): boolean;
}
