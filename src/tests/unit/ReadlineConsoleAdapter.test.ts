import { describe, it, expect } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { ReadlineConsoleAdapter } from '../../adapters/console/ReadlineConsoleAdapter.js';

function collectingStream(): { stream: Writable; written: string[] } {
  const written: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      written.push(chunk.toString());
      callback();
    },
  });
  return { stream, written };
}

describe('ReadlineConsoleAdapter', () => {
  it('reads lines in order, then reports end of input', async () => {
    const input = new PassThrough();
    const { stream, written } = collectingStream();
    const adapter = new ReadlineConsoleAdapter(input, stream);

    input.end('London, Paris\r\nquit\n');

    expect(await adapter.readLine('Cities: ')).toBe('London, Paris');
    expect(adapter.isClosed()).toBe(false);
    expect(await adapter.readLine('Cities: ')).toBe('quit');
    expect(await adapter.readLine('Cities: ')).toBeUndefined();
    expect(adapter.isClosed()).toBe(true);
    expect(written).toEqual(['Cities: ', 'Cities: ', 'Cities: ', '\n']);
  });

  it('does not prompt again once closed', async () => {
    const input = new PassThrough();
    const { stream, written } = collectingStream();
    const adapter = new ReadlineConsoleAdapter(input, stream);

    adapter.close();

    expect(adapter.isClosed()).toBe(true);
    expect(await adapter.readLine('Cities: ')).toBeUndefined();
    expect(written).toEqual([]);
  });

  it('ends a pending read when closed', async () => {
    const input = new PassThrough();
    const { stream } = collectingStream();
    const adapter = new ReadlineConsoleAdapter(input, stream);

    const pending = adapter.readLine('Cities: ');
    adapter.close();

    expect(await pending).toBeUndefined();
    expect(adapter.isClosed()).toBe(true);
  });

  it('prints one line per call', () => {
    const { stream, written } = collectingStream();
    const adapter = new ReadlineConsoleAdapter(new PassThrough(), stream);

    adapter.print('Exiting...');
    adapter.close();

    expect(written).toEqual(['Exiting...\n']);
  });
});
