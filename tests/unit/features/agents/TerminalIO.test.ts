/**
 * Unit tests for TerminalIO
 */

import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { TerminalIO } from '../../../../src/features/agents/TerminalIO.js';

function collect(stream: PassThrough): () => string {
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
  return () => chunks.join('');
}

describe('TerminalIO', () => {
  it('should prompt, read lines and report end of input', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = collect(output);
    const io = new TerminalIO(input, output);

    input.end('status\nexit\n');

    expect(await io.read('> ')).toBe('status');
    expect(await io.read('> ')).toBe('exit');
    expect(await io.read('> ')).toBeNull();

    io.print('bye');
    io.close();
    await new Promise((resolve) => setImmediate(resolve));

    expect(written()).toBe('> > > bye\n');
  });
});
