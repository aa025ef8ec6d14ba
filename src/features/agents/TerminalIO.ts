/**
 * readline-backed AgentIO for an attached terminal
 */

import readline from 'readline';
import type { AgentIO } from './types.js';

export class TerminalIO implements AgentIO {
  private rl: readline.Interface;
  private lines: AsyncIterableIterator<string>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, output, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  async read(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    const next = await this.lines.next();
    return next.done === true ? null : next.value;
  }

  close(): void {
    this.rl.close();
  }
}
