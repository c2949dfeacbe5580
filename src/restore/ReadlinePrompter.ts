import * as readline from 'readline/promises';
import { Readable, Writable } from 'stream';
import { Prompter } from '../interfaces/Prompter';
import { toError } from '../utils/errors';

export class PromptClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'PromptClosedError';
  }
}

/**
 * Prompter over a terminal or any pair of streams
 */
export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface;
  private output: Writable;
  private closed = false;

  constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
    this.rl = readline.createInterface({ input, output, terminal: false });
    this.output = output;
    this.rl.once('close', () => {
      this.closed = true;
    });
  }

  write(line: string): void {
    this.output.write(`${line}\n`);
  }

  ask(question: string): Promise<string> {
    if (this.closed) {
      return Promise.reject(new PromptClosedError());
    }

    return new Promise((resolve, reject) => {
      const onClose = (): void => reject(new PromptClosedError());
      this.rl.once('close', onClose);
      this.rl.question(question).then(
        answer => {
          this.rl.off('close', onClose);
          resolve(answer);
        },
        error => {
          this.rl.off('close', onClose);
          reject(toError(error));
        }
      );
    });
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
