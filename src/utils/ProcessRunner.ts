import { spawn } from 'child_process';
import { pipeline } from 'stream/promises';
import { Readable, Writable } from 'stream';
import { toError } from './errors';

export interface ProcessOptions {
  /** Variables added to the inherited environment */
  env?: Record<string, string | undefined>;

  /** Stream fed to the child's stdin */
  input?: Readable;

  /** Stream receiving the child's stdout; stdout is not captured when set */
  output?: Writable;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Spawn a command and wait for it to exit.
 * Resolves with the exit code, rejects only when the process cannot be started
 * or one of the attached streams fails.
 */
export function runProcess(
  command: string,
  args: string[],
  options: ProcessOptions = {}
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: { ...process.env, ...options.env },
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const fail = (error: Error): void => {
      if (settled) return;
      settled = true;
      reject(error);
    };

    const streams: Promise<void>[] = [];

    if (options.output) {
      streams.push(pipeline(child.stdout, options.output));
    } else {
      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
    }

    if (options.input) {
      streams.push(pipeline(options.input, child.stdin));
    } else {
      child.stdin.end();
    }

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', fail);

    // A child that exits early breaks its pipes; the exit code is the better report then
    const streamsSettled = Promise.allSettled(streams);

    child.on('close', code => {
      const exitCode = code ?? -1;
      streamsSettled.then(results => {
        const failure = results.find(
          (result): result is PromiseRejectedResult => result.status === 'rejected'
        );
        if (failure && exitCode === 0) {
          fail(toError(failure.reason));
          return;
        }
        if (settled) return;
        settled = true;
        resolve({ exitCode, stdout, stderr });
      }, fail);
    });
  });
}
