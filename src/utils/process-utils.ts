import { spawn } from 'child_process';

export interface ProcessResult {
  exitCode: number | null;          // null when the process was killed by a signal
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs an external program from an argument vector and waits for it to exit.
 * Rejects only if the program could not be started.
 */
export interface ProcessExecutor {
  run(program: string, args: readonly string[]): Promise<ProcessResult>;
}

/**
 * Spawn a program without a shell and collect its output
 */
export function runProcess(program: string, args: readonly string[]): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(program, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    // ENOENT, EACCES, ...
    child.on('error', reject);

    child.on('close', (exitCode, signal) => {
      resolve({
        exitCode,
        signal,
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
      });
    });
  });
}

export const spawnExecutor: ProcessExecutor = {
  run: runProcess,
};
