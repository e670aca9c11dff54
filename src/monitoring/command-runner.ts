// command-runner.ts - Bounded execution of OS query tools
import { execFile, ExecFileException } from 'child_process';

export type QueryOutcome =
  | { status: 'ok'; stdout: string; stderr: string; exitCode: number }
  | { status: 'timed-out'; timeoutMs: number }
  | { status: 'failed'; error: string };

export interface RunOptions {
  timeoutMs: number;
  maxBufferBytes?: number;
}

const DEFAULT_MAX_BUFFER = 16 * 1024 * 1024;

/**
 * Runs a tool with a wall-clock deadline. The child is killed when the deadline
 * passes and the outcome is `timed-out`; a non-zero exit still yields its output,
 * since most query tools print usable text before failing.
 */
export function runCommand(file: string, args: string[], options: RunOptions): Promise<QueryOutcome> {
  return new Promise(resolve => {
    execFile(
      file,
      args,
      {
        encoding: 'utf8',
        timeout: options.timeoutMs,
        maxBuffer: options.maxBufferBytes ?? DEFAULT_MAX_BUFFER,
        windowsHide: true
      },
      (error: ExecFileException | null, stdout: string, stderr: string) => {
        if (!error) {
          resolve({ status: 'ok', stdout, stderr, exitCode: 0 });
          return;
        }

        if (error.killed && error.signal === 'SIGTERM') {
          resolve({ status: 'timed-out', timeoutMs: options.timeoutMs });
          return;
        }

        if (typeof error.code === 'number') {
          resolve({ status: 'ok', stdout, stderr, exitCode: error.code });
          return;
        }

        resolve({ status: 'failed', error: error.message });
      }
    );
  });
}

export function describeOutcome(outcome: QueryOutcome): string {
  switch (outcome.status) {
    case 'ok':
      return `exit ${outcome.exitCode}`;
    case 'timed-out':
      return `timed out after ${outcome.timeoutMs}ms`;
    case 'failed':
      return outcome.error;
  }
}

/** Stdout of a successful run, or null when the tool timed out, failed to start, or exited non-zero with nothing printed. */
export function outputOf(outcome: QueryOutcome): string | null {
  if (outcome.status !== 'ok') return null;
  if (outcome.exitCode !== 0 && outcome.stdout.trim() === '') return null;
  return outcome.stdout;
}
