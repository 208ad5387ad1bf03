import { execFile } from 'node:child_process';
import type { CommandOutcome, CommandRunner, CommandSpec } from './types.js';

const MAX_BUFFER = 16 * 1024 * 1024;

/**
 * Default CommandRunner: spawns the tool with execFile (no shell) and
 * classifies the way it ended. Never rejects.
 *
 * On timeout Node kills the child and reports `killed: true`; that becomes
 * a `timeout` failure. A missing executable (ENOENT) becomes `not_found`.
 * A non-zero exit is still a completed run: linters and auditors signal
 * findings through their exit code.
 */
export const runCommand: CommandRunner = (spec: CommandSpec): Promise<CommandOutcome> => {
  return new Promise(resolve => {
    execFile(
      spec.command,
      spec.args,
      {
        cwd: spec.cwd,
        timeout: spec.timeoutMs,
        maxBuffer: MAX_BUFFER,
        encoding: 'utf-8',
        windowsHide: true,
      },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ kind: 'completed', exitCode: 0, stdout, stderr });
          return;
        }

        const code: unknown = err.code;

        if (err.killed) {
          resolve({
            kind: 'failed',
            error: 'timeout',
            message: `${spec.command} timed out after ${spec.timeoutMs}ms`,
            stdout,
            stderr,
          });
          return;
        }

        if (code === 'ENOENT') {
          resolve({
            kind: 'failed',
            error: 'not_found',
            message: `${spec.command} not found`,
            stdout,
            stderr,
          });
          return;
        }

        if (typeof code === 'number') {
          resolve({ kind: 'completed', exitCode: code, stdout, stderr });
          return;
        }

        resolve({ kind: 'failed', error: 'other', message: err.message, stdout, stderr });
      },
    );
  });
};

/**
 * Arguments for running a project-local binary without ever downloading it.
 */
export function npxArgs(tool: string, args: string[]): string[] {
  return ['--no-install', tool, ...args];
}
