/**
 * Scripted CommandRunner for probe and monitor tests
 */

import type { CommandOutcome, CommandRunner, CommandSpec } from '../../src/probes/types.js';

export function completed(stdout = '', exitCode = 0, stderr = ''): CommandOutcome {
  return { kind: 'completed', exitCode, stdout, stderr };
}

export function failed(
  error: 'timeout' | 'not_found' | 'other',
  message = `command failed: ${error}`,
): CommandOutcome {
  return { kind: 'failed', error, message, stdout: '', stderr: '' };
}

export function commandLine(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(' ');
}

/**
 * Answers each command with the outcome of the first route whose fragment
 * appears in the command line; anything unrouted is "not found".
 */
export class FakeRunner {
  readonly calls: CommandSpec[] = [];
  private routes: Array<{ fragment: string; outcome: CommandOutcome }> = [];

  on(fragment: string, outcome: CommandOutcome): this {
    this.routes.push({ fragment, outcome });
    return this;
  }

  readonly run: CommandRunner = async (spec: CommandSpec): Promise<CommandOutcome> => {
    this.calls.push(spec);
    const line = commandLine(spec);
    const route = this.routes.find(r => line.includes(r.fragment));
    return route ? route.outcome : failed('not_found', `${spec.command}: not found`);
  };

  /** Command lines seen so far */
  get lines(): string[] {
    return this.calls.map(commandLine);
  }
}

/** Every tool is missing */
export const missingTools: CommandRunner = async spec => failed('not_found', `${spec.command}: not found`);
