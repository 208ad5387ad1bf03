import { describe, it, expect, beforeEach, vi } from 'vitest';

interface ExecScript {
  err: (Error & { code?: unknown; killed?: boolean }) | null;
  stdout: string;
  stderr: string;
  calls: unknown[][];
}

const script = vi.hoisted((): ExecScript => ({ err: null, stdout: '', stderr: '', calls: [] }));

vi.mock('node:child_process', () => ({
  execFile: (...args: unknown[]) => {
    script.calls.push(args);
    const callback = args[3];
    if (typeof callback === 'function') {
      callback(script.err, script.stdout, script.stderr);
    }
  },
}));

import { npxArgs, runCommand } from '../../../src/probes/command-runner.js';

const spec = { command: 'eslint', args: ['src'], cwd: '/tmp/project', timeoutMs: 5000 };

describe('runCommand', () => {
  beforeEach(() => {
    script.err = null;
    script.stdout = '';
    script.stderr = '';
    script.calls = [];
  });

  it('passes cwd and timeout to execFile', async () => {
    await runCommand(spec);

    expect(script.calls).toHaveLength(1);
    const [command, args, options] = script.calls[0];
    expect(command).toBe('eslint');
    expect(args).toEqual(['src']);
    expect(options).toMatchObject({ cwd: '/tmp/project', timeout: 5000, encoding: 'utf-8' });
  });

  it('reports a clean exit as completed with code 0', async () => {
    script.stdout = '[]';

    const outcome = await runCommand(spec);

    expect(outcome).toEqual({ kind: 'completed', exitCode: 0, stdout: '[]', stderr: '' });
  });

  it('keeps a non-zero exit as a completed run', async () => {
    script.err = Object.assign(new Error('Command failed'), { code: 1 });
    script.stdout = '[{"filePath":"a.ts","messages":[]}]';

    const outcome = await runCommand(spec);

    expect(outcome).toEqual({
      kind: 'completed',
      exitCode: 1,
      stdout: '[{"filePath":"a.ts","messages":[]}]',
      stderr: '',
    });
  });

  it('classifies a killed child as a timeout', async () => {
    script.err = Object.assign(new Error('killed'), { killed: true, code: null });

    const outcome = await runCommand(spec);

    expect(outcome.kind).toBe('failed');
    if (outcome.kind === 'failed') {
      expect(outcome.error).toBe('timeout');
      expect(outcome.message).toBe('eslint timed out after 5000ms');
    }
  });

  it('classifies ENOENT as not_found', async () => {
    script.err = Object.assign(new Error('spawn eslint ENOENT'), { code: 'ENOENT' });

    const outcome = await runCommand(spec);

    expect(outcome).toMatchObject({ kind: 'failed', error: 'not_found', message: 'eslint not found' });
  });

  it('classifies anything else as other', async () => {
    script.err = Object.assign(new Error('maxBuffer exceeded'), { code: 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER' });

    const outcome = await runCommand(spec);

    expect(outcome).toMatchObject({ kind: 'failed', error: 'other', message: 'maxBuffer exceeded' });
  });
});

describe('npxArgs', () => {
  it('never lets npx download a missing tool', () => {
    expect(npxArgs('eslint', ['--version'])).toEqual(['--no-install', 'eslint', '--version']);
  });
});
