import { describe, it, expect } from 'vitest';
import { EslintProbe } from '../../../src/probes/eslint.js';
import { FakeRunner, completed, failed } from '../../helpers/fake-runner.js';

const report = JSON.stringify([
  {
    filePath: '/tmp/project/src/index.ts',
    messages: [
      { ruleId: 'no-unused-vars', severity: 2, message: "'x' is unused", line: 3, column: 7 },
      { ruleId: 'semi', severity: 1, message: 'Missing semicolon', line: 4, column: 20, fix: { range: [1, 1], text: ';' } },
    ],
  },
  {
    filePath: '/tmp/project/src/util.ts',
    messages: [
      { ruleId: 'prefer-const', severity: 2, message: "Use 'const'", line: 1, column: 1, fix: { range: [0, 3], text: 'const' } },
    ],
  },
]);

function probeWith(runner: FakeRunner): EslintProbe {
  return new EslintProbe({ cwd: '/tmp/project', target: 'src', run: runner.run });
}

describe('EslintProbe', () => {
  it('reports not_found when eslint is not installed', async () => {
    const result = await probeWith(new FakeRunner()).probe();

    expect(result.available).toBe(false);
    if (!result.available) {
      expect(result.error).toBe('not_found');
    }
    expect(result.findings.issueCount).toBe(0);
  });

  it('treats a failing version check as not installed', async () => {
    const runner = new FakeRunner().on('eslint --version', completed('', 1, 'npm ERR! could not determine executable'));

    const result = await probeWith(runner).probe();

    expect(result).toMatchObject({ available: false, error: 'not_found' });
  });

  it('counts issues, fixable issues and severities from the JSON report', async () => {
    const runner = new FakeRunner()
      .on('eslint --version', completed('v9.10.0\n'))
      .on('eslint src --format json', completed(report, 1));

    const result = await probeWith(runner).probe();

    expect(result.available).toBe(true);
    expect(result.findings).toMatchObject({
      issueCount: 3,
      fixableCount: 2,
      errorCount: 2,
      warningCount: 1,
    });
    expect(result.findings.issues[0]).toEqual({
      file: '/tmp/project/src/index.ts',
      line: 3,
      column: 7,
      rule: 'no-unused-vars',
      severity: 'error',
      message: "'x' is unused",
    });
    if (result.available) {
      expect(result.version).toBe('v9.10.0');
    }
    expect(runner.lines).toContain('npx --no-install eslint src --format json');
  });

  it('reports no issues for empty output', async () => {
    const runner = new FakeRunner()
      .on('eslint --version', completed('v9.10.0'))
      .on('--format json', completed(''));

    const result = await probeWith(runner).probe();

    expect(result).toMatchObject({ available: true, findings: { issueCount: 0 } });
  });

  it('reports other when eslint crashes without a report', async () => {
    const runner = new FakeRunner()
      .on('eslint --version', completed('v9.10.0'))
      .on('--format json', completed('', 2, 'Oops! Something went wrong!'));

    const result = await probeWith(runner).probe();

    expect(result).toMatchObject({ available: false, error: 'other', message: 'Oops! Something went wrong!' });
  });

  it('falls back to counting lines when the output is not JSON', async () => {
    const runner = new FakeRunner()
      .on('eslint --version', completed('v9.10.0'))
      .on('--format json', completed('src/a.ts: problem one\n\nsrc/b.ts: problem two\n', 1));

    const result = await probeWith(runner).probe();

    expect(result).toMatchObject({ available: true, error: 'parse_error' });
    expect(result.findings.issueCount).toBe(2);
  });

  it('reports a timed-out lint run as timeout', async () => {
    const runner = new FakeRunner()
      .on('eslint --version', completed('v9.10.0'))
      .on('--format json', failed('timeout', 'npx timed out after 120000ms'));

    const result = await probeWith(runner).probe();

    expect(result).toMatchObject({ available: false, error: 'timeout' });
  });

  it('runs eslint --fix over the target', async () => {
    const runner = new FakeRunner().on('--fix', completed(''));

    const outcome = await probeWith(runner).fix();

    expect(outcome).toEqual(completed(''));
    expect(runner.calls[0]).toMatchObject({
      command: 'npx',
      args: ['--no-install', 'eslint', 'src', '--fix'],
      cwd: '/tmp/project',
      timeoutMs: 120_000,
    });
  });
});
