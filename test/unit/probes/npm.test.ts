import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { NpmAuditProbe, NpmInstalledProbe, NpmOutdatedProbe } from '../../../src/probes/npm.js';
import { FakeRunner, completed, failed } from '../../helpers/fake-runner.js';

const AUDIT_REPORT = JSON.stringify({
  auditReportVersion: 2,
  vulnerabilities: {
    lodash: {
      name: 'lodash',
      severity: 'high',
      via: [{ source: 1, title: 'Prototype Pollution', severity: 'high' }],
    },
    minimist: {
      name: 'minimist',
      severity: 'critical',
      via: ['lodash'],
    },
  },
  metadata: { vulnerabilities: { high: 1, critical: 1, total: 2 } },
});

function npm(): FakeRunner {
  return new FakeRunner().on('npm --version', completed('10.8.2\n'));
}

describe('NpmAuditProbe', () => {
  let projectDir: string;

  beforeAll(() => {
    projectDir = mkdtempSync(join(tmpdir(), 'healthpulse-audit-'));
  });

  afterAll(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  it('needs a lockfile', async () => {
    const result = await new NpmAuditProbe({ cwd: projectDir, run: npm().run }).probe();

    expect(result).toMatchObject({ available: false, error: 'not_found', message: 'No package-lock.json to audit' });
  });

  it('counts vulnerable packages and describes them', async () => {
    writeFileSync(join(projectDir, 'package-lock.json'), '{}');
    const runner = npm().on('npm audit --json', completed(AUDIT_REPORT, 1));

    const result = await new NpmAuditProbe({ cwd: projectDir, run: runner.run }).probe();

    expect(result.available).toBe(true);
    expect(result.findings).toEqual({
      count: 2,
      bySeverity: { high: 1, critical: 1 },
      details: ['lodash (high): Prototype Pollution', 'minimist (critical): lodash'],
    });
  });

  it('surfaces npm error documents', async () => {
    writeFileSync(join(projectDir, 'package-lock.json'), '{}');
    const runner = npm().on(
      'npm audit --json',
      completed(JSON.stringify({ error: { code: 'ENOAUDIT', summary: 'Your configured registry does not support audit requests.' } }), 1),
    );

    const result = await new NpmAuditProbe({ cwd: projectDir, run: runner.run }).probe();

    expect(result).toMatchObject({
      available: false,
      error: 'other',
      message: 'Your configured registry does not support audit requests.',
    });
  });

  it('reports a timeout without findings', async () => {
    writeFileSync(join(projectDir, 'package-lock.json'), '{}');
    const runner = npm().on('npm audit --json', failed('timeout'));

    const result = await new NpmAuditProbe({ cwd: projectDir, run: runner.run }).probe();

    expect(result).toMatchObject({ available: false, error: 'timeout', findings: { count: 0 } });
  });
});

describe('NpmOutdatedProbe', () => {
  it('lists outdated packages', async () => {
    const runner = npm().on(
      'npm outdated --json',
      completed(JSON.stringify({
        chalk: { current: '4.1.2', wanted: '4.1.2', latest: '5.3.0' },
        zod: { current: '3.22.0', wanted: '3.23.8', latest: '3.23.8' },
      }), 1),
    );

    const result = await new NpmOutdatedProbe({ cwd: '/tmp/project', run: runner.run }).probe();

    expect(result.findings.packages).toEqual([
      { name: 'chalk', current: '4.1.2', wanted: '4.1.2', latest: '5.3.0' },
      { name: 'zod', current: '3.22.0', wanted: '3.23.8', latest: '3.23.8' },
    ]);
  });

  it('treats empty output as nothing outdated', async () => {
    const runner = npm().on('npm outdated --json', completed(''));

    const result = await new NpmOutdatedProbe({ cwd: '/tmp/project', run: runner.run }).probe();

    expect(result).toMatchObject({ available: true, findings: { packages: [] } });
  });

  it('flattens workspace entries and fills missing versions', async () => {
    const runner = npm().on(
      'npm outdated --json',
      completed(JSON.stringify({
        typescript: [
          { current: '5.4.5', wanted: '5.4.5', latest: '5.6.2' },
          { wanted: '5.6.2', latest: '5.6.2' },
        ],
      }), 1),
    );

    const result = await new NpmOutdatedProbe({ cwd: '/tmp/project', run: runner.run }).probe();

    expect(result.findings.packages).toEqual([
      { name: 'typescript', current: '5.4.5', wanted: '5.4.5', latest: '5.6.2' },
      { name: 'typescript', current: '', wanted: '5.6.2', latest: '5.6.2' },
    ]);
  });

  it('is unavailable without npm', async () => {
    const result = await new NpmOutdatedProbe({ cwd: '/tmp/project', run: new FakeRunner().run }).probe();

    expect(result).toMatchObject({ available: false, error: 'not_found', findings: { packages: [] } });
  });
});

describe('NpmInstalledProbe', () => {
  it('counts top-level dependencies', async () => {
    const runner = npm().on(
      'npm ls --json --depth=0',
      completed(JSON.stringify({ name: 'app', dependencies: { pino: { version: '9.4.0' }, zod: { version: '3.23.8' } } })),
    );

    const result = await new NpmInstalledProbe({ cwd: '/tmp/project', run: runner.run }).probe();

    expect(result).toMatchObject({ available: true, findings: { count: 2 } });
  });

  it('reports parse_error for unreadable output', async () => {
    const runner = npm().on('npm ls --json --depth=0', completed('not json'));

    const result = await new NpmInstalledProbe({ cwd: '/tmp/project', run: runner.run }).probe();

    expect(result).toMatchObject({ available: false, error: 'parse_error', findings: { count: 0 } });
  });
});
