import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DependencyScanner, classifyUpdate } from '../../../src/monitors/dependencies.js';
import { FakeRunner, completed } from '../../helpers/fake-runner.js';
import { recordingContext } from '../../helpers/plan-context.js';

describe('classifyUpdate', () => {
  it('treats the same leading segment as safe', () => {
    expect(classifyUpdate('4.17.20', '4.17.21')).toBe('safe');
    expect(classifyUpdate('v2.1.0', '2.9.3')).toBe('safe');
  });

  it('treats a different leading segment as major', () => {
    expect(classifyUpdate('4.1.2', '5.3.0')).toBe('major');
    expect(classifyUpdate('0.9.1', '1.0.0')).toBe('major');
  });

  it('treats unparseable versions as major', () => {
    expect(classifyUpdate('', '1.0.0')).toBe('major');
    expect(classifyUpdate('git+https', '2.0.0')).toBe('major');
  });
});

function outdatedReport(entries: Record<string, [current: string, latest: string]>): string {
  const report: Record<string, { current: string; wanted: string; latest: string }> = {};
  for (const [name, [current, latest]] of Object.entries(entries)) {
    report[name] = { current, wanted: latest, latest };
  }
  return JSON.stringify(report);
}

describe('DependencyScanner', () => {
  let projectDir: string;

  beforeEach(() => {
    projectDir = mkdtempSync(join(tmpdir(), 'healthpulse-deps-'));
    writeFileSync(join(projectDir, 'package.json'), JSON.stringify({
      name: 'sample',
      dependencies: { pino: '^9.0.0', zod: '^3.23.0', yaml: '^2.5.0' },
      devDependencies: { vitest: '^2.0.0', zod: '^3.23.0' },
    }));
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  function npm(): FakeRunner {
    return new FakeRunner().on('npm --version', completed('10.8.2'));
  }

  it('scores freshness against the installed packages', async () => {
    const runner = npm()
      .on('npm outdated --json', completed(outdatedReport({ pino: ['8.21.0', '9.4.0'] }), 1))
      .on('npm ls --json --depth=0', completed(JSON.stringify({
        dependencies: { pino: {}, zod: {}, yaml: {}, vitest: {} },
      })));
    const monitor = new DependencyScanner({ projectDir, run: runner.run });

    const analysis = await monitor.analyze();

    expect(analysis.outdatedCount).toBe(1);
    expect(analysis.freshnessScore).toBe(75);
    expect(analysis.manifests).toEqual({ files: [{ name: 'package.json', count: 4 }], totalDeclared: 4 });
    expect(monitor.metrics()).toEqual({
      freshnessScore: 75,
      outdatedPackages: 1,
      installedPackages: 4,
      declaredDependencies: 4,
    });
  });

  it('gives the same score on a repeated analysis and records one sample each', async () => {
    const runner = npm()
      .on('npm outdated --json', completed(outdatedReport({ pino: ['8.21.0', '9.4.0'] }), 1))
      .on('npm ls --json --depth=0', completed(JSON.stringify({
        dependencies: { pino: {}, zod: {}, yaml: {}, vitest: {} },
      })));
    const monitor = new DependencyScanner({ projectDir, run: runner.run });

    await monitor.analyze();
    expect(monitor.history.length).toBe(1);
    const second = await monitor.analyze();

    expect(second.freshnessScore).toBe(75);
    expect(monitor.history.length).toBe(2);
    expect(monitor.history.toArray().map(sample => sample.score)).toEqual([75, 75]);
  });

  it('falls back to declared dependencies when npm ls is unavailable', async () => {
    const runner = npm()
      .on('npm outdated --json', completed(outdatedReport({ zod: ['3.22.0', '3.23.8'] }), 1))
      .on('npm ls --json --depth=0', completed('garbage'));
    const monitor = new DependencyScanner({ projectDir, run: runner.run });

    const analysis = await monitor.analyze();

    expect(analysis.installed.available).toBe(false);
    expect(analysis.freshnessScore).toBe(75);
  });

  it('scores 100 without npm', async () => {
    const analysis = await new DependencyScanner({ projectDir, run: new FakeRunner().run }).analyze();

    expect(analysis.outdated.available).toBe(false);
    expect(analysis.freshnessScore).toBe(100);
  });

  it('skips a manifest that is not valid JSON', async () => {
    writeFileSync(join(projectDir, 'package.json'), '{ not json');

    const analysis = await new DependencyScanner({ projectDir, run: new FakeRunner().run }).analyze();

    expect(analysis.manifests).toEqual({ files: [], totalDeclared: 0 });
  });

  it('splits updates into safe and major plans', async () => {
    const runner = npm().on('npm outdated --json', completed(outdatedReport({
      chalk: ['4.1.2', '5.3.0'],
      zod: ['3.22.0', '3.23.8'],
      yaml: ['2.4.0', '2.5.1'],
    }), 1));
    const monitor = new DependencyScanner({ projectDir, run: runner.run });
    const context = recordingContext();

    const plans = await monitor.plan(await monitor.analyze(), context);

    expect(plans).toEqual([
      {
        type: 'safe_updates',
        priority: 4,
        description: 'Found 2 safe (minor/patch) updates',
        requiresApproval: false,
        payload: {
          total: 2,
          packages: [
            { name: 'zod', current: '3.22.0', wanted: '3.23.8', latest: '3.23.8' },
            { name: 'yaml', current: '2.4.0', wanted: '2.5.1', latest: '2.5.1' },
          ],
        },
      },
      {
        type: 'major_updates',
        priority: 3,
        description: 'Found 1 major updates requiring review',
        requiresApproval: true,
        payload: {
          total: 1,
          packages: [{ name: 'chalk', current: '4.1.2', wanted: '5.3.0', latest: '5.3.0' }],
        },
      },
    ]);
    expect(context.suggestions).toEqual([]);
  });

  it('suggests a review when more than five packages are outdated', async () => {
    const entries: Record<string, [string, string]> = {};
    for (const name of ['a', 'b', 'c', 'd', 'e', 'f']) entries[`pkg-${name}`] = ['1.0.0', '1.1.0'];
    const runner = npm().on('npm outdated --json', completed(outdatedReport(entries), 1));
    const monitor = new DependencyScanner({ projectDir, run: runner.run });
    const context = recordingContext();

    await monitor.plan(await monitor.analyze(), context);

    expect(context.suggestions).toHaveLength(1);
    expect(context.suggestions[0]).toMatchObject({
      category: 'dependencies',
      title: 'Multiple Outdated Dependencies',
      description: '6 packages have updates available. Consider updating to improve security and features.',
      analysis: {
        outdatedCount: 6,
        packages: ['pkg-a', 'pkg-b', 'pkg-c', 'pkg-d', 'pkg-e', 'pkg-f'],
      },
    });
  });

  it('logs recommendations with the package names', async () => {
    const outcome = await new DependencyScanner({ projectDir }).execute({
      type: 'major_updates',
      priority: 3,
      description: 'Found 1 major updates requiring review',
      requiresApproval: true,
      payload: { total: 1, packages: [{ name: 'chalk', current: '4.1.2', wanted: '5.3.0', latest: '5.3.0' }] },
    });

    expect(outcome).toEqual({
      status: 'logged',
      message: 'Logged 1 major updates for manual review',
      action: 'major_updates',
      packages: ['chalk'],
    });
  });
});
