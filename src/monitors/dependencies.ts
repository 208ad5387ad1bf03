/**
 * Outdated and installed npm packages plus the
 * dependencies declared in the manifests. Updates are only ever
 * recommended, never applied.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { z } from 'zod';
import type { ExecutionOutcome, MonitorMetrics, PlanContext } from '../agents/types.js';
import { errorMessage } from '../core/errors.js';
import { NpmInstalledProbe, NpmOutdatedProbe } from '../probes/npm.js';
import type { CommandRunner, OutdatedPackage } from '../probes/types.js';
import { freshnessScore } from '../scoring/index.js';
import { BaseMonitor, MONITORING_LAYER } from './base-monitor.js';
import type {
  DependencyAnalysis,
  DependencyPlan,
  ImprovementPlan,
  ManifestSummary,
} from './types.js';

const MAX_PACKAGES_PER_PLAN = 10;
const MAX_SUGGESTED_PACKAGES = 20;
const MAX_LOGGED_NAMES = 5;
/** More outdated packages than this earns a suggestion */
export const OUTDATED_SUGGESTION_LIMIT = 5;

const DependencyMap = z.record(z.string(), z.string()).optional();

const ManifestSchema = z.object({
  dependencies: DependencyMap,
  devDependencies: DependencyMap,
  optionalDependencies: DependencyMap,
  peerDependencies: DependencyMap,
});

export type UpdateClass = 'safe' | 'major';

const LEADING_SEGMENT = /^v?(\d+)(?:\.|$)/;

function majorOf(version: string): number | null {
  const match = LEADING_SEGMENT.exec(version.trim());
  return match ? Number(match[1]) : null;
}

/**
 * `safe` when both versions start with the same numeric segment. Only the
 * segment before the first dot is compared; anything unparseable is `major`.
 */
export function classifyUpdate(current: string, latest: string): UpdateClass {
  const from = majorOf(current);
  const to = majorOf(latest);
  if (from === null || to === null) return 'major';
  return from === to ? 'safe' : 'major';
}

export interface DependencyScannerOptions {
  projectDir: string;
  manifestFiles?: readonly string[];
  intervalSeconds?: number;
  run?: CommandRunner;
}

export class DependencyScanner extends BaseMonitor<DependencyAnalysis> {
  readonly kind = 'dependencies' as const;

  private readonly projectDir: string;
  private readonly manifestFiles: readonly string[];
  private readonly outdated: NpmOutdatedProbe;
  private readonly installed: NpmInstalledProbe;

  constructor(options: DependencyScannerOptions) {
    super({
      name: 'DependencyScanner',
      layer: MONITORING_LAYER,
      intervalSeconds: options.intervalSeconds ?? 86_400,
    });
    this.projectDir = options.projectDir;
    this.manifestFiles = options.manifestFiles ?? ['package.json'];
    const probeOptions = { cwd: options.projectDir, run: options.run };
    this.outdated = new NpmOutdatedProbe(probeOptions);
    this.installed = new NpmInstalledProbe(probeOptions);
  }

  protected async inspect(): Promise<DependencyAnalysis> {
    const outdated = await this.outdated.probe();
    const installed = await this.installed.probe();
    const manifests = await this.readManifests();

    const outdatedCount = outdated.findings.packages.length;
    // Without npm ls, the declared dependencies stand in for the installed set
    const installedCount = installed.available ? installed.findings.count : manifests.totalDeclared;
    const score = freshnessScore(outdatedCount, installedCount);

    this.logger.info({ freshnessScore: score, outdated: outdatedCount, installed: installedCount }, 'Dependencies analyzed');

    return {
      kind: 'dependencies',
      timestamp: new Date().toISOString(),
      outdated,
      installed,
      manifests,
      outdatedCount,
      freshnessScore: score,
    };
  }

  protected gaugesFor(analysis: DependencyAnalysis): MonitorMetrics {
    return {
      freshnessScore: analysis.freshnessScore,
      outdatedPackages: analysis.outdatedCount,
      installedPackages: analysis.installed.findings.count,
      declaredDependencies: analysis.manifests.totalDeclared,
    };
  }

  async plan(analysis: DependencyAnalysis, context: PlanContext): Promise<DependencyPlan[]> {
    const plans: DependencyPlan[] = [];
    const outdated = analysis.outdated.findings.packages;

    const safe: OutdatedPackage[] = [];
    const major: OutdatedPackage[] = [];
    for (const pkg of outdated) {
      (classifyUpdate(pkg.current, pkg.latest) === 'safe' ? safe : major).push(pkg);
    }

    if (safe.length > 0) {
      plans.push({
        type: 'safe_updates',
        priority: 4,
        description: `Found ${safe.length} safe (minor/patch) updates`,
        requiresApproval: false,
        payload: { total: safe.length, packages: safe.slice(0, MAX_PACKAGES_PER_PLAN) },
      });
    }

    if (major.length > 0) {
      plans.push({
        type: 'major_updates',
        priority: 3,
        description: `Found ${major.length} major updates requiring review`,
        requiresApproval: true,
        payload: { total: major.length, packages: major.slice(0, MAX_PACKAGES_PER_PLAN) },
      });
    }

    if (outdated.length > OUTDATED_SUGGESTION_LIMIT) {
      await context.suggest({
        category: 'dependencies',
        priority: 5,
        title: 'Multiple Outdated Dependencies',
        description:
          `${outdated.length} packages have updates available. ` +
          'Consider updating to improve security and features.',
        estimatedImpact: 0.1,
        analysis: {
          freshnessScore: analysis.freshnessScore,
          outdatedCount: outdated.length,
          packages: outdated.slice(0, MAX_SUGGESTED_PACKAGES).map(p => p.name),
        },
      });
    }

    return plans;
  }

  async execute(plan: ImprovementPlan): Promise<ExecutionOutcome> {
    switch (plan.type) {
      case 'safe_updates': {
        const names = plan.payload.packages.map(p => p.name);
        this.logger.info(`Safe updates available: ${names.slice(0, MAX_LOGGED_NAMES).join(', ')}`);
        return {
          status: 'logged',
          message: `Logged ${names.length} safe update recommendations`,
          action: plan.type,
          packages: names,
        };
      }
      case 'major_updates': {
        const names = plan.payload.packages.map(p => p.name);
        this.logger.info(
          `Major updates available (review needed): ${names.slice(0, MAX_LOGGED_NAMES).join(', ')}`,
        );
        return {
          status: 'logged',
          message: `Logged ${names.length} major updates for manual review`,
          action: plan.type,
          packages: names,
        };
      }
      default:
        return this.skipped(plan);
    }
  }

  private async readManifests(): Promise<ManifestSummary> {
    const summary: ManifestSummary = { files: [], totalDeclared: 0 };

    for (const name of this.manifestFiles) {
      const path = resolve(this.projectDir, name);
      if (!existsSync(path)) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(await readFile(path, 'utf-8'));
      } catch (err) {
        this.logger.warn({ manifest: name, error: errorMessage(err) }, 'Cannot read manifest');
        continue;
      }

      const parsed = ManifestSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn({ manifest: name }, 'Manifest has unexpected shape');
        continue;
      }

      const declared = new Set<string>();
      for (const section of Object.values(parsed.data)) {
        for (const dep of Object.keys(section ?? {})) declared.add(dep);
      }
      summary.files.push({ name, count: declared.size });
      summary.totalDeclared += declared.size;
    }

    return summary;
  }
}
