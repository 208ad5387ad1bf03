/**
 * Code health: ESLint, tsc and Prettier over the source directory.
 * The score charges 5 points per lint or type error per source file.
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import type { ExecutionOutcome, MonitorMetrics, PlanContext } from '../agents/types.js';
import { EslintProbe } from '../probes/eslint.js';
import { PrettierProbe } from '../probes/prettier.js';
import { TscProbe } from '../probes/tsc.js';
import type { CommandOutcome, CommandRunner } from '../probes/types.js';
import { codeHealthScore } from '../scoring/index.js';
import { listSourceFiles } from '../utils/fs.js';
import { BaseMonitor, MONITORING_LAYER, SOURCE_EXTENSIONS } from './base-monitor.js';
import type { CodeHealthAnalysis, CodeHealthPlan, FileStats, ImprovementPlan } from './types.js';

export const CODE_HEALTH_THRESHOLD = 80;
const MAX_OUTPUT_CHARS = 500;

export interface CodeHealthMonitorOptions {
  projectDir: string;
  /** Relative to projectDir, or absolute */
  sourceDir: string;
  extensions?: readonly string[];
  intervalSeconds?: number;
  run?: CommandRunner;
}

export class CodeHealthMonitor extends BaseMonitor<CodeHealthAnalysis> {
  readonly kind = 'code_health' as const;

  private readonly sourcePath: string;
  private readonly extensions: readonly string[];
  private readonly lint: EslintProbe;
  private readonly typeCheck: TscProbe;
  private readonly format: PrettierProbe;

  constructor(options: CodeHealthMonitorOptions) {
    super({
      name: 'CodeHealthMonitor',
      layer: MONITORING_LAYER,
      intervalSeconds: options.intervalSeconds ?? 1800,
    });
    this.sourcePath = resolve(options.projectDir, options.sourceDir);
    this.extensions = options.extensions ?? SOURCE_EXTENSIONS;

    const probeOptions = { cwd: options.projectDir, run: options.run, target: options.sourceDir };
    this.lint = new EslintProbe(probeOptions);
    this.typeCheck = new TscProbe(probeOptions);
    this.format = new PrettierProbe(probeOptions);
  }

  protected async inspect(): Promise<CodeHealthAnalysis> {
    this.logger.info({ sourceDir: this.sourcePath }, 'Analyzing code health');

    const lint = await this.lint.probe();
    const typeCheck = await this.typeCheck.probe();
    const format = await this.format.probe();
    const fileStats = await this.fileStats();

    const totalIssues = lint.findings.issueCount + typeCheck.findings.issueCount;
    const healthScore = codeHealthScore(
      lint.findings.issueCount,
      typeCheck.findings.issueCount,
      fileStats.sourceFiles,
    );

    this.logger.info(
      { healthScore, lintIssues: lint.findings.issueCount, typeErrors: typeCheck.findings.issueCount },
      'Code health analyzed',
    );

    return {
      kind: 'code_health',
      timestamp: new Date().toISOString(),
      lint,
      typeCheck,
      format,
      fileStats,
      totalIssues,
      healthScore,
    };
  }

  protected gaugesFor(analysis: CodeHealthAnalysis): MonitorMetrics {
    return {
      healthScore: analysis.healthScore,
      lintIssues: analysis.lint.findings.issueCount,
      typeErrors: analysis.typeCheck.findings.issueCount,
      unformattedFiles: analysis.format.findings.unformattedFiles,
      sourceFiles: analysis.fileStats.sourceFiles,
    };
  }

  async plan(analysis: CodeHealthAnalysis, context: PlanContext): Promise<CodeHealthPlan[]> {
    const plans: CodeHealthPlan[] = [];
    const lint = analysis.lint.findings;

    if (lint.issueCount > 0) {
      plans.push({
        type: 'lint_autofix',
        priority: 7,
        description: 'Auto-fix ESLint issues',
        requiresApproval: false,
        payload: { issueCount: lint.issueCount, fixableCount: lint.fixableCount },
      });
    }

    if (analysis.format.findings.hasFormatIssues) {
      plans.push({
        type: 'format',
        priority: 5,
        description: 'Format code with Prettier',
        requiresApproval: false,
        payload: { unformattedFiles: analysis.format.findings.unformattedFiles },
      });
    }

    if (analysis.healthScore < CODE_HEALTH_THRESHOLD) {
      await context.suggest({
        category: 'code_health',
        priority: 8,
        title: 'Code Health Below Threshold',
        description:
          `Health score is ${analysis.healthScore.toFixed(1)}/100. ` +
          `Found ${analysis.totalIssues} issues.`,
        estimatedImpact: 0.1,
        analysis: {
          healthScore: analysis.healthScore,
          lintIssues: lint.issueCount,
          typeErrors: analysis.typeCheck.findings.issueCount,
        },
      });
    }

    return plans;
  }

  async execute(plan: ImprovementPlan): Promise<ExecutionOutcome> {
    switch (plan.type) {
      case 'lint_autofix':
        return this.applied(plan.type, 'ESLint', await this.lint.fix());
      case 'format':
        return this.applied(plan.type, 'Prettier', await this.format.write());
      default:
        return this.skipped(plan);
    }
  }

  private applied(action: string, tool: string, outcome: CommandOutcome): ExecutionOutcome {
    const output = `${outcome.stdout}\n${outcome.stderr}`.trim().substring(0, MAX_OUTPUT_CHARS);

    if (outcome.kind === 'failed') {
      this.logger.warn({ action, error: outcome.error }, `${tool} could not run`);
      return { status: 'error', message: `${tool} could not run: ${outcome.message}`, action, output };
    }
    if (outcome.exitCode === 0) {
      this.logger.info({ action }, `${tool} changes applied`);
      return { status: 'success', message: `${tool} changes applied`, action, output };
    }
    return {
      status: 'partial',
      message: `${tool} exited with code ${outcome.exitCode}; some issues need manual fixes`,
      action,
      output,
    };
  }

  private async fileStats(): Promise<FileStats> {
    const files = listSourceFiles(this.sourcePath, this.extensions);
    let totalLines = 0;

    for (const file of files) {
      try {
        const content = await readFile(file, 'utf-8');
        totalLines += content.split('\n').length;
      } catch (err) {
        this.logger.debug({ file, err }, 'Skipping unreadable source file');
      }
    }

    return { sourceFiles: files.length, totalLines };
  }
}
