/**
 * Security audit: npm audit, a hardcoded-secret scan over source files
 * and a world-readable check on the local secrets file.
 *
 * Secrets are counted per file: the first pattern that matches a file
 * flags it and the remaining patterns are not tried. `matchCount` keeps
 * the raw matches of that first pattern for reference only.
 */

import { existsSync } from 'fs';
import { readFile, stat } from 'fs/promises';
import { relative, resolve } from 'path';
import type { ExecutionOutcome, MonitorMetrics, PlanContext } from '../agents/types.js';
import { NpmAuditProbe } from '../probes/npm.js';
import type { CommandRunner } from '../probes/types.js';
import { securityScore } from '../scoring/index.js';
import { listSourceFiles } from '../utils/fs.js';
import { BaseMonitor, MONITORING_LAYER, SOURCE_EXTENSIONS } from './base-monitor.js';
import type {
  ImprovementPlan,
  PermissionCheck,
  SecretScan,
  SecurityAnalysis,
  SecurityPlan,
} from './types.js';

export const SECURITY_THRESHOLD = 80;
const ALERT_DETAIL_LINES = 5;
const WORLD_READABLE = 0o004;

/** `name = "value"` assignments of credential-like names */
export const SECRET_PATTERNS: readonly RegExp[] = [
  /(password|passwd|pwd)\s*=\s*["'][^"']+["']/gi,
  /(api_key|apikey|api-key)\s*=\s*["'][^"']+["']/gi,
  /(secret|token)\s*=\s*["'][^"']+["']/gi,
  /(aws_access_key|aws_secret)\s*=\s*["'][^"']+["']/gi,
];

export interface SecurityAuditorOptions {
  projectDir: string;
  sourceDir: string;
  extensions?: readonly string[];
  /** Relative to projectDir */
  secretsFile?: string;
  intervalSeconds?: number;
  run?: CommandRunner;
}

/**
 * Matches of the first pattern that hits `content`; 0 when none does.
 */
export function firstPatternMatches(content: string, patterns: readonly RegExp[] = SECRET_PATTERNS): number {
  for (const pattern of patterns) {
    const matches = content.match(pattern);
    if (matches) return matches.length;
  }
  return 0;
}

export class SecurityAuditor extends BaseMonitor<SecurityAnalysis> {
  readonly kind = 'security' as const;

  private readonly projectDir: string;
  private readonly sourcePath: string;
  private readonly extensions: readonly string[];
  private readonly secretsFile: string;
  private readonly audit: NpmAuditProbe;

  constructor(options: SecurityAuditorOptions) {
    super({
      name: 'SecurityAuditor',
      layer: MONITORING_LAYER,
      intervalSeconds: options.intervalSeconds ?? 3600,
    });
    this.projectDir = options.projectDir;
    this.sourcePath = resolve(options.projectDir, options.sourceDir);
    this.extensions = options.extensions ?? SOURCE_EXTENSIONS;
    this.secretsFile = options.secretsFile ?? '.env';
    this.audit = new NpmAuditProbe({ cwd: options.projectDir, run: options.run });
  }

  protected async inspect(): Promise<SecurityAnalysis> {
    const vulnerabilities = await this.audit.probe();
    const secrets = await this.scanForSecrets();
    const permissions = await this.checkPermissions();
    const score = securityScore(vulnerabilities.findings.count, secrets.count);

    this.logger.info(
      { securityScore: score, vulnerabilities: vulnerabilities.findings.count, secretFiles: secrets.count },
      'Security analyzed',
    );

    return {
      kind: 'security',
      timestamp: new Date().toISOString(),
      vulnerabilities,
      secrets,
      permissions,
      securityScore: score,
    };
  }

  protected gaugesFor(analysis: SecurityAnalysis): MonitorMetrics {
    return {
      securityScore: analysis.securityScore,
      vulnerabilities: analysis.vulnerabilities.findings.count,
      secretFiles: analysis.secrets.count,
      permissionIssues: analysis.permissions.issues.length,
    };
  }

  async plan(analysis: SecurityAnalysis, context: PlanContext): Promise<SecurityPlan[]> {
    const plans: SecurityPlan[] = [];
    const vulns = analysis.vulnerabilities.findings;
    const secrets = analysis.secrets;

    if (vulns.count > 0) {
      plans.push({
        type: 'vulnerability_alert',
        priority: 10,
        description: `Found ${vulns.count} dependency vulnerabilities`,
        requiresApproval: true,
        payload: { count: vulns.count, vulnerabilities: vulns.details },
      });
    }

    if (secrets.count > 0) {
      plans.push({
        type: 'secret_alert',
        priority: 10,
        description: `Found potential hardcoded secrets in ${secrets.count} files`,
        requiresApproval: true,
        payload: { count: secrets.count, files: secrets.files },
      });
    }

    if (analysis.securityScore < SECURITY_THRESHOLD) {
      await context.suggest({
        category: 'security',
        priority: 10,
        title: 'Security Issues Detected',
        description:
          `Security score is ${analysis.securityScore.toFixed(1)}/100. ` +
          `Found ${vulns.count} vulnerabilities and potential secrets in ${secrets.count} files.`,
        estimatedImpact: 0.3,
        analysis: {
          securityScore: analysis.securityScore,
          vulnerabilities: vulns.count,
          secrets: secrets.count,
          permissionIssues: analysis.permissions.issues,
        },
      });
    }

    return plans;
  }

  async execute(plan: ImprovementPlan): Promise<ExecutionOutcome> {
    switch (plan.type) {
      case 'vulnerability_alert':
        this.alert(plan.description, plan.payload.vulnerabilities);
        return {
          status: 'logged',
          message: 'Vulnerability alert logged for immediate review',
          action: plan.type,
        };
      case 'secret_alert':
        this.alert(plan.description, plan.payload.files);
        return {
          status: 'logged',
          message: 'Secret exposure alert logged for immediate review',
          action: plan.type,
        };
      default:
        return this.skipped(plan);
    }
  }

  private alert(description: string, details: readonly string[]): void {
    this.logger.fatal(`SECURITY ALERT: ${description}`);
    for (const detail of details.slice(0, ALERT_DETAIL_LINES)) {
      this.logger.warn(`  - ${detail}`);
    }
  }

  private async scanForSecrets(): Promise<SecretScan> {
    const files = listSourceFiles(this.sourcePath, this.extensions);
    const flagged: string[] = [];
    let matchCount = 0;

    for (const file of files) {
      let content: string;
      try {
        content = await readFile(file, 'utf-8');
      } catch (err) {
        this.logger.debug({ file, err }, 'Skipping unreadable file');
        continue;
      }

      const matches = firstPatternMatches(content);
      if (matches > 0) {
        matchCount += matches;
        flagged.push(relative(this.projectDir, file));
      }
    }

    flagged.sort();
    return { count: flagged.length, matchCount, files: flagged, scannedFiles: files.length };
  }

  private async checkPermissions(): Promise<PermissionCheck> {
    const result: PermissionCheck = { checked: true, issues: [] };
    const path = resolve(this.projectDir, this.secretsFile);
    if (!existsSync(path)) {
      return result;
    }

    try {
      const { mode } = await stat(path);
      if (mode & WORLD_READABLE) {
        result.issues.push(`${this.secretsFile} is world-readable`);
      }
    } catch (err) {
      this.logger.debug({ path, err }, 'Cannot stat secrets file');
      result.checked = false;
    }
    return result;
  }
}
