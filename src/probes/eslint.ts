import { z } from 'zod';
import { BaseProbe, parseJson, type ProbeOptions } from './base-probe.js';
import { npxArgs } from './command-runner.js';
import type { CommandOutcome, LintFindings, LintIssue, ProbeResult } from './types.js';

const LINT_TIMEOUT_MS = 120_000;
const FIX_TIMEOUT_MS = 120_000;
const MAX_REPORTED_ISSUES = 20;

const EslintReportSchema = z.array(z.object({
  filePath: z.string(),
  messages: z.array(z.object({
    ruleId: z.string().nullable().optional(),
    severity: z.number(),
    message: z.string(),
    line: z.number().optional(),
    column: z.number().optional(),
    fix: z.unknown().optional(),
  })),
}));

export interface SourceProbeOptions extends ProbeOptions {
  /** Directory handed to the tool, relative to cwd or absolute */
  target: string;
}

/**
 * Runs ESLint with the JSON formatter over the source directory.
 */
export class EslintProbe extends BaseProbe<LintFindings> {
  readonly name = 'eslint';
  private readonly target: string;

  constructor(options: SourceProbeOptions) {
    super(options);
    this.target = options.target;
  }

  protected empty(): LintFindings {
    return { issueCount: 0, fixableCount: 0, errorCount: 0, warningCount: 0, issues: [] };
  }

  protected async collect(): Promise<ProbeResult<LintFindings>> {
    const version = await this.detectVersion('npx', npxArgs('eslint', ['--version']));
    if (!version.ok) return version.result;

    const outcome = await this.exec(
      'npx',
      npxArgs('eslint', [this.target, '--format', 'json']),
      LINT_TIMEOUT_MS,
    );

    if (outcome.kind === 'failed') {
      return this.unavailable(outcome.error, outcome.message);
    }

    const stdout = outcome.stdout.trim();
    if (!stdout) {
      // Exit 2 without a report means ESLint itself failed (bad config, crash)
      if (outcome.exitCode > 1) {
        return this.unavailable('other', outcome.stderr.trim().substring(0, 200) || 'eslint failed');
      }
      return { available: true, version: version.version, findings: this.empty() };
    }

    const parsed = EslintReportSchema.safeParse(parseJson(stdout));
    if (!parsed.success) {
      // Unstructured output: one issue per non-empty line
      const lines = stdout.split('\n').filter(l => l.trim().length > 0);
      this.logger.warn({ probe: this.name }, 'ESLint output could not be parsed, counting lines');
      return {
        available: true,
        version: version.version,
        error: 'parse_error',
        message: `ESLint output could not be parsed: ${stdout.substring(0, 200)}`,
        findings: { ...this.empty(), issueCount: lines.length },
      };
    }

    const findings = this.empty();
    const issues: LintIssue[] = [];

    for (const file of parsed.data) {
      for (const msg of file.messages) {
        findings.issueCount++;
        if (msg.fix !== undefined) findings.fixableCount++;
        if (msg.severity === 2) {
          findings.errorCount++;
        } else {
          findings.warningCount++;
        }
        issues.push({
          file: file.filePath,
          line: msg.line,
          column: msg.column,
          rule: msg.ruleId ?? null,
          severity: msg.severity === 2 ? 'error' : 'warning',
          message: msg.message,
        });
      }
    }

    findings.issues = issues.slice(0, MAX_REPORTED_ISSUES);
    return { available: true, version: version.version, findings };
  }

  /** Apply ESLint's automatic fixes in place */
  fix(): Promise<CommandOutcome> {
    return this.exec('npx', npxArgs('eslint', [this.target, '--fix']), FIX_TIMEOUT_MS);
  }
}
