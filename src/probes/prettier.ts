import { BaseProbe } from './base-probe.js';
import { npxArgs } from './command-runner.js';
import type { SourceProbeOptions } from './eslint.js';
import type { CommandOutcome, FormatFindings, ProbeResult } from './types.js';

const CHECK_TIMEOUT_MS = 60_000;
const WRITE_TIMEOUT_MS = 120_000;

/**
 * `prettier --check` exits 1 when files need formatting and
 * prints one `[warn] <file>` line per offender.
 */
export class PrettierProbe extends BaseProbe<FormatFindings> {
  readonly name = 'prettier';
  private readonly target: string;

  constructor(options: SourceProbeOptions) {
    super(options);
    this.target = options.target;
  }

  protected empty(): FormatFindings {
    return { hasFormatIssues: false, unformattedFiles: 0 };
  }

  protected async collect(): Promise<ProbeResult<FormatFindings>> {
    const version = await this.detectVersion('npx', npxArgs('prettier', ['--version']));
    if (!version.ok) return version.result;

    const outcome = await this.exec('npx', npxArgs('prettier', ['--check', this.target]), CHECK_TIMEOUT_MS);
    if (outcome.kind === 'failed') {
      return this.unavailable(outcome.error, outcome.message);
    }

    if (outcome.exitCode > 1) {
      return this.unavailable('other', outcome.stderr.trim().substring(0, 200) || 'prettier failed');
    }

    const unformattedFiles = `${outcome.stdout}\n${outcome.stderr}`
      .split('\n')
      .filter(line => /^\[warn\] /.test(line) && !/Code style issues/.test(line))
      .length;

    return {
      available: true,
      version: version.version,
      findings: {
        hasFormatIssues: outcome.exitCode === 1,
        unformattedFiles,
      },
    };
  }

  /** Rewrite the source directory with Prettier */
  write(): Promise<CommandOutcome> {
    return this.exec('npx', npxArgs('prettier', ['--write', this.target]), WRITE_TIMEOUT_MS);
  }
}
