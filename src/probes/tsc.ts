/**
 * Runs `tsc --noEmit` and counts the reported errors.
 * Reports not_found when the project has no tsconfig.json.
 */

import { existsSync } from 'fs';
import { join } from 'path';
import { BaseProbe } from './base-probe.js';
import { npxArgs } from './command-runner.js';
import type { ProbeResult, TypeCheckFindings, TypeCheckIssue } from './types.js';

const TYPECHECK_TIMEOUT_MS = 180_000;
const MAX_REPORTED_ISSUES = 20;

/** file(line,col): error TSxxxx: message */
const DIAGNOSTIC_LINE = /^(.+)\((\d+),(\d+)\):\s+error\s+(TS\d+):\s+(.+)$/;

export class TscProbe extends BaseProbe<TypeCheckFindings> {
  readonly name = 'tsc';

  protected empty(): TypeCheckFindings {
    return { issueCount: 0, issues: [] };
  }

  protected async collect(): Promise<ProbeResult<TypeCheckFindings>> {
    if (!existsSync(join(this.cwd, 'tsconfig.json'))) {
      return this.unavailable('not_found', 'No tsconfig.json found');
    }

    const version = await this.detectVersion('npx', npxArgs('tsc', ['--version']));
    if (!version.ok) return version.result;

    const outcome = await this.exec(
      'npx',
      npxArgs('tsc', ['--noEmit', '--pretty', 'false']),
      TYPECHECK_TIMEOUT_MS,
    );
    if (outcome.kind === 'failed') {
      return this.unavailable(outcome.error, outcome.message);
    }

    return {
      available: true,
      version: version.version,
      findings: parseTypeErrors(outcome.stdout || outcome.stderr),
    };
  }
}

/**
 * Count every `error TSxxxx` line; keep structured details for the ones
 * that carry a file position.
 */
export function parseTypeErrors(output: string): TypeCheckFindings {
  const issues: TypeCheckIssue[] = [];
  let issueCount = 0;

  for (const line of output.split('\n')) {
    if (!/\berror TS\d+/.test(line)) continue;
    issueCount++;

    const match = line.trim().match(DIAGNOSTIC_LINE);
    if (match && issues.length < MAX_REPORTED_ISSUES) {
      issues.push({
        file: match[1],
        line: parseInt(match[2], 10),
        column: parseInt(match[3], 10),
        code: match[4],
        message: match[5],
      });
    }
  }

  return { issueCount, issues };
}
