import type { AggregateReport } from '../orchestrator/types.js';
import type { HealthStatus } from '../scoring/index.js';
import type { StoredReport } from '../store/schema.js';
import { formatDuration } from '../utils/timer.js';

const RULE = '  ' + '─'.repeat(40);

const STATUS_MESSAGES: Record<HealthStatus, string> = {
  healthy: '✅ All systems healthy',
  warning: '⚠️  Some checks need attention',
  critical: '❌ Critical issues detected',
};

function score(value: number): string {
  return value.toFixed(1).padStart(5);
}

/**
 * Console summary of a run: component scores, overall score, tier,
 * duration and a status message.
 */
export function formatReport(report: StoredReport): string[] {
  const { scores, overallScore, status } = report.aggregate;
  return [
    '',
    '  healthpulse report',
    RULE,
    `  Code health:   ${score(scores.code_health)}`,
    `  Performance:   ${score(scores.performance)}`,
    `  Security:      ${score(scores.security)}`,
    `  Dependencies:  ${score(scores.dependencies)}`,
    RULE,
    `  Overall:       ${score(overallScore)} / 100 (${status.toUpperCase()})`,
    `  Mode:          ${report.mode}`,
    `  Duration:      ${formatDuration(report.durationSeconds * 1000)}`,
    `  Completed:     ${report.completedAt}`,
    '',
    `  ${STATUS_MESSAGES[status]}`,
    '',
  ];
}

/**
 * One line per agent whose cycle did not succeed.
 */
export function formatAgentErrors(report: AggregateReport): string[] {
  const lines: string[] = [];
  for (const [kind, outcome] of Object.entries(report.agents)) {
    if (outcome.status === 'error') {
      lines.push(`  ✗ ${kind}: ${outcome.error}`);
    } else if (outcome.result.status === 'error') {
      lines.push(`  ✗ ${kind}: ${outcome.result.error ?? 'cycle failed'}`);
    }
  }
  return lines;
}
