/**
 * Pure mappings from finding counts and metrics to a
 * 0-100 score. Every result passes through clampScore, so negative counts,
 * zero denominators and NaN still land inside the range.
 */

import type { MonitorKind } from '../monitors/types.js';

export type HealthStatus = 'healthy' | 'warning' | 'critical';

/** Component weights for the overall score; they sum to 1.0 */
export const SCORE_WEIGHTS: Readonly<Record<MonitorKind, number>> = {
  code_health: 0.3,
  performance: 0.2,
  security: 0.35,
  dependencies: 0.15,
};

export const HEALTHY_THRESHOLD = 80;
export const WARNING_THRESHOLD = 60;

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/** 5 points per lint or type issue per source file */
export function codeHealthScore(lintIssues: number, typeIssues: number, fileCount: number): number {
  const issuesPerFile = (lintIssues + typeIssues) / Math.max(fileCount, 1);
  return round1(clampScore(100 - issuesPerFile * 5));
}

export interface ResourceUsage {
  cpuPercent: number;
  memoryPercent: number;
  diskPercent: number;
}

function tieredPenalty(percent: number, tiers: ReadonlyArray<[threshold: number, penalty: number]>): number {
  for (const [threshold, penalty] of tiers) {
    if (percent > threshold) return penalty;
  }
  return 0;
}

const CPU_MEMORY_TIERS: ReadonlyArray<[number, number]> = [[90, 30], [70, 15], [50, 5]];
const DISK_TIERS: ReadonlyArray<[number, number]> = [[95, 20], [85, 10]];

/**
 * Tiered, additive penalties per resource. Without usage data (metrics
 * unavailable) the score stays at 100.
 */
export function performanceScore(usage: ResourceUsage | null): number {
  if (!usage) return 100;
  const penalty =
    tieredPenalty(usage.cpuPercent, CPU_MEMORY_TIERS) +
    tieredPenalty(usage.memoryPercent, CPU_MEMORY_TIERS) +
    tieredPenalty(usage.diskPercent, DISK_TIERS);
  return clampScore(100 - penalty);
}

export function securityScore(vulnerabilityCount: number, secretCount: number): number {
  return clampScore(100 - vulnerabilityCount * 10 - secretCount * 15);
}

export function freshnessScore(outdatedCount: number, installedCount: number): number {
  return clampScore(100 - (outdatedCount / Math.max(installedCount, 1)) * 100);
}

// ═══════════════════════════════════════════════════════════════
// AGGREGATE
// ═══════════════════════════════════════════════════════════════

export interface AggregateScores {
  scores: Record<MonitorKind, number>;
  overallScore: number;
  status: HealthStatus;
}

export function classifyHealth(overallScore: number): HealthStatus {
  if (overallScore >= HEALTHY_THRESHOLD) return 'healthy';
  if (overallScore >= WARNING_THRESHOLD) return 'warning';
  return 'critical';
}

/**
 * Weighted sum of the component scores. Components are clamped first, so
 * the overall score is in range for any input.
 */
export function aggregateScores(scores: Record<MonitorKind, number>): AggregateScores {
  const clamped: Record<MonitorKind, number> = {
    code_health: clampScore(scores.code_health),
    performance: clampScore(scores.performance),
    security: clampScore(scores.security),
    dependencies: clampScore(scores.dependencies),
  };

  const overallScore =
    clamped.code_health * SCORE_WEIGHTS.code_health +
    clamped.performance * SCORE_WEIGHTS.performance +
    clamped.security * SCORE_WEIGHTS.security +
    clamped.dependencies * SCORE_WEIGHTS.dependencies;

  return {
    scores: clamped,
    overallScore,
    status: classifyHealth(overallScore),
  };
}
