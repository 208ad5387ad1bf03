/**
 * The closed set of monitor kinds, their analysis
 * results and the improvement plans each one can propose.
 */

import type {
  FormatFindings,
  LintFindings,
  InstalledFindings,
  OutdatedFindings,
  OutdatedPackage,
  ProbeErrorKind,
  ProbeResult,
  SystemMetrics,
  TypeCheckFindings,
  VulnerabilityFindings,
} from '../probes/types.js';

// ═══════════════════════════════════════════════════════════════
// KINDS
// ═══════════════════════════════════════════════════════════════

export type MonitorKind = 'code_health' | 'performance' | 'security' | 'dependencies';

/** Orchestration order */
export const MONITOR_KINDS: readonly MonitorKind[] = [
  'code_health',
  'performance',
  'security',
  'dependencies',
];

/**
 * Build a record with one entry per monitor kind.
 */
export function byKind<T>(fn: (kind: MonitorKind) => T): Record<MonitorKind, T> {
  return {
    code_health: fn('code_health'),
    performance: fn('performance'),
    security: fn('security'),
    dependencies: fn('dependencies'),
  };
}

export interface ScoreSample {
  timestamp: string;
  score: number;
}

// ═══════════════════════════════════════════════════════════════
// ANALYSIS RESULTS
// ═══════════════════════════════════════════════════════════════

export interface FileStats {
  sourceFiles: number;
  totalLines: number;
}

export interface CodeHealthAnalysis {
  kind: 'code_health';
  timestamp: string;
  lint: ProbeResult<LintFindings>;
  typeCheck: ProbeResult<TypeCheckFindings>;
  format: ProbeResult<FormatFindings>;
  fileStats: FileStats;
  totalIssues: number;
  healthScore: number;
}

export interface LogStats {
  totalSizeMb: number;
  fileCount: number;
}

export interface BasicMetrics {
  timestamp: string;
  loadAverage: number[];
}

export interface PerformanceAnalysis {
  kind: 'performance';
  timestamp: string;
  metricsAvailable: boolean;
  /** Full metrics; null in degraded mode */
  system: SystemMetrics | null;
  /** Degraded-mode record; null when full metrics were collected */
  basic: BasicMetrics | null;
  metricsError?: ProbeErrorKind;
  logs: LogStats;
  performanceScore: number;
}

export interface SecretScan {
  /** Distinct files with at least one match */
  count: number;
  /** Raw matches of the first matching pattern per file */
  matchCount: number;
  files: string[];
  scannedFiles: number;
}

export interface PermissionCheck {
  checked: boolean;
  issues: string[];
}

export interface SecurityAnalysis {
  kind: 'security';
  timestamp: string;
  vulnerabilities: ProbeResult<VulnerabilityFindings>;
  secrets: SecretScan;
  permissions: PermissionCheck;
  securityScore: number;
}

export interface ManifestSummary {
  files: Array<{ name: string; count: number }>;
  totalDeclared: number;
}

export interface DependencyAnalysis {
  kind: 'dependencies';
  timestamp: string;
  outdated: ProbeResult<OutdatedFindings>;
  installed: ProbeResult<InstalledFindings>;
  manifests: ManifestSummary;
  outdatedCount: number;
  freshnessScore: number;
}

export type AnalysisResult =
  | CodeHealthAnalysis
  | PerformanceAnalysis
  | SecurityAnalysis
  | DependencyAnalysis;

/**
 * The score a monitor declares in its analysis.
 */
export function scoreOf(analysis: AnalysisResult): number {
  switch (analysis.kind) {
    case 'code_health':
      return analysis.healthScore;
    case 'performance':
      return analysis.performanceScore;
    case 'security':
      return analysis.securityScore;
    case 'dependencies':
      return analysis.freshnessScore;
  }
}

// ═══════════════════════════════════════════════════════════════
// IMPROVEMENT PLANS
// ═══════════════════════════════════════════════════════════════

interface PlanBase<TType extends string, TPayload> {
  type: TType;
  /** Higher is more urgent */
  priority: number;
  description: string;
  requiresApproval: boolean;
  payload: TPayload;
}

export type LintAutofixPlan = PlanBase<'lint_autofix', { issueCount: number; fixableCount: number }>;
export type FormatPlan = PlanBase<'format', { unformattedFiles: number }>;
export type CodeHealthPlan = LintAutofixPlan | FormatPlan;

export type ResourceName = 'cpu' | 'memory' | 'disk';
export type ResourceAlertPlan = PlanBase<
  'high_cpu_alert' | 'high_memory_alert' | 'high_disk_alert',
  { metric: ResourceName; value: number; threshold: number }
>;
export type LogCleanupPlan = PlanBase<'log_cleanup', { totalSizeMb: number; limitMb: number }>;
export type PerformancePlan = ResourceAlertPlan | LogCleanupPlan;

export type VulnerabilityAlertPlan = PlanBase<'vulnerability_alert', { count: number; vulnerabilities: string[] }>;
export type SecretAlertPlan = PlanBase<'secret_alert', { count: number; files: string[] }>;
export type SecurityPlan = VulnerabilityAlertPlan | SecretAlertPlan;

export type SafeUpdatesPlan = PlanBase<'safe_updates', { total: number; packages: OutdatedPackage[] }>;
export type MajorUpdatesPlan = PlanBase<'major_updates', { total: number; packages: OutdatedPackage[] }>;
export type DependencyPlan = SafeUpdatesPlan | MajorUpdatesPlan;

export type ImprovementPlan = CodeHealthPlan | PerformancePlan | SecurityPlan | DependencyPlan;
