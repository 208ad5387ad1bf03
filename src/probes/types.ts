/**
 * Probe contracts. Every external analysis tool is wrapped so that a missing,
 * slow or misbehaving tool yields a degraded result instead of an exception.
 */

export type ProbeErrorKind = 'timeout' | 'not_found' | 'parse_error' | 'other';

export type ProbeResult<F> =
  | {
    available: true;
    findings: F;
    version?: string;
    /** Set when the tool ran but its output needed a fallback parse */
    error?: 'parse_error';
    message?: string;
  }
  | {
    available: false;
    findings: F;
    error: ProbeErrorKind;
    message: string;
  };

export interface Probe<F> {
  readonly name: string;
  probe(): Promise<ProbeResult<F>>;
}

// ═══════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════

export interface CommandSpec {
  command: string;
  args: string[];
  cwd: string;
  timeoutMs: number;
}

export type CommandOutcome =
  | { kind: 'completed'; exitCode: number; stdout: string; stderr: string }
  | {
    kind: 'failed';
    error: Exclude<ProbeErrorKind, 'parse_error'>;
    message: string;
    stdout: string;
    stderr: string;
  };

export type CommandRunner = (spec: CommandSpec) => Promise<CommandOutcome>;

// ═══════════════════════════════════════════════════════════════
// FINDINGS
// ═══════════════════════════════════════════════════════════════

export interface LintIssue {
  file: string;
  line?: number;
  column?: number;
  rule: string | null;
  severity: 'error' | 'warning';
  message: string;
}

export interface LintFindings {
  issueCount: number;
  fixableCount: number;
  errorCount: number;
  warningCount: number;
  /** First 20 issues, for the activity log */
  issues: LintIssue[];
}

export interface FormatFindings {
  hasFormatIssues: boolean;
  unformattedFiles: number;
}

export interface TypeCheckIssue {
  file: string;
  line: number;
  column: number;
  code: string;
  message: string;
}

export interface TypeCheckFindings {
  issueCount: number;
  issues: TypeCheckIssue[];
}

export interface VulnerabilityFindings {
  count: number;
  bySeverity: Record<string, number>;
  /** Up to 10 "name (severity): title" lines */
  details: string[];
}

export interface OutdatedPackage {
  name: string;
  current: string;
  wanted: string;
  latest: string;
}

export interface OutdatedFindings {
  packages: OutdatedPackage[];
}

export interface InstalledFindings {
  count: number;
}

export interface CpuMetrics {
  percent: number;
  count: number;
  loadAverage: number[];
}

export interface MemoryMetrics {
  percent: number;
  totalGb: number;
  availableGb: number;
  usedGb: number;
}

export interface DiskMetrics {
  path: string;
  percent: number;
  totalGb: number;
  freeGb: number;
  usedGb: number;
}

export interface ProcessMetrics {
  pid: number;
  memoryMb: number;
  heapUsedMb: number;
  uptimeSeconds: number;
}

export interface SystemMetrics {
  cpu: CpuMetrics;
  memory: MemoryMetrics;
  disk: DiskMetrics;
  process: ProcessMetrics;
}
