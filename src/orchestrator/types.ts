import type { AgentStatus, CycleResult } from '../agents/types.js';
import type { MonitorKind } from '../monitors/types.js';
import type { AggregateScores } from '../scoring/index.js';

export type RunMode = 'sequential' | 'parallel';

/** One agent's contribution to a run; a crashed agent never sinks the others */
export type AgentRunOutcome =
  | { status: 'success'; result: CycleResult }
  | { status: 'error'; error: string };

export interface AggregateReport {
  runId: string;
  startedAt: string;
  completedAt: string;
  durationSeconds: number;
  mode: RunMode;
  agents: Record<MonitorKind, AgentRunOutcome>;
  aggregate: AggregateScores;
}

export interface RunOptions {
  parallel?: boolean;
}

export interface OrchestratorStatus {
  orchestrator: 'ready' | 'running';
  lastRun: string | null;
  agents: Record<MonitorKind, AgentStatus>;
}
