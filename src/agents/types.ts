import type { ErrorKind } from '../core/result.js';
import type { HistoryBuffer } from '../utils/history-buffer.js';
import type {
  AnalysisResult,
  ImprovementPlan,
  MonitorKind,
  ScoreSample,
} from '../monitors/types.js';

// ===== Identity & State =====

export interface AgentIdentity {
  readonly name: string;
  readonly layer: string;
  readonly intervalSeconds: number;
}

export type AgentState =
  | 'idle'
  | 'analyzing'
  | 'planning'
  | 'executing'
  | 'validating'
  | 'learning'
  | 'success'
  | 'error';

/** Gauges a monitor exposes; copied into every activity line */
export type MonitorMetrics = Record<string, number>;

// ===== Execution =====

export type ExecutionStatus = 'success' | 'partial' | 'error' | 'skipped' | 'logged';

/** What a monitor's execute() reports for one plan */
export interface ExecutionOutcome {
  status: ExecutionStatus;
  message: string;
  /** Plan type, or the unknown type that was skipped */
  action: string;
  /** Raw tool output, trimmed */
  output?: string;
  /** Package names a dependency recommendation covers */
  packages?: string[];
}

export interface ExecutionResult extends ExecutionOutcome {
  plan: ImprovementPlan;
  validated: boolean;
}

// ===== Cycle =====

export type CycleStatus = 'running' | 'success' | 'error';

export interface CyclePhases {
  analyze?: { status: 'success'; result: AnalysisResult };
  plan?: { status: 'success'; plansCreated: number; plans: ImprovementPlan[] };
  execute?: { status: 'success'; executed: number; results: ExecutionResult[] };
}

export interface CycleResult {
  cycleId: string;
  agent: string;
  layer: string;
  kind: MonitorKind;
  startedAt: string;
  completedAt?: string;
  durationSeconds?: number;
  status: CycleStatus;
  phases: CyclePhases;
  error?: string;
  errorKind?: ErrorKind;
}

// ===== Persisted records =====

export type ActivityAction = 'analyze' | 'plan' | 'execute' | 'cycle';
export type ActivityStatus = 'success' | 'error' | 'validation_failed';

export interface ActivityEntry {
  timestamp: string;
  agent: string;
  layer: string;
  action: ActivityAction;
  status: ActivityStatus;
  details: unknown;
  metrics: MonitorMetrics;
}

export interface LearnedPattern {
  timestamp: string;
  agent: string;
  action: string;
  outcome: 'success';
}

export interface SuggestionInput {
  category: MonitorKind;
  priority: number;
  title: string;
  description: string;
  /** Expected improvement of the score, 0-1 */
  estimatedImpact: number;
  analysis: Record<string, unknown>;
}

export interface ImprovementSuggestion extends SuggestionInput {
  createdAt: string;
  status: 'pending';
  agent: string;
  layer: string;
}

// ===== Monitor capability =====

/**
 * Handed to plan(): the only side effect a plan phase may have is writing
 * a suggestion for a human.
 */
export interface PlanContext {
  suggest(input: SuggestionInput): Promise<boolean>;
}

/**
 * What the lifecycle engine needs from a monitor. analyze() must push one
 * sample onto `history` per call.
 */
export interface Monitor<A extends AnalysisResult = AnalysisResult> {
  readonly kind: A['kind'];
  readonly identity: AgentIdentity;
  readonly history: HistoryBuffer<ScoreSample>;
  metrics(): MonitorMetrics;
  analyze(): Promise<A>;
  plan(analysis: A, context: PlanContext): Promise<ImprovementPlan[]>;
  /** Plans this monitor does not recognise come back `skipped` */
  execute(plan: ImprovementPlan): Promise<ExecutionOutcome>;
}

export interface AgentStatus {
  name: string;
  layer: string;
  kind: MonitorKind;
  running: boolean;
  state: AgentState;
  lastRun: string | null;
  intervalSeconds: number;
  latestScore: number | null;
  historySize: number;
  metrics: MonitorMetrics;
}

/** The orchestrator's view of an agent */
export interface CycleRunner {
  readonly identity: AgentIdentity;
  readonly kind: MonitorKind;
  runCycle(): Promise<CycleResult>;
  getStatus(): AgentStatus;
  start(): Promise<void>;
  stop(): void;
}
