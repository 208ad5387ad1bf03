import type {
  ActivityEntry,
  AgentIdentity,
  CycleResult,
  ImprovementSuggestion,
  LearnedPattern,
} from '../agents/types.js';
import type { AggregateReport } from '../orchestrator/types.js';
import type { StoredReport } from './schema.js';

/**
 * Append-only record sink for agents and the orchestrator.
 *
 * Writes resolve to `false` on failure and never reject. `register` is the
 * exception: it prepares an agent's storage and throws PersistenceError
 * when that is impossible.
 */
export interface MonitorStore {
  register(identity: AgentIdentity): void;
  appendActivity(identity: AgentIdentity, entry: ActivityEntry): Promise<boolean>;
  /** Whole-document snapshot of a terminal cycle */
  saveCycle(identity: AgentIdentity, cycle: CycleResult): Promise<boolean>;
  appendPattern(identity: AgentIdentity, pattern: LearnedPattern): Promise<boolean>;
  /** Shared by every agent of the same layer */
  appendSuggestion(identity: AgentIdentity, suggestion: ImprovementSuggestion): Promise<boolean>;
  saveReport(report: AggregateReport): Promise<boolean>;
  /** Most recently written report, or null when there is none or it cannot be read */
  latestReport(): Promise<StoredReport | null>;
}
