import type {
  ActivityEntry,
  AgentIdentity,
  CycleResult,
  ImprovementSuggestion,
  LearnedPattern,
} from '../agents/types.js';
import type { AggregateReport } from '../orchestrator/types.js';
import type { StoredReport } from './schema.js';
import type { MonitorStore } from './types.js';

export interface AgentRecord<T> {
  agent: string;
  record: T;
}

/**
 * In-process MonitorStore. Keeps every record in arrays; `failWrites`
 * makes every write report failure, the way a full disk would.
 */
export class MemoryMonitorStore implements MonitorStore {
  readonly registered: AgentIdentity[] = [];
  readonly activities: Array<AgentRecord<ActivityEntry>> = [];
  readonly cycles: Array<AgentRecord<CycleResult>> = [];
  readonly patterns: Array<AgentRecord<LearnedPattern>> = [];
  readonly suggestions: Array<AgentRecord<ImprovementSuggestion>> = [];
  readonly reports: AggregateReport[] = [];
  failWrites = false;

  register(identity: AgentIdentity): void {
    this.registered.push(identity);
  }

  async appendActivity(identity: AgentIdentity, entry: ActivityEntry): Promise<boolean> {
    return this.keep(this.activities, identity, entry);
  }

  async saveCycle(identity: AgentIdentity, cycle: CycleResult): Promise<boolean> {
    return this.keep(this.cycles, identity, cycle);
  }

  async appendPattern(identity: AgentIdentity, pattern: LearnedPattern): Promise<boolean> {
    return this.keep(this.patterns, identity, pattern);
  }

  async appendSuggestion(identity: AgentIdentity, suggestion: ImprovementSuggestion): Promise<boolean> {
    return this.keep(this.suggestions, identity, suggestion);
  }

  async saveReport(report: AggregateReport): Promise<boolean> {
    if (this.failWrites) return false;
    this.reports.push(report);
    return true;
  }

  async latestReport(): Promise<StoredReport | null> {
    return this.reports[this.reports.length - 1] ?? null;
  }

  /** Activity lines written by one agent */
  activitiesOf(agent: string): ActivityEntry[] {
    return this.activities.filter(a => a.agent === agent).map(a => a.record);
  }

  private keep<T>(list: Array<AgentRecord<T>>, identity: AgentIdentity, record: T): boolean {
    if (this.failWrites) return false;
    list.push({ agent: identity.name, record });
    return true;
  }
}
