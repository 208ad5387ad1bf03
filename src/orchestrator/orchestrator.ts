import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { errorMessage } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { attempt } from '../core/result.js';
import type { EventBus } from '../core/events.js';
import { AutonomousAgent } from '../agents/autonomous-agent.js';
import { PeriodicTask } from '../agents/periodic-task.js';
import type { CycleRunner } from '../agents/types.js';
import { createMonitors, type CreateMonitorsOptions } from '../monitors/index.js';
import { byKind, scoreOf, type MonitorKind } from '../monitors/types.js';
import { aggregateScores, round1, type AggregateScores } from '../scoring/index.js';
import { FileMonitorStore } from '../store/file-store.js';
import type { StoredReport } from '../store/schema.js';
import type { MonitorStore } from '../store/types.js';
import { Timer } from '../utils/timer.js';
import type {
  AgentRunOutcome,
  AggregateReport,
  OrchestratorStatus,
  RunMode,
  RunOptions,
} from './types.js';

export type AgentSet = Record<MonitorKind, CycleRunner>;

export interface OrchestratorOptions {
  agents: AgentSet;
  store: MonitorStore;
  events?: EventBus;
}

/**
 * The score an agent reported in its analyze phase; 0 when the agent
 * crashed or never got that far.
 */
export function scoreFromOutcome(outcome: AgentRunOutcome): number {
  if (outcome.status !== 'success') return 0;
  const analyze = outcome.result.phases.analyze;
  return analyze ? scoreOf(analyze.result) : 0;
}

export function computeAggregate(outcomes: Record<MonitorKind, AgentRunOutcome>): AggregateScores {
  return aggregateScores(byKind(kind => scoreFromOutcome(outcomes[kind])));
}

/**
 * Runs the four agents and persists one aggregate report per run. A crashed
 * agent scores 0 and never sinks the others.
 */
export class MonitoringOrchestrator {
  private logger: Logger = getLogger().child({ agent: 'orchestrator' });
  private readonly agents: AgentSet;
  private readonly store: MonitorStore;
  private readonly events?: EventBus;
  private lastRun: Date | null = null;
  private inFlight = false;
  private task: PeriodicTask | null = null;

  constructor(options: OrchestratorOptions) {
    this.agents = options.agents;
    this.store = options.store;
    this.events = options.events;
  }

  async runAllAgents(options: RunOptions = {}): Promise<AggregateReport> {
    const mode: RunMode = options.parallel ? 'parallel' : 'sequential';
    const timer = new Timer();
    const startedAt = new Date().toISOString();
    this.inFlight = true;
    this.logger.info({ mode }, 'Running all monitoring agents');

    try {
      const agents = mode === 'parallel' ? await this.runParallel() : await this.runSequential();
      const aggregate = computeAggregate(agents);
      const completed = new Date();

      const report: AggregateReport = {
        runId: nanoid(10),
        startedAt,
        completedAt: completed.toISOString(),
        durationSeconds: timer.stop() / 1000,
        mode,
        agents,
        aggregate,
      };

      this.lastRun = completed;
      this.logger.info(
        { overallScore: round1(aggregate.overallScore), status: aggregate.status, durationSeconds: report.durationSeconds },
        'Monitoring complete',
      );

      await this.store.saveReport(report);
      this.publishComplete(report);
      return report;
    } finally {
      this.inFlight = false;
    }
  }

  getLatestResults(): Promise<StoredReport | null> {
    return this.store.latestReport();
  }

  getStatus(): OrchestratorStatus {
    return {
      orchestrator: this.inFlight ? 'running' : 'ready',
      lastRun: this.lastRun ? this.lastRun.toISOString() : null,
      agents: byKind(kind => this.agents[kind].getStatus()),
    };
  }

  /**
   * Run the whole set every `intervalSeconds` until stop(). Resolves once
   * the loop has exited.
   */
  start(intervalSeconds: number, options: RunOptions = {}): Promise<void> {
    this.task ??= new PeriodicTask({
      name: 'orchestrator',
      intervalMs: intervalSeconds * 1000,
      run: () => this.runAllAgents(options),
    });
    return this.task.start();
  }

  stop(): void {
    this.task?.stop();
  }

  private publishComplete(report: AggregateReport): void {
    try {
      this.events?.emit('orchestrator:complete', { report });
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, 'Event listener failed');
    }
  }

  private async runOne(kind: MonitorKind): Promise<AgentRunOutcome> {
    const agent = this.agents[kind];
    const ran = await attempt(() => agent.runCycle(), 'phase_failure');
    if (ran.ok) {
      return { status: 'success', result: ran.value };
    }
    this.logger.error({ monitor: agent.identity.name, error: ran.error.message }, 'Agent crashed');
    return { status: 'error', error: ran.error.message };
  }

  private async runSequential(): Promise<Record<MonitorKind, AgentRunOutcome>> {
    return {
      code_health: await this.runOne('code_health'),
      performance: await this.runOne('performance'),
      security: await this.runOne('security'),
      dependencies: await this.runOne('dependencies'),
    };
  }

  private async runParallel(): Promise<Record<MonitorKind, AgentRunOutcome>> {
    const [code_health, performance, security, dependencies] = await Promise.all([
      this.runOne('code_health'),
      this.runOne('performance'),
      this.runOne('security'),
      this.runOne('dependencies'),
    ]);
    return { code_health, performance, security, dependencies };
  }
}

export interface CreateOrchestratorOptions extends CreateMonitorsOptions {
  /** Defaults to files under the configured logs and data directories */
  store?: MonitorStore;
  events?: EventBus;
}

/**
 * Wire monitors, agents and the store from configuration. Throws
 * PersistenceError when the record directories cannot be created.
 */
export function createOrchestrator(options: CreateOrchestratorOptions): MonitoringOrchestrator {
  const store = options.store ?? new FileMonitorStore({
    rootDir: options.projectDir,
    logsDir: options.config.paths.logsDir,
    dataDir: options.config.paths.dataDir,
  });
  const monitors = createMonitors(options);
  const agentOptions = { store, events: options.events };

  return new MonitoringOrchestrator({
    agents: {
      code_health: new AutonomousAgent(monitors.code_health, agentOptions),
      performance: new AutonomousAgent(monitors.performance, agentOptions),
      security: new AutonomousAgent(monitors.security, agentOptions),
      dependencies: new AutonomousAgent(monitors.dependencies, agentOptions),
    },
    store,
    events: options.events,
  });
}
