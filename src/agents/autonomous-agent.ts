import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { attempt, type Failure } from '../core/result.js';
import type { EventBus } from '../core/events.js';
import type { MonitorStore } from '../store/types.js';
import type { AnalysisResult, ImprovementPlan } from '../monitors/types.js';
import { Timer } from '../utils/timer.js';
import { PeriodicTask } from './periodic-task.js';
import type {
  ActivityAction,
  ActivityStatus,
  AgentIdentity,
  AgentState,
  AgentStatus,
  CycleResult,
  CycleRunner,
  ExecutionOutcome,
  ExecutionResult,
  Monitor,
  PlanContext,
} from './types.js';

const VALID_STATUSES: ReadonlySet<ExecutionOutcome['status']> = new Set(['success', 'partial', 'logged']);

export interface AutonomousAgentOptions {
  store: MonitorStore;
  events?: EventBus;
}

/**
 * AutonomousAgent — drives one monitor through
 * analyze → plan → execute → validate → learn.
 *
 * runCycle() always resolves. A failing analyze or plan ends the cycle with
 * status `error`; a failing execute only drops that plan. Every terminal
 * cycle is written as a snapshot.
 */
export class AutonomousAgent<A extends AnalysisResult = AnalysisResult> implements CycleRunner {
  readonly identity: AgentIdentity;
  readonly kind: A['kind'];

  private logger: Logger;
  private store: MonitorStore;
  private events?: EventBus;
  private state: AgentState = 'idle';
  private cycleId = '';
  private lastRun: Date | null = null;
  private task: PeriodicTask | null = null;

  /** Throws PersistenceError when the agent's directories cannot be created */
  constructor(private readonly monitor: Monitor<A>, options: AutonomousAgentOptions) {
    this.identity = monitor.identity;
    this.kind = monitor.kind;
    this.store = options.store;
    this.events = options.events;
    this.logger = getLogger().child({ agent: this.identity.name });

    this.store.register(this.identity);
    this.logger.info(
      { layer: this.identity.layer, intervalSeconds: this.identity.intervalSeconds },
      'Initialized',
    );
  }

  // ═══════════════════════════════════════════════════════════════
  // CYCLE
  // ═══════════════════════════════════════════════════════════════

  async runCycle(): Promise<CycleResult> {
    const timer = new Timer();
    this.cycleId = nanoid(10);
    const cycle: CycleResult = {
      cycleId: this.cycleId,
      agent: this.identity.name,
      layer: this.identity.layer,
      kind: this.kind,
      startedAt: new Date().toISOString(),
      status: 'running',
      phases: {},
    };
    this.logger.info({ cycleId: this.cycleId }, 'Starting improvement cycle');

    // every cycle starts from idle, including after success or error
    if (this.state !== 'idle') {
      this.transition('idle');
    }

    // Phase 1: analyze
    this.transition('analyzing');
    const analysis = await attempt(() => this.monitor.analyze(), 'phase_failure');
    if (!analysis.ok) {
      return this.fail(cycle, timer, 'analyze', analysis.error);
    }
    cycle.phases.analyze = { status: 'success', result: analysis.value };
    await this.logActivity('analyze', 'success', analysis.value);

    // Phase 2: plan
    this.transition('planning');
    const planned = await attempt(
      () => this.monitor.plan(analysis.value, this.planContext()),
      'phase_failure',
    );
    if (!planned.ok) {
      return this.fail(cycle, timer, 'plan', planned.error);
    }
    const plans = planned.value;
    cycle.phases.plan = { status: 'success', plansCreated: plans.length, plans };
    await this.logActivity('plan', 'success', { plansCreated: plans.length });

    // Phase 3-5: execute, validate, learn, one plan at a time
    const results: ExecutionResult[] = [];
    for (const [index, plan] of plans.entries()) {
      this.transition('executing');
      this.logger.info({ plan: plan.type, index: index + 1, total: plans.length }, 'Executing plan');
      const result = await this.executePlan(plan);
      if (result) {
        results.push(result);
      }
    }
    cycle.phases.execute = { status: 'success', executed: results.length, results };

    cycle.status = 'success';
    this.complete(cycle, timer);
    this.transition('success');
    this.logger.info(
      { cycleId: this.cycleId, executed: results.length, durationSeconds: cycle.durationSeconds },
      'Cycle complete',
    );

    await this.store.saveCycle(this.identity, cycle);
    this.publishCycle(cycle);
    return cycle;
  }

  /**
   * Execute one plan. Returns the validated result, or null when the plan
   * threw or did not validate.
   */
  private async executePlan(plan: ImprovementPlan): Promise<ExecutionResult | null> {
    const executed = await attempt(() => this.monitor.execute(plan), 'execution_failure');
    if (!executed.ok) {
      this.logger.error({ plan: plan.type, error: executed.error.message }, 'Failed to execute plan');
      await this.logActivity('execute', 'error', { error: executed.error.message, plan });
      return null;
    }

    this.transition('validating');
    const validated = this.validate(executed.value);
    const result: ExecutionResult = { ...executed.value, plan, validated };

    if (!validated) {
      await this.logActivity('execute', 'validation_failed', result);
      return null;
    }

    this.transition('learning');
    await this.learn(result);
    await this.logActivity('execute', 'success', result);
    return result;
  }

  /** A result counts when it did something or deliberately logged */
  protected validate(result: ExecutionOutcome): boolean {
    return VALID_STATUSES.has(result.status);
  }

  /** Remember actions that fully succeeded */
  protected async learn(result: ExecutionResult): Promise<void> {
    if (result.status !== 'success') return;
    await this.store.appendPattern(this.identity, {
      timestamp: new Date().toISOString(),
      agent: this.identity.name,
      action: result.action,
      outcome: 'success',
    });
  }

  private planContext(): PlanContext {
    return {
      suggest: input =>
        this.store.appendSuggestion(this.identity, {
          ...input,
          createdAt: new Date().toISOString(),
          status: 'pending',
          agent: this.identity.name,
          layer: this.identity.layer,
        }),
    };
  }

  private async fail(
    cycle: CycleResult,
    timer: Timer,
    phase: 'analyze' | 'plan',
    failure: Failure,
  ): Promise<CycleResult> {
    cycle.status = 'error';
    cycle.error = failure.message;
    cycle.errorKind = failure.kind;
    this.complete(cycle, timer);
    this.transition('error');
    this.logger.error({ cycleId: this.cycleId, phase, error: failure.message }, 'Cycle failed');

    await this.logActivity('cycle', 'error', { error: failure.message, phase });
    await this.store.saveCycle(this.identity, cycle);
    this.publishCycle(cycle);
    return cycle;
  }

  private complete(cycle: CycleResult, timer: Timer): void {
    const now = new Date();
    cycle.completedAt = now.toISOString();
    cycle.durationSeconds = timer.stop() / 1000;
    this.lastRun = now;
  }

  private async logActivity(action: ActivityAction, status: ActivityStatus, details: unknown): Promise<void> {
    await this.store.appendActivity(this.identity, {
      timestamp: new Date().toISOString(),
      agent: this.identity.name,
      layer: this.identity.layer,
      action,
      status,
      details,
      metrics: this.monitor.metrics(),
    });
  }

  // ═══════════════════════════════════════════════════════════════
  // EVENTS
  // ═══════════════════════════════════════════════════════════════

  private transition(to: AgentState): void {
    const from = this.state;
    this.state = to;
    this.publish(() =>
      this.events?.emit('agent:state', {
        agent: this.identity.name,
        kind: this.kind,
        cycleId: this.cycleId,
        from,
        to,
      }),
    );
  }

  private publishCycle(result: CycleResult): void {
    this.publish(() =>
      this.events?.emit('agent:cycle', { agent: this.identity.name, kind: this.kind, result }),
    );
  }

  /** A throwing listener must not break the cycle */
  private publish(emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, 'Event listener failed');
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // CONTINUOUS MODE
  // ═══════════════════════════════════════════════════════════════

  /**
   * Run cycles every `intervalSeconds` until stop(). Resolves once the loop
   * has exited.
   */
  start(): Promise<void> {
    this.task ??= new PeriodicTask({
      name: this.identity.name,
      intervalMs: this.identity.intervalSeconds * 1000,
      run: () => this.runCycle(),
    });
    return this.task.start();
  }

  stop(): void {
    this.task?.stop();
  }

  getStatus(): AgentStatus {
    return {
      name: this.identity.name,
      layer: this.identity.layer,
      kind: this.kind,
      running: this.task?.running ?? false,
      state: this.state,
      lastRun: this.lastRun ? this.lastRun.toISOString() : null,
      intervalSeconds: this.identity.intervalSeconds,
      latestScore: this.monitor.history.latest()?.score ?? null,
      historySize: this.monitor.history.length,
      metrics: this.monitor.metrics(),
    };
  }
}
