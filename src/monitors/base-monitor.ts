import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import { HistoryBuffer } from '../utils/history-buffer.js';
import type {
  AgentIdentity,
  ExecutionOutcome,
  Monitor,
  MonitorMetrics,
  PlanContext,
} from '../agents/types.js';
import { scoreOf, type AnalysisResult, type ImprovementPlan, type ScoreSample } from './types.js';

/** Every monitor reports under this layer */
export const MONITORING_LAYER = 'monitoring';

export const SOURCE_EXTENSIONS: readonly string[] = ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs', '.mts', '.cts'];

/**
 * Records one score sample and refreshes the gauges on every
 * analyze(); subclasses only inspect, plan and execute.
 */
export abstract class BaseMonitor<A extends AnalysisResult> implements Monitor<A> {
  abstract readonly kind: A['kind'];
  readonly identity: AgentIdentity;
  readonly history = new HistoryBuffer<ScoreSample>();

  protected logger: Logger;
  private gauges: MonitorMetrics = {};

  constructor(identity: AgentIdentity) {
    this.identity = identity;
    this.logger = getLogger().child({ agent: identity.name });
  }

  async analyze(): Promise<A> {
    const analysis = await this.inspect();
    this.history.push({ timestamp: analysis.timestamp, score: scoreOf(analysis) });
    this.gauges = this.gaugesFor(analysis);
    return analysis;
  }

  metrics(): MonitorMetrics {
    return { ...this.gauges };
  }

  abstract plan(analysis: A, context: PlanContext): Promise<ImprovementPlan[]>;

  abstract execute(plan: ImprovementPlan): Promise<ExecutionOutcome>;

  /** Gather findings and compute the score */
  protected abstract inspect(): Promise<A>;

  protected abstract gaugesFor(analysis: A): MonitorMetrics;

  protected skipped(plan: ImprovementPlan): ExecutionOutcome {
    return {
      status: 'skipped',
      message: `Unknown plan type: ${plan.type}`,
      action: plan.type,
    };
  }
}
