/**
 * Host CPU, memory and disk pressure plus the size of
 * the log directories. Alerts are logged; nothing is ever cleaned up.
 */

import { loadavg } from 'os';
import { resolve } from 'path';
import type { ExecutionOutcome, MonitorMetrics, PlanContext } from '../agents/types.js';
import { SystemMetricsProbe, nodeMetricsSource, type MetricsSource } from '../probes/system-metrics.js';
import type { SystemMetrics } from '../probes/types.js';
import { performanceScore } from '../scoring/index.js';
import { directorySize } from '../utils/fs.js';
import { BaseMonitor, MONITORING_LAYER } from './base-monitor.js';
import type {
  ImprovementPlan,
  LogStats,
  PerformanceAnalysis,
  PerformancePlan,
  ResourceAlertPlan,
  ResourceName,
} from './types.js';

export const PERFORMANCE_THRESHOLD = 70;
const MB = 1024 * 1024;

export interface ResourceThresholds {
  cpu: number;
  memory: number;
  disk: number;
}

export const DEFAULT_THRESHOLDS: Readonly<ResourceThresholds> = { cpu: 80, memory: 80, disk: 90 };

export interface PerformanceMonitorOptions {
  projectDir: string;
  thresholds?: ResourceThresholds;
  logSizeLimitMb?: number;
  /** Relative to projectDir, or absolute */
  logDirs?: readonly string[];
  diskPath?: string;
  cpuSampleMs?: number;
  /** null when the host offers no metrics; defaults to Node's os module */
  metricsSource?: MetricsSource | null;
  intervalSeconds?: number;
}

const ALERTS: ReadonlyArray<{
  metric: ResourceName;
  type: ResourceAlertPlan['type'];
  label: string;
  priority: number;
}> = [
  { metric: 'cpu', type: 'high_cpu_alert', label: 'CPU', priority: 8 },
  { metric: 'memory', type: 'high_memory_alert', label: 'Memory', priority: 8 },
  { metric: 'disk', type: 'high_disk_alert', label: 'Disk', priority: 9 },
];

function usageOf(system: SystemMetrics, metric: ResourceName): number {
  switch (metric) {
    case 'cpu':
      return system.cpu.percent;
    case 'memory':
      return system.memory.percent;
    case 'disk':
      return system.disk.percent;
  }
}

export class PerformanceMonitor extends BaseMonitor<PerformanceAnalysis> {
  readonly kind = 'performance' as const;

  private readonly thresholds: ResourceThresholds;
  private readonly logSizeLimitMb: number;
  private readonly logDirs: string[];
  private readonly systemProbe: SystemMetricsProbe;

  constructor(options: PerformanceMonitorOptions) {
    super({
      name: 'PerformanceMonitor',
      layer: MONITORING_LAYER,
      intervalSeconds: options.intervalSeconds ?? 900,
    });
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.logSizeLimitMb = options.logSizeLimitMb ?? 100;
    this.logDirs = (options.logDirs ?? ['logs']).map(dir => resolve(options.projectDir, dir));
    this.systemProbe = new SystemMetricsProbe({
      cwd: options.projectDir,
      source: options.metricsSource === undefined ? nodeMetricsSource : options.metricsSource,
      diskPath: options.diskPath ?? '/',
      cpuSampleMs: options.cpuSampleMs ?? 1000,
    });
  }

  protected async inspect(): Promise<PerformanceAnalysis> {
    const timestamp = new Date().toISOString();
    const probed = await this.systemProbe.probe();
    const system = probed.available ? probed.findings : null;
    const logs = this.logStats();

    const score = performanceScore(
      system
        ? {
          cpuPercent: system.cpu.percent,
          memoryPercent: system.memory.percent,
          diskPercent: system.disk.percent,
        }
        : null,
    );

    if (!system) {
      this.logger.warn('System metrics unavailable, reporting load average only');
    }
    this.logger.info({ performanceScore: score, logSizeMb: logs.totalSizeMb }, 'Performance analyzed');

    return {
      kind: 'performance',
      timestamp,
      metricsAvailable: system !== null,
      system,
      basic: system ? null : { timestamp, loadAverage: loadavg() },
      ...(probed.available ? {} : { metricsError: probed.error }),
      logs,
      performanceScore: score,
    };
  }

  protected gaugesFor(analysis: PerformanceAnalysis): MonitorMetrics {
    const gauges: MonitorMetrics = {
      performanceScore: analysis.performanceScore,
      logSizeMb: analysis.logs.totalSizeMb,
    };
    if (analysis.system) {
      gauges.cpuPercent = analysis.system.cpu.percent;
      gauges.memoryPercent = analysis.system.memory.percent;
      gauges.diskPercent = analysis.system.disk.percent;
    }
    return gauges;
  }

  async plan(analysis: PerformanceAnalysis, context: PlanContext): Promise<PerformancePlan[]> {
    const plans: PerformancePlan[] = [];
    const system = analysis.system;

    if (system) {
      for (const alert of ALERTS) {
        const value = usageOf(system, alert.metric);
        const threshold = this.thresholds[alert.metric];
        if (value > threshold) {
          plans.push({
            type: alert.type,
            priority: alert.priority,
            description: `${alert.label} usage is ${value.toFixed(1)}%`,
            requiresApproval: true,
            payload: { metric: alert.metric, value, threshold },
          });
        }
      }
    }

    if (analysis.logs.totalSizeMb > this.logSizeLimitMb) {
      plans.push({
        type: 'log_cleanup',
        priority: 5,
        description: `Log files exceed ${this.logSizeLimitMb}MB, consider cleanup`,
        requiresApproval: true,
        payload: { totalSizeMb: analysis.logs.totalSizeMb, limitMb: this.logSizeLimitMb },
      });
    }

    if (analysis.performanceScore < PERFORMANCE_THRESHOLD) {
      await context.suggest({
        category: 'performance',
        priority: 7,
        title: 'Performance Below Threshold',
        description: `Performance score is ${analysis.performanceScore.toFixed(1)}/100`,
        estimatedImpact: 0.15,
        analysis: {
          cpu: system?.cpu ?? null,
          memory: system?.memory ?? null,
          disk: system?.disk ?? null,
        },
      });
    }

    return plans;
  }

  async execute(plan: ImprovementPlan): Promise<ExecutionOutcome> {
    switch (plan.type) {
      case 'high_cpu_alert':
      case 'high_memory_alert':
      case 'high_disk_alert':
        this.logger.warn({ ...plan.payload }, `ALERT: ${plan.description}`);
        return {
          status: 'logged',
          message: `Performance alert logged: ${plan.description}`,
          action: plan.type,
        };
      case 'log_cleanup':
        this.logger.info({ ...plan.payload }, `Recommendation: ${plan.description}`);
        return {
          status: 'logged',
          message: 'Log cleanup recommendation logged',
          action: plan.type,
        };
      default:
        return this.skipped(plan);
    }
  }

  private logStats(): LogStats {
    const { bytes, files } = directorySize(this.logDirs);
    return { totalSizeMb: Math.round((bytes / MB) * 100) / 100, fileCount: files };
  }
}
