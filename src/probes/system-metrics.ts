/**
 * CPU, memory, disk and process statistics from
 * Node's os module and statfs. A `null` source models a host where metrics
 * cannot be collected; the performance monitor then degrades to load average.
 */

import { cpus, freemem, loadavg, totalmem } from 'os';
import { statfs } from 'fs/promises';
import { BaseProbe, type ProbeOptions } from './base-probe.js';
import type {
  DiskMetrics,
  MemoryMetrics,
  ProbeResult,
  ProcessMetrics,
  SystemMetrics,
} from './types.js';

const GB = 1024 ** 3;
const MB = 1024 ** 2;

export interface MetricsSource {
  /** Host CPU utilisation over a sampling window, 0-100 */
  cpuPercent(sampleMs: number): Promise<number>;
  cpuCount(): number;
  loadAverage(): number[];
  memory(): MemoryMetrics;
  disk(path: string): Promise<DiskMetrics>;
  process(): ProcessMetrics;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function cpuTimes(): { idle: number; total: number } {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus()) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.idle + t.irq;
  }
  return { idle, total };
}

export const nodeMetricsSource: MetricsSource = {
  async cpuPercent(sampleMs: number): Promise<number> {
    const start = cpuTimes();
    await new Promise(resolve => setTimeout(resolve, sampleMs));
    const end = cpuTimes();
    const total = end.total - start.total;
    if (total <= 0) return 0;
    return round2((1 - (end.idle - start.idle) / total) * 100);
  },

  cpuCount(): number {
    return cpus().length;
  },

  loadAverage(): number[] {
    return loadavg();
  },

  memory(): MemoryMetrics {
    const total = totalmem();
    const available = freemem();
    const used = total - available;
    return {
      percent: total > 0 ? round2((used / total) * 100) : 0,
      totalGb: round2(total / GB),
      availableGb: round2(available / GB),
      usedGb: round2(used / GB),
    };
  },

  async disk(path: string): Promise<DiskMetrics> {
    const stats = await statfs(path);
    const total = stats.blocks * stats.bsize;
    const used = (stats.blocks - stats.bfree) * stats.bsize;
    const free = stats.bavail * stats.bsize;
    // Same basis as `df`: space reserved for root counts as neither used nor free
    const usable = used + free;
    return {
      path,
      percent: usable > 0 ? round2((used / usable) * 100) : 0,
      totalGb: round2(total / GB),
      freeGb: round2(free / GB),
      usedGb: round2(used / GB),
    };
  },

  process(): ProcessMetrics {
    const usage = process.memoryUsage();
    return {
      pid: process.pid,
      memoryMb: round2(usage.rss / MB),
      heapUsedMb: round2(usage.heapUsed / MB),
      uptimeSeconds: Math.round(process.uptime()),
    };
  },
};

export interface SystemMetricsProbeOptions extends ProbeOptions {
  source: MetricsSource | null;
  diskPath: string;
  cpuSampleMs: number;
}

export class SystemMetricsProbe extends BaseProbe<SystemMetrics | null> {
  readonly name = 'system-metrics';
  private readonly source: MetricsSource | null;
  private readonly diskPath: string;
  private readonly cpuSampleMs: number;

  constructor(options: SystemMetricsProbeOptions) {
    super(options);
    this.source = options.source;
    this.diskPath = options.diskPath;
    this.cpuSampleMs = options.cpuSampleMs;
  }

  protected empty(): SystemMetrics | null {
    return null;
  }

  protected async collect(): Promise<ProbeResult<SystemMetrics | null>> {
    const source = this.source;
    if (!source) {
      return this.unavailable('not_found', 'System metrics source is not available');
    }

    const [percent, disk] = await Promise.all([
      source.cpuPercent(this.cpuSampleMs),
      source.disk(this.diskPath),
    ]);

    return {
      available: true,
      findings: {
        cpu: { percent, count: source.cpuCount(), loadAverage: source.loadAverage() },
        memory: source.memory(),
        disk,
        process: source.process(),
      },
    };
  }
}
