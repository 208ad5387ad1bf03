import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { AgentIdentity, AgentStatus, CycleResult, CycleRunner } from '../../../src/agents/types.js';
import { EventBus } from '../../../src/core/events.js';
import { MONITOR_KINDS, type MonitorKind } from '../../../src/monitors/types.js';
import {
  MonitoringOrchestrator,
  computeAggregate,
  scoreFromOutcome,
  type AgentSet,
} from '../../../src/orchestrator/orchestrator.js';
import type { AgentRunOutcome, AggregateReport } from '../../../src/orchestrator/types.js';
import { MemoryMonitorStore } from '../../../src/store/memory-store.js';
import { performanceAnalysis } from '../../helpers/stub-monitor.js';

function cycleWithScore(kind: MonitorKind, score: number): CycleResult {
  return {
    cycleId: `cycle-${kind}`,
    agent: kind,
    layer: 'monitoring',
    kind,
    startedAt: '2026-01-01T00:00:00.000Z',
    completedAt: '2026-01-01T00:00:01.000Z',
    durationSeconds: 1,
    status: 'success',
    phases: { analyze: { status: 'success', result: performanceAnalysis(score) } },
  };
}

class StubRunner implements CycleRunner {
  readonly identity: AgentIdentity;
  readonly log: string[];
  crash = false;

  constructor(readonly kind: MonitorKind, private score: number, log: string[]) {
    this.identity = { name: kind, layer: 'monitoring', intervalSeconds: 60 };
    this.log = log;
  }

  async runCycle(): Promise<CycleResult> {
    this.log.push(`start:${this.kind}`);
    await Promise.resolve();
    this.log.push(`end:${this.kind}`);
    if (this.crash) throw new Error(`${this.kind} crashed`);
    return cycleWithScore(this.kind, this.score);
  }

  getStatus(): AgentStatus {
    return {
      name: this.kind,
      layer: 'monitoring',
      kind: this.kind,
      running: false,
      state: 'idle',
      lastRun: null,
      intervalSeconds: 60,
      latestScore: this.score,
      historySize: 0,
      metrics: {},
    };
  }

  async start(): Promise<void> {}

  stop(): void {}
}

const SCORES: Record<MonitorKind, number> = {
  code_health: 90,
  performance: 100,
  security: 70,
  dependencies: 80,
};

describe('scoreFromOutcome', () => {
  it('reads the score declared in the analyze phase', () => {
    expect(scoreFromOutcome({ status: 'success', result: cycleWithScore('performance', 64) })).toBe(64);
  });

  it('is 0 for a crashed agent', () => {
    expect(scoreFromOutcome({ status: 'error', error: 'boom' })).toBe(0);
  });

  it('is 0 for a cycle that failed before analysis', () => {
    const failed: CycleResult = { ...cycleWithScore('security', 90), status: 'error', phases: {} };

    expect(scoreFromOutcome({ status: 'success', result: failed })).toBe(0);
  });
});

describe('computeAggregate', () => {
  it('weights the four scores', () => {
    const outcomes: Record<MonitorKind, AgentRunOutcome> = {
      code_health: { status: 'success', result: cycleWithScore('code_health', 90) },
      performance: { status: 'success', result: cycleWithScore('performance', 100) },
      security: { status: 'success', result: cycleWithScore('security', 70) },
      dependencies: { status: 'success', result: cycleWithScore('dependencies', 80) },
    };

    const aggregate = computeAggregate(outcomes);

    // 27 + 20 + 24.5 + 12
    expect(aggregate.overallScore).toBeCloseTo(83.5, 10);
    expect(aggregate.status).toBe('healthy');
    expect(aggregate.scores).toEqual(SCORES);
  });
});

describe('MonitoringOrchestrator', () => {
  let log: string[];
  let runners: Record<MonitorKind, StubRunner>;
  let store: MemoryMonitorStore;
  let events: EventBus;
  let orchestrator: MonitoringOrchestrator;

  beforeEach(() => {
    log = [];
    runners = {
      code_health: new StubRunner('code_health', SCORES.code_health, log),
      performance: new StubRunner('performance', SCORES.performance, log),
      security: new StubRunner('security', SCORES.security, log),
      dependencies: new StubRunner('dependencies', SCORES.dependencies, log),
    };
    const agents: AgentSet = runners;
    store = new MemoryMonitorStore();
    events = new EventBus();
    orchestrator = new MonitoringOrchestrator({ agents, store, events });
  });

  it('runs the agents one after another by default', async () => {
    const report = await orchestrator.runAllAgents();

    expect(report.mode).toBe('sequential');
    expect(log).toEqual(MONITOR_KINDS.flatMap(kind => [`start:${kind}`, `end:${kind}`]));
    expect(report.aggregate.overallScore).toBeCloseTo(83.5, 10);
  });

  it('starts every agent before any finishes in parallel mode', async () => {
    const report = await orchestrator.runAllAgents({ parallel: true });

    expect(report.mode).toBe('parallel');
    expect(log.slice(0, 4)).toEqual(MONITOR_KINDS.map(kind => `start:${kind}`));
  });

  it('scores a crashed agent as 0 without failing the run', async () => {
    runners.security.crash = true;

    const report = await orchestrator.runAllAgents();

    expect(report.agents.security).toEqual({ status: 'error', error: 'security crashed' });
    expect(report.agents.dependencies.status).toBe('success');
    expect(report.aggregate.scores.security).toBe(0);
    // 27 + 20 + 0 + 12
    expect(report.aggregate.overallScore).toBeCloseTo(59, 10);
    expect(report.aggregate.status).toBe('critical');
  });

  it('persists and announces the report', async () => {
    const announced: AggregateReport[] = [];
    events.on('orchestrator:complete', e => announced.push(e.report));

    const report = await orchestrator.runAllAgents();

    expect(store.reports).toEqual([report]);
    expect(announced).toEqual([report]);
    await expect(orchestrator.getLatestResults()).resolves.toBe(report);
  });

  it('returns the report when a completion listener throws', async () => {
    events.on('orchestrator:complete', () => {
      throw new Error('listener bug');
    });

    const report = await orchestrator.runAllAgents();

    expect(store.reports).toEqual([report]);
    expect(orchestrator.getStatus().orchestrator).toBe('ready');
  });

  it('reports status for every agent', async () => {
    expect(orchestrator.getStatus()).toMatchObject({ orchestrator: 'ready', lastRun: null });

    await orchestrator.runAllAgents();
    const status = orchestrator.getStatus();

    expect(status.orchestrator).toBe('ready');
    expect(status.lastRun).not.toBeNull();
    expect(Object.keys(status.agents)).toEqual([...MONITOR_KINDS]);
    expect(status.agents.security.latestScore).toBe(70);
  });

  it('is running while a run is in flight', async () => {
    const run = orchestrator.runAllAgents();

    expect(orchestrator.getStatus().orchestrator).toBe('running');
    await run;
    expect(orchestrator.getStatus().orchestrator).toBe('ready');
  });

  it('repeats runs on an interval until stopped', async () => {
    vi.useFakeTimers();
    try {
      const loop = orchestrator.start(10, { parallel: true });
      await vi.advanceTimersByTimeAsync(0);
      expect(store.reports).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(10_000);
      await vi.advanceTimersByTimeAsync(0);
      expect(store.reports).toHaveLength(2);
      expect(store.reports[1].mode).toBe('parallel');

      orchestrator.stop();
      await loop;
    } finally {
      vi.useRealTimers();
    }
  });
});
