import { resolve } from 'path';
import { ConfigManager, type ConfigManagerOptions } from '../core/config.js';
import type { EventBus } from '../core/events.js';
import type { HealthPulseConfigOverrides } from '../core/types.js';
import type { MetricsSource } from '../probes/system-metrics.js';
import type { CommandRunner } from '../probes/types.js';
import type { MonitorStore } from '../store/types.js';
import { createOrchestrator } from './orchestrator.js';
import type { AggregateReport } from './types.js';

export interface MonitoringCycleOptions {
  projectDir?: string;
  /** Falls back to `orchestrator.parallel` from the configuration */
  parallel?: boolean;
  overrides?: HealthPulseConfigOverrides;
  configOptions?: ConfigManagerOptions;
  run?: CommandRunner;
  metricsSource?: MetricsSource | null;
  store?: MonitorStore;
  events?: EventBus;
}

/**
 * Load configuration, build the orchestrator and run every agent once.
 * Configuration and directory failures reject; agent failures end up in
 * the report.
 */
export async function runMonitoringCycle(options: MonitoringCycleOptions = {}): Promise<AggregateReport> {
  const projectDir = resolve(options.projectDir ?? process.cwd());
  const config = new ConfigManager(projectDir, options.configOptions).load(options.overrides);

  const orchestrator = createOrchestrator({
    projectDir,
    config,
    run: options.run,
    metricsSource: options.metricsSource,
    store: options.store,
    events: options.events,
  });

  return orchestrator.runAllAgents({ parallel: options.parallel ?? config.orchestrator.parallel });
}
