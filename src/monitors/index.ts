import type { HealthPulseConfig } from '../core/types.js';
import type { MetricsSource } from '../probes/system-metrics.js';
import type { CommandRunner } from '../probes/types.js';
import { CodeHealthMonitor } from './code-health.js';
import { DependencyScanner } from './dependencies.js';
import { PerformanceMonitor } from './performance.js';
import { SecurityAuditor } from './security.js';

export { BaseMonitor, MONITORING_LAYER, SOURCE_EXTENSIONS } from './base-monitor.js';
export { CodeHealthMonitor, CODE_HEALTH_THRESHOLD, type CodeHealthMonitorOptions } from './code-health.js';
export {
  PerformanceMonitor,
  PERFORMANCE_THRESHOLD,
  DEFAULT_THRESHOLDS,
  type PerformanceMonitorOptions,
  type ResourceThresholds,
} from './performance.js';
export {
  SecurityAuditor,
  SECURITY_THRESHOLD,
  SECRET_PATTERNS,
  firstPatternMatches,
  type SecurityAuditorOptions,
} from './security.js';
export {
  DependencyScanner,
  OUTDATED_SUGGESTION_LIMIT,
  classifyUpdate,
  type DependencyScannerOptions,
  type UpdateClass,
} from './dependencies.js';
export * from './types.js';

export interface MonitorSet {
  code_health: CodeHealthMonitor;
  performance: PerformanceMonitor;
  security: SecurityAuditor;
  dependencies: DependencyScanner;
}

export interface CreateMonitorsOptions {
  projectDir: string;
  config: HealthPulseConfig;
  run?: CommandRunner;
  /** Omit for Node's os module; null simulates a host without metrics */
  metricsSource?: MetricsSource | null;
}

/**
 * Build the four monitors from a loaded configuration.
 */
export function createMonitors(options: CreateMonitorsOptions): MonitorSet {
  const { projectDir, config, run } = options;
  const { codeHealth, performance, security, dependencies } = config.monitors;

  return {
    code_health: new CodeHealthMonitor({
      projectDir,
      sourceDir: config.paths.sourceDir,
      extensions: codeHealth.extensions,
      intervalSeconds: codeHealth.intervalSeconds,
      run,
    }),
    performance: new PerformanceMonitor({
      projectDir,
      thresholds: performance.thresholds,
      logSizeLimitMb: performance.logSizeLimitMb,
      logDirs: performance.logDirs,
      diskPath: performance.diskPath,
      cpuSampleMs: performance.cpuSampleMs,
      metricsSource: options.metricsSource,
      intervalSeconds: performance.intervalSeconds,
    }),
    security: new SecurityAuditor({
      projectDir,
      sourceDir: config.paths.sourceDir,
      extensions: codeHealth.extensions,
      secretsFile: security.secretsFile,
      intervalSeconds: security.intervalSeconds,
      run,
    }),
    dependencies: new DependencyScanner({
      projectDir,
      manifestFiles: dependencies.manifestFiles,
      intervalSeconds: dependencies.intervalSeconds,
      run,
    }),
  };
}
