/**
 * healthpulse public API
 */

// Core
export { ConfigManager, PROJECT_CONFIG_FILE, type ConfigManagerOptions } from './core/config.js';
export {
  HealthPulseConfigSchema,
  type HealthPulseConfig,
  type HealthPulseConfigOverrides,
} from './core/types.js';
export { EventBus, type HealthPulseEvents } from './core/events.js';
export { createLogger, getLogger, setLogger, type LoggerOptions } from './core/logger.js';
export { HealthPulseError, ConfigError, PersistenceError, errorMessage } from './core/errors.js';
export { ok, fail, attempt, type Result, type Failure, type ErrorKind } from './core/result.js';

// Agents
export { AutonomousAgent, type AutonomousAgentOptions } from './agents/autonomous-agent.js';
export { PeriodicTask, type PeriodicTaskOptions } from './agents/periodic-task.js';
export type * from './agents/types.js';

// Monitors
export * from './monitors/index.js';

// Probes
export type * from './probes/types.js';
export { BaseProbe, type ProbeOptions } from './probes/base-probe.js';
export { runCommand } from './probes/command-runner.js';
export { EslintProbe, type SourceProbeOptions } from './probes/eslint.js';
export { PrettierProbe } from './probes/prettier.js';
export { TscProbe, parseTypeErrors } from './probes/tsc.js';
export { NpmAuditProbe, NpmOutdatedProbe, NpmInstalledProbe } from './probes/npm.js';
export { SystemMetricsProbe, nodeMetricsSource, type MetricsSource } from './probes/system-metrics.js';

// Scoring
export * from './scoring/index.js';

// Orchestration & persistence
export * from './orchestrator/index.js';
export * from './store/index.js';

// Utilities
export { HistoryBuffer, HISTORY_CAPACITY } from './utils/history-buffer.js';

export { VERSION, NAME } from './version.js';
