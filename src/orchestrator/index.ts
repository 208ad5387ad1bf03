export {
  MonitoringOrchestrator,
  createOrchestrator,
  computeAggregate,
  scoreFromOutcome,
  type AgentSet,
  type OrchestratorOptions,
  type CreateOrchestratorOptions,
} from './orchestrator.js';
export { runMonitoringCycle, type MonitoringCycleOptions } from './run-monitoring.js';
export type {
  AgentRunOutcome,
  AggregateReport,
  OrchestratorStatus,
  RunMode,
  RunOptions,
} from './types.js';
