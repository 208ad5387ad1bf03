import { EventEmitter } from 'eventemitter3';
import type { AgentState, CycleResult } from '../agents/types.js';
import type { MonitorKind } from '../monitors/types.js';
import type { AggregateReport } from '../orchestrator/types.js';

export interface HealthPulseEvents {
  'agent:state': { agent: string; kind: MonitorKind; cycleId: string; from: AgentState; to: AgentState };
  'agent:cycle': { agent: string; kind: MonitorKind; result: CycleResult };
  'orchestrator:complete': { report: AggregateReport };
}

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof HealthPulseEvents>(event: K, listener: (data: HealthPulseEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof HealthPulseEvents>(event: K, listener: (data: HealthPulseEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof HealthPulseEvents>(event: K, listener: (data: HealthPulseEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof HealthPulseEvents>(event: K, data: HealthPulseEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
