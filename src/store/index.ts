export type { MonitorStore } from './types.js';
export { FileMonitorStore, type FileStoreOptions } from './file-store.js';
export { MemoryMonitorStore, type AgentRecord } from './memory-store.js';
export { StoredReportSchema, type StoredReport } from './schema.js';
