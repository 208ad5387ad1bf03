/**
 * FileMonitorStore writes JSON lines and JSON documents under a fixed layout:
 *
 *   <logsDir>/<agent>/<YYYY-MM-DD>.jsonl          activity
 *   <logsDir>/<agent>/cycle_<stamp>.json          cycle snapshots
 *   <logsDir>/orchestrator/monitoring_<stamp>.json aggregate reports
 *   <dataDir>/<layer>/<agent>_patterns.jsonl      learned patterns
 *   <dataDir>/<layer>/improvement_suggestions.jsonl
 *
 * Agent directory names are lower-cased agent names.
 *
 * Documents are written to a temporary sibling and renamed into place, so a
 * crash never leaves a half-written report under its final name. A record
 * appended after a torn line starts on a line of its own.
 */

import { appendFile, open, readFile, readdir, rename, rm, writeFile, type FileHandle } from 'fs/promises';
import { join, resolve } from 'path';
import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import { PersistenceError, errorMessage } from '../core/errors.js';
import { ensureDirSync } from '../utils/fs.js';
import { dayStamp, fileStamp } from '../utils/time.js';
import type {
  ActivityEntry,
  AgentIdentity,
  CycleResult,
  ImprovementSuggestion,
  LearnedPattern,
} from '../agents/types.js';
import type { AggregateReport } from '../orchestrator/types.js';
import { StoredReportSchema, type StoredReport } from './schema.js';
import type { MonitorStore } from './types.js';

const REPORT_FILE = /^monitoring_\d{8}_\d{6}\.json$/;

export interface FileStoreOptions {
  /** Base for relative logsDir / dataDir */
  rootDir: string;
  logsDir: string;
  dataDir: string;
  clock?: () => Date;
}

export class FileMonitorStore implements MonitorStore {
  private logger: Logger = getLogger();
  private readonly logsDir: string;
  private readonly dataDir: string;
  private readonly reportsDir: string;
  private readonly clock: () => Date;

  constructor(options: FileStoreOptions) {
    this.logsDir = resolve(options.rootDir, options.logsDir);
    this.dataDir = resolve(options.rootDir, options.dataDir);
    this.reportsDir = join(this.logsDir, 'orchestrator');
    this.clock = options.clock ?? (() => new Date());
    this.ensureDir(this.reportsDir);
  }

  agentDir(identity: AgentIdentity): string {
    return join(this.logsDir, identity.name.toLowerCase());
  }

  layerDir(identity: AgentIdentity): string {
    return join(this.dataDir, identity.layer);
  }

  register(identity: AgentIdentity): void {
    this.ensureDir(this.agentDir(identity));
    this.ensureDir(this.layerDir(identity));
  }

  appendActivity(identity: AgentIdentity, entry: ActivityEntry): Promise<boolean> {
    const file = join(this.agentDir(identity), `${dayStamp(this.clock())}.jsonl`);
    return this.append(file, entry, 'activity log');
  }

  saveCycle(identity: AgentIdentity, cycle: CycleResult): Promise<boolean> {
    const file = join(this.agentDir(identity), `cycle_${fileStamp(this.clock())}.json`);
    return this.write(file, cycle, 'cycle result');
  }

  appendPattern(identity: AgentIdentity, pattern: LearnedPattern): Promise<boolean> {
    const file = join(this.layerDir(identity), `${identity.name.toLowerCase()}_patterns.jsonl`);
    return this.append(file, pattern, 'learned pattern');
  }

  appendSuggestion(identity: AgentIdentity, suggestion: ImprovementSuggestion): Promise<boolean> {
    const file = join(this.layerDir(identity), 'improvement_suggestions.jsonl');
    return this.append(file, suggestion, 'improvement suggestion');
  }

  saveReport(report: AggregateReport): Promise<boolean> {
    const file = join(this.reportsDir, `monitoring_${fileStamp(this.clock())}.json`);
    return this.write(file, report, 'monitoring report');
  }

  async latestReport(): Promise<StoredReport | null> {
    let names: string[];
    try {
      names = await readdir(this.reportsDir);
    } catch (err) {
      this.logger.warn({ dir: this.reportsDir, error: errorMessage(err) }, 'Cannot list monitoring reports');
      return null;
    }

    const candidates = names.filter(name => REPORT_FILE.test(name)).sort().reverse();
    for (const name of candidates) {
      const report = await this.readReport(join(this.reportsDir, name));
      if (report) {
        return report;
      }
    }
    return null;
  }

  private async readReport(file: string): Promise<StoredReport | null> {
    try {
      const parsed = StoredReportSchema.safeParse(JSON.parse(await readFile(file, 'utf-8')));
      if (!parsed.success) {
        this.logger.warn({ file, issues: parsed.error.issues.length }, 'Monitoring report has unexpected shape');
        return null;
      }
      return parsed.data;
    } catch (err) {
      this.logger.warn({ file, error: errorMessage(err) }, 'Failed to read monitoring report');
      return null;
    }
  }

  private ensureDir(dir: string): void {
    try {
      ensureDirSync(dir);
    } catch (err) {
      throw new PersistenceError(`Cannot create directory ${dir}: ${errorMessage(err)}`, dir, err);
    }
  }

  private async append(file: string, record: unknown, what: string): Promise<boolean> {
    try {
      const lead = (await endsWithNewline(file)) ? '' : '\n';
      await appendFile(file, lead + JSON.stringify(record) + '\n', 'utf-8');
      return true;
    } catch (err) {
      this.logger.warn({ file, error: errorMessage(err) }, `Failed to write ${what}`);
      return false;
    }
  }

  private async write(file: string, document: unknown, what: string): Promise<boolean> {
    const temp = `${file}.${process.pid}.tmp`;
    try {
      await writeFile(temp, JSON.stringify(document, null, 2), 'utf-8');
      await rename(temp, file);
      return true;
    } catch (err) {
      this.logger.warn({ file, error: errorMessage(err) }, `Failed to save ${what}`);
      await rm(temp, { force: true }).catch((rmErr: unknown) => {
        this.logger.debug({ file: temp, error: errorMessage(rmErr) }, 'Failed to remove temporary file');
      });
      return false;
    }
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** True for a missing or empty file too: nothing to separate from. */
async function endsWithNewline(file: string): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(file, 'r');
  } catch (err) {
    if (isMissing(err)) return true;
    throw err;
  }

  try {
    const { size } = await handle.stat();
    if (size === 0) return true;
    const { buffer } = await handle.read(Buffer.alloc(1), 0, 1, size - 1);
    return buffer[0] === 0x0a;
  } finally {
    await handle.close();
  }
}
