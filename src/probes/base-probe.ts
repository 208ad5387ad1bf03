import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { Timer } from '../utils/timer.js';
import { runCommand } from './command-runner.js';
import type {
  CommandOutcome,
  CommandRunner,
  Probe,
  ProbeErrorKind,
  ProbeResult,
} from './types.js';

export interface ProbeOptions {
  /** Directory the tool runs in */
  cwd: string;
  run?: CommandRunner;
}

/** Timeout for `--version` style availability checks */
export const VERSION_TIMEOUT_MS = 10_000;

export abstract class BaseProbe<F> implements Probe<F> {
  abstract readonly name: string;

  protected logger: Logger = getLogger();
  protected readonly cwd: string;
  private readonly runner: CommandRunner;

  constructor(options: ProbeOptions) {
    this.cwd = options.cwd;
    this.runner = options.run ?? runCommand;
  }

  async probe(): Promise<ProbeResult<F>> {
    const timer = new Timer();
    try {
      const result = await this.collect();
      this.logger.debug(
        { probe: this.name, available: result.available, duration: timer.stop() },
        'Probe finished',
      );
      return result;
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn({ probe: this.name, error: message }, 'Probe crashed');
      return this.unavailable('other', `Probe "${this.name}" crashed: ${message}`);
    }
  }

  /** Findings reported when the tool could not contribute anything */
  protected abstract empty(): F;

  protected abstract collect(): Promise<ProbeResult<F>>;

  protected unavailable(error: ProbeErrorKind, message: string): ProbeResult<F> {
    return { available: false, findings: this.empty(), error, message };
  }

  protected exec(command: string, args: string[], timeoutMs: number): Promise<CommandOutcome> {
    return this.runner({ command, args, cwd: this.cwd, timeoutMs });
  }

  /**
   * Run a version command. Returns the trimmed version string, or the
   * unavailable result to hand back when the tool cannot be used.
   */
  protected async detectVersion(
    command: string,
    args: string[],
  ): Promise<{ ok: true; version: string } | { ok: false; result: ProbeResult<F> }> {
    const outcome = await this.exec(command, args, VERSION_TIMEOUT_MS);

    if (outcome.kind === 'failed') {
      this.logger.warn({ probe: this.name, error: outcome.error }, 'Tool not available');
      return { ok: false, result: this.unavailable(outcome.error, outcome.message) };
    }
    if (outcome.exitCode !== 0) {
      this.logger.warn({ probe: this.name, exitCode: outcome.exitCode }, 'Tool not available');
      return {
        ok: false,
        result: this.unavailable('not_found', `${this.name} is not installed`),
      };
    }
    return { ok: true, version: outcome.stdout.trim() };
  }
}

/**
 * Parse a JSON document, returning undefined instead of throwing.
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
