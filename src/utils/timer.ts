/**
 * Wall-clock stopwatch for phase and cycle durations.
 */
export class Timer {
  private readonly startedAt = Date.now();
  private stoppedAt?: number;

  /** Stop the timer; returns elapsed milliseconds */
  stop(): number {
    this.stoppedAt ??= Date.now();
    return this.elapsed;
  }

  get elapsed(): number {
    return (this.stoppedAt ?? Date.now()) - this.startedAt;
  }
}

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}
