/**
 * Repeat orchestrator cycles until interrupted.
 */

import { Command, InvalidArgumentError } from 'commander';
import { EventBus } from '../../core/events.js';
import { createOrchestrator } from '../../orchestrator/orchestrator.js';
import { bootstrap } from '../bootstrap.js';
import { formatAgentErrors, formatReport } from '../format.js';

interface WatchOptions {
  dir: string;
  interval?: number;
  parallel?: boolean;
  verbose?: boolean;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds < 1) {
    throw new InvalidArgumentError('Interval must be a positive whole number of seconds.');
  }
  return seconds;
}

export function createWatchCommand(): Command {
  const cmd = new Command('watch');

  cmd
    .description('Run the monitors continuously, one cycle per interval')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-i, --interval <seconds>', 'Seconds between cycles', parseSeconds)
    .option('-p, --parallel', 'Run the monitors concurrently')
    .option('-v, --verbose', 'Enable debug logging')
    .action(async (options: WatchOptions) => {
      await executeWatch(options);
    });

  return cmd;
}

async function executeWatch(options: WatchOptions): Promise<void> {
  const { projectDir, config } = bootstrap(options);
  const events = new EventBus();
  const orchestrator = createOrchestrator({ projectDir, config, events });

  events.on('orchestrator:complete', ({ report }) => {
    for (const line of formatReport(report)) console.log(line);
    for (const line of formatAgentErrors(report)) console.log(line);
  });

  const interval = options.interval ?? config.orchestrator.intervalSeconds;
  const shutdown = (): void => {
    console.log('\n  Stopping after the current cycle...');
    orchestrator.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  console.log(`\n  Watching ${projectDir} every ${interval}s (Ctrl+C to stop)`);
  await orchestrator.start(interval, { parallel: options.parallel ?? config.orchestrator.parallel });
}
