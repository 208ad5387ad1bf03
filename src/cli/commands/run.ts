/**
 * `healthpulse run`: one orchestrator cycle over all four monitors.
 */

import { Command } from 'commander';
import { createOrchestrator } from '../../orchestrator/orchestrator.js';
import { bootstrap } from '../bootstrap.js';
import { formatAgentErrors, formatReport } from '../format.js';

interface RunOptions {
  dir: string;
  parallel?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run every monitor once and print the aggregate health report')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-p, --parallel', 'Run the monitors concurrently')
    .option('--json', 'Output the report as JSON')
    .option('-v, --verbose', 'Enable debug logging')
    .action(async (options: RunOptions) => {
      await executeRun(options);
    });

  return cmd;
}

async function executeRun(options: RunOptions): Promise<void> {
  const { projectDir, config } = bootstrap(options);
  const orchestrator = createOrchestrator({ projectDir, config });

  const report = await orchestrator.runAllAgents({
    parallel: options.parallel ?? config.orchestrator.parallel,
  });

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  for (const line of formatReport(report)) console.log(line);
  const errors = formatAgentErrors(report);
  if (errors.length > 0) {
    console.log('  Failed monitors:');
    for (const line of errors) console.log(line);
    console.log();
  }
}
