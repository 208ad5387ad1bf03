import { Command } from 'commander';
import { FileMonitorStore } from '../../store/file-store.js';
import { bootstrap } from '../bootstrap.js';
import { formatReport } from '../format.js';

interface LatestOptions {
  dir: string;
  json?: boolean;
}

export function createLatestCommand(): Command {
  const cmd = new Command('latest');

  cmd
    .description('Show the most recent monitoring report')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output the report as JSON')
    .action(async (options: LatestOptions) => {
      await showLatest(options);
    });

  return cmd;
}

async function showLatest(options: LatestOptions): Promise<void> {
  const { projectDir, config } = bootstrap(options);
  const store = new FileMonitorStore({
    rootDir: projectDir,
    logsDir: config.paths.logsDir,
    dataDir: config.paths.dataDir,
  });

  const report = await store.latestReport();
  if (!report) {
    console.log('\n  No monitoring report found. Run `healthpulse run` first.\n');
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }
  for (const line of formatReport(report)) console.log(line);
}
