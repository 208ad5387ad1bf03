import { Command } from 'commander';
import { join, resolve } from 'path';
import { ConfigManager, PROJECT_CONFIG_FILE } from '../../core/config.js';

export function createInitCommand(): Command {
  const cmd = new Command('init');

  cmd
    .description(`Create a default ${PROJECT_CONFIG_FILE} in the project directory`)
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action((options: { dir: string }) => {
      const projectDir = resolve(options.dir);
      const created = new ConfigManager(projectDir).createDefaultConfig();
      const path = join(projectDir, PROJECT_CONFIG_FILE);
      console.log(created ? `\n  Created ${path}\n` : `\n  ${path} already exists\n`);
    });

  return cmd;
}
