import { join, resolve } from 'path';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { HealthPulseConfig } from '../core/types.js';

export interface CommonOptions {
  dir: string;
  verbose?: boolean;
}

export interface Session {
  projectDir: string;
  config: HealthPulseConfig;
}

/**
 * Load configuration for the project directory and install the process
 * logger. Throws ConfigError on a bad configuration.
 */
export function bootstrap(options: CommonOptions): Session {
  const projectDir = resolve(options.dir);
  const config = new ConfigManager(projectDir).load();

  setLogger(createLogger({
    level: options.verbose ? 'debug' : config.logging.level,
    pretty: config.logging.pretty,
    file: config.logging.file ?? join(resolve(projectDir, config.paths.logsDir), 'healthpulse.log'),
  }));

  return { projectDir, config };
}
