import { pino, type Logger } from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { homedir } from 'os';

const DEFAULT_LOG_FILE = join(homedir(), '.healthpulse', 'logs', 'healthpulse.log');

export interface LoggerOptions {
  name?: string;
  level?: string;
  /** Pretty-print to the terminal instead of writing JSON lines to a file */
  pretty?: boolean;
  file?: string;
}

function ensureLogDir(file: string): void {
  const dir = dirname(file);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const name = options.name ?? 'healthpulse';
  const level = options.level ?? 'info';

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        // stderr, so stdout stays clean for reports and --json
        options: { colorize: true, destination: 2 },
      },
    });
  }

  const destination = options.file ?? DEFAULT_LOG_FILE;
  ensureLogDir(destination);

  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination, mkdir: true },
    },
  });
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}
