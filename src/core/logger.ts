import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { NAME } from '../version.js';

/** Beside config.yaml and the default database. */
export const LOG_DIR = join(homedir(), `.${NAME}`, 'logs');

export interface LoggerOptions {
  name?: string;
  /** Pretty-print to stdout at debug level instead of writing the log file. */
  verbose?: boolean;
  level?: pino.LevelWithSilent;
  dir?: string;
}

export function logFilePath(options: Pick<LoggerOptions, 'name' | 'dir'> = {}): string {
  return join(options.dir ?? LOG_DIR, `${options.name ?? NAME}.log`);
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const name = options.name ?? NAME;
  const level = options.level ?? 'info';

  if (options.verbose) {
    return pino({
      name,
      level: 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true },
      },
    });
  }

  if (level === 'silent') {
    return pino({ name, level });
  }

  const dir = options.dir ?? LOG_DIR;
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: logFilePath({ name, dir }), mkdir: true },
    },
  });
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}
