import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

const LOG_DIR = join(homedir(), '.rightsizer', 'logs');

function ensureLogDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

export type Logger = pino.Logger;

export function createLogger(name: string = 'rightsizer', verbose: boolean = false): pino.Logger {
  if (verbose) {
    return pino({
      name,
      level: 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  ensureLogDir();
  return pino({
    name,
    level: 'info',
    transport: {
      target: 'pino/file',
      options: { destination: join(LOG_DIR, 'rightsizer.log'), mkdir: true },
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
