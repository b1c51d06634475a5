import pino from 'pino';
import { join } from 'path';
import { homedir } from 'os';
import { ensureDirSync } from '../utils/fs.js';

const LOG_DIR = join(homedir(), '.agent-replay', 'logs');

export function createLogger(
  name: string = 'agent-replay',
  verbose: boolean = false,
  level: pino.LevelWithSilent = 'info',
): pino.Logger {
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

  ensureDirSync(LOG_DIR);
  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: join(LOG_DIR, 'agent-replay.log'), mkdir: true },
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
