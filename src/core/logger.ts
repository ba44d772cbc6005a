import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({ name: 'toolloop', level });
}

const envLevel = process.env.LOG_LEVEL;

export const logger: Logger = createLogger(isLevel(envLevel) ? envLevel : 'info');

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value === 'fatal' || value === 'error' || value === 'warn' || value === 'info'
    || value === 'debug' || value === 'trace' || value === 'silent';
}
