import pino, { type LevelWithSilent, type Logger } from 'pino';

export const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
export const DEFAULT_SERVICE_NAME = 'trawl-server';
const VALID_LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function parseLogLevel(raw: string | undefined): LevelWithSilent {
  const normalized = raw?.trim().toLowerCase();
  return VALID_LOG_LEVELS.find((level) => level === normalized) ?? DEFAULT_LOG_LEVEL;
}

export interface LoggerOptions {
  level?: LevelWithSilent;
  service?: string;
  /** stdio transport owns stdout, so logs go to stderr there. */
  destination?: 'stdout' | 'stderr';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const fd = options.destination === 'stderr' ? 2 : 1;

  return pino(
    {
      level: options.level ?? DEFAULT_LOG_LEVEL,
      base: { service: options.service ?? DEFAULT_SERVICE_NAME },
      timestamp: () => `,"ts":"${new Date().toISOString()}"`,
      formatters: {
        level: (label) => ({ level: label }),
      },
      messageKey: 'message',
    },
    pino.destination({ fd, sync: true }),
  );
}
