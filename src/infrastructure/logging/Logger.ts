import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export const createLogger = (level: LevelWithSilent = 'info'): Logger =>
  pino({
    level,
    base: { service: 'rupee-ledger' },
    redact: ['password', '*.password'],
  });

export const silentLogger = (): Logger => createLogger('silent');
