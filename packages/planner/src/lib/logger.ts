import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

/** Default logger for registries, specs, plans and clients: emits nothing. */
export const silentLogger: Logger = pino({ enabled: false });

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'capacity-planner',
    level: options.level ?? 'info',
  });
}
