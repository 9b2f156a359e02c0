import { log } from 'crawlee';

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'OFF';

/** Applies LOG_LEVEL to crawlee's shared logger. Call once at startup. */
export function configureLogging(level: LogLevelName): void {
    log.setLevel(log.LEVELS[level]);
}
