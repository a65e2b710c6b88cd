import pino, { type Logger } from 'pino';

export type { Logger };

export type LoggerOptions = {
    verbose?: boolean;
    name?: string;
};

export function createLogger(options: LoggerOptions = {}): Logger {
    return pino({
        name: options.name ?? 'replicator',
        level: options.verbose ? 'debug' : 'info'
    });
}

export function silentLogger(): Logger {
    return pino({ level: 'silent' });
}
