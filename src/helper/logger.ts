import { z } from 'zod';

// --- LOG LEVELS ---
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

const LEVEL_TAG: Record<EmittingLevel, string> = {
    debug: '(DEBUG)',
    info: '(INFO)',
    warn: '(WARNING)',
    error: '(ERROR)'
};

export type LogSink = Pick<Console, EmittingLevel>;

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Create a leveled logger writing tagged lines to the console (or any console-shaped sink)
 * Lines below `level` are dropped.
 *
 * @param level - Minimum level to emit; 'silent' drops everything
 * @param sink - Destination, console by default
 */
export function createLogger(level: LogLevel = 'warn', sink: LogSink = console): Logger {
    const emit = (message_level: EmittingLevel, message: string): void => {
        if (LEVEL_RANK[message_level] < LEVEL_RANK[level]) return;
        sink[message_level](`${LEVEL_TAG[message_level]} ${message}`);
    };

    return {
        debug: (message) => emit('debug', message),
        info: (message) => emit('info', message),
        warn: (message) => emit('warn', message),
        error: (message) => emit('error', message)
    };
}

export const defaultLogger: Logger = createLogger('warn');
