// ============================================================================
// Logger — Leveled single-line logging to stderr
// ============================================================================
//
// stdout carries the stdio transport's JSON-RPC stream, so nothing may log there.

import pc from 'picocolors';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const SEVERITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export interface Logger {
    readonly level: LogLevel;
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface LoggerOptions {
    /** Minimum level written (default: `'info'`) */
    readonly level?: LogLevel;
    /** Colorize level labels (default: when the terminal supports it) */
    readonly colors?: boolean;
    /** Line sink (default: `process.stderr`) */
    readonly write?: (line: string) => void;
}

export const LOG_PREFIX = '[metabase-mcp]';

export function createLogger(options: LoggerOptions = {}): Logger {
    const level = options.level ?? 'info';
    const c = pc.createColors(options.colors ?? pc.isColorSupported);
    const write = options.write ?? ((line: string) => { process.stderr.write(`${line}\n`); });

    const labels: Record<Exclude<LogLevel, 'silent'>, string> = {
        debug: c.dim('DEBUG'),
        info: c.cyan('INFO '),
        warn: c.yellow('WARN '),
        error: c.red('ERROR'),
    };

    const emit = (at: Exclude<LogLevel, 'silent'>, message: string): void => {
        if (SEVERITY[at] < SEVERITY[level]) return;
        write(`${LOG_PREFIX} ${labels[at]} ${message}`);
    };

    return {
        level,
        debug: message => emit('debug', message),
        info: message => emit('info', message),
        warn: message => emit('warn', message),
        error: message => emit('error', message),
    };
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}
