/**
 * Structured console logging: (data: unknown, msg?: string) => void per level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LoggerFn = (data: unknown, msg?: string) => void;

export interface Logger {
    debug: LoggerFn;
    info: LoggerFn;
    warn: LoggerFn;
    error: LoggerFn;
}

const RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

const SINKS: Record<Exclude<LogLevel, 'silent'>, (...args: unknown[]) => void> = {
    debug: (...args) => console.debug(...args),
    info: (...args) => console.log(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args)
};

function render(data: unknown): unknown {
    if (data instanceof Error) return data.message;
    return typeof data === 'object' && data !== null ? JSON.stringify(data) : data;
}

export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
    const createLogMethod = (method: Exclude<LogLevel, 'silent'>): LoggerFn => {
        if (RANK[method] < RANK[level]) return () => { };
        return (data: unknown, msg?: string) => {
            const prefix = `[${new Date().toISOString()}] [${scope}:${method}]`;
            if (msg) SINKS[method](prefix, msg, render(data));
            else SINKS[method](prefix, render(data));
        };
    };

    return {
        debug: createLogMethod('debug'),
        info: createLogMethod('info'),
        warn: createLogMethod('warn'),
        error: createLogMethod('error')
    };
}

/**
 * No-op logger for tests and embedding
 */
export const silentLogger: Logger = {
    debug: () => { },
    info: () => { },
    warn: () => { },
    error: () => { }
};
