export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export type LogFields = Record<string, unknown>;
export type LogSink = (line: string) => void;

export interface Logger {
    debug(event: string, data?: LogFields): void;
    info(event: string, data?: LogFields): void;
    warn(event: string, data?: LogFields): void;
    error(event: string, data?: LogFields): void;
    child(bindings: LogFields): Logger;
}

const SEVERITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * JSON-lines logger. Each entry carries a timestamp, level and event name,
 * followed by the logger's bindings and the per-call fields.
 */
export function createLogger(
    level: LogLevel = 'info',
    bindings: LogFields = {},
    sink: LogSink = (line) => console.log(line)
): Logger {
    const threshold = SEVERITY[level];

    const write = (entryLevel: LogLevel, event: string, data: LogFields = {}): void => {
        if (SEVERITY[entryLevel] < threshold) return;
        sink(JSON.stringify({
            timestamp: new Date().toISOString(),
            level: entryLevel,
            event,
            ...bindings,
            ...data,
        }));
    };

    return {
        debug: (event, data) => write('debug', event, data),
        info: (event, data) => write('info', event, data),
        warn: (event, data) => write('warn', event, data),
        error: (event, data) => write('error', event, data),
        child: (extra) => createLogger(level, { ...bindings, ...extra }, sink),
    };
}

export function describeError(err: unknown): LogFields {
    if (err instanceof Error) {
        const fields: LogFields = { error: err.message, error_name: err.name, stack: err.stack };
        if (err.cause !== undefined) {
            fields.cause = err.cause instanceof Error ? err.cause.message : String(err.cause);
        }
        return fields;
    }
    return { error: String(err) };
}
