import { StderrWriter, Writer } from './Writer';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export type Logger = {
    log: (level: LogLevel, message: string, detail?: unknown) => void;
    info: (message: string, detail?: unknown) => void;
    warn: (message: string, detail?: unknown) => void;
    error: (message: string, detail?: unknown) => void;
    debug: (message: string, detail?: unknown) => void;
};

export interface LoggerOptions {
    /** Emit debug lines (dropped otherwise) */
    debug?: boolean;
    /** Where log lines go; stderr by default so stdout stays clean */
    sink?: Writer;
}

export const createLogger = (prefix?: string, options: LoggerOptions = {}): Logger => {
    const sink = options.sink ?? new StderrWriter();
    const format = (level: LogLevel, message: string, detail?: unknown) => {
        const payload = detail === undefined ? message : `${message} ${JSON.stringify(detail)}`;
        return prefix ? `[${prefix}] ${level}: ${payload}` : `${level}: ${payload}`;
    };
    const log = (level: LogLevel, message: string, detail?: unknown) => {
        if (level === 'debug' && !options.debug) {
            return;
        }
        sink.writeLine(format(level, message, detail));
    };
    const info = (message: string, detail?: unknown) => log('info', message, detail);
    const warn = (message: string, detail?: unknown) => log('warn', message, detail);
    const error = (message: string, detail?: unknown) => log('error', message, detail);
    const debug = (message: string, detail?: unknown) => log('debug', message, detail);
    return { log, info, warn, error, debug };
};
