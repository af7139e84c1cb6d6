import { appendFileSync } from 'node:fs';
import { formatLogForConsole } from './log_formatter.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogFields {
    component?: string;
    event?: string;
    runId?: string;
    [key: string]: unknown;
}

export interface LogEntry extends LogFields {
    ts: string;
    level: LogLevel;
    message: string;
    runId: string;
}

export type Logger = {
    info: (message: string, fields?: LogFields) => void;
    warn: (message: string, fields?: LogFields) => void;
    error: (message: string, fields?: LogFields) => void;
    debug: (message: string, fields?: LogFields) => void;
};

export interface LoggerOptions {
    /** JSON lines are appended here; without it they go to stdout. */
    logFile?: string;
}

let prettyConsoleEnabled = process.env.VOLPROV_PRETTY_LOGS !== 'false';

export function setPrettyConsole(enabled: boolean) {
    prettyConsoleEnabled = enabled;
}

export function createLogger(runId: string, options: LoggerOptions = {}): Logger {
    const log = (level: LogLevel, message: string, fields: LogFields = {}) => {
        const entry: LogEntry = {
            ...fields,
            ts: new Date().toISOString(),
            level,
            message,
            runId,
        };

        // Pretty console output for user
        if (prettyConsoleEnabled) {
            formatLogForConsole(entry);
        }

        const line = JSON.stringify(entry);
        if (options.logFile) {
            appendFileSync(options.logFile, line + '\n', 'utf-8');
        } else {
            console.log(line);
        }
    };

    return {
        info: (message: string, fields?: LogFields) => log('info', message, fields),
        warn: (message: string, fields?: LogFields) => log('warn', message, fields),
        error: (message: string, fields?: LogFields) => log('error', message, fields),
        debug: (message: string, fields?: LogFields) => log('debug', message, fields),
    };
}
