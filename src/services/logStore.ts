export type LogSeverity = 'info' | 'warning' | 'error';

export interface LogEntry {
    id: string;
    scope: string;
    severity: LogSeverity;
    message: string;
    timestamp: number;
    metadata?: Record<string, unknown>;
}

export interface AppendLogParams {
    scope: string;
    severity: LogSeverity;
    message: string;
    metadata?: Record<string, unknown>;
    timestamp?: number;
}

export type LogSink = (entry: LogEntry) => void;

export interface ScopedLogger {
    logInfo: (message: string, metadata?: Record<string, unknown>) => void;
    logWarning: (message: string, metadata?: Record<string, unknown>) => void;
    logError: (message: string, metadata?: Record<string, unknown>) => void;
}

export const MAX_LOG_ENTRIES = 200;

const createLogId = (() => {
    let counter = 0;
    return () => {
        counter += 1;
        return `log-${Date.now()}-${counter}`;
    };
})();

export const consoleSink: LogSink = (entry) => {
    const line = `[${entry.scope}] ${entry.message}`;
    if (entry.severity === 'error') {
        console.error(line, entry.metadata ?? '');
    } else if (entry.severity === 'warning') {
        console.warn(line, entry.metadata ?? '');
    } else {
        console.info(line, entry.metadata ?? '');
    }
};

interface LogStoreOptions {
    maxEntries?: number;
    sink?: LogSink;
}

/**
 * Bounded in-memory log, newest entry first. Entries can be mirrored to a
 * sink such as the console.
 */
export class LogStore {
    private readonly maxEntries: number;

    private readonly sink: LogSink | null;

    private items: LogEntry[] = [];

    constructor(options: LogStoreOptions = {}) {
        this.maxEntries = options.maxEntries ?? MAX_LOG_ENTRIES;
        this.sink = options.sink ?? null;
    }

    public get entries(): readonly LogEntry[] {
        return this.items;
    }

    public append(entry: AppendLogParams): LogEntry {
        const nextEntry: LogEntry = {
            id: createLogId(),
            scope: entry.scope,
            severity: entry.severity,
            message: entry.message,
            metadata: entry.metadata,
            timestamp: entry.timestamp ?? Date.now(),
        };
        this.items = [nextEntry, ...this.items].slice(0, this.maxEntries);
        this.sink?.(nextEntry);
        return nextEntry;
    }

    public clear(): void {
        this.items = [];
    }

    public createLogger(scope: string): ScopedLogger {
        const log = (severity: LogSeverity, message: string, metadata?: Record<string, unknown>) => {
            this.append({ scope, severity, message, metadata });
        };
        return {
            logInfo: (message, metadata) => log('info', message, metadata),
            logWarning: (message, metadata) => log('warning', message, metadata),
            logError: (message, metadata) => log('error', message, metadata),
        };
    }
}
