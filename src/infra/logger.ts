// Централизованный модуль логирования.
// Консольный вывод + дополнительные sinks (файлы), уровни логов, корректное закрытие при shutdown.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    level: LogLevel;
    message: string;
    ts: number;
    iso: string;
}

export interface LogSink {
    kind: 'console' | 'file' | 'memory';
    write(entry: LogEntry, formatted?: string): void;
    flush?(): void | Promise<void>;
    close?(): void | Promise<void>;
}

export type ConsoleSinkFn = (entry: LogEntry, formatted: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
    const normalized = raw?.trim().toLowerCase();
    if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
        return normalized;
    }
    return fallback;
}

const defaultConsoleSink: ConsoleSinkFn = (entry, formatted) => {
    if (entry.level === 'error' || entry.level === 'warn') {
        console.error(formatted);
        return;
    }
    console.log(formatted);
};

function formatError(err: unknown): string | undefined {
    if (err === undefined || err === null) return undefined;
    if (err instanceof Error) {
        // Короткий стек: первые три строки
        return err.stack?.split('\n').slice(0, 3).join('\n') ?? `${err.name}: ${err.message}`;
    }
    if (typeof err === 'string') return err;
    try {
        return JSON.stringify(err);
    } catch {
        return String(err);
    }
}

class Logger {
    private level: LogLevel = parseLogLevel(process.env.LOG_LEVEL);
    private display = true;
    private consoleSink: ConsoleSinkFn = defaultConsoleSink;
    private sinks: LogSink[] = [];

    getLevel(): LogLevel {
        return this.level;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    setDisplay(enabled: boolean): void {
        this.display = enabled;
    }

    setSink(sink: ConsoleSinkFn): void {
        this.consoleSink = sink;
    }

    resetSinkToConsole(): void {
        this.consoleSink = defaultConsoleSink;
    }

    setSinks(sinks: LogSink[]): void {
        this.sinks = [...sinks];
    }

    debug(msg: string): void {
        this.log('debug', msg);
    }

    info(msg: string): void {
        this.log('info', msg);
    }

    warn(msg: string, err?: unknown): void {
        this.log('warn', msg, err);
    }

    error(msg: string, err?: unknown): void {
        this.log('error', msg, err);
    }

    async flush(): Promise<void> {
        for (const sink of this.sinks) {
            try {
                await sink.flush?.();
            } catch (err) {
                this.writeConsoleFallback(`logger flush failed: ${formatError(err) ?? 'unknown'}`);
            }
        }
    }

    async close(): Promise<void> {
        for (const sink of this.sinks) {
            try {
                await sink.close?.();
            } catch (err) {
                this.writeConsoleFallback(`logger close failed: ${formatError(err) ?? 'unknown'}`);
            }
        }
    }

    private log(level: LogLevel, msg: string, err?: unknown): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
        const ts = Date.now();
        const iso = new Date(ts).toISOString();
        const errorText = formatError(err);
        const message = errorText ? `${msg}\n${errorText}` : msg;
        const entry: LogEntry = { level, message, ts, iso };
        const formatted = `[${iso}] ${level.toUpperCase()}: ${message}`;

        if (this.display) {
            this.consoleSink(entry, formatted);
        }
        for (const sink of this.sinks) {
            sink.write(entry, formatted);
        }
    }

    private writeConsoleFallback(message: string): void {
        if (!this.display) return;
        console.error(message);
    }
}

export const logger = new Logger();
