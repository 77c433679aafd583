/**
 * Logger
 *
 * Console logger shared by every server module. Messages are tagged with
 * a bracketed component (`[Poller]`, `[Registry]`) and `key=value` fields;
 * a trailing context object is appended as JSON.
 *
 * Level comes from LOG_LEVEL and can be changed at runtime with setLevel().
 *
 * @module server/utils/logger
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

type LogContext = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    verbose: 3,
    debug: 4,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LEVELS;
}

function resolveLevel(raw: string | undefined): LogLevel {
    const configured = raw?.trim().toLowerCase();
    return configured && isLogLevel(configured) ? configured : 'info';
}

function serializeContext(context: LogContext | undefined): string {
    if (!context || Object.keys(context).length === 0) return '';
    try {
        return ' ' + JSON.stringify(context, (_key, value: unknown) =>
            value instanceof Error ? { name: value.name, message: value.message } : value
        );
    } catch {
        return ' [unserializable context]';
    }
}

// ============================================================================
// LOGGER
// ============================================================================

class Logger {
    private level: LogLevel = resolveLevel(process.env.LOG_LEVEL);

    setLevel(level: string): void {
        const next = resolveLevel(level);
        if (next !== this.level) {
            this.level = next;
            this.info(`[Logger] Level set: level=${next}`);
        }
    }

    error(message: string, context?: LogContext): void {
        this.write('error', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.write('warn', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.write('info', message, context);
    }

    verbose(message: string, context?: LogContext): void {
        this.write('verbose', message, context);
    }

    debug(message: string, context?: LogContext): void {
        this.write('debug', message, context);
    }

    /** Startup banner, printed regardless of level. */
    startup(name: string, meta: LogContext = {}): void {
        const details = Object.entries(meta).map(([key, value]) => `${key}=${String(value)}`).join(' ');
        console.log(`\n  ${name}${details ? `  ${details}` : ''}\n`);
    }

    private write(level: LogLevel, message: string, context?: LogContext): void {
        if (LEVELS[level] > LEVELS[this.level]) return;

        const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(7)} ${message}${serializeContext(context)}`;
        if (level === 'error') {
            console.error(line);
        } else if (level === 'warn') {
            console.warn(line);
        } else {
            console.log(line);
        }
    }
}

const logger = new Logger();

export default logger;
