/**
 * Standalone Logger Utility
 *
 * Provides consistent logging with environment-aware formatting.
 */

export type LogMeta = Record<string, unknown>;

export class Logger {
    constructor(private readonly scope?: string) {}

    /**
     * Log debug message with context
     */
    debug(message: string, meta?: LogMeta) {
        console.info(this.formatLog('DEBUG', message, meta));
    }

    /**
     * Log info message with context
     */
    info(message: string, meta?: LogMeta) {
        console.info(this.formatLog('INFO', message, meta));
    }

    /**
     * Log warning message with context
     */
    warn(message: string, meta?: LogMeta) {
        console.warn(this.formatLog('WARN', message, meta));
    }

    error(message: string, meta?: LogMeta) {
        console.error(this.formatLog('ERROR', message, meta));
    }

    /**
     * Log timing data with calculated elapsed time using hrtime precision
     * Takes start time from process.hrtime.bigint() and calculates duration
     */
    time(label: string, startTime: bigint, meta: LogMeta = {}): void {
        const durationNs = process.hrtime.bigint() - startTime;
        const durationMs = Number(durationNs) / 1_000_000;
        console.info(this.formatLog('TIME', `${label} ${durationMs}ms`, meta));
    }

    /**
     * Child logger that prefixes every message with a component name
     */
    child(scope: string): Logger {
        return new Logger(this.scope ? `${this.scope}:${scope}` : scope);
    }

    /**
     * Format log message with environment-aware output
     */
    formatLog(level: string, message: string, meta?: LogMeta): string {
        const text = this.scope ? `[${this.scope}] ${message}` : message;

        if (process.env.NODE_ENV === 'production') {
            // Structured JSON for production log aggregation
            return JSON.stringify({
                timestamp: new Date().toISOString(),
                level,
                message: text,
                ...(meta && { meta }),
            });
        }

        // Pretty format for development
        const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
        return `${level} ${text}${metaStr}`;
    }
}

/**
 * Global logger instance for infrastructure components
 * Use this at server startup, in middleware and in the codec dispatchers
 */
export const logger = new Logger();
