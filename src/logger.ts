type Level = 'info' | 'warn' | 'error';

function serialize(v: unknown): string {
    try {
        return typeof v === 'string' ? v : JSON.stringify(v, (_key, value: unknown) =>
            typeof value === 'bigint' ? value.toString() : value
        );
    } catch {
        return String(v);
    }
}

/**
 * Writes a single log line: `[raffle] <iso time> LEVEL message {meta}`.
 */
export function log(level: Level, message: string, meta?: Record<string, unknown>): void {
    const base = `[raffle] ${new Date().toISOString()} ${level.toUpperCase()} ${message}`;
    const line = meta && Object.keys(meta).length ? `${base} ${serialize(meta)}` : base;

    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
}

export const logger = {
    info(message: string, meta?: Record<string, unknown>) {
        log('info', message, meta);
    },
    warn(message: string, meta?: Record<string, unknown>) {
        log('warn', message, meta);
    },
    error(message: string, meta?: Record<string, unknown>) {
        log('error', message, meta);
    },
};
