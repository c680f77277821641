// ─── Tunnedit: Logger ────────────────────────────────────────────────────────
//
// Scoped console logging with a process-wide level. Every level writes to
// stderr so that stdout stays free for the socket export line.

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export type LogMeta = Record<string, unknown>;

export class Logger {
    constructor(private readonly scope: string) {}

    child(scope: string): Logger {
        return new Logger(`${this.scope}:${scope}`);
    }

    debug(message: string, meta?: LogMeta): void {
        if (!this.enabled('debug')) return;
        console.error(chalk.gray(this.format(message, meta)));
    }

    info(message: string, meta?: LogMeta): void {
        if (!this.enabled('info')) return;
        console.error(this.format(message, meta));
    }

    /** Info-level line for a completed step. */
    success(message: string, meta?: LogMeta): void {
        if (!this.enabled('info')) return;
        console.error(chalk.green(this.format(message, meta)));
    }

    warn(message: string, meta?: LogMeta): void {
        if (!this.enabled('warn')) return;
        console.error(chalk.yellow(this.format(message, meta)));
    }

    error(message: string, meta?: LogMeta): void {
        if (!this.enabled('error')) return;
        console.error(chalk.red(this.format(message, meta)));
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
    }

    private format(message: string, meta?: LogMeta): string {
        const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
        return `[${this.scope}] ${message}${metaStr}`;
    }
}

export function createLogger(scope: string): Logger {
    return new Logger(scope);
}
