// ============================================================
// Logger - tagged console output with an optional file sink
// ============================================================

import * as fs from 'fs-extra';
import type { LogLevel } from './types';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export interface LoggerOptions {
    level?: LogLevel;
    /**
     * Every emitted line is also appended here, prefixed with a timestamp.
     */
    file?: string;
}

/**
 * Writes `[Tag] message` lines to stderr, so stdout stays free for REPL output.
 */
export class Logger {
    private readonly level: LogLevel;
    private readonly file?: string;

    constructor(private readonly tag: string, options: LoggerOptions = {}) {
        this.level = options.level ?? 'warn';
        this.file = options.file;
        if (this.file) {
            fs.ensureFileSync(this.file);
        }
    }

    child(tag: string): Logger {
        return new Logger(tag, { level: this.level, file: this.file });
    }

    isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
    }

    debug(message: string): void {
        this.write('debug', message);
    }

    info(message: string): void {
        this.write('info', message);
    }

    warn(message: string): void {
        this.write('warn', message);
    }

    error(message: string, err?: unknown): void {
        const detail = err instanceof Error ? `: ${err.stack ?? err.message}` : err !== undefined ? `: ${String(err)}` : '';
        this.write('error', `${message}${detail}`);
    }

    private write(level: Exclude<LogLevel, 'silent'>, message: string): void {
        if (!this.isEnabled(level)) return;

        const line = `[${this.tag}] ${message}`;
        console.error(line);

        if (this.file) {
            fs.appendFileSync(this.file, `${new Date().toISOString()} ${level.toUpperCase()} ${line}\n`);
        }
    }
}
