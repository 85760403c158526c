import { OPERATION_SYMBOLS } from './calculation';
import type { Logger } from './logger';
import type { HistoryEntry } from './types';

export interface HistoryObserver {
    onRecord(entry: HistoryEntry): void;
}

/**
 * Rounds for display only: at most `precision` decimal places,
 * trailing zeros dropped.
 */
export function formatNumber(value: number, precision?: number): string {
    if (precision === undefined || !Number.isFinite(value)) {
        return String(value);
    }
    const rounded = Number(value.toFixed(precision));
    // toFixed turns tiny negatives into "-0"
    return String(rounded === 0 ? 0 : rounded);
}

/** `add 2 3 = 5` or `divide 10 0 -> error: division by zero` */
export function formatEntry(entry: HistoryEntry, precision?: number): string {
    const head = `${entry.kind} ${formatNumber(entry.a)} ${formatNumber(entry.b)}`;
    return entry.result.ok
        ? `${head} = ${formatNumber(entry.result.value, precision)}`
        : `${head} -> error: ${entry.result.error.message}`;
}

/** `2 + 3 = 5` */
export function formatCalculation(entry: HistoryEntry, value: number, precision?: number): string {
    return `${formatNumber(entry.a)} ${OPERATION_SYMBOLS[entry.kind]} ${formatNumber(entry.b)} = ${formatNumber(value, precision)}`;
}

/**
 * Append-only record of attempted calculations for one session.
 */
export class History {
    private readonly items: HistoryEntry[] = [];
    private readonly observers = new Set<HistoryObserver>();

    get size(): number {
        return this.items.length;
    }

    record(entry: HistoryEntry): void {
        this.items.push(Object.freeze({ ...entry }));
        this.observers.forEach(observer => observer.onRecord(entry));
    }

    entries(): readonly HistoryEntry[] {
        return [...this.items];
    }

    clear(): void {
        this.items.length = 0;
    }

    subscribe(observer: HistoryObserver): () => void {
        this.observers.add(observer);
        return () => {
            this.observers.delete(observer);
        };
    }
}

export class LoggingObserver implements HistoryObserver {
    constructor(private readonly logger: Logger) { }

    onRecord(entry: HistoryEntry): void {
        this.logger.info(`Recorded: ${formatEntry(entry)}`);
    }
}
