// ============================================================
// Calculator - Shared Type Definitions
// ============================================================

import type { CalculatorError } from './errors';
import type { CalculationKind } from './calculation';

// ------------------------------------------------------------
// Result
// ------------------------------------------------------------
export type Result =
    | { readonly ok: true; readonly value: number }
    | { readonly ok: false; readonly error: CalculatorError };

// ------------------------------------------------------------
// History Entry
// ------------------------------------------------------------
export interface HistoryEntry {
    readonly kind: CalculationKind;
    readonly a: number;
    readonly b: number;
    readonly result: Result;
}

// ------------------------------------------------------------
// Line Outcome (one REPL transition)
// ------------------------------------------------------------
export type LineOutcome =
    | { type: 'empty' }
    | { type: 'meta'; command: MetaCommand }
    | { type: 'calculated'; entry: HistoryEntry }   // recorded, ok result
    | { type: 'failed'; entry: HistoryEntry }       // recorded, domain error
    | { type: 'rejected'; error: CalculatorError }  // malformed request, not recorded
    | { type: 'exit' };

export type MetaCommand = 'help' | 'history' | 'clear' | 'exit' | 'quit';

export type SessionState = 'running' | 'terminated';

// ------------------------------------------------------------
// Configuration
// ------------------------------------------------------------
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface CalculatorConfig {
    prompt: string;
    precision: number;
    logLevel: LogLevel;
    logFile?: string;
}
