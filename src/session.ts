// ============================================================
// REPL Session - read, dispatch, record, print
// ============================================================

import * as readline from 'readline';
import { CalculationFactory, defaultFactory, execute } from './calculation';
import {
    CalculatorError,
    InvalidArgumentsError,
    InvalidOperandError,
} from './errors';
import { History, LoggingObserver, formatCalculation, formatEntry } from './history';
import { Logger } from './logger';
import type { HistoryEntry, LineOutcome, MetaCommand, SessionState } from './types';

const OPERAND_COUNT = 2;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

const META_COMMANDS: ReadonlySet<string> = new Set<MetaCommand>(['help', 'history', 'clear', 'exit', 'quit']);

function isMetaCommand(command: string): command is MetaCommand {
    return META_COMMANDS.has(command);
}

/**
 * Parses a decimal literal. Hex, binary, "Infinity" and "NaN" are rejected.
 */
export function parseOperand(token: string): number {
    const value = NUMBER_PATTERN.test(token) ? Number(token) : NaN;
    if (!Number.isFinite(value)) {
        throw new InvalidOperandError(token);
    }
    return value;
}

export function helpText(operations: readonly string[]): string {
    return [
        'Usage: <operation> <number1> <number2>',
        `Operations: ${operations.join(', ')}`,
        'Commands:',
        '  help     show this message',
        '  history  list calculations from this session',
        '  clear    forget the calculation history',
        '  exit     leave the calculator (also: quit)',
        'Example: add 10 5',
    ].join('\n');
}

export interface SessionOptions {
    factory?: CalculationFactory;
    logger?: Logger;
    /** Decimal places shown for results; unset shows full precision. */
    precision?: number;
    /** Receives each output line, without trailing newline. */
    print?: (line: string) => void;
}

export class Session {
    readonly history = new History();
    private currentState: SessionState = 'running';
    private readonly factory: CalculationFactory;
    private readonly logger: Logger;
    private readonly precision?: number;
    private readonly print: (line: string) => void;

    constructor(options: SessionOptions = {}) {
        this.factory = options.factory ?? defaultFactory;
        this.logger = options.logger ?? new Logger('Session');
        this.precision = options.precision;
        this.print = options.print ?? (line => console.log(line));
        this.history.subscribe(new LoggingObserver(this.logger));
    }

    get state(): SessionState {
        return this.currentState;
    }

    terminate(): void {
        this.currentState = 'terminated';
    }

    /**
     * Runs one REPL transition for a single input line.
     * User errors are reported and swallowed here; anything else is rethrown.
     */
    processLine(line: string): LineOutcome {
        if (this.currentState === 'terminated') {
            return { type: 'exit' };
        }

        const tokens = line.trim().split(/\s+/).filter(Boolean);
        if (tokens.length === 0) {
            return { type: 'empty' };
        }

        const [command, ...args] = tokens;
        this.logger.debug(`Dispatching '${command}' with ${args.length} argument(s)`);

        if (isMetaCommand(command)) {
            return this.runMeta(command);
        }

        try {
            return this.calculate(command, args);
        } catch (error) {
            if (error instanceof CalculatorError) {
                this.logger.info(`Rejected '${line.trim()}': ${error.message}`);
                this.print(`Error: ${error.message}`);
                return { type: 'rejected', error };
            }
            throw error;
        }
    }

    private calculate(command: string, args: string[]): LineOutcome {
        if (args.length !== OPERAND_COUNT) {
            throw new InvalidArgumentsError(OPERAND_COUNT, args.length);
        }
        const a = parseOperand(args[0]);
        const b = parseOperand(args[1]);
        const calculation = this.factory.create(command, a, b);
        const result = execute(calculation);

        const entry: HistoryEntry = { kind: calculation.kind, a, b, result };
        this.history.record(entry);

        if (result.ok) {
            this.print(formatCalculation(entry, result.value, this.precision));
            return { type: 'calculated', entry };
        }
        this.logger.info(`Calculation failed: ${formatEntry(entry)}`);
        this.print(`Error: ${result.error.message}`);
        return { type: 'failed', entry };
    }

    private runMeta(command: MetaCommand): LineOutcome {
        switch (command) {
            case 'help':
                this.print(helpText(this.factory.names()));
                break;
            case 'history':
                this.printHistory();
                break;
            case 'clear':
                this.history.clear();
                this.print('History cleared.');
                break;
            case 'exit':
            case 'quit':
                this.terminate();
                return { type: 'exit' };
        }
        return { type: 'meta', command };
    }

    private printHistory(): void {
        const entries = this.history.entries();
        if (entries.length === 0) {
            this.print('No calculations performed yet.');
            return;
        }
        for (const entry of entries) {
            this.print(formatEntry(entry, this.precision));
        }
    }
}

export interface RunSessionOptions extends Omit<SessionOptions, 'print'> {
    /** Written before each read; empty or unset writes nothing. */
    prompt?: string;
}

/**
 * Drives a Session over a line-oriented stream until `exit`/`quit`
 * or end of input. Resolves with the history as it stood at termination.
 */
export async function runSession(
    input: NodeJS.ReadableStream,
    output: NodeJS.WritableStream,
    options: RunSessionOptions = {}
): Promise<readonly HistoryEntry[]> {
    const { prompt, ...sessionOptions } = options;
    const session = new Session({
        ...sessionOptions,
        print: line => {
            output.write(`${line}\n`);
        },
    });
    const showPrompt = () => {
        if (prompt) output.write(prompt);
    };

    const rl = readline.createInterface({ input, terminal: false, crlfDelay: Infinity });
    try {
        showPrompt();
        for await (const line of rl) {
            session.processLine(line);
            if (session.state === 'terminated') break;
            showPrompt();
        }
    } finally {
        rl.close();
    }

    session.terminate();
    return session.history.entries();
}
