// ============================================================
// Calculator Errors
// ============================================================

export type CalculatorErrorCode =
    | 'DIVISION_BY_ZERO'
    | 'UNSUPPORTED_OPERATION'
    | 'INVALID_ARGUMENTS'
    | 'INVALID_OPERAND'
    | 'CONFIGURATION';

/**
 * Base class for every error the calculator recovers from.
 * The message is the user-facing text, without any "Error:" prefix.
 */
export class CalculatorError extends Error {
    constructor(public readonly code: CalculatorErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class DivisionByZeroError extends CalculatorError {
    constructor() {
        super('DIVISION_BY_ZERO', 'division by zero');
    }
}

export class UnsupportedOperationError extends CalculatorError {
    constructor(public readonly operation: string) {
        super('UNSUPPORTED_OPERATION', `unsupported operation '${operation}'`);
    }
}

export class InvalidArgumentsError extends CalculatorError {
    constructor(public readonly expected: number, public readonly got: number) {
        super('INVALID_ARGUMENTS', `expected ${expected} operands, got ${got}`);
    }
}

export class InvalidOperandError extends CalculatorError {
    constructor(public readonly token: string) {
        super('INVALID_OPERAND', `'${token}' is not a number`);
    }
}

export class ConfigurationError extends CalculatorError {
    constructor(public readonly key: string, public readonly value: string, reason: string) {
        super('CONFIGURATION', `invalid ${key} '${value}': ${reason}`);
    }
}

export function isCalculatorError(error: unknown): error is CalculatorError {
    return error instanceof CalculatorError;
}
