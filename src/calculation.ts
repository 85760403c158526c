// ============================================================
// Calculation Model + Factory
// ============================================================

import { add, divide, multiply, subtract } from './calculator';
import { CalculatorError, UnsupportedOperationError } from './errors';
import type { Result } from './types';

export type CalculationKind = 'add' | 'subtract' | 'multiply' | 'divide';

/**
 * Two operands tagged with the operation that combines them.
 * Built by the factory, executed once, then dropped.
 */
export interface Calculation {
    readonly kind: CalculationKind;
    readonly a: number;
    readonly b: number;
}

export const OPERATION_SYMBOLS: Readonly<Record<CalculationKind, string>> = {
    add: '+',
    subtract: '-',
    multiply: '*',
    divide: '/',
};

/**
 * Runs the calculation through the operation library.
 * Domain errors come back as a failed Result; anything else is thrown.
 */
export function execute(calculation: Calculation): Result {
    const { a, b } = calculation;
    try {
        switch (calculation.kind) {
            case 'add':
                return { ok: true, value: add(a, b) };
            case 'subtract':
                return { ok: true, value: subtract(a, b) };
            case 'multiply':
                return { ok: true, value: multiply(a, b) };
            case 'divide':
                return { ok: true, value: divide(a, b) };
        }
    } catch (error) {
        if (error instanceof CalculatorError) {
            return { ok: false, error };
        }
        throw error;
    }
}

export type CalculationRegistry = ReadonlyMap<string, CalculationKind>;

export const DEFAULT_REGISTRY: CalculationRegistry = new Map<string, CalculationKind>([
    ['add', 'add'],
    ['subtract', 'subtract'],
    ['multiply', 'multiply'],
    ['divide', 'divide'],
]);

export class CalculationFactory {
    private readonly registry: CalculationRegistry;

    /**
     * The registry is copied, so later changes to the source map
     * never reach this factory.
     */
    constructor(registry: CalculationRegistry = DEFAULT_REGISTRY) {
        this.registry = new Map(registry);
    }

    /**
     * Resolves an operation name (exact, case-sensitive match) to a Calculation.
     * @throws UnsupportedOperationError for names outside the registry
     */
    create(operationName: string, a: number, b: number): Calculation {
        const kind = this.registry.get(operationName);
        if (!kind) {
            throw new UnsupportedOperationError(operationName);
        }
        return Object.freeze({ kind, a, b });
    }

    has(operationName: string): boolean {
        return this.registry.has(operationName);
    }

    names(): string[] {
        return [...this.registry.keys()];
    }
}

export const defaultFactory = new CalculationFactory();

/**
 * One-shot entry point: build and run a calculation with the default factory.
 */
export function evaluate(operationName: string, a: number, b: number): Result {
    return execute(defaultFactory.create(operationName, a, b));
}
