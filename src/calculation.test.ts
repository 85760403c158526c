import { describe, it, expect } from 'vitest';
import {
    CalculationFactory,
    DEFAULT_REGISTRY,
    defaultFactory,
    evaluate,
    execute,
} from './calculation';
import type { CalculationKind } from './calculation';
import { add, divide, multiply, subtract } from './calculator';
import { DivisionByZeroError, UnsupportedOperationError } from './errors';

describe('CalculationFactory', () => {
    it('should create a calculation for each registered name', () => {
        for (const name of ['add', 'subtract', 'multiply', 'divide']) {
            expect(defaultFactory.create(name, 1, 2)).toEqual({ kind: name, a: 1, b: 2 });
        }
    });

    it('should list names in registry order', () => {
        expect(defaultFactory.names()).toEqual(['add', 'subtract', 'multiply', 'divide']);
    });

    it('should reject unknown names', () => {
        expect(() => defaultFactory.create('foo', 1, 2)).toThrow(UnsupportedOperationError);
        expect(() => defaultFactory.create('foo', 1, 2)).toThrow("unsupported operation 'foo'");
        expect(defaultFactory.has('foo')).toBe(false);
    });

    it('should match names exactly', () => {
        expect(() => defaultFactory.create('Add', 1, 2)).toThrow("unsupported operation 'Add'");
        expect(() => defaultFactory.create('add ', 1, 2)).toThrow(UnsupportedOperationError);
    });

    it('should return frozen calculations', () => {
        const calculation = defaultFactory.create('add', 1, 2);
        expect(Object.isFrozen(calculation)).toBe(true);
    });

    it('should accept a custom registry and ignore later changes to it', () => {
        const registry = new Map<string, CalculationKind>([['plus', 'add']]);
        const factory = new CalculationFactory(registry);
        registry.set('times', 'multiply');

        expect(factory.create('plus', 2, 3).kind).toBe('add');
        expect(factory.has('times')).toBe(false);
        expect(factory.names()).toEqual(['plus']);
    });

    it('should not share state with the default registry', () => {
        new CalculationFactory(new Map<string, CalculationKind>([['minus', 'subtract']]));
        expect(DEFAULT_REGISTRY.has('minus')).toBe(false);
    });
});

describe('execute', () => {
    const cases: Array<[string, (a: number, b: number) => number]> = [
        ['add', add],
        ['subtract', subtract],
        ['multiply', multiply],
        ['divide', divide],
    ];

    it.each(cases)('should match the %s primitive', (name, fn) => {
        for (const [a, b] of [[7, 2], [-1.5, 4], [0, 3]]) {
            expect(execute(defaultFactory.create(name, a, b))).toEqual({ ok: true, value: fn(a, b) });
        }
    });

    it('should return a failed result for division by zero', () => {
        const result = execute(defaultFactory.create('divide', 8, 0));
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(DivisionByZeroError);
            expect(result.error.message).toBe('division by zero');
        }
    });
});

describe('evaluate', () => {
    it('should evaluate by operation name', () => {
        expect(evaluate('add', 3, 4)).toEqual({ ok: true, value: 7 });
        expect(evaluate('divide', 8, 2)).toEqual({ ok: true, value: 4 });
    });

    it('should throw for unsupported names', () => {
        expect(() => evaluate('modulo', 8, 3)).toThrow(UnsupportedOperationError);
    });
});
