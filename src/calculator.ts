/**
 * Arithmetic primitives behind every calculation.
 * All four are pure; only `divide` has a domain error.
 */

import { DivisionByZeroError, InvalidOperandError } from './errors';

function assertFinite(a: number, b: number): void {
  if (!Number.isFinite(a)) {
    throw new InvalidOperandError(String(a));
  }
  if (!Number.isFinite(b)) {
    throw new InvalidOperandError(String(b));
  }
}

/**
 * Adds two numbers
 * @throws InvalidOperandError if either argument is not finite
 */
export function add(a: number, b: number): number {
  assertFinite(a, b);
  return a + b;
}

/**
 * Subtracts the second number from the first
 */
export function subtract(a: number, b: number): number {
  assertFinite(a, b);
  return a - b;
}

export function multiply(a: number, b: number): number {
  assertFinite(a, b);
  return a * b;
}

/**
 * Divides the first number by the second
 * @param a - Dividend
 * @param b - Divisor
 * @throws DivisionByZeroError if the divisor is zero (either sign)
 */
export function divide(a: number, b: number): number {
  assertFinite(a, b);
  if (b === 0) {
    throw new DivisionByZeroError();
  }
  return a / b;
}
