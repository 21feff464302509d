import { describe, it, expect } from 'vitest';
import { calculate } from './calculate.js';

describe('calculate', () => {
  it.each([
    ['add', 10, 5, 15],
    ['subtract', 10, 15, -5],
    ['multiply', 15, 4, 60],
    ['divide', 7, 2, 3.5],
  ])('%s(%s, %s) = %s', (operation, num1, num2, expected) => {
    const envelope = calculate({ operation, num1, num2 });
    expect(envelope).toMatchObject({ status: 'success', result: expected });
  });

  it('returns the operands and a readable expression', () => {
    expect(calculate({ operation: 'multiply', num1: 15, num2: 4 })).toEqual({
      operation: 'multiply',
      num1: 15,
      num2: 4,
      result: 60,
      expression: '15 multiply 4 = 60',
      status: 'success',
    });
  });

  it('matches the operation name case-insensitively', () => {
    expect(calculate({ operation: 'ADD', num1: 1.5, num2: 2 })).toMatchObject({
      operation: 'add',
      result: 3.5,
      expression: '1.5 add 2 = 3.5',
    });
  });

  it('refuses to divide by zero', () => {
    for (const num1 of [0, 1, -8]) {
      expect(calculate({ operation: 'divide', num1, num2: 0 })).toEqual({
        error: 'Cannot divide by zero',
        status: 'error',
      });
    }
  });

  it('allows zero as a dividend', () => {
    expect(calculate({ operation: 'divide', num1: 0, num2: 4 })).toMatchObject({ status: 'success', result: 0 });
  });

  it('lists the valid operations for an unknown one', () => {
    expect(calculate({ operation: 'Power', num1: 1, num2: 2 })).toEqual({
      error: "Invalid operation 'power'. Use: add, subtract, multiply, divide",
      status: 'error',
    });
  });

  it('does not treat inherited object keys as operations', () => {
    expect(calculate({ operation: 'constructor', num1: 1, num2: 2 }).status).toBe('error');
  });
});
