import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { failure, respond, success, type ToolEnvelope } from './envelope.js';

export const name = 'calculate';

export const description = 'Perform basic arithmetic: add, subtract, multiply or divide two numbers.';

export const inputSchema = {
  operation: z.string().describe('One of "add", "subtract", "multiply", "divide"'),
  num1: z.number().describe('First number'),
  num2: z.number().describe('Second number'),
};

export const OPERATIONS = ['add', 'subtract', 'multiply', 'divide'] as const;

export type Operation = (typeof OPERATIONS)[number];

const operations: Record<Operation, (a: number, b: number) => number> = {
  add: (a, b) => a + b,
  subtract: (a, b) => a - b,
  multiply: (a, b) => a * b,
  divide: (a, b) => a / b,
};

function isOperation(operation: string): operation is Operation {
  return OPERATIONS.some((candidate) => candidate === operation);
}

export type Calculation = {
  operation: Operation;
  num1: number;
  num2: number;
  result: number;
  expression: string;
};

export function calculate(args: { operation: string; num1: number; num2: number }): ToolEnvelope<Calculation> {
  const operation = args.operation.toLowerCase();
  const { num1, num2 } = args;

  if (!isOperation(operation)) {
    return failure(`Invalid operation '${operation}'. Use: ${OPERATIONS.join(', ')}`);
  }

  if (operation === 'divide' && num2 === 0) {
    return failure('Cannot divide by zero');
  }

  const result = operations[operation](num1, num2);

  return success({
    operation,
    num1,
    num2,
    result,
    expression: `${num1} ${operation} ${num2} = ${result}`,
  });
}

export async function handler(args: { operation: string; num1: number; num2: number }) {
  return respond(name, async () => calculate(args));
}

export function register(server: McpServer): void {
  server.registerTool(name, { description, inputSchema }, handler);
}
