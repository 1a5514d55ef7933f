// Calculator Tool
// Performs mathematical calculations safely using mathjs

import { evaluate } from 'mathjs';
import type { CapabilityResult, ToolDefinition } from './types.js';

export const calculatorTool: ToolDefinition = {
  name: 'calculator',
  description: 'Perform mathematical calculations. Supports basic arithmetic, algebra, trigonometry, and more. Use this for any mathematical computation.',
  parameters: [
    {
      name: 'expression',
      type: 'string',
      description: 'Mathematical expression to evaluate (e.g., "2 + 2", "sin(pi/2)", "sqrt(16)")',
      required: true,
    },
  ],
  source: 'builtin',
  invoke: async (args: Record<string, unknown>): Promise<CapabilityResult> => {
    const raw = args.expression;
    const expression = typeof raw === 'string' || typeof raw === 'number' ? String(raw).trim() : '';
    if (!expression) {
      return { error: 'missing required parameter: expression' };
    }

    try {
      const result: unknown = evaluate(expression);
      const resultStr = typeof result === 'object' ? JSON.stringify(result) : String(result);

      return {
        expression,
        result: resultStr,
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        error: `Failed to evaluate expression: ${errorMessage}`,
      };
    }
  },
};
