/**
 * Tool definition helper shared by all tool groups
 */

import type { z } from 'zod';
import { ErrorHandler } from '../utils/error-handler.js';

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

export interface RegisteredTool {
  description: string;
  inputSchema: ToolInputSchema;
  /** Validate raw arguments against the zod schema, then run the handler */
  run: (rawArgs: unknown) => Promise<string>;
}

export function defineTool<S extends z.ZodTypeAny>(tool: {
  description: string;
  inputSchema: ToolInputSchema;
  schema: S;
  handler: (args: z.output<S>) => Promise<string>;
}): RegisteredTool {
  return {
    description: tool.description,
    inputSchema: tool.inputSchema,
    run: async (rawArgs) => {
      const args = await ErrorHandler.wrap(async () => tool.schema.parse(rawArgs ?? {}));
      return tool.handler(args);
    }
  };
}

export const FORMAT_PROPERTY = {
  type: 'string' as const,
  enum: ['markdown', 'json'],
  default: 'markdown',
  description: 'Output format'
};
