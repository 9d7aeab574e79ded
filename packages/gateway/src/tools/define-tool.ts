/**
 * Tool definition helper: zod-validated arguments, JSON Schema declaration
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import type { CapabilityContext, ToolHandler } from '@koboldgate/core';
import { CapabilityError } from '@koboldgate/runtime';
import { toInputSchema } from './json-schema.js';

export type ToolDefinition = {
  declaration: Tool;
  handler: ToolHandler;
};

export type ToolSpec<S extends z.ZodObject<z.ZodRawShape>> = {
  name: string;
  description: string;
  schema: S;
  run: (args: z.output<S>, ctx: CapabilityContext) => Promise<unknown>;
};

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    .join('; ');
}

export function defineTool<S extends z.ZodObject<z.ZodRawShape>>(
  spec: ToolSpec<S>
): ToolDefinition {
  return {
    declaration: {
      name: spec.name,
      description: spec.description,
      inputSchema: toInputSchema(spec.schema)
    },
    handler: async (args, ctx) => {
      const parsed = spec.schema.safeParse(args);
      if (!parsed.success) {
        throw new CapabilityError(
          `Invalid arguments for ${spec.name}: ${formatIssues(parsed.error)}`
        );
      }
      return spec.run(parsed.data, ctx);
    }
  };
}
