/**
 * Publish a zod object schema as a tool input schema
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export function toInputSchema(schema: z.ZodObject<z.ZodRawShape>): Tool['inputSchema'] {
  const json = zodToJsonSchema(schema, { $refStrategy: 'none' });
  const properties = 'properties' in json ? json.properties : {};
  const required =
    'required' in json && Array.isArray(json.required) && json.required.length > 0
      ? json.required
      : undefined;

  return required ? { type: 'object', properties, required } : { type: 'object', properties };
}
