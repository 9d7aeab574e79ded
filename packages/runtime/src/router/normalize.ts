import { isRecord, type ToolCallResult } from '@koboldgate/core';

function toContentItem(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : { type: 'text', text: stringify(value) };
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return '';
  return JSON.stringify(value) ?? String(value);
}

/**
 * Shape a raw handler value as a tools/call result:
 * a mapping becomes one content item, a sequence becomes many,
 * anything else a single text item.
 */
export function normalizeToolResult(value: unknown): ToolCallResult {
  if (Array.isArray(value)) {
    return { content: value.map(toContentItem) };
  }
  if (isRecord(value)) {
    return { content: [value] };
  }
  return { content: [{ type: 'text', text: stringify(value) }] };
}

export function errorToolResult(message: string): ToolCallResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}
