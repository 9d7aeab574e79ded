/**
 * Registry entry types shared by the router and the capability layer.
 * Pure types with no side effects.
 */

import type { Resource, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from '../logger.js';

/**
 * Per-call context handed to every tool and resource handler
 */
export type CapabilityContext = {
  sessionId: string;
  /** Aborts when the owning session closes */
  signal: AbortSignal;
  logger: Logger;
};

export type ToolHandler = (args: Record<string, unknown>, ctx: CapabilityContext) => Promise<unknown>;

export type ResourceContents = {
  uri: string;
  mimeType?: string;
  text: string;
};

export type ResourceHandler = (uri: string, ctx: CapabilityContext) => Promise<ResourceContents>;

export type ToolEntry = {
  name: string;
  declaration: Tool;
  handler: ToolHandler;
};

export type ResourceEntry = {
  uri: string;
  declaration: Resource;
  handler: ResourceHandler;
};

/** Content item in a tools/call result */
export type ContentItem = {
  type: 'text';
  text: string;
  metadata?: Record<string, unknown>;
};

/** Handler results may pass their own content objects through */
export type ToolCallResult = {
  content: Array<ContentItem | Record<string, unknown>>;
  isError?: boolean;
};
