/**
 * Global constants for koboldgate
 * Keep values environment-agnostic and dependency-free.
 */

/** The single MCP protocol version the gateway negotiates */
export const PROTOCOL_VERSION = '2024-11-05' as const;

/** Product name for serverInfo */
export const SERVER_NAME = 'koboldgate' as const;

/**
 * Gateway version string.
 * NOTE: keep in step with the root package.json.
 */
export const SERVER_VERSION = '0.1.0' as const;

/** serverInfo payload used in initialize responses */
export const SERVER_INFO = {
  name: SERVER_NAME,
  version: SERVER_VERSION
} as const;

/** Capability set advertised on initialize; both lists may change */
export const SERVER_CAPABILITIES = {
  tools: { listChanged: true },
  resources: { listChanged: true }
} as const;

/**
 * KoboldCpp sampler ordering sent with every native generate call.
 * Backend constant, not user-configurable.
 */
export const SAMPLER_ORDER: readonly number[] = [6, 0, 1, 3, 4, 2, 5];

/** Tokens stripped from prompts when sanitization is enabled */
export const INJECTION_DELIMITERS: readonly string[] = ['</s>', '<|endoftext|>'];

/** Upper bound on prompts accepted by a single batch call */
export const MAX_BATCH_PROMPTS = 50;
