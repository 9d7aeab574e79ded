/**
 * @koboldgate/gateway - capability layer and session supervision
 */

export { type AuditLogEntry, AuditLogger, type AuditLoggerOptions } from './audit-logger.js';
export { createGateway, type Gateway, type GatewayOptions } from './gateway.js';
export {
  createBackendResources,
  MODEL_INFO_URI,
  type ResourceDefinition,
  SERVER_STATUS_URI
} from './resources.js';
export { SessionSupervisor, type SessionSupervisorOptions } from './supervisor.js';
export { defineTool, type ToolDefinition, type ToolSpec } from './tools/define-tool.js';
export { toInputSchema } from './tools/json-schema.js';
export { capTokens, preparePrompt, sanitizePrompt } from './tools/sanitize.js';
export * from './tools/schemas.js';
export {
  createTextGenerationTools,
  pickBestRun,
  type TestPromptRun
} from './tools/text-generation.js';
