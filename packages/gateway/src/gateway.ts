/**
 * Gateway assembly: registries built once, sealed, and shared by every session
 */

import type { GenerationBackend, Logger, Settings } from '@koboldgate/core';
import { ProtocolRouter, ResourceRegistry, ToolRegistry } from '@koboldgate/runtime';
import { AuditLogger } from './audit-logger.js';
import { createBackendResources } from './resources.js';
import { SessionSupervisor } from './supervisor.js';
import { createTextGenerationTools } from './tools/text-generation.js';

export type GatewayOptions = {
  settings: Settings;
  backend: GenerationBackend;
  logger: Logger;
  /** Overrides the audit log built from `logging.auditLog` */
  audit?: AuditLogger;
};

export type Gateway = {
  tools: ToolRegistry;
  resources: ResourceRegistry;
  router: ProtocolRouter;
  supervisor: SessionSupervisor;
  audit: AuditLogger | undefined;
};

export function createGateway(options: GatewayOptions): Gateway {
  const { settings, backend, logger } = options;

  const tools = new ToolRegistry();
  for (const tool of createTextGenerationTools(backend, settings)) {
    tools.register(tool.declaration, tool.handler);
  }
  const resources = new ResourceRegistry();
  const backendResources = createBackendResources(backend, {
    backendUrl: settings.backend.url,
    logger
  });
  for (const resource of backendResources) {
    resources.register(resource.declaration, resource.handler);
  }
  tools.seal();
  resources.seal();
  logger.info({ tools: tools.size, resources: resources.size }, 'Registries sealed');

  const audit =
    options.audit ??
    (settings.logging.auditLog
      ? new AuditLogger(settings.logging.auditFile, { logger })
      : undefined);

  if (settings.security.enableAuth) {
    logger.warn('Authentication is enabled in settings but not enforced');
  }

  const router = new ProtocolRouter({
    tools,
    resources,
    logger,
    onToolCall: audit ? (entry) => audit.record(entry) : undefined
  });

  return {
    tools,
    resources,
    router,
    supervisor: new SessionSupervisor({ router, logger }),
    audit
  };
}
