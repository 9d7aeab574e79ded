/**
 * Tool-call audit log: one JSON line per tools/call, appended to a file.
 * Writes are serialized; a failed write is logged and never reaches the caller.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { Logger } from '@koboldgate/core';
import type { ToolCallAudit } from '@koboldgate/runtime';

export type AuditLogEntry = {
  timestamp: string;
  event: 'TOOL_CALL';
  sessionId: string;
  tool: string;
  arguments: Record<string, unknown>;
  outcome: ToolCallAudit['outcome'];
};

export type AuditLoggerOptions = {
  logger: Logger;
  now?: () => Date;
};

export class AuditLogger {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private queue: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(filePath: string, options: AuditLoggerOptions) {
    this.filePath = resolve(filePath);
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  get path(): string {
    return this.filePath;
  }

  record(audit: ToolCallAudit): void {
    const entry: AuditLogEntry = {
      timestamp: this.now().toISOString(),
      event: 'TOOL_CALL',
      sessionId: audit.sessionId,
      tool: audit.tool,
      arguments: audit.arguments,
      outcome: audit.outcome
    };
    this.queue = this.queue.then(() => this.write(entry));
  }

  /**
   * Resolves once every recorded entry has been written (or failed)
   */
  flush(): Promise<void> {
    return this.queue;
  }

  private async write(entry: AuditLogEntry): Promise<void> {
    try {
      if (!this.dirReady) {
        await mkdir(dirname(this.filePath), { recursive: true });
        this.dirReady = true;
      }
      await appendFile(this.filePath, `${JSON.stringify(entry)}\n`, 'utf-8');
    } catch (error) {
      this.logger.warn({ error, file: this.filePath }, 'Failed to write audit entry');
    }
  }
}
