/**
 * Tool registry - built once at startup, sealed, then shared read-only by every session.
 * Listing order is registration order.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolEntry, ToolHandler } from '@koboldgate/core';
import { DuplicateRegistrationError, RegistrySealedError } from '../errors.js';

export class ToolRegistry {
  private entries = new Map<string, ToolEntry>();
  private sealed = false;

  register(declaration: Tool, handler: ToolHandler): void {
    const name = declaration.name;
    if (this.sealed) {
      throw new RegistrySealedError('tool', name);
    }
    if (this.entries.has(name)) {
      throw new DuplicateRegistrationError('tool', name);
    }
    this.entries.set(name, { name, declaration, handler });
  }

  /**
   * Freeze the registry; later registrations throw
   */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  get(name: string): ToolEntry | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  list(): Tool[] {
    return Array.from(this.entries.values(), (entry) => entry.declaration);
  }

  get size(): number {
    return this.entries.size;
  }
}
