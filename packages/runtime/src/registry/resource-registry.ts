/**
 * Resource registry keyed by URI. Same lifecycle as the tool registry.
 */

import type { Resource } from '@modelcontextprotocol/sdk/types.js';
import type { ResourceEntry, ResourceHandler } from '@koboldgate/core';
import { DuplicateRegistrationError, RegistrySealedError } from '../errors.js';

export class ResourceRegistry {
  private entries = new Map<string, ResourceEntry>();
  private sealed = false;

  register(declaration: Resource, handler: ResourceHandler): void {
    const uri = declaration.uri;
    if (this.sealed) {
      throw new RegistrySealedError('resource', uri);
    }
    if (this.entries.has(uri)) {
      throw new DuplicateRegistrationError('resource', uri);
    }
    this.entries.set(uri, { uri, declaration, handler });
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  get(uri: string): ResourceEntry | undefined {
    return this.entries.get(uri);
  }

  list(): Resource[] {
    return Array.from(this.entries.values(), (entry) => entry.declaration);
  }

  get size(): number {
    return this.entries.size;
  }
}
