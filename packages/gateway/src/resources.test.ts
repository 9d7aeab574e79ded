import { describe, expect, it } from 'vitest';
import { type CapabilityContext, createSilentLogger } from '@koboldgate/core';
import { createMockBackend } from '@koboldgate/test-utils';
import { createBackendResources, MODEL_INFO_URI, SERVER_STATUS_URI } from './resources.js';

const ctx: CapabilityContext = {
  sessionId: 'session-1',
  signal: new AbortController().signal,
  logger: createSilentLogger()
};

async function read(backend: ReturnType<typeof createMockBackend>, uri: string) {
  const resources = createBackendResources(backend, {
    backendUrl: 'http://localhost:5001',
    logger: createSilentLogger()
  });
  const resource = resources.find((candidate) => candidate.declaration.uri === uri);
  if (!resource) throw new Error(`missing resource ${uri}`);
  const contents = await resource.handler(uri, ctx);
  const body: unknown = JSON.parse(contents.text);
  return { contents, body };
}

describe('backend resources', () => {
  it('declares model info and server status', () => {
    const resources = createBackendResources(createMockBackend(), {
      backendUrl: 'http://localhost:5001',
      logger: createSilentLogger()
    });
    expect(resources.map((resource) => resource.declaration)).toEqual([
      {
        uri: 'koboldcpp://model/info',
        name: 'Model Information',
        description: 'Current KoboldCpp model information and capabilities',
        mimeType: 'application/json'
      },
      {
        uri: 'koboldcpp://server/status',
        name: 'Server Status',
        description: 'KoboldCpp server status and health information',
        mimeType: 'application/json'
      }
    ]);
  });

  it('reads model info as JSON', async () => {
    const backend = createMockBackend({
      getModelInfo: async () => ({ modelName: 'llama-7b', contextLength: 4096, format: 'gguf' })
    });
    const { contents, body } = await read(backend, MODEL_INFO_URI);

    expect(contents.uri).toBe(MODEL_INFO_URI);
    expect(contents.mimeType).toBe('application/json');
    expect(body).toEqual({
      model_name: 'llama-7b',
      context_length: 4096,
      vocab_size: null,
      parameters: null,
      architecture: null,
      format: 'gguf'
    });
  });

  it('reports model info failures in the body', async () => {
    const backend = createMockBackend({
      getModelInfo: async () => {
        throw new Error('connection refused');
      }
    });
    const { body } = await read(backend, MODEL_INFO_URI);
    expect(body).toEqual({ error: 'Failed to get model info: connection refused' });
  });

  it('reads server status with the backend URL', async () => {
    const { body } = await read(createMockBackend(), SERVER_STATUS_URI);
    expect(body).toEqual({
      online: true,
      model_loaded: true,
      model_name: 'test-model',
      context_length: 2048,
      generation_active: false,
      server_url: 'http://localhost:5001'
    });
  });

  it('reports status failures in the body', async () => {
    const backend = createMockBackend({
      checkStatus: async () => {
        throw new Error('HTTP 500: down');
      }
    });
    const { body } = await read(backend, SERVER_STATUS_URI);
    expect(body).toEqual({ error: 'Failed to get server status: HTTP 500: down' });
  });
});
