/**
 * Backend-backed resources. Failures are reported inside the JSON body
 * rather than as protocol errors.
 */

import type { Resource } from '@modelcontextprotocol/sdk/types.js';
import type {
  GenerationBackend,
  Logger,
  ResourceContents,
  ResourceHandler
} from '@koboldgate/core';
import { errorMessage } from '@koboldgate/runtime';

export const MODEL_INFO_URI = 'koboldcpp://model/info';
export const SERVER_STATUS_URI = 'koboldcpp://server/status';

export type ResourceDefinition = {
  declaration: Resource;
  handler: ResourceHandler;
};

function jsonContents(uri: string, value: unknown): ResourceContents {
  return { uri, mimeType: 'application/json', text: JSON.stringify(value, null, 2) };
}

export function createBackendResources(
  backend: GenerationBackend,
  options: { backendUrl: string; logger: Logger }
): ResourceDefinition[] {
  const modelInfo: ResourceHandler = async (uri, ctx) => {
    try {
      const info = await backend.getModelInfo(ctx.signal);
      return jsonContents(uri, {
        model_name: info.modelName,
        context_length: info.contextLength,
        vocab_size: info.vocabSize ?? null,
        parameters: info.parameters ?? null,
        architecture: info.architecture ?? null,
        format: info.format ?? null
      });
    } catch (error) {
      options.logger.error({ error }, 'Failed to get model info');
      return jsonContents(uri, { error: `Failed to get model info: ${errorMessage(error)}` });
    }
  };

  const serverStatus: ResourceHandler = async (uri, ctx) => {
    try {
      const status = await backend.checkStatus(ctx.signal);
      return jsonContents(uri, {
        online: status.online,
        model_loaded: status.modelLoaded,
        model_name: status.modelName,
        context_length: status.contextLength,
        generation_active: status.generationActive,
        server_url: options.backendUrl
      });
    } catch (error) {
      options.logger.error({ error }, 'Failed to get server status');
      return jsonContents(uri, { error: `Failed to get server status: ${errorMessage(error)}` });
    }
  };

  return [
    {
      declaration: {
        uri: MODEL_INFO_URI,
        name: 'Model Information',
        description: 'Current KoboldCpp model information and capabilities',
        mimeType: 'application/json'
      },
      handler: modelInfo
    },
    {
      declaration: {
        uri: SERVER_STATUS_URI,
        name: 'Server Status',
        description: 'KoboldCpp server status and health information',
        mimeType: 'application/json'
      },
      handler: serverStatus
    }
  ];
}
