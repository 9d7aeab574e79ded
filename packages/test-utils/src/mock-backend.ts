import type {
  BackendStatus,
  BatchResult,
  ChatParams,
  GenerateParams,
  GenerationBackend,
  GenerationResult,
  ModelInfo
} from '@koboldgate/core';

export function makeResult(
  text: string,
  overrides: Partial<GenerationResult> = {}
): GenerationResult {
  return {
    text,
    tokensGenerated: text.split(/\s+/).filter(Boolean).length,
    generationTime: 0.5,
    tokensPerSecond: 2,
    finishReason: 'stop',
    ...overrides
  };
}

export const TEST_MODEL_INFO: ModelInfo = {
  modelName: 'test-model',
  contextLength: 2048
};

export const TEST_STATUS: BackendStatus = {
  online: true,
  modelLoaded: true,
  modelName: 'test-model',
  contextLength: 2048,
  generationActive: false
};

export type MockBackend = GenerationBackend & {
  readonly calls: {
    generateText: GenerateParams[];
    chatCompletion: ChatParams[];
    batchGenerate: Array<{ prompts: string[]; maxConcurrent?: number; maxTokens?: number }>;
    signals: Array<AbortSignal | undefined>;
  };
};

/**
 * Generation backend fake. Defaults echo the prompt; pass overrides to change one call.
 */
export function createMockBackend(overrides: Partial<GenerationBackend> = {}): MockBackend {
  const calls: MockBackend['calls'] = {
    generateText: [],
    chatCompletion: [],
    batchGenerate: [],
    signals: []
  };

  const generateText: GenerationBackend['generateText'] = async (params, signal) => {
    calls.generateText.push(params);
    calls.signals.push(signal);
    return overrides.generateText
      ? overrides.generateText(params, signal)
      : makeResult(`echo: ${params.prompt}`);
  };

  const chatCompletion: GenerationBackend['chatCompletion'] = async (params, signal) => {
    calls.chatCompletion.push(params);
    calls.signals.push(signal);
    if (overrides.chatCompletion) return overrides.chatCompletion(params, signal);
    const last = params.messages[params.messages.length - 1];
    return makeResult(`reply: ${last?.content ?? ''}`);
  };

  const batchGenerate: GenerationBackend['batchGenerate'] = async (prompts, options, signal) => {
    calls.batchGenerate.push({
      prompts: [...prompts],
      maxConcurrent: options?.maxConcurrent,
      maxTokens: options?.params?.maxTokens
    });
    calls.signals.push(signal);
    if (overrides.batchGenerate) return overrides.batchGenerate(prompts, options, signal);

    const results: GenerationResult[] = [];
    for (const prompt of prompts) {
      try {
        results.push(await generateText({ ...options?.params, prompt }, signal));
      } catch {
        results.push(
          makeResult('', {
            tokensGenerated: 0,
            generationTime: 0,
            tokensPerSecond: 0,
            finishReason: 'error'
          })
        );
      }
    }
    const failed = results.filter((result) => result.finishReason === 'error').length;
    const batch: BatchResult = {
      results,
      totalTime: 1,
      successful: results.length - failed,
      failed
    };
    return batch;
  };

  return {
    calls,
    generateText,
    chatCompletion,
    batchGenerate,
    checkStatus: overrides.checkStatus ?? (async () => TEST_STATUS),
    getModelInfo: overrides.getModelInfo ?? (async () => TEST_MODEL_INFO)
  };
}
