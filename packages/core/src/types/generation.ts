/**
 * Backend-facing generation types
 */

export type FinishReason = 'stop' | 'length' | 'error';

export type GenerationResult = Readonly<{
  text: string;
  tokensGenerated: number;
  /** Seconds */
  generationTime: number;
  tokensPerSecond: number;
  finishReason: FinishReason;
}>;

export type BatchResult = Readonly<{
  results: readonly GenerationResult[];
  totalTime: number;
  successful: number;
  failed: number;
}>;

export type BackendStatus = {
  online: boolean;
  modelLoaded: boolean;
  modelName: string;
  contextLength: number | null;
  generationActive: boolean;
};

export type ModelInfo = {
  modelName: string;
  contextLength: number;
  vocabSize?: number;
  parameters?: string;
  architecture?: string;
  format?: string;
};

export type GenerateParams = {
  prompt: string;
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  topK?: number;
  typicalP?: number;
  repetitionPenalty?: number;
  repetitionPenaltyRange?: number;
  stopSequences?: string[];
  maxContextLength?: number;
};

export type ChatRole = 'system' | 'user' | 'assistant';

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ChatParams = {
  messages: ChatMessage[];
  maxTokens?: number;
  temperature?: number;
  topP?: number;
};

export type BatchRequestOptions = {
  /** Batch-scoped concurrency, capped by the global ceiling */
  maxConcurrent?: number;
  params?: Omit<GenerateParams, 'prompt'>;
};

/**
 * What the capability layer needs from a backend
 */
export interface GenerationBackend {
  generateText(params: GenerateParams, signal?: AbortSignal): Promise<GenerationResult>;
  chatCompletion(params: ChatParams, signal?: AbortSignal): Promise<GenerationResult>;
  batchGenerate(
    prompts: readonly string[],
    options?: BatchRequestOptions,
    signal?: AbortSignal
  ): Promise<BatchResult>;
  checkStatus(signal?: AbortSignal): Promise<BackendStatus>;
  getModelInfo(signal?: AbortSignal): Promise<ModelInfo>;
}
