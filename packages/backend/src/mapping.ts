/**
 * KoboldCpp wire mapping: request bodies out, typed results in
 */

import { z } from 'zod';
import {
  SAMPLER_ORDER,
  type BackendStatus,
  type ChatParams,
  type FinishReason,
  type GenerateParams,
  type ModelInfo
} from '@koboldgate/core';
import { BackendResponseError } from './errors.js';

export const GENERATION_DEFAULTS = {
  maxTokens: 100,
  temperature: 0.7,
  topP: 0.9,
  topK: 40,
  typicalP: 1.0,
  repetitionPenalty: 1.1,
  repetitionPenaltyRange: 320
} as const;

export const DEFAULT_CONTEXT_LENGTH = 2048;

/**
 * Native generate body. `max_context_length` is sent only when the caller sets it.
 */
export function buildGenerateBody(params: GenerateParams, stream = false): Record<string, unknown> {
  const body: Record<string, unknown> = {
    prompt: params.prompt,
    max_length: params.maxTokens ?? GENERATION_DEFAULTS.maxTokens,
    temperature: params.temperature ?? GENERATION_DEFAULTS.temperature,
    top_p: params.topP ?? GENERATION_DEFAULTS.topP,
    top_k: params.topK ?? GENERATION_DEFAULTS.topK,
    typical: params.typicalP ?? GENERATION_DEFAULTS.typicalP,
    rep_pen: params.repetitionPenalty ?? GENERATION_DEFAULTS.repetitionPenalty,
    rep_pen_range: params.repetitionPenaltyRange ?? GENERATION_DEFAULTS.repetitionPenaltyRange,
    sampler_order: [...SAMPLER_ORDER],
    stop_sequence: params.stopSequences ?? [],
    stream
  };
  if (params.maxContextLength !== undefined) {
    body.max_context_length = params.maxContextLength;
  }
  return body;
}

export function buildChatBody(params: ChatParams): Record<string, unknown> {
  return {
    model: 'koboldcpp',
    messages: params.messages.map(({ role, content }) => ({ role, content })),
    max_tokens: params.maxTokens ?? GENERATION_DEFAULTS.maxTokens,
    temperature: params.temperature ?? GENERATION_DEFAULTS.temperature,
    top_p: params.topP ?? GENERATION_DEFAULTS.topP,
    stream: false
  };
}

/**
 * Whitespace word count; KoboldCpp's native API reports no token usage
 */
export function estimateTokens(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

export function tokensPerSecond(tokens: number, seconds: number): number {
  return seconds > 0 ? tokens / seconds : 0;
}

const GenerateResponseSchema = z.object({
  results: z.array(z.object({ text: z.string().optional() }).passthrough()).optional()
});

const ChatResponseSchema = z.object({
  choices: z
    .array(
      z
        .object({
          message: z.object({ content: z.string().nullish() }).passthrough().optional(),
          finish_reason: z.string().nullish()
        })
        .passthrough()
    )
    .optional(),
  usage: z.object({ completion_tokens: z.number().int().nonnegative().optional() }).optional()
});

const StatusResponseSchema = z
  .object({
    ready: z.boolean().optional(),
    generating: z.boolean().optional()
  })
  .passthrough();

const ModelResponseSchema = z
  .object({
    model_name: z.string().optional(),
    result: z.string().optional(),
    max_context_length: z.number().int().positive().optional(),
    vocab_size: z.number().int().optional(),
    parameters: z.string().optional(),
    architecture: z.string().optional(),
    format: z.string().optional()
  })
  .passthrough();

function parseWith<T>(schema: z.ZodType<T>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new BackendResponseError(`Malformed ${what} response${where}`, { cause: result.error });
  }
  return result.data;
}

export function readGeneratedText(data: unknown): string {
  const parsed = parseWith(GenerateResponseSchema, data, 'generate');
  return parsed.results?.[0]?.text ?? '';
}

export type ChatOutput = {
  text: string;
  finishReason: FinishReason;
  completionTokens: number | undefined;
};

export function readChatOutput(data: unknown): ChatOutput {
  const parsed = parseWith(ChatResponseSchema, data, 'chat');
  const choice = parsed.choices?.[0];
  if (!choice) {
    throw new BackendResponseError('No choices returned from chat completion');
  }
  return {
    text: choice.message?.content ?? '',
    finishReason: choice.finish_reason === 'length' ? 'length' : 'stop',
    completionTokens: parsed.usage?.completion_tokens
  };
}

export function readStatusFlags(data: unknown): { ready: boolean; generating: boolean } {
  const parsed = parseWith(StatusResponseSchema, data, 'status');
  return { ready: parsed.ready ?? false, generating: parsed.generating ?? false };
}

export function readModelInfo(data: unknown): ModelInfo {
  const parsed = parseWith(ModelResponseSchema, data, 'model');
  const info: ModelInfo = {
    modelName: parsed.model_name ?? parsed.result ?? 'unknown',
    contextLength: parsed.max_context_length ?? DEFAULT_CONTEXT_LENGTH
  };
  if (parsed.vocab_size !== undefined) info.vocabSize = parsed.vocab_size;
  if (parsed.parameters !== undefined) info.parameters = parsed.parameters;
  if (parsed.architecture !== undefined) info.architecture = parsed.architecture;
  if (parsed.format !== undefined) info.format = parsed.format;
  return info;
}

/**
 * Status built from the status call plus an optional model call
 */
export function composeStatus(
  flags: { ready: boolean; generating: boolean },
  model: unknown
): BackendStatus {
  const parsed = model === undefined ? undefined : ModelResponseSchema.safeParse(model);
  const data = parsed?.success ? parsed.data : undefined;
  return {
    online: true,
    modelLoaded: flags.ready,
    modelName: data?.model_name ?? data?.result ?? 'unknown',
    contextLength: data?.max_context_length ?? null,
    generationActive: flags.generating
  };
}

export const OFFLINE_STATUS: BackendStatus = Object.freeze({
  online: false,
  modelLoaded: false,
  modelName: 'unknown',
  contextLength: null,
  generationActive: false
});

/**
 * Extract the token from one streamed NDJSON line, if any
 */
export function readStreamToken(line: string): string | undefined {
  const trimmed = line.trim();
  if (!trimmed) return undefined;
  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch {
    // keep-alive and partial lines carry no token
    return undefined;
  }
  if (
    typeof data === 'object' &&
    data !== null &&
    'token' in data &&
    typeof data.token === 'string'
  ) {
    return data.token;
  }
  return undefined;
}
