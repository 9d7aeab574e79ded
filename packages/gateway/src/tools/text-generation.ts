/**
 * Text generation tools: thin validating shims over the generation backend
 */

import {
  MAX_BATCH_PROMPTS,
  type GenerationBackend,
  type GenerationResult,
  type Settings
} from '@koboldgate/core';
import { CapabilityError } from '@koboldgate/runtime';
import { defineTool, type ToolDefinition } from './define-tool.js';
import { capTokens, preparePrompt } from './sanitize.js';
import {
  BatchGenerateArgsSchema,
  ChatCompletionArgsSchema,
  GenerateTextArgsSchema,
  TestPromptArgsSchema
} from './schemas.js';

export type TestPromptRun = {
  temperature: number;
  top_p: number;
  generated_text: string;
  tokens_generated: number;
  generation_time: number;
  tokens_per_second: number;
};

function timing(result: GenerationResult) {
  return {
    tokens_generated: result.tokensGenerated,
    generation_time: result.generationTime,
    tokens_per_second: result.tokensPerSecond,
    finish_reason: result.finishReason
  };
}

/**
 * Highest tokens-per-second wins; ties go to the earliest run
 */
export function pickBestRun(runs: readonly TestPromptRun[]): TestPromptRun | undefined {
  let best: TestPromptRun | undefined;
  for (const run of runs) {
    if (!best || run.tokens_per_second > best.tokens_per_second) {
      best = run;
    }
  }
  return best;
}

export function createTextGenerationTools(
  backend: GenerationBackend,
  settings: Pick<Settings, 'security' | 'performance'>
): ToolDefinition[] {
  const { security, performance } = settings;

  const generateText = defineTool({
    name: 'generate_text',
    description:
      'Generate text using KoboldCpp with configurable parameters. Supports various sampling methods and stopping conditions.',
    schema: GenerateTextArgsSchema,
    run: async (args, ctx) => {
      const prompt = preparePrompt(args.prompt, security);
      const parameters = {
        max_tokens: capTokens(args.max_tokens, security),
        temperature: args.temperature,
        top_p: args.top_p,
        top_k: args.top_k,
        typical_p: args.typical_p,
        rep_pen: args.rep_pen,
        rep_pen_range: args.rep_pen_range,
        stop_sequence: args.stop_sequence
      };

      const result = await backend.generateText(
        {
          prompt,
          maxTokens: parameters.max_tokens,
          temperature: parameters.temperature,
          topP: parameters.top_p,
          topK: parameters.top_k,
          typicalP: parameters.typical_p,
          repetitionPenalty: parameters.rep_pen,
          repetitionPenaltyRange: parameters.rep_pen_range,
          stopSequences: parameters.stop_sequence
        },
        ctx.signal
      );

      return {
        type: 'text',
        text: result.text,
        metadata: { ...timing(result), parameters_used: parameters }
      };
    }
  });

  const chatCompletion = defineTool({
    name: 'chat_completion',
    description:
      'Generate chat completion using conversation format. Supports multi-turn conversations with system, user, and assistant messages.',
    schema: ChatCompletionArgsSchema,
    run: async (args, ctx) => {
      const messages = args.messages.map((message) => ({
        role: message.role,
        content: preparePrompt(message.content, security)
      }));

      const result = await backend.chatCompletion(
        {
          messages,
          maxTokens: capTokens(args.max_tokens, security),
          temperature: args.temperature,
          topP: args.top_p
        },
        ctx.signal
      );

      return {
        type: 'text',
        text: result.text,
        metadata: { ...timing(result), conversation_length: messages.length }
      };
    }
  });

  const testPrompt = defineTool({
    name: 'test_prompt',
    description:
      'Test a prompt with multiple parameter variations to find optimal settings. Useful for prompt engineering and optimization.',
    schema: TestPromptArgsSchema,
    run: async (args, ctx) => {
      const prompt = preparePrompt(args.prompt, security);
      const maxTokens = capTokens(args.max_tokens, security);
      const runs: TestPromptRun[] = [];

      // Sequential; temperature outer, top_p inner
      for (const temperature of args.temperature_range) {
        for (const topP of args.top_p_range) {
          const result = await backend.generateText(
            { prompt, maxTokens, temperature, topP },
            ctx.signal
          );
          runs.push({
            temperature,
            top_p: topP,
            generated_text: result.text,
            tokens_generated: result.tokensGenerated,
            generation_time: result.generationTime,
            tokens_per_second: result.tokensPerSecond
          });
        }
      }

      const best = pickBestRun(runs);
      return {
        type: 'text',
        text: `Prompt testing completed with ${runs.length} variations`,
        metadata: {
          test_results: runs,
          best_configuration: best
            ? {
                temperature: best.temperature,
                top_p: best.top_p,
                performance: best.tokens_per_second
              }
            : null,
          total_tests: runs.length
        }
      };
    }
  });

  const batchGenerate = defineTool({
    name: 'batch_generate',
    description:
      'Generate text for multiple prompts efficiently with controlled concurrency. Useful for processing large datasets or document analysis.',
    schema: BatchGenerateArgsSchema,
    run: async (args, ctx) => {
      if (args.prompts.length > MAX_BATCH_PROMPTS) {
        throw new CapabilityError(`Too many prompts in batch (maximum ${MAX_BATCH_PROMPTS})`);
      }
      const prompts = args.prompts.map((prompt) => preparePrompt(prompt, security));

      const batch = await backend.batchGenerate(
        prompts,
        {
          maxConcurrent: Math.min(args.max_concurrent, performance.maxConcurrentRequests),
          params: {
            maxTokens: capTokens(args.max_tokens, security),
            temperature: args.temperature
          }
        },
        ctx.signal
      );

      return {
        type: 'text',
        text: `Batch generation completed: ${batch.successful} successful, ${batch.failed} failed`,
        metadata: {
          results: batch.results.map((result, index) => ({
            prompt_index: index,
            generated_text: result.text,
            tokens_generated: result.tokensGenerated,
            generation_time: result.generationTime,
            success: result.finishReason !== 'error'
          })),
          total_time: batch.totalTime,
          successful: batch.successful,
          failed: batch.failed,
          total_prompts: prompts.length
        }
      };
    }
  });

  return [generateText, chatCompletion, testPrompt, batchGenerate];
}
