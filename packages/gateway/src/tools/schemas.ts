/**
 * Tool argument schemas. Field names follow the published tool interface (snake_case).
 */

import { z } from 'zod';

const temperature = z
  .number()
  .min(0)
  .max(2)
  .default(0.7)
  .describe('Sampling temperature (0.0 to 2.0)');
const topP = z.number().min(0).max(1).default(0.9).describe('Nucleus sampling parameter');

export const GenerateTextArgsSchema = z.object({
  prompt: z.string().describe('The text prompt to generate from'),
  max_tokens: z
    .number()
    .int()
    .min(1)
    .max(4096)
    .default(100)
    .describe('Maximum number of tokens to generate'),
  temperature,
  top_p: topP,
  top_k: z.number().int().min(1).max(100).default(40).describe('Top-k sampling parameter'),
  typical_p: z.number().min(0).max(1).default(1.0).describe('Typical sampling parameter'),
  rep_pen: z.number().min(1).max(2).default(1.1).describe('Repetition penalty'),
  rep_pen_range: z
    .number()
    .int()
    .min(0)
    .max(2048)
    .default(320)
    .describe('Repetition penalty range'),
  stop_sequence: z
    .array(z.string())
    .default([])
    .describe('List of strings that will stop generation')
});

export const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']).describe('The role of the message sender'),
  content: z.string().describe('The message content')
});

export const ChatCompletionArgsSchema = z.object({
  messages: z.array(ChatMessageSchema).min(1).describe('List of conversation messages'),
  max_tokens: z
    .number()
    .int()
    .min(1)
    .max(4096)
    .default(100)
    .describe('Maximum tokens to generate'),
  temperature,
  top_p: topP
});

export const TestPromptArgsSchema = z.object({
  prompt: z.string().describe('The prompt to test'),
  temperature_range: z
    .array(z.number().min(0).max(2))
    .min(1)
    .max(10)
    .default([0.3, 0.7, 1.0])
    .describe('List of temperature values to test'),
  top_p_range: z
    .array(z.number().min(0).max(1))
    .min(1)
    .max(10)
    .default([0.8, 0.9, 0.95])
    .describe('List of top_p values to test'),
  max_tokens: z.number().int().min(1).max(1024).default(50).describe('Maximum tokens per test')
});

export const BatchGenerateArgsSchema = z.object({
  prompts: z.array(z.string()).describe('List of prompts to process'),
  max_tokens: z
    .number()
    .int()
    .min(1)
    .max(2048)
    .default(100)
    .describe('Maximum tokens per generation'),
  temperature,
  max_concurrent: z
    .number()
    .int()
    .min(1)
    .max(10)
    .default(3)
    .describe('Maximum concurrent requests')
});

export type GenerateTextArgs = z.output<typeof GenerateTextArgsSchema>;
export type ChatCompletionArgs = z.output<typeof ChatCompletionArgsSchema>;
export type TestPromptArgs = z.output<typeof TestPromptArgsSchema>;
export type BatchGenerateArgs = z.output<typeof BatchGenerateArgsSchema>;
