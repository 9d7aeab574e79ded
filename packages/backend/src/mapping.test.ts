import { describe, expect, it } from 'vitest';
import { BackendResponseError } from './errors.js';
import {
  buildGenerateBody,
  estimateTokens,
  readChatOutput,
  readModelInfo,
  readStreamToken,
  tokensPerSecond
} from './mapping.js';

describe('estimateTokens', () => {
  it('counts whitespace-separated words', () => {
    expect(estimateTokens(' world')).toBe(1);
    expect(estimateTokens('a  b\nc')).toBe(3);
    expect(estimateTokens('   ')).toBe(0);
  });
});

describe('tokensPerSecond', () => {
  it('guards against zero elapsed time', () => {
    expect(tokensPerSecond(10, 0)).toBe(0);
    expect(tokensPerSecond(10, 2)).toBe(5);
  });
});

describe('buildGenerateBody', () => {
  it('adds max_context_length only when given', () => {
    expect(buildGenerateBody({ prompt: 'x' })).not.toHaveProperty('max_context_length');
    expect(buildGenerateBody({ prompt: 'x', maxContextLength: 4096 }).max_context_length).toBe(4096);
  });
});

describe('readChatOutput', () => {
  it('maps unknown finish reasons to stop', () => {
    const output = readChatOutput({
      choices: [{ message: { content: 'ok' }, finish_reason: 'eos_token' }]
    });
    expect(output).toEqual({ text: 'ok', finishReason: 'stop', completionTokens: undefined });
  });

  it('rejects malformed bodies', () => {
    expect(() => readChatOutput({ choices: 'none' })).toThrow(BackendResponseError);
    expect(() => readChatOutput({ choices: 'none' })).toThrow('Malformed chat response at choices');
  });
});

describe('readModelInfo', () => {
  it('prefers model_name over result', () => {
    expect(readModelInfo({ model_name: 'a', result: 'b', format: 'gguf' })).toEqual({
      modelName: 'a',
      contextLength: 2048,
      format: 'gguf'
    });
  });
});

describe('readStreamToken', () => {
  it('extracts tokens and skips noise', () => {
    expect(readStreamToken('{"token":"x"}')).toBe('x');
    expect(readStreamToken('{"done":true}')).toBeUndefined();
    expect(readStreamToken('partial {')).toBeUndefined();
    expect(readStreamToken('')).toBeUndefined();
  });
});
