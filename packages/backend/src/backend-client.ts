/**
 * KoboldCpp backend client.
 *
 * One pooled undici dispatcher per client, a shared concurrency gate sized by
 * `performance.maxConcurrentRequests`, and retry with exponential backoff.
 * The gate slot is held across retries of one logical call.
 */

import { performance as perf } from 'node:perf_hooks';
import { Agent, type Dispatcher } from 'undici';
import type {
  BackendSettings,
  BackendStatus,
  BatchRequestOptions,
  BatchResult,
  ChatParams,
  GenerateParams,
  GenerationBackend,
  GenerationResult,
  Logger,
  ModelInfo,
  PerformanceSettings
} from '@koboldgate/core';
import { createSilentLogger } from '@koboldgate/core';
import {
  abortError,
  AbortedError,
  createGate,
  type Gate,
  GateQueueFullError,
  isTransientError,
  linkSignals,
  type Release,
  withRetry
} from '@koboldgate/runtime';
import {
  BackendClosedError,
  BackendHttpError,
  BackendQueueFullError,
  BackendResponseError,
  BackendRetryExhaustedError,
  BackendTimeoutError
} from './errors.js';
import {
  buildChatBody,
  buildGenerateBody,
  composeStatus,
  estimateTokens,
  OFFLINE_STATUS,
  readChatOutput,
  readGeneratedText,
  readModelInfo,
  readStatusFlags,
  readStreamToken,
  tokensPerSecond
} from './mapping.js';

export type DispatcherFactory = (settings: BackendSettings) => Dispatcher;

export type BackendClientOptions = {
  backend: BackendSettings;
  performance: PerformanceSettings;
  logger?: Logger;
  /** Builds the pooled connection; tests pass a MockAgent */
  dispatcherFactory?: DispatcherFactory;
  /** Millisecond clock for generation timing */
  clock?: () => number;
};

export type BatchOptions = BatchRequestOptions;

type HttpMethod = 'GET' | 'POST';

const DEFAULT_BATCH_CONCURRENCY = 3;

const defaultDispatcherFactory: DispatcherFactory = (settings) =>
  new Agent({
    connections: settings.maxConnections,
    keepAliveTimeout: 30_000,
    connectTimeout: settings.timeoutMs
  });

export const FAILED_GENERATION: GenerationResult = Object.freeze({
  text: '',
  tokensGenerated: 0,
  generationTime: 0,
  tokensPerSecond: 0,
  finishReason: 'error'
});

function isRetryable(error: unknown): boolean {
  if (error instanceof BackendHttpError) return error.retryable;
  if (error instanceof BackendTimeoutError) return true;
  if (error instanceof BackendResponseError) return false;
  return isTransientError(error);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new BackendResponseError('Backend returned invalid JSON', { cause: error });
  }
}

export class BackendClient implements GenerationBackend {
  private readonly settings: BackendSettings;
  private readonly logger: Logger;
  private readonly gate: Gate;
  private readonly maxConcurrent: number;
  private readonly dispatcherFactory: DispatcherFactory;
  private readonly clock: () => number;
  private readonly origin: string;
  private readonly basePath: string;
  private dispatcher: Dispatcher | undefined;
  private inFlight = 0;
  private drainWaiters: Array<() => void> = [];
  private closing: Promise<void> | undefined;

  constructor(options: BackendClientOptions) {
    this.settings = options.backend;
    this.logger = options.logger ?? createSilentLogger();
    this.maxConcurrent = options.performance.maxConcurrentRequests;
    this.gate = createGate(this.maxConcurrent, {
      queueLimit: options.performance.requestQueueSize
    });
    this.dispatcherFactory = options.dispatcherFactory ?? defaultDispatcherFactory;
    this.clock = options.clock ?? (() => perf.now());

    const url = new URL(this.settings.url);
    this.origin = url.origin;
    this.basePath = url.pathname.replace(/\/+$/, '');
  }

  get connected(): boolean {
    return this.dispatcher !== undefined;
  }

  get pendingRequests(): number {
    return this.inFlight;
  }

  /**
   * Create the pooled connection; idempotent
   */
  connect(): void {
    if (this.closing) {
      throw new BackendClosedError();
    }
    if (!this.dispatcher) {
      this.dispatcher = this.dispatcherFactory(this.settings);
      this.logger.info({ url: this.settings.url }, 'Backend client connected');
    }
  }

  /**
   * Wait for in-flight calls to finish, then release the pool.
   * Concurrent callers share the same drain.
   */
  disconnect(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }
    if (!this.dispatcher) {
      return Promise.resolve();
    }
    this.closing = this.drainAndClose().finally(() => {
      this.closing = undefined;
    });
    return this.closing;
  }

  private async drainAndClose(): Promise<void> {
    if (this.inFlight > 0) {
      await new Promise<void>((resolve) => this.drainWaiters.push(resolve));
    }
    const dispatcher = this.dispatcher;
    this.dispatcher = undefined;
    await dispatcher?.close();
    this.logger.info('Backend client disconnected');
  }

  async checkStatus(signal?: AbortSignal): Promise<BackendStatus> {
    let flags: { ready: boolean; generating: boolean };
    try {
      const data = await this.request('GET', this.settings.endpoints.status, undefined, signal);
      flags = readStatusFlags(data);
    } catch (error) {
      if (error instanceof AbortedError) throw error;
      this.logger.error({ error }, 'Failed to check backend status');
      return { ...OFFLINE_STATUS };
    }

    let model: unknown;
    try {
      model = await this.request('GET', this.settings.endpoints.model, undefined, signal);
    } catch (error) {
      // Some backends have no model endpoint
      this.logger.debug({ error }, 'Model endpoint unavailable');
    }
    return composeStatus(flags, model);
  }

  async getModelInfo(signal?: AbortSignal): Promise<ModelInfo> {
    const data = await this.request('GET', this.settings.endpoints.model, undefined, signal);
    return readModelInfo(data);
  }

  async healthCheck(signal?: AbortSignal): Promise<boolean> {
    const status = await this.checkStatus(signal);
    return status.online;
  }

  async generateText(params: GenerateParams, signal?: AbortSignal): Promise<GenerationResult> {
    const started = this.clock();
    const data = await this.request(
      'POST',
      this.settings.endpoints.generate,
      buildGenerateBody(params),
      signal
    );
    const generationTime = (this.clock() - started) / 1000;
    const text = readGeneratedText(data);
    const tokensGenerated = estimateTokens(text);

    return Object.freeze({
      text,
      tokensGenerated,
      generationTime,
      tokensPerSecond: tokensPerSecond(tokensGenerated, generationTime),
      finishReason: 'stop'
    });
  }

  async chatCompletion(params: ChatParams, signal?: AbortSignal): Promise<GenerationResult> {
    const started = this.clock();
    const data = await this.request(
      'POST',
      this.settings.endpoints.chat,
      buildChatBody(params),
      signal
    );
    const generationTime = (this.clock() - started) / 1000;
    const output = readChatOutput(data);
    const tokensGenerated = output.completionTokens ?? estimateTokens(output.text);

    return Object.freeze({
      text: output.text,
      tokensGenerated,
      generationTime,
      tokensPerSecond: tokensPerSecond(tokensGenerated, generationTime),
      finishReason: output.finishReason
    });
  }

  /**
   * Fan prompts out under a batch-scoped gate. A failed prompt yields a
   * zero-valued `error` result in its slot; the batch itself never fails.
   */
  async batchGenerate(
    prompts: readonly string[],
    options: BatchOptions = {},
    signal?: AbortSignal
  ): Promise<BatchResult> {
    const started = this.clock();
    const requested = options.maxConcurrent ?? DEFAULT_BATCH_CONCURRENCY;
    const limit = Math.max(1, Math.min(requested, this.maxConcurrent));
    const batchGate = createGate(limit);

    const settled = await Promise.all(
      prompts.map(async (prompt, index): Promise<GenerationResult | null> => {
        try {
          return await batchGate.run(
            () => this.generateText({ ...options.params, prompt }, signal),
            signal
          );
        } catch (error) {
          this.logger.warn({ index, error }, 'Batch prompt failed');
          return null;
        }
      })
    );

    const results = settled.map((result) => result ?? FAILED_GENERATION);
    const failed = settled.filter((result) => result === null).length;

    return Object.freeze({
      results,
      totalTime: (this.clock() - started) / 1000,
      successful: prompts.length - failed,
      failed
    });
  }

  /**
   * Stream tokens from the native generate endpoint (NDJSON `{"token": ...}` lines).
   * No retry: a partially consumed stream cannot be replayed.
   */
  async *streamGenerate(params: GenerateParams, signal?: AbortSignal): AsyncGenerator<string> {
    const dispatcher = this.beginCall();
    try {
      const release = await this.acquire(signal);
      try {
        const response = await dispatcher.request({
          origin: this.origin,
          path: this.basePath + this.settings.endpoints.generate,
          method: 'POST',
          headers: { 'content-type': 'application/json', accept: 'application/x-ndjson' },
          body: JSON.stringify(buildGenerateBody(params, true)),
          signal
        });
        if (response.statusCode < 200 || response.statusCode >= 300) {
          throw new BackendHttpError(response.statusCode, await response.body.text());
        }

        const decoder = new TextDecoder();
        let buffer = '';
        try {
          for await (const chunk of response.body) {
            buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
            const lines = buffer.split('\n');
            buffer = lines.pop() ?? '';
            for (const line of lines) {
              const token = readStreamToken(line);
              if (token !== undefined) yield token;
            }
          }
          const tail = readStreamToken(buffer + decoder.decode());
          if (tail !== undefined) yield tail;
        } finally {
          // consumer may stop early
          response.body.destroy();
        }
      } finally {
        release();
      }
    } finally {
      this.endCall();
    }
  }

  private async request(
    method: HttpMethod,
    path: string,
    body: unknown,
    signal?: AbortSignal
  ): Promise<unknown> {
    const dispatcher = this.beginCall();
    try {
      const release = await this.acquire(signal);
      try {
        return await withRetry(() => this.attempt(dispatcher, method, path, body, signal), {
          maxRetries: this.settings.maxRetries,
          baseDelayMs: this.settings.retryDelayMs,
          isRetryable,
          signal,
          onRetry: (error, attempt, delayMs) =>
            this.logger.warn(
              { path, attempt: attempt + 1, of: this.settings.maxRetries + 1, delayMs, error },
              'Backend request failed, retrying'
            ),
          onExhausted: (lastError, attempts) =>
            new BackendRetryExhaustedError(attempts, { cause: lastError })
        });
      } finally {
        release();
      }
    } finally {
      this.endCall();
    }
  }

  private async attempt(
    dispatcher: Dispatcher,
    method: HttpMethod,
    path: string,
    body: unknown,
    signal?: AbortSignal
  ): Promise<unknown> {
    const timeout = AbortSignal.timeout(this.settings.timeoutMs);
    const linked = linkSignals(signal, timeout);
    try {
      const response = await dispatcher.request({
        origin: this.origin,
        path: this.basePath + path,
        method,
        headers:
          body === undefined
            ? { accept: 'application/json' }
            : { accept: 'application/json', 'content-type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: linked.signal
      });
      const text = await response.body.text();
      if (response.statusCode < 200 || response.statusCode >= 300) {
        throw new BackendHttpError(response.statusCode, text);
      }
      return parseJson(text);
    } catch (error) {
      if (signal?.aborted) throw abortError(signal);
      if (timeout.aborted) {
        throw new BackendTimeoutError(this.settings.timeoutMs, { cause: error });
      }
      throw error;
    } finally {
      linked.dispose();
    }
  }

  private async acquire(signal?: AbortSignal): Promise<Release> {
    try {
      return await this.gate.acquire(signal);
    } catch (error) {
      if (error instanceof GateQueueFullError) {
        throw new BackendQueueFullError(error.queueLimit, { cause: error });
      }
      throw error;
    }
  }

  private beginCall(): Dispatcher {
    this.connect();
    const dispatcher = this.dispatcher;
    if (!dispatcher) {
      throw new BackendClosedError();
    }
    this.inFlight++;
    return dispatcher;
  }

  private endCall(): void {
    this.inFlight--;
    if (this.inFlight === 0 && this.drainWaiters.length > 0) {
      const waiters = this.drainWaiters;
      this.drainWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
