/**
 * Model Invoker
 *
 * チャンクごとのモデルリクエストを同時実行数制限・リトライ付きで送信する
 * - transient（429, 408, 5xx, タイムアウト, ネットワーク）は指数バックオフ + ジッターで再試行
 * - permanent は即座に失敗
 * - 429 は共有の RateLimitGate にクールダウンを通知する
 * 失敗しても例外は投げず、ok: false のレスポンスを返す
 */

import pLimit from "p-limit";
import pRetry, { AbortError } from "p-retry";
import { classifyProviderError } from "../errors/error-registry.js";
import type { CompletionProvider } from "./client.js";
import { RateLimitGate } from "./rate-limit-gate.js";
import type { ModelRequest, ModelResponse } from "../review/types.js";

// ========================================
// 設定
// ========================================

export interface InvokerOptions {
  // 最大同時リクエスト数
  concurrency: number;
  // 1リクエストあたりの最大試行回数（初回を含む）
  maxAttempts: number;
  minBackoffMs: number;
  maxBackoffMs: number;
  // retry-after が無い 429 のクールダウン
  rateLimitCooldownMs: number;
}

export const DEFAULT_INVOKER_OPTIONS: InvokerOptions = {
  concurrency: 3,
  maxAttempts: 4,
  minBackoffMs: 1000,
  maxBackoffMs: 30000,
  rateLimitCooldownMs: 20000,
};

export interface InvokeAllOptions {
  signal?: AbortSignal;
  // 各レスポンスの確定時に呼ばれる（進捗表示用）
  onResponse?: (response: ModelResponse, request: ModelRequest) => void;
}

// ========================================
// Invoker
// ========================================

export class ModelInvoker {
  readonly options: InvokerOptions;
  readonly gate: RateLimitGate;

  constructor(
    private readonly provider: CompletionProvider,
    options: Partial<InvokerOptions> = {},
    gate?: RateLimitGate
  ) {
    this.options = { ...DEFAULT_INVOKER_OPTIONS, ...options };
    this.gate = gate ?? new RateLimitGate(this.options.concurrency);
  }

  /**
   * 1リクエストを送信（例外を投げない）
   */
  async invoke(request: ModelRequest, signal?: AbortSignal): Promise<ModelResponse> {
    const chunkId = request.chunk.id;
    let attempts = 0;

    const attempt = async () => {
      attempts++;
      try {
        await this.gate.acquire(signal);
      } catch (error) {
        throw new AbortError(classifyProviderError(error, signal));
      }

      try {
        const completion = await this.provider.complete(request.prompt, {
          system: request.system,
          temperature: request.parameters.temperature,
          maxOutputTokens: request.parameters.maxOutputTokens,
          abortSignal: signal,
        });
        this.gate.recordSuccess();
        return completion;
      } catch (error) {
        const classified = classifyProviderError(error, signal);
        if (classified.rateLimited) {
          this.gate.signalRateLimit(classified.retryAfterMs ?? this.options.rateLimitCooldownMs);
        }
        if (classified.kind !== "transient") {
          throw new AbortError(classified);
        }
        throw classified;
      } finally {
        this.gate.release();
      }
    };

    try {
      const completion = await pRetry(attempt, {
        retries: Math.max(0, this.options.maxAttempts - 1),
        factor: 2,
        minTimeout: this.options.minBackoffMs,
        maxTimeout: this.options.maxBackoffMs,
        randomize: true,
        signal,
        onFailedAttempt: ({ error, attemptNumber, retriesLeft }) => {
          console.warn(
            `[Invoker] ${chunkId} attempt ${attemptNumber} failed (${retriesLeft} retries left):`,
            error.message
          );
        },
      });

      console.log(`[Invoker] ${chunkId} succeeded after ${attempts} attempt(s)`);
      return { chunkId, ok: true, text: completion.text, usage: completion.usage, attempts };
    } catch (error) {
      const classified = classifyProviderError(error, signal);
      if (classified.kind === "cancelled") {
        console.warn(`[Invoker] ${chunkId} cancelled`);
      } else {
        console.error(`[Invoker] ${chunkId} failed (${classified.kind}) after ${attempts} attempt(s):`, classified.message);
      }
      return { chunkId, ok: false, error: classified, attempts };
    }
  }

  /**
   * 全リクエストを並列送信し、リクエスト順のレスポンスを返す
   */
  async invokeAll(requests: readonly ModelRequest[], options: InvokeAllOptions = {}): Promise<ModelResponse[]> {
    const limit = pLimit(this.options.concurrency);

    return Promise.all(
      requests.map((request) =>
        limit(async () => {
          const response = await this.invoke(request, options.signal);
          options.onResponse?.(response, request);
          return response;
        })
      )
    );
  }
}
