/**
 * Rate Limit Gate
 *
 * 1回のレビュー実行内で全てのモデル呼び出しが共有するレート制限状態
 * - cooldownUntil: 429 を受けた後、全タスクが次の試行前に待つ時刻
 * - permits: 同時に飛ばせるリクエスト数（429 で半減、成功ごとに +1 で上限まで回復）
 *
 * 状態の更新は全て同期的に行う（イベントループ上で競合しない）
 */

import { setTimeout as sleep } from "node:timers/promises";

export type Clock = () => number;

export interface RateLimitGateSnapshot {
  permits: number;
  maxPermits: number;
  inFlight: number;
  waiting: number;
  cooldownUntil: number;
}

export class RateLimitGate {
  readonly maxPermits: number;
  private permits: number;
  private inFlight = 0;
  private cooldownUntil = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(maxPermits: number, private readonly clock: Clock = Date.now) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new RangeError(`maxPermits must be a positive integer (got ${maxPermits})`);
    }
    this.maxPermits = maxPermits;
    this.permits = maxPermits;
  }

  /**
   * クールダウンの終了と空き枠を待ってから1枠確保する
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      signal?.throwIfAborted();

      const waitMs = this.cooldownUntil - this.clock();
      if (waitMs > 0) {
        await sleep(waitMs, undefined, { signal });
        continue;
      }

      if (this.inFlight < this.permits) {
        this.inFlight++;
        return;
      }

      await this.waitForRelease(signal);
    }
  }

  release(): void {
    if (this.inFlight > 0) {
      this.inFlight--;
    }
    this.wakeWaiters();
  }

  /**
   * 429 を受けたことを通知
   * 既存のクールダウンより長い場合のみ延長し、枠数を半減させる
   */
  signalRateLimit(cooldownMs: number): void {
    const until = this.clock() + Math.max(0, cooldownMs);
    if (until > this.cooldownUntil) {
      this.cooldownUntil = until;
    }
    const reduced = Math.max(1, Math.floor(this.permits / 2));
    if (reduced < this.permits) {
      console.warn(`[RateLimit] Rate limited, permits ${this.permits} -> ${reduced}, cooling down ${cooldownMs}ms`);
    }
    this.permits = reduced;
  }

  /**
   * 成功ごとに枠を1つ回復
   */
  recordSuccess(): void {
    if (this.permits < this.maxPermits) {
      this.permits++;
      this.wakeWaiters();
    }
  }

  snapshot(): RateLimitGateSnapshot {
    return {
      permits: this.permits,
      maxPermits: this.maxPermits,
      inFlight: this.inFlight,
      waiting: this.waiters.length,
      cooldownUntil: this.cooldownUntil,
    };
  }

  private wakeWaiters(): void {
    // 起こされた側は acquire のループで改めて枠を確認する
    const woken = this.waiters.splice(0, this.waiters.length);
    for (const wake of woken) {
      wake();
    }
  }

  private waitForRelease(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(wake);
        if (index !== -1) this.waiters.splice(index, 1);
        reject(signal?.reason);
      };
      const wake = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      this.waiters.push(wake);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
