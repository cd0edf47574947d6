/**
 * 修正PRのCIチェック待ち
 * 全てのチェックが completed になるか、タイムアウトするまでポーリングする
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { PullRequestRef } from "../diff/types.js";
import type { CheckRunInfo, SourceControlHost } from "../github/types.js";

export interface CheckWaitOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  signal?: AbortSignal;
}

// 失敗扱いにしない結論
const PASSING_CONCLUSIONS = new Set(["success", "neutral", "skipped"]);

function logRuns(runs: readonly CheckRunInfo[]): void {
  for (const run of runs) {
    console.log(`[Checks]   ${run.name}: ${run.conclusion ? `${run.status}/${run.conclusion}` : run.status}`);
  }
}

/**
 * gitRef のチェック結果を返す
 * タイムアウト・中断時はその時点の結果
 */
export async function waitForChecks(
  host: SourceControlHost,
  ref: PullRequestRef,
  gitRef: string,
  options: CheckWaitOptions
): Promise<CheckRunInfo[]> {
  const { timeoutMs, pollIntervalMs, signal } = options;
  console.log(`[Checks] Waiting for checks on ${gitRef} (timeout ${timeoutMs}ms, interval ${pollIntervalMs}ms)`);

  let runs: CheckRunInfo[] = [];
  for (let elapsed = 0; elapsed < timeoutMs; elapsed += pollIntervalMs) {
    runs = await host.listCheckRuns(ref, gitRef);
    if (runs.length > 0 && runs.every((run) => run.status === "completed")) {
      logRuns(runs);
      return runs;
    }

    const pending = runs.filter((run) => run.status !== "completed").length;
    console.log(`[Checks] ${pending}/${runs.length} checks pending (${elapsed}ms elapsed)`);

    try {
      await sleep(pollIntervalMs, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        console.warn("[Checks] Cancelled while waiting for checks");
        return runs;
      }
      throw error;
    }
  }

  console.warn(`[Checks] Timed out after ${timeoutMs}ms`);
  runs = await host.listCheckRuns(ref, gitRef);
  logRuns(runs);
  return runs;
}

/**
 * 完了したチェックが全て成功扱いか（チェックが無ければ true）
 */
export function checksPassed(runs: readonly CheckRunInfo[]): boolean {
  return runs.every((run) => run.status !== "completed" || PASSING_CONCLUSIONS.has(run.conclusion ?? ""));
}
