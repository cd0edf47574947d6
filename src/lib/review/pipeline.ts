/**
 * Review Pipeline
 *
 * 1つのPRに対するレビュー実行を調整する
 *
 *   fetching → chunking → reviewing → aggregating → publishing → done
 *
 * - レビュー対象が無ければ chunking → publishing でサマリーだけ投稿する
 * - publishing ではコメント投稿の後、設定に応じて Issue 作成・修正PR・CIチェック待ちを行う
 * - failed は fetching（diff取得不可）と publishing（1件も投稿できない）からのみ
 * - cancelled は中断シグナルによる
 * - チャンク単位の失敗は記録するだけで実行は止めない
 * - 結果は常に RunResult として返す
 */

import { buildModelRequest } from "../ai/prompts.js";
import { chunkDiff } from "../ai/chunking/index.js";
import type { CompletionProvider } from "../ai/client.js";
import { aggregateFindings } from "../ai/deduplication.js";
import { ModelInvoker } from "../ai/invoker.js";
import { RateLimitGate } from "../ai/rate-limit-gate.js";
import { parseModelResponse, type ParsedResponse } from "../ai/response-parser.js";
import type { ReviewConfig } from "../config/index.js";
import { filterReviewableFiles } from "../diff/filter.js";
import type { Diff, PullRequestRef } from "../diff/types.js";
import { getErrorMessage } from "../errors/errors.js";
import { checksPassed, waitForChecks } from "../fix/check-waiter.js";
import { generateFixPullRequest, type FixPullRequest } from "../fix/fix-generator.js";
import { formatRef } from "../github/client.js";
import { createIssues } from "../github/issue-creator.js";
import type { CheckRunInfo, PullRequestInfo, SourceControlHost } from "../github/types.js";
import { getTokenEstimator, type TokenEstimator } from "../tokenizer/index.js";
import { getPullRequestSkipReason } from "./guards.js";
import { buildSummaryComment } from "./summary.js";
import type {
  Chunk,
  ChunkOutcome,
  Finding,
  ModelResponse,
  ParseWarning,
  PipelineState,
  PublishResult,
  ReviewComment,
  RunOutcome,
  RunResult,
  RunSummary,
} from "./types.js";

// ========================================
// 状態遷移
// ========================================

const ALLOWED_TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  fetching: ["chunking", "done", "failed", "cancelled"],
  chunking: ["reviewing", "publishing", "done", "cancelled"],
  reviewing: ["aggregating", "cancelled"],
  aggregating: ["publishing", "done", "cancelled"],
  publishing: ["done", "failed", "cancelled"],
  done: [],
  failed: [],
  cancelled: [],
};

export class InvalidTransitionError extends Error {
  constructor(from: PipelineState, to: PipelineState) {
    super(`Invalid pipeline transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

class StateTracker {
  readonly history: PipelineState[] = ["fetching"];

  get current(): PipelineState {
    return this.history[this.history.length - 1];
  }

  transition(next: PipelineState): void {
    if (!ALLOWED_TRANSITIONS[this.current].includes(next)) {
      throw new InvalidTransitionError(this.current, next);
    }
    console.log(`[Pipeline] ${this.current} -> ${next}`);
    this.history.push(next);
  }
}

// ========================================
// 型定義
// ========================================

export interface PipelineDeps {
  host: SourceControlHost;
  provider: CompletionProvider;
  // 未指定なら config.tokenizer から決める
  estimator?: TokenEstimator;
  // 未指定なら config.concurrency 枠のゲートを作る
  gate?: RateLimitGate;
  clock?: () => number;
}

export type PipelineEvent =
  | { type: "state"; state: PipelineState }
  | { type: "chunks"; total: number }
  | { type: "chunk"; chunkId: string; ok: boolean; completed: number; total: number };

export interface PipelineOptions {
  // 実行開始時に読み込んだ設定（実行中は変わらない）
  config: ReviewConfig;
  signal?: AbortSignal;
  // 投稿せずに結果だけ返す
  dryRun?: boolean;
  onEvent?: (event: PipelineEvent) => void;
}

interface RunContext {
  ref: PullRequestRef;
  deps: PipelineDeps;
  options: PipelineOptions;
  tracker: StateTracker;
  startedAt: number;
  clock: () => number;
}

interface Progress {
  filesReviewed: number;
  filesSkipped: number;
  chunks: Chunk[];
  chunkOutcomes: ChunkOutcome[];
  warnings: ParseWarning[];
  findingsProduced: number;
  findingsDropped: number;
  comments: ReviewComment[];
  chunkSummaries: string[];
  publish?: PublishResult;
  summaryPosted: boolean;
  issueUrls: string[];
  fixPullRequest?: FixPullRequest;
  checkRuns: CheckRunInfo[];
}

function emptyProgress(): Progress {
  return {
    filesReviewed: 0,
    filesSkipped: 0,
    chunks: [],
    chunkOutcomes: [],
    warnings: [],
    findingsProduced: 0,
    findingsDropped: 0,
    comments: [],
    chunkSummaries: [],
    summaryPosted: false,
    issueUrls: [],
    checkRuns: [],
  };
}

// ========================================
// ヘルパー
// ========================================

/**
 * 中断されたら待たずに null を返す（処理自体は裏で捨てられる）
 */
async function raceAbort<T>(work: () => Promise<T>, signal?: AbortSignal): Promise<T | null> {
  if (!signal) return work();
  if (signal.aborted) return null;

  let resolveAborted: (value: null) => void = () => undefined;
  const aborted = new Promise<null>((resolve) => {
    resolveAborted = resolve;
  });
  const onAbort = () => resolveAborted(null);
  signal.addEventListener("abort", onAbort, { once: true });

  try {
    return await Promise.race([work(), aborted]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

function toChunkOutcome(
  chunk: Chunk,
  response: ModelResponse | undefined,
  warnings: readonly ParseWarning[],
  findings: number
): ChunkOutcome {
  if (!response) {
    return {
      chunkId: chunk.id,
      status: "failed",
      attempts: 0,
      findings: 0,
      warnings: 0,
      error: "cancelled before completion",
    };
  }
  if (!response.ok) {
    return {
      chunkId: chunk.id,
      status: "failed",
      attempts: response.attempts,
      findings: 0,
      warnings: 0,
      error: `${response.error.kind}: ${response.error.message}`,
    };
  }

  // パース不能な応答はレビューできなかったものとして扱う
  const unparseable = warnings.find((warning) => warning.reason === "unparseable");
  return {
    chunkId: chunk.id,
    status: unparseable ? "failed" : warnings.length > 0 ? "partial" : "succeeded",
    attempts: response.attempts,
    findings,
    warnings: warnings.length,
    error: unparseable?.message,
  };
}

function buildResult(ctx: RunContext, outcome: RunOutcome, progress: Progress, reason?: string): RunResult {
  const count = (status: ChunkOutcome["status"]) =>
    progress.chunkOutcomes.filter((chunkOutcome) => chunkOutcome.status === status).length;

  const summary: RunSummary = {
    outcome,
    reason,
    filesReviewed: progress.filesReviewed,
    filesSkipped: progress.filesSkipped,
    chunksAttempted: progress.chunks.length,
    chunksSucceeded: count("succeeded"),
    chunksPartial: count("partial"),
    chunksFailed: count("failed"),
    findingsProduced: progress.findingsProduced,
    findingsDropped: progress.findingsDropped,
    commentsPublished: progress.publish?.posted ?? 0,
    commentsFailed: progress.publish?.failed.length ?? 0,
    summaryPosted: progress.summaryPosted,
    issuesCreated: progress.issueUrls.length,
    fixPullRequestUrl: progress.fixPullRequest?.url,
    durationMs: ctx.clock() - ctx.startedAt,
  };

  const log = outcome === "failed" ? console.error : console.log;
  log(`[Pipeline] ${formatRef(ctx.ref)} finished: ${outcome}${reason ? ` (${reason})` : ""}`);

  return {
    outcome,
    states: [...ctx.tracker.history],
    summary,
    comments: progress.comments,
    chunkOutcomes: progress.chunkOutcomes,
    warnings: progress.warnings,
    publish: progress.publish,
    issueUrls: progress.issueUrls,
    fixPullRequest: progress.fixPullRequest,
    checkRuns: progress.checkRuns,
  };
}

function enter(ctx: RunContext, state: PipelineState): void {
  ctx.tracker.transition(state);
  ctx.options.onEvent?.({ type: "state", state });
}

// ========================================
// 各ステージ
// ========================================

async function fetchStage(
  ctx: RunContext
): Promise<{ pr: PullRequestInfo; config: ReviewConfig; diff: Diff | null; skipReason?: string }> {
  const { host } = ctx.deps;
  const { config, signal } = ctx.options;
  const pr = await host.getPullRequest(ctx.ref, signal);

  const skipReason = getPullRequestSkipReason(pr, {
    skipLabel: config.skipLabel,
    fixBranchPrefix: config.fixBranchPrefix,
  });
  if (skipReason) {
    return { pr, config, diff: null, skipReason };
  }

  const diff = await host.fetchDiff(ctx.ref, signal);
  return { pr, config, diff };
}

/**
 * チャンクに含まれるファイルの head 時点の内容を読む
 * 読めなかったファイルは差分だけでレビューする
 */
async function loadFileContents(
  ctx: RunContext,
  config: ReviewConfig,
  pr: PullRequestInfo,
  chunks: readonly Chunk[]
): Promise<Map<string, string>> {
  const contents = new Map<string, string>();
  if (!config.includeFullFiles) return contents;

  const { signal } = ctx.options;
  const paths = [
    ...new Set(
      chunks.flatMap((chunk) =>
        chunk.files.filter((file) => file.change.kind !== "deleted" && !file.change.binary).map((file) => file.change.path)
      )
    ),
  ];

  await Promise.all(
    paths.map(async (path) => {
      try {
        const file = await ctx.deps.host.getFile(ctx.ref, path, pr.headSha, signal);
        if (file) contents.set(path, file.content);
      } catch (error) {
        if (signal?.aborted) return;
        console.warn(`[Pipeline] Could not load ${path}: ${getErrorMessage(error)}`);
      }
    })
  );

  console.log(`[Pipeline] Loaded full contents of ${contents.size}/${paths.length} files`);
  return contents;
}

/**
 * 全チャンクをレビューし、完了したレスポンスを返す
 * 中断時は中断までに完了したものだけ
 */
async function reviewStage(
  ctx: RunContext,
  config: ReviewConfig,
  pr: PullRequestInfo,
  chunks: readonly Chunk[],
  fileContents: ReadonlyMap<string, string>
): Promise<{ responses: Map<string, ModelResponse>; cancelled: boolean }> {
  const gate = ctx.deps.gate ?? new RateLimitGate(config.concurrency);
  const invoker = new ModelInvoker(
    ctx.deps.provider,
    {
      concurrency: config.concurrency,
      maxAttempts: config.maxAttempts,
      minBackoffMs: config.minBackoffMs,
      maxBackoffMs: config.maxBackoffMs,
      rateLimitCooldownMs: config.rateLimitCooldownMs,
    },
    gate
  );

  const requests = chunks.map((chunk) =>
    buildModelRequest(chunk, {
      contextLines: config.contextLines,
      temperature: config.temperature,
      maxOutputTokens: config.maxOutputTokens,
      categories: config.categories,
      maxFindingsPerFile: config.maxFindingsPerFile,
      prTitle: pr.title,
      prBody: pr.body,
      allChunks: chunks,
      fileContents,
      maxFileChars: config.maxFileChars,
    })
  );

  const responses = new Map<string, ModelResponse>();
  const finished = await raceAbort(
    () =>
      invoker.invokeAll(requests, {
        signal: ctx.options.signal,
        onResponse: (response) => {
          // 中断後に返ってきたレスポンスは使わない
          if (ctx.options.signal?.aborted) return;
          responses.set(response.chunkId, response);
          ctx.options.onEvent?.({
            type: "chunk",
            chunkId: response.chunkId,
            ok: response.ok,
            completed: responses.size,
            total: chunks.length,
          });
        },
      }),
    ctx.options.signal
  );

  return { responses, cancelled: finished === null || ctx.options.signal?.aborted === true };
}

function parseStage(
  chunks: readonly Chunk[],
  responses: ReadonlyMap<string, ModelResponse>,
  progress: Progress
): Finding[] {
  const findings: Finding[] = [];

  for (const chunk of chunks) {
    const response = responses.get(chunk.id);
    const parsed: ParsedResponse = response ? parseModelResponse(response, chunk) : { findings: [], warnings: [] };

    findings.push(...parsed.findings);
    progress.warnings.push(...parsed.warnings);
    progress.chunkOutcomes.push(toChunkOutcome(chunk, response, parsed.warnings, parsed.findings.length));
    if (parsed.summary) progress.chunkSummaries.push(parsed.summary);

    const rejected = parsed.warnings.filter((warning) => warning.reason !== "unparseable").length;
    progress.findingsProduced += parsed.findings.length + rejected;
    progress.findingsDropped += rejected;
  }

  return findings;
}

async function postSummaryStage(ctx: RunContext, progress: Progress): Promise<void> {
  try {
    await ctx.deps.host.postSummary(
      ctx.ref,
      buildSummaryComment({
        comments: progress.comments,
        chunkOutcomes: progress.chunkOutcomes,
        publish: progress.publish,
        chunkSummaries: progress.chunkSummaries,
        issueUrls: progress.issueUrls,
        fixPullRequestUrl: progress.fixPullRequest?.url,
        checkRuns: progress.checkRuns,
      })
    );
    progress.summaryPosted = true;
  } catch (error) {
    console.error(`[Pipeline] Failed to post summary: ${getErrorMessage(error)}`);
  }
}

/**
 * Issue 作成・修正PR・修正PRのCIチェック待ち（失敗しても実行は止めない）
 */
async function followUpStage(
  ctx: RunContext,
  config: ReviewConfig,
  pr: PullRequestInfo,
  progress: Progress
): Promise<void> {
  const { host, provider } = ctx.deps;
  const { signal } = ctx.options;
  const { comments } = progress;
  if (comments.length === 0 || signal?.aborted) return;

  if (config.createIssues) {
    progress.issueUrls = await createIssues(
      host,
      pr,
      comments,
      { review: config.reviewLabel, automated: config.automatedLabel },
      signal
    );
  }

  if (!config.fixEnabled || signal?.aborted) return;
  const fix = await generateFixPullRequest(host, provider, pr, comments, {
    branchPrefix: config.fixBranchPrefix,
    maxFiles: config.fixMaxFiles,
    labels: [config.skipLabel, config.automatedLabel],
    temperature: config.temperature,
    maxOutputTokens: config.maxOutputTokens,
    signal,
  });
  if (!fix) return;
  progress.fixPullRequest = fix;

  if (!config.waitForChecks || signal?.aborted) return;
  try {
    progress.checkRuns = await waitForChecks(host, ctx.ref, fix.branch, {
      timeoutMs: config.checkTimeoutMs,
      pollIntervalMs: config.checkPollIntervalMs,
      signal,
    });
    if (!checksPassed(progress.checkRuns)) {
      console.warn(`[Pipeline] Some checks failed on the fix PR ${fix.url}`);
    }
  } catch (error) {
    console.error(`[Pipeline] Failed to read checks for ${fix.branch}: ${getErrorMessage(error)}`);
  }
}

async function publishStage(
  ctx: RunContext,
  config: ReviewConfig,
  pr: PullRequestInfo,
  diff: Diff,
  progress: Progress
): Promise<void> {
  const { host } = ctx.deps;
  const { comments } = progress;

  if (comments.length === 0) {
    progress.publish = { posted: 0, failed: [] };
  } else {
    try {
      progress.publish = await host.publishComments(ctx.ref, comments, diff);
    } catch (error) {
      const message = getErrorMessage(error);
      console.error(`[Pipeline] Failed to publish comments: ${message}`);
      progress.publish = {
        posted: 0,
        failed: comments.map((comment) => ({ comment, reason: "error" as const, message })),
      };
    }
  }

  await followUpStage(ctx, config, pr, progress);

  if (config.postSummary) {
    await postSummaryStage(ctx, progress);
  }
}

// ========================================
// メイン関数
// ========================================

/**
 * PRを1件レビューする
 */
export async function runReviewPipeline(
  ref: PullRequestRef,
  deps: PipelineDeps,
  options: PipelineOptions
): Promise<RunResult> {
  const clock = deps.clock ?? Date.now;
  const ctx: RunContext = { ref, deps, options, tracker: new StateTracker(), startedAt: clock(), clock };
  const progress = emptyProgress();
  const { signal } = options;

  console.log(`[Pipeline] Starting review of ${formatRef(ref)}${options.dryRun ? " (dry run)" : ""}`);
  options.onEvent?.({ type: "state", state: "fetching" });

  // ---- fetching ----
  let fetched: Awaited<ReturnType<typeof fetchStage>> | null;
  try {
    fetched = await raceAbort(() => fetchStage(ctx), signal);
  } catch (error) {
    if (signal?.aborted) {
      enter(ctx, "cancelled");
      return buildResult(ctx, "cancelled", progress, "cancelled while fetching");
    }
    enter(ctx, "failed");
    return buildResult(ctx, "failed", progress, `diff unavailable: ${getErrorMessage(error)}`);
  }

  if (fetched === null || signal?.aborted) {
    enter(ctx, "cancelled");
    return buildResult(ctx, "cancelled", progress, "cancelled while fetching");
  }

  const { pr, config, diff, skipReason } = fetched;
  if (skipReason || !diff) {
    enter(ctx, "done");
    return buildResult(ctx, "done", progress, `skipped: ${skipReason ?? "no diff"}`);
  }

  // ---- chunking ----
  enter(ctx, "chunking");
  const { diff: reviewable, skipped } = filterReviewableFiles(diff, config.excludePatterns);
  progress.filesReviewed = reviewable.files.length;
  progress.filesSkipped = skipped.length;

  const estimator = deps.estimator ?? getTokenEstimator(config.tokenizer);
  progress.chunks = chunkDiff(reviewable, config.maxTokensPerChunk, estimator);
  options.onEvent?.({ type: "chunks", total: progress.chunks.length });

  if (progress.chunks.length === 0) {
    if (options.dryRun || !config.postSummary) {
      enter(ctx, "done");
      return buildResult(ctx, "done", progress, "nothing to review");
    }

    // 指摘なしのサマリーだけ投稿する
    enter(ctx, "publishing");
    await postSummaryStage(ctx, progress);
    if (!progress.summaryPosted) {
      enter(ctx, "failed");
      return buildResult(ctx, "failed", progress, "summary could not be posted");
    }
    enter(ctx, "done");
    return buildResult(ctx, "done", progress, "nothing to review");
  }

  const fileContents = await raceAbort(() => loadFileContents(ctx, config, pr, progress.chunks), signal);
  if (fileContents === null) {
    enter(ctx, "cancelled");
    return buildResult(ctx, "cancelled", progress, "cancelled while loading files");
  }

  // ---- reviewing ----
  enter(ctx, "reviewing");
  const { responses, cancelled } = await reviewStage(ctx, config, pr, progress.chunks, fileContents);

  if (cancelled && !config.publishPartialOnCancel) {
    parseStage(progress.chunks, responses, progress);
    enter(ctx, "cancelled");
    return buildResult(ctx, "cancelled", progress, "cancelled during review");
  }

  // ---- aggregating ----
  enter(ctx, "aggregating");
  const findings = parseStage(progress.chunks, responses, progress);
  const { comments, stats } = aggregateFindings(findings, {
    minSeverity: config.minSeverity,
    categories: config.categories,
    similarityThreshold: config.similarityThreshold,
    maxFindingsPerFile: config.maxFindingsPerFile,
    maxTotalFindings: config.maxTotalFindings,
  });
  progress.comments = comments;
  progress.findingsDropped += stats.belowMinSeverity + stats.excludedCategory + stats.cappedPerFile + stats.cappedTotal;

  if (options.dryRun) {
    enter(ctx, cancelled ? "cancelled" : "done");
    return buildResult(ctx, cancelled ? "cancelled" : "done", progress, cancelled ? "cancelled during review" : "dry run");
  }

  // ---- publishing ----
  enter(ctx, "publishing");
  await publishStage(ctx, config, pr, diff, progress);

  if (cancelled) {
    enter(ctx, "cancelled");
    return buildResult(ctx, "cancelled", progress, "cancelled during review; partial results published");
  }

  const posted = progress.publish?.posted ?? 0;
  if (comments.length > 0 && posted === 0) {
    enter(ctx, "failed");
    return buildResult(ctx, "failed", progress, "no comments could be published");
  }
  if (comments.length === 0 && config.postSummary && !progress.summaryPosted) {
    enter(ctx, "failed");
    return buildResult(ctx, "failed", progress, "summary could not be posted");
  }

  enter(ctx, "done");
  return buildResult(ctx, "done", progress);
}
