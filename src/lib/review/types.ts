// レビューパイプラインの型定義

import type { Category, Severity } from "../ai/constants.js";
import type { FileChange, Hunk } from "../diff/types.js";
import type { ProviderError } from "../errors/errors.js";
import type { FixPullRequest } from "../fix/fix-generator.js";
import type { CheckRunInfo } from "../github/types.js";

// ========================================
// チャンク
// ========================================

/**
 * チャンクに含まれるファイル（大きなファイルはhunkの連続した一部）
 */
export interface ChunkFile {
  change: FileChange;
  hunks: readonly Hunk[];
  // change.hunks 内での先頭hunkの位置
  hunkOffset: number;
}

export interface Chunk {
  id: string;
  index: number;
  totalChunks: number;
  files: readonly ChunkFile[];
  tokenCount: number;
  // 単独で上限を超えるhunkを含む（切り詰めずに許容）
  oversized: boolean;
}

// ========================================
// モデル呼び出し
// ========================================

export interface ModelParameters {
  temperature: number;
  maxOutputTokens: number;
}

export interface ModelRequest {
  chunk: Chunk;
  system: string;
  prompt: string;
  parameters: ModelParameters;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export type ModelResponse =
  | { chunkId: string; ok: true; text: string; usage?: TokenUsage; attempts: number }
  | { chunkId: string; ok: false; error: ProviderError; attempts: number };

// ========================================
// 指摘とコメント
// ========================================

export interface Finding {
  readonly path: string;
  readonly line: number;
  readonly severity: Severity;
  readonly category: Category;
  readonly title: string;
  readonly body: string;
  readonly suggestion?: string;
  readonly chunkId: string;
  // sha256(path:line:正規化した本文)
  readonly fingerprint: string;
}

export type ParseWarningReason = "unparseable" | "invalid_finding" | "unanchored";

export interface ParseWarning {
  chunkId: string;
  reason: ParseWarningReason;
  message: string;
  path?: string;
  line?: number;
}

export interface ReviewComment {
  path: string;
  line: number;
  severity: Severity;
  category: Category;
  title: string;
  // GitHubに投稿するMarkdown本文
  body: string;
  // 見出しを除いた指摘本文（Issue・修正プロンプト用）
  description: string;
  suggestion?: string;
  fingerprints: string[];
}

// ========================================
// 公開
// ========================================

// rejected: GitHub が 422 で拒否 / error: それ以外の失敗
export type PublishFailureReason = "stale_anchor" | "not_addressable" | "rejected" | "error";

/**
 * 投稿できなかったコメント（実行内では再試行しない）
 */
export interface PublishPartialFailure {
  comment: ReviewComment;
  reason: PublishFailureReason;
  message: string;
}

export interface PublishResult {
  posted: number;
  failed: PublishPartialFailure[];
}

// ========================================
// パイプライン
// ========================================

export type PipelineState =
  | "fetching"
  | "chunking"
  | "reviewing"
  | "aggregating"
  | "publishing"
  | "done"
  | "failed"
  | "cancelled";

export type RunOutcome = "done" | "failed" | "cancelled";

export type ChunkOutcomeStatus = "succeeded" | "partial" | "failed";

export interface ChunkOutcome {
  chunkId: string;
  status: ChunkOutcomeStatus;
  attempts: number;
  findings: number;
  warnings: number;
  error?: string;
}

export interface RunSummary {
  outcome: RunOutcome;
  // done の理由（skipped / nothing to review など）や failed の原因
  reason?: string;
  filesReviewed: number;
  filesSkipped: number;
  chunksAttempted: number;
  chunksSucceeded: number;
  chunksPartial: number;
  chunksFailed: number;
  findingsProduced: number;
  findingsDropped: number;
  commentsPublished: number;
  commentsFailed: number;
  summaryPosted: boolean;
  issuesCreated: number;
  fixPullRequestUrl?: string;
  durationMs: number;
}

export interface RunResult {
  outcome: RunOutcome;
  states: PipelineState[];
  summary: RunSummary;
  comments: ReviewComment[];
  chunkOutcomes: ChunkOutcome[];
  warnings: ParseWarning[];
  publish?: PublishResult;
  issueUrls: string[];
  fixPullRequest?: FixPullRequest;
  // 修正PRのCIチェック結果
  checkRuns: CheckRunInfo[];
}
