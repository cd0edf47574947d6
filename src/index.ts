// reviewloom ライブラリのエントリーポイント

// Diff
export type { Diff, DiffLine, FileChange, FileChangeKind, Hunk, PullRequestRef } from "./lib/diff/types.js";
export { parseDiff, reconstructDiff } from "./lib/diff/parser.js";
export { createDiff, getAddressableLines, getFileByPath, validateDiff } from "./lib/diff/model.js";
export { filterReviewableFiles, isExcluded } from "./lib/diff/filter.js";

// レビュー
export { chunkDiff } from "./lib/ai/chunking/index.js";
export { buildModelRequest, buildReviewPrompt, REVIEW_SYSTEM_PROMPT } from "./lib/ai/prompts.js";
export { ModelInvoker, DEFAULT_INVOKER_OPTIONS, type InvokerOptions } from "./lib/ai/invoker.js";
export { RateLimitGate } from "./lib/ai/rate-limit-gate.js";
export { parseModelResponse } from "./lib/ai/response-parser.js";
export { aggregateFindings, DEFAULT_AGGREGATE_OPTIONS, type AggregateOptions } from "./lib/ai/deduplication.js";
export {
  createGoogleProvider,
  createLanguageModelProvider,
  type Completion,
  type CompletionParams,
  type CompletionProvider,
} from "./lib/ai/client.js";
export { SEVERITIES, CATEGORIES, type Severity, type Category } from "./lib/ai/constants.js";
export { runReviewPipeline, type PipelineDeps, type PipelineOptions, type PipelineEvent } from "./lib/review/pipeline.js";
export { buildSummaryComment, formatRunSummary } from "./lib/review/summary.js";
export type * from "./lib/review/types.js";

// ホスト
export { GitHubHost, createOctokit, createOctokitApi } from "./lib/github/client.js";
export type {
  CheckRunInfo,
  FileCommit,
  GitHubApi,
  NewIssue,
  NewPullRequest,
  PullRequestInfo,
  RepoFile,
  SourceControlHost,
} from "./lib/github/types.js";
export { createIssues, type IssueLabels } from "./lib/github/issue-creator.js";

// 修正PR
export {
  generateFixPullRequest,
  type FixPullRequest,
  type FixPullRequestOptions,
} from "./lib/fix/fix-generator.js";
export { checksPassed, waitForChecks, type CheckWaitOptions } from "./lib/fix/check-waiter.js";

// 設定・エラー
export { loadConfig, ReviewConfigSchema, type ReviewConfig } from "./lib/config/index.js";
export * from "./lib/errors/index.js";
export { getTokenEstimator, type TokenEstimator } from "./lib/tokenizer/index.js";
