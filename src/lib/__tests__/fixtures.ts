/**
 * テスト用のDiff・設定・フェイク
 */

import { vi } from "vitest";
import type { Completion, CompletionParams, CompletionProvider } from "../ai/client.js";
import { loadConfig, type ReviewConfig } from "../config/index.js";
import { createDiff } from "../diff/model.js";
import { parseDiff } from "../diff/parser.js";
import type { Diff, DiffLine, FileChange, Hunk, PullRequestRef } from "../diff/types.js";
import type { GitHubApi, PullRequestInfo, SourceControlHost } from "../github/types.js";
import type { Chunk, Finding, PublishResult, ReviewComment } from "../review/types.js";

export const TEST_REF: PullRequestRef = { owner: "acme", repo: "widgets", number: 7 };
export const HEAD_SHA = "1111111111111111111111111111111111111111";

// ========================================
// Diff
// ========================================

export interface AddedFileSpec {
  path: string;
  // 新規ファイルとして 1 行目から追加される行
  lines: string[];
}

/**
 * 追加行だけからなる新規ファイルの unified diff を作る
 */
export function buildAddedFileDiff(files: readonly AddedFileSpec[]): string {
  return files
    .flatMap(({ path, lines }) => [
      `diff --git a/${path} b/${path}`,
      "new file mode 100644",
      "--- /dev/null",
      `+++ b/${path}`,
      `@@ -0,0 +1,${lines.length} @@`,
      ...lines.map((line) => `+${line}`),
    ])
    .join("\n");
}

export function makeDiff(raw: string, headSha: string = HEAD_SHA): Diff {
  return createDiff(parseDiff(raw).files, headSha);
}

/**
 * 追加行だけのhunk（newStart から連番）
 */
export function addedHunk(newStart: number, lines: readonly string[]): Hunk {
  return {
    oldStart: 0,
    oldLines: 0,
    newStart,
    newLines: lines.length,
    header: "",
    lines: lines.map((content, index): DiffLine => ({ type: "added", content, newLineNumber: newStart + index })),
  };
}

function countLines(hunks: readonly Hunk[], type: DiffLine["type"]): number {
  return hunks.reduce((sum, hunk) => sum + hunk.lines.filter((line) => line.type === type).length, 0);
}

export function fileChange(path: string, hunks: readonly Hunk[]): FileChange {
  return {
    path,
    oldPath: path,
    kind: "modified",
    hunks,
    additions: countLines(hunks, "added"),
    deletions: countLines(hunks, "removed"),
    binary: false,
  };
}

/**
 * ファイル全体をそのまま含むチャンク
 */
export function chunkOf(files: readonly FileChange[], index = 0, totalChunks = 1): Chunk {
  return {
    id: `chunk-${index}`,
    index,
    totalChunks,
    files: files.map((change) => ({ change, hunks: change.hunks, hunkOffset: 0 })),
    tokenCount: 0,
    oversized: false,
  };
}

// ========================================
// 設定
// ========================================

export function testConfig(overrides: Partial<ReviewConfig> = {}): ReviewConfig {
  return {
    ...loadConfig({}),
    tokenizer: "heuristic",
    minBackoffMs: 1,
    maxBackoffMs: 5,
    rateLimitCooldownMs: 10,
    ...overrides,
  };
}

// ========================================
// 指摘
// ========================================

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  const path = overrides.path ?? "src/a.ts";
  const line = overrides.line ?? 1;
  const body = overrides.body ?? "Possible null dereference here";
  return {
    path,
    line,
    severity: "warning",
    category: "correctness",
    title: "Null dereference",
    body,
    chunkId: "chunk-0",
    fingerprint: `${path}:${line}:${body}`,
    ...overrides,
  };
}

export function makeComment(overrides: Partial<ReviewComment> = {}): ReviewComment {
  return {
    path: "src/a.ts",
    line: 1,
    severity: "warning",
    category: "correctness",
    title: "Null dereference",
    body: "🟠 **[warning]** Null dereference _(correctness)_\n\nPossible null dereference here",
    description: "Possible null dereference here",
    fingerprints: ["fp-1"],
    ...overrides,
  };
}

// ========================================
// フェイク
// ========================================

export function pullRequestInfo(overrides: Partial<PullRequestInfo> = {}): PullRequestInfo {
  return {
    ref: TEST_REF,
    title: "Add widgets",
    body: "Adds the widget service",
    author: "octocat",
    state: "open",
    draft: false,
    headSha: HEAD_SHA,
    headRef: "feature/widgets",
    baseRef: "main",
    labels: [],
    ...overrides,
  };
}

export function fakeHost(diff: Diff, pr: PullRequestInfo = pullRequestInfo()) {
  let issues = 0;
  return {
    getPullRequest: vi.fn<SourceControlHost["getPullRequest"]>(async () => pr),
    fetchDiff: vi.fn<SourceControlHost["fetchDiff"]>(async () => diff),
    getFile: vi.fn<SourceControlHost["getFile"]>(async () => null),
    publishComments: vi.fn<SourceControlHost["publishComments"]>(
      async (_ref, comments): Promise<PublishResult> => ({ posted: comments.length, failed: [] })
    ),
    postSummary: vi.fn<SourceControlHost["postSummary"]>(async () => undefined),
    createIssue: vi.fn<SourceControlHost["createIssue"]>(
      async () => `https://github.com/acme/widgets/issues/${100 + issues++}`
    ),
    createBranch: vi.fn<SourceControlHost["createBranch"]>(async () => undefined),
    commitFile: vi.fn<SourceControlHost["commitFile"]>(async () => undefined),
    createPullRequest: vi.fn<SourceControlHost["createPullRequest"]>(
      async () => "https://github.com/acme/widgets/pull/200"
    ),
    listCheckRuns: vi.fn<SourceControlHost["listCheckRuns"]>(async () => []),
  } satisfies SourceControlHost;
}

/**
 * プロンプトに応じて応答を返すプロバイダー
 */
export function fakeProvider(
  respond: (prompt: string, params: CompletionParams) => Promise<Completion> | Completion
) {
  const complete = vi.fn(async (prompt: string, params: CompletionParams) => respond(prompt, params));
  return { modelId: "test-model", complete } satisfies CompletionProvider;
}

export function httpError(message: string, fields: Record<string, unknown>): Error {
  return Object.assign(new Error(message), fields);
}

/**
 * GitHub REST API のフェイク（既定では全て成功）
 */
export function fakeGitHubApi(rawDiff: string, pr: PullRequestInfo = pullRequestInfo()) {
  return {
    getPullRequest: vi.fn<GitHubApi["getPullRequest"]>(async () => pr),
    getPullRequestDiff: vi.fn<GitHubApi["getPullRequestDiff"]>(async () => rawDiff),
    getFile: vi.fn<GitHubApi["getFile"]>(async () => null),
    createReview: vi.fn<GitHubApi["createReview"]>(async () => undefined),
    createReviewComment: vi.fn<GitHubApi["createReviewComment"]>(async () => undefined),
    createIssueComment: vi.fn<GitHubApi["createIssueComment"]>(async () => undefined),
    createIssue: vi.fn<GitHubApi["createIssue"]>(async () => "https://github.com/acme/widgets/issues/100"),
    createBranch: vi.fn<GitHubApi["createBranch"]>(async () => undefined),
    commitFile: vi.fn<GitHubApi["commitFile"]>(async () => undefined),
    createPullRequest: vi.fn<GitHubApi["createPullRequest"]>(async () => "https://github.com/acme/widgets/pull/101"),
    listCheckRuns: vi.fn<GitHubApi["listCheckRuns"]>(async () => []),
  } satisfies GitHubApi;
}
