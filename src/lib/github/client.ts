import { Octokit } from "octokit";
import pLimit from "p-limit";
import pRetry, { AbortError } from "p-retry";
import { setTimeout as sleep } from "node:timers/promises";
import { createDiff, getAddressableLines, getFileByPath, getLineContent } from "../diff/model.js";
import { parseDiff } from "../diff/parser.js";
import type { Diff, PullRequestRef } from "../diff/types.js";
import { classifyHostError, getRetryAfterMs } from "../errors/error-registry.js";
import { HostError } from "../errors/errors.js";
import type { PublishPartialFailure, PublishResult, ReviewComment } from "../review/types.js";
import { submitReview } from "./review-submitter.js";
import type {
  CheckRunInfo,
  FileCommit,
  GitHubApi,
  NewIssue,
  NewPullRequest,
  PullRequestInfo,
  RepoFile,
  RepoRef,
  SourceControlHost,
} from "./types.js";

// =====================================================
// クライアント作成
// =====================================================

/**
 * トークンからOctokitクライアントを作成
 */
export function createOctokit(token: string): Octokit {
  if (!token) {
    throw new HostError("unauthorized", "GitHub token not configured. Set GITHUB_TOKEN environment variable.");
  }
  return new Octokit({ auth: token });
}

// =====================================================
// レート制限とリトライ設定
// =====================================================

// 並行実行数制限（Abuse Detection回避）
const limit = pLimit(5);

export interface RequestRetryOptions {
  retries: number;
  minTimeout: number;
  maxTimeout: number;
}

export const DEFAULT_REQUEST_RETRY: RequestRetryOptions = {
  retries: 5,
  minTimeout: 1000,
  maxTimeout: 30000,
};

/**
 * レート制限とリトライ付きAPIコール
 * 失敗は常に HostError として投げる
 */
export async function rateLimitedRequest<T>(
  fn: () => Promise<T>,
  retry: RequestRetryOptions = DEFAULT_REQUEST_RETRY,
  signal?: AbortSignal
): Promise<T> {
  return limit(() =>
    pRetry(
      async () => {
        try {
          return await fn();
        } catch (error) {
          const hostError = classifyHostError(error);

          // 一時的なエラー（429 / 5xx / ネットワーク）は再試行
          if (hostError.retryable) {
            const retryAfter = getRetryAfterMs(error);
            if (retryAfter !== undefined) {
              const waitMs = Math.min(retryAfter, retry.maxTimeout);
              console.log(`[GitHub API] Rate limited, waiting ${waitMs}ms`);
              await sleep(waitMs, undefined, { signal });
            }
            throw hostError;
          }

          // その他は即座に失敗（4xxエラー等）
          throw new AbortError(hostError);
        }
      },
      {
        retries: retry.retries,
        factor: 2,
        minTimeout: retry.minTimeout,
        maxTimeout: retry.maxTimeout,
        signal,
        onFailedAttempt: ({ error, attemptNumber, retriesLeft }) => {
          if (retriesLeft > 0) {
            console.warn(`[GitHub API] Retry attempt ${attemptNumber}:`, error.message);
          }
        },
      }
    )
  );
}

// =====================================================
// GitHub API ラッパー
// =====================================================

/**
 * Octokit を GitHubApi インターフェースに適合させる
 */
export function createOctokitApi(octokit: Octokit, retry: RequestRetryOptions = DEFAULT_REQUEST_RETRY): GitHubApi {
  return {
    async getPullRequest(ref, signal) {
      return rateLimitedRequest(async () => {
        const { data } = await octokit.rest.pulls.get({
          owner: ref.owner,
          repo: ref.repo,
          pull_number: ref.number,
          request: { signal },
        });
        return {
          ref,
          title: data.title,
          body: data.body ?? "",
          author: data.user?.login ?? "",
          state: data.state,
          draft: data.draft ?? false,
          headSha: data.head.sha,
          headRef: data.head.ref,
          baseRef: data.base.ref,
          labels: data.labels.map((label) => label.name),
        };
      }, retry, signal);
    },

    async getPullRequestDiff(ref, signal) {
      return rateLimitedRequest(async () => {
        const response = await octokit.rest.pulls.get({
          owner: ref.owner,
          repo: ref.repo,
          pull_number: ref.number,
          mediaType: { format: "diff" },
          request: { signal },
        });
        // diff形式では本文が文字列で返る
        const data: unknown = response.data;
        if (typeof data !== "string") {
          throw new HostError("validation", "GitHub did not return a unified diff for the pull request");
        }
        return data;
      }, retry, signal);
    },

    async getFile(repo, path, gitRef, signal) {
      try {
        return await rateLimitedRequest(async () => {
          const response = await octokit.rest.repos.getContent({
            owner: repo.owner,
            repo: repo.repo,
            path,
            ref: gitRef,
            request: { signal },
          });

          if ("content" in response.data && response.data.type === "file") {
            return {
              content: Buffer.from(response.data.content, "base64").toString("utf-8"),
              sha: response.data.sha,
            };
          }
          return null;
        }, retry, signal);
      } catch (error) {
        if (error instanceof HostError && error.kind === "not_found") return null;
        throw error;
      }
    },

    async createReview(ref, params) {
      await rateLimitedRequest(
        () =>
          octokit.rest.pulls.createReview({
            owner: ref.owner,
            repo: ref.repo,
            pull_number: ref.number,
            commit_id: params.commitId,
            body: params.body,
            event: "COMMENT",
            comments: params.comments,
          }),
        retry
      );
    },

    async createReviewComment(ref, params) {
      await rateLimitedRequest(
        () =>
          octokit.rest.pulls.createReviewComment({
            owner: ref.owner,
            repo: ref.repo,
            pull_number: ref.number,
            commit_id: params.commitId,
            path: params.comment.path,
            line: params.comment.line,
            side: params.comment.side,
            body: params.comment.body,
          }),
        retry
      );
    },

    async createIssueComment(ref, body) {
      await rateLimitedRequest(
        () =>
          octokit.rest.issues.createComment({
            owner: ref.owner,
            repo: ref.repo,
            issue_number: ref.number,
            body,
          }),
        retry
      );
    },

    async createIssue(repo, issue) {
      const { data } = await rateLimitedRequest(
        () =>
          octokit.rest.issues.create({
            owner: repo.owner,
            repo: repo.repo,
            title: issue.title,
            body: issue.body,
            labels: issue.labels,
          }),
        retry
      );
      return data.html_url;
    },

    async createBranch(repo, branch, fromSha) {
      await rateLimitedRequest(
        () =>
          octokit.rest.git.createRef({
            owner: repo.owner,
            repo: repo.repo,
            ref: `refs/heads/${branch}`,
            sha: fromSha,
          }),
        retry
      );
    },

    async commitFile(repo, commit) {
      await rateLimitedRequest(
        () =>
          octokit.rest.repos.createOrUpdateFileContents({
            owner: repo.owner,
            repo: repo.repo,
            path: commit.path,
            message: commit.message,
            content: Buffer.from(commit.content, "utf8").toString("base64"),
            sha: commit.sha,
            branch: commit.branch,
          }),
        retry
      );
    },

    async createPullRequest(repo, pullRequest) {
      const { data } = await rateLimitedRequest(
        () =>
          octokit.rest.pulls.create({
            owner: repo.owner,
            repo: repo.repo,
            title: pullRequest.title,
            body: pullRequest.body,
            head: pullRequest.head,
            base: pullRequest.base,
          }),
        retry
      );

      if (pullRequest.labels.length > 0) {
        await rateLimitedRequest(
          () =>
            octokit.rest.issues.addLabels({
              owner: repo.owner,
              repo: repo.repo,
              issue_number: data.number,
              labels: pullRequest.labels,
            }),
          retry
        );
      }
      return data.html_url;
    },

    async listCheckRuns(repo, gitRef) {
      const { data } = await rateLimitedRequest(
        () =>
          octokit.rest.checks.listForRef({
            owner: repo.owner,
            repo: repo.repo,
            ref: gitRef,
            per_page: 100,
          }),
        retry
      );
      return data.check_runs.map((run) => ({
        name: run.name,
        status: run.status,
        conclusion: run.conclusion,
      }));
    },
  };
}

// =====================================================
// ソースコントロールホスト
// =====================================================

/**
 * GitHub をレビューパイプラインのホストとして扱う
 */
export class GitHubHost implements SourceControlHost {
  constructor(private readonly api: GitHubApi) {}

  getPullRequest(ref: PullRequestRef, signal?: AbortSignal): Promise<PullRequestInfo> {
    return this.api.getPullRequest(ref, signal);
  }

  async fetchDiff(ref: PullRequestRef, signal?: AbortSignal): Promise<Diff> {
    const pr = await this.api.getPullRequest(ref, signal);
    const raw = await this.api.getPullRequestDiff(ref, signal);
    const diff = createDiff(parseDiff(raw).files, pr.headSha);
    console.log(`[GitHub API] Fetched diff for ${formatRef(ref)}: ${diff.files.length} files @ ${pr.headSha.slice(0, 7)}`);
    return diff;
  }

  getFile(ref: PullRequestRef, path: string, gitRef: string, signal?: AbortSignal): Promise<RepoFile | null> {
    return this.api.getFile(toRepo(ref), path, gitRef, signal);
  }

  /**
   * コメントを投稿
   * レビュー中にheadが進んでいた場合はdiffを取り直し、位置がずれたコメントは投稿しない
   */
  async publishComments(ref: PullRequestRef, comments: readonly ReviewComment[], diff: Diff): Promise<PublishResult> {
    const pr = await this.api.getPullRequest(ref);
    if (diff.headSha === undefined || pr.headSha === diff.headSha) {
      return submitReview(this.api, ref, pr.headSha, comments, diff);
    }

    console.warn(
      `[Review] Head moved ${diff.headSha.slice(0, 7)} -> ${pr.headSha.slice(0, 7)}, re-checking comment anchors`
    );
    const current = await this.fetchDiff(ref);
    const { fresh, stale } = partitionStaleComments(comments, diff, current);

    const result = await submitReview(this.api, ref, current.headSha ?? pr.headSha, fresh, current);
    return { posted: result.posted, failed: [...stale, ...result.failed] };
  }

  async postSummary(ref: PullRequestRef, body: string): Promise<void> {
    await this.api.createIssueComment(ref, body);
  }

  createIssue(ref: PullRequestRef, issue: NewIssue): Promise<string> {
    return this.api.createIssue(toRepo(ref), issue);
  }

  createBranch(ref: PullRequestRef, branch: string, fromSha: string): Promise<void> {
    return this.api.createBranch(toRepo(ref), branch, fromSha);
  }

  commitFile(ref: PullRequestRef, commit: FileCommit): Promise<void> {
    return this.api.commitFile(toRepo(ref), commit);
  }

  createPullRequest(ref: PullRequestRef, pullRequest: NewPullRequest): Promise<string> {
    return this.api.createPullRequest(toRepo(ref), pullRequest);
  }

  listCheckRuns(ref: PullRequestRef, gitRef: string): Promise<CheckRunInfo[]> {
    return this.api.listCheckRuns(toRepo(ref), gitRef);
  }
}

function toRepo(ref: PullRequestRef): RepoRef {
  return { owner: ref.owner, repo: ref.repo };
}

/**
 * 新しいdiffで同じ行がコメント可能かつ内容が変わっていないコメントだけを残す
 */
export function partitionStaleComments(
  comments: readonly ReviewComment[],
  previous: Diff,
  current: Diff
): { fresh: ReviewComment[]; stale: PublishPartialFailure[] } {
  const fresh: ReviewComment[] = [];
  const stale: PublishPartialFailure[] = [];

  for (const comment of comments) {
    const before = getFileByPath(previous, comment.path);
    const after = getFileByPath(current, comment.path);
    const stillAddressable = after !== undefined && getAddressableLines(after.hunks).has(comment.line);
    const unchanged =
      before !== undefined &&
      after !== undefined &&
      getLineContent(before.hunks, comment.line) === getLineContent(after.hunks, comment.line);

    if (stillAddressable && unchanged) {
      fresh.push(comment);
    } else {
      stale.push({
        comment,
        reason: "stale_anchor",
        message: `${comment.path}:${comment.line} no longer matches the pull request head`,
      });
    }
  }

  if (stale.length > 0) {
    console.warn(`[Review] ${stale.length} comments have stale anchors`);
  }

  return { fresh, stale };
}

export function formatRef(ref: PullRequestRef): string {
  return `${ref.owner}/${ref.repo}#${ref.number}`;
}
