// GitHub / ソースコントロールホストの型定義

import type { Diff, PullRequestRef } from "../diff/types.js";
import type { PublishResult, ReviewComment } from "../review/types.js";

export interface RepoRef {
  owner: string;
  repo: string;
}

export interface PullRequestInfo {
  ref: PullRequestRef;
  title: string;
  body: string;
  author: string;
  state: string;
  draft: boolean;
  headSha: string;
  headRef: string;
  baseRef: string;
  labels: string[];
}

export interface RepoFile {
  content: string;
  // 更新時に必要な blob SHA
  sha: string;
}

export interface NewIssue {
  title: string;
  body: string;
  labels: string[];
}

export interface NewPullRequest {
  title: string;
  body: string;
  head: string;
  base: string;
  labels: string[];
}

export interface FileCommit {
  path: string;
  content: string;
  message: string;
  branch: string;
  sha: string;
}

export interface CheckRunInfo {
  name: string;
  // queued / in_progress / completed
  status: string;
  conclusion: string | null;
}

// pulls.createReview の comments 要素
export interface ReviewCommentInput {
  path: string;
  line: number;
  side: "RIGHT";
  body: string;
}

/**
 * GitHub REST API のうちレビューで使う部分
 * Octokit 実装は createOctokitApi、テストではフェイクを渡す
 */
export interface GitHubApi {
  getPullRequest(ref: PullRequestRef, signal?: AbortSignal): Promise<PullRequestInfo>;
  getPullRequestDiff(ref: PullRequestRef, signal?: AbortSignal): Promise<string>;
  // 存在しなければ null
  getFile(repo: RepoRef, path: string, gitRef: string, signal?: AbortSignal): Promise<RepoFile | null>;
  createReview(
    ref: PullRequestRef,
    params: { commitId: string; body: string; comments: ReviewCommentInput[] }
  ): Promise<void>;
  createReviewComment(ref: PullRequestRef, params: { commitId: string; comment: ReviewCommentInput }): Promise<void>;
  createIssueComment(ref: PullRequestRef, body: string): Promise<void>;
  // 作成したIssueのURLを返す
  createIssue(repo: RepoRef, issue: NewIssue): Promise<string>;
  createBranch(repo: RepoRef, branch: string, fromSha: string): Promise<void>;
  commitFile(repo: RepoRef, commit: FileCommit): Promise<void>;
  // 作成したPRのURLを返す
  createPullRequest(repo: RepoRef, pullRequest: NewPullRequest): Promise<string>;
  listCheckRuns(repo: RepoRef, gitRef: string): Promise<CheckRunInfo[]>;
}

/**
 * パイプラインから見たソースコントロールホスト
 */
export interface SourceControlHost {
  getPullRequest(ref: PullRequestRef, signal?: AbortSignal): Promise<PullRequestInfo>;
  fetchDiff(ref: PullRequestRef, signal?: AbortSignal): Promise<Diff>;
  getFile(ref: PullRequestRef, path: string, gitRef: string, signal?: AbortSignal): Promise<RepoFile | null>;
  publishComments(ref: PullRequestRef, comments: readonly ReviewComment[], diff: Diff): Promise<PublishResult>;
  postSummary(ref: PullRequestRef, body: string): Promise<void>;
  createIssue(ref: PullRequestRef, issue: NewIssue): Promise<string>;
  createBranch(ref: PullRequestRef, branch: string, fromSha: string): Promise<void>;
  commitFile(ref: PullRequestRef, commit: FileCommit): Promise<void>;
  createPullRequest(ref: PullRequestRef, pullRequest: NewPullRequest): Promise<string>;
  listCheckRuns(ref: PullRequestRef, gitRef: string): Promise<CheckRunInfo[]>;
}
