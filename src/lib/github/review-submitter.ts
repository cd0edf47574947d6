/**
 * Review Submitter
 * 422エラーハンドリングとフォールバック処理を含むレビュー投稿
 * pr-agentのpublish_code_suggestions()を参考
 */

import { getAddressableLines, getFileByPath } from "../diff/model.js";
import type { Diff, PullRequestRef } from "../diff/types.js";
import { HostError, getErrorMessage } from "../errors/errors.js";
import type { PublishPartialFailure, PublishResult, ReviewComment } from "../review/types.js";
import type { GitHubApi, ReviewCommentInput } from "./types.js";

function toInput(comment: ReviewComment): ReviewCommentInput {
  return { path: comment.path, line: comment.line, side: "RIGHT", body: comment.body };
}

function isValidationError(error: unknown): boolean {
  return error instanceof HostError && error.kind === "validation";
}

/**
 * コメント位置を検証（diffの右側でコメント可能な行か）
 */
export function validateCommentAnchors(
  comments: readonly ReviewComment[],
  diff: Diff
): { valid: ReviewComment[]; invalid: PublishPartialFailure[] } {
  const valid: ReviewComment[] = [];
  const invalid: PublishPartialFailure[] = [];
  const cache = new Map<string, Set<number>>();

  for (const comment of comments) {
    let lines = cache.get(comment.path);
    if (!lines) {
      const file = getFileByPath(diff, comment.path);
      lines = file ? getAddressableLines(file.hunks) : new Set<number>();
      cache.set(comment.path, lines);
    }

    if (!lines.has(comment.line)) {
      console.warn(`[Review] Invalid comment: ${comment.path}:${comment.line} - line not in diff`);
      invalid.push({
        comment,
        reason: "not_addressable",
        message: `${comment.path}:${comment.line} is not a commentable line of the diff`,
      });
      continue;
    }

    valid.push(comment);
  }

  return { valid, invalid };
}

/**
 * レビューを投稿（422エラーハンドリング付き）
 *
 * 1. 位置を検証し、diff外のコメントは投稿しない
 * 2. 全コメントを1つのレビューとして投稿
 * 3. 422の場合は1件ずつ投稿して拒否されたコメントを特定
 *
 * 最初のレビュー投稿が422以外で失敗した場合はそのまま投げる（1件も投稿されていない）
 */
export async function submitReview(
  api: GitHubApi,
  ref: PullRequestRef,
  commitId: string,
  comments: readonly ReviewComment[],
  diff: Diff
): Promise<PublishResult> {
  console.log(`[Review] Validating ${comments.length} comments`);
  const { valid, invalid } = validateCommentAnchors(comments, diff);
  console.log(`[Review] Valid: ${valid.length}, Invalid: ${invalid.length}`);

  if (valid.length === 0) {
    return { posted: 0, failed: invalid };
  }

  try {
    await api.createReview(ref, {
      commitId,
      body: `🤖 AI Review: ${valid.length} inline comment(s)`,
      comments: valid.map(toInput),
    });
    console.log(`[Review] Posted review with ${valid.length} comments`);
    return { posted: valid.length, failed: invalid };
  } catch (error) {
    if (!isValidationError(error)) throw error;
    console.warn("[Review] 422 error, posting comments individually");
  }

  const result = await postIndividually(api, ref, commitId, valid);
  return { posted: result.posted, failed: [...invalid, ...result.failed] };
}

/**
 * 1件ずつ投稿して問題のコメントを特定
 * 失敗したコメントは記録して次へ進む（投稿済みの件数は失わない）
 */
async function postIndividually(
  api: GitHubApi,
  ref: PullRequestRef,
  commitId: string,
  comments: readonly ReviewComment[]
): Promise<PublishResult> {
  let posted = 0;
  const failed: PublishPartialFailure[] = [];

  for (const comment of comments) {
    try {
      await api.createReviewComment(ref, { commitId, comment: toInput(comment) });
      posted++;
    } catch (error) {
      const reason = isValidationError(error) ? "rejected" : "error";
      console.warn(`[Review] Comment failed (${reason}): ${comment.path}:${comment.line}`);
      failed.push({ comment, reason, message: getErrorMessage(error) });
    }
  }

  console.log(`[Review] Posted ${posted}/${comments.length} comments individually`);
  return { posted, failed };
}
