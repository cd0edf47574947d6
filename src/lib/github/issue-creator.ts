/**
 * Issue Creator
 * 公開したコメントごとにGitHub Issueを作成する
 * 1件の失敗はログに残して次へ進む
 */

import { getErrorMessage } from "../errors/errors.js";
import type { ReviewComment } from "../review/types.js";
import type { PullRequestInfo, SourceControlHost } from "./types.js";

export interface IssueLabels {
  review: string;
  automated: string;
}

function buildIssueTitle(comment: ReviewComment, pr: PullRequestInfo): string {
  return `[${comment.severity.toUpperCase()}] ${comment.title} (PR #${pr.ref.number})`;
}

function buildIssueBody(comment: ReviewComment, pr: PullRequestInfo): string {
  const lines = [
    "## AI Review Finding",
    "",
    `**Source PR:** #${pr.ref.number} (${pr.title})`,
    `**File:** \`${comment.path}\``,
    `**Line:** ${comment.line}`,
    `**Severity:** ${comment.severity}`,
    `**Category:** ${comment.category}`,
    "",
    "## Description",
    "",
    comment.description,
  ];

  if (comment.suggestion) {
    const fence = comment.suggestion.includes("```") ? "````" : "```";
    lines.push("", "## Suggested Fix", "", fence, comment.suggestion, fence);
  }

  lines.push("", "---", "*This issue was created automatically by reviewloom.*");
  return lines.join("\n");
}

/**
 * 作成できたIssueのURLを返す
 */
export async function createIssues(
  host: SourceControlHost,
  pr: PullRequestInfo,
  comments: readonly ReviewComment[],
  labels: IssueLabels,
  signal?: AbortSignal
): Promise<string[]> {
  const urls: string[] = [];

  for (const comment of comments) {
    if (signal?.aborted) break;
    try {
      const url = await host.createIssue(pr.ref, {
        title: buildIssueTitle(comment, pr),
        body: buildIssueBody(comment, pr),
        labels: [labels.review, labels.automated],
      });
      urls.push(url);
    } catch (error) {
      console.error(`[Issues] Failed to create issue for ${comment.path}:${comment.line}: ${getErrorMessage(error)}`);
    }
  }

  console.log(`[Issues] Created ${urls.length}/${comments.length} issues`);
  return urls;
}
