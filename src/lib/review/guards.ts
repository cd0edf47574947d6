// レビューをスキップするPRの判定

import type { PullRequestInfo } from "../github/types.js";

// 作成者名にこれらを含むPRはボットによるものとみなす
export const BOT_AUTHOR_MARKERS = ["[bot]", "github-actions", "dependabot"] as const;

export interface SkipGuardOptions {
  skipLabel: string;
  fixBranchPrefix: string;
}

/**
 * スキップ理由を返す（レビュー対象なら null）
 */
export function getPullRequestSkipReason(pr: PullRequestInfo, options: SkipGuardOptions): string | null {
  const author = pr.author.toLowerCase();
  if (BOT_AUTHOR_MARKERS.some((marker) => author.includes(marker))) {
    return `author ${pr.author} is a bot`;
  }

  if (pr.headRef.startsWith(options.fixBranchPrefix)) {
    return `head branch ${pr.headRef} starts with ${options.fixBranchPrefix}`;
  }

  if (pr.labels.includes(options.skipLabel)) {
    return `labelled ${options.skipLabel}`;
  }

  return null;
}
