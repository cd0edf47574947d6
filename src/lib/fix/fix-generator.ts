/**
 * Fix Pull Request Generator
 *
 * 提案付きのコメントから修正PRを作る
 * - ファイルごとに指摘をまとめ、モデルに修正後のファイル全体を書かせる
 * - 修正ブランチは PR の head から切り、PR の head ブランチに向けて PR を作る
 * - どのファイルもコミットできなければ PR は作らない
 */

import type { CompletionProvider } from "../ai/client.js";
import { parseAndValidateJson } from "../ai/json-utils.js";
import { FIX_SYSTEM_PROMPT, buildFixPrompt } from "../ai/prompts.js";
import { FixOutputSchema } from "../ai/schemas.js";
import { getErrorMessage } from "../errors/errors.js";
import { isValidSuggestion } from "../github/suggestion-formatter.js";
import type { PullRequestInfo, SourceControlHost } from "../github/types.js";
import type { ReviewComment } from "../review/types.js";

export interface FixPullRequestOptions {
  branchPrefix: string;
  maxFiles: number;
  labels: string[];
  temperature: number;
  maxOutputTokens: number;
  signal?: AbortSignal;
}

export interface FixPullRequest {
  url: string;
  branch: string;
  // コミットできたファイル
  files: string[];
}

// ========================================
// モデル応答の解釈
// ========================================

const CODE_BLOCK_PATTERN = /```[^\n]*\n([\s\S]*?)\n```/;

/**
 * {"fixed_content": ...} か、最初のコードブロックから修正後の内容を取り出す
 */
function extractFixedContent(text: string): string | null {
  const parsed = parseAndValidateJson(text, FixOutputSchema);
  // 途中で切れた応答を修復したものはファイルとして使わない
  if (parsed.success && !parsed.repaired) {
    return parsed.data.fixed_content;
  }

  const block = CODE_BLOCK_PATTERN.exec(text);
  return block ? `${block[1]}\n` : null;
}

function groupByFile(comments: readonly ReviewComment[]): Map<string, ReviewComment[]> {
  const byFile = new Map<string, ReviewComment[]>();
  for (const comment of comments) {
    const group = byFile.get(comment.path) ?? [];
    group.push(comment);
    byFile.set(comment.path, group);
  }
  return byFile;
}

function buildCommitMessage(path: string, comments: readonly ReviewComment[]): string {
  const addressed = comments.map((comment) => `- [${comment.severity}] ${comment.title}`);
  return [`fix: address AI review findings in ${path}`, "", "Findings addressed:", ...addressed].join("\n");
}

function buildPullRequestBody(pr: PullRequestInfo, fixed: ReadonlyMap<string, readonly ReviewComment[]>): string {
  const lines = [
    "## AI-Generated Fix PR",
    "",
    `This PR addresses review findings from PR #${pr.ref.number}.`,
    "",
    "### Files Modified",
    "",
  ];
  for (const [path, comments] of fixed) {
    lines.push(`#### \`${path}\``, ...comments.map((comment) => `- **[${comment.severity}]** ${comment.title}`), "");
  }
  lines.push("---", "*This PR was generated automatically by reviewloom.*");
  return lines.join("\n");
}

// ========================================
// ファイル単位の修正
// ========================================

async function fixFile(
  host: SourceControlHost,
  provider: CompletionProvider,
  pr: PullRequestInfo,
  branch: string,
  path: string,
  comments: readonly ReviewComment[],
  options: FixPullRequestOptions
): Promise<boolean> {
  const file = await host.getFile(pr.ref, path, branch, options.signal);
  if (!file) {
    console.warn(`[Fix] Could not read ${path} from ${branch}`);
    return false;
  }

  const completion = await provider.complete(buildFixPrompt(path, file.content, comments), {
    system: FIX_SYSTEM_PROMPT,
    temperature: options.temperature,
    maxOutputTokens: options.maxOutputTokens,
    abortSignal: options.signal,
  });

  const fixed = extractFixedContent(completion.text);
  if (fixed === null) {
    console.warn(`[Fix] Could not extract fixed content for ${path}`);
    return false;
  }
  if (fixed === file.content) {
    console.log(`[Fix] No changes for ${path}`);
    return false;
  }

  await host.commitFile(pr.ref, {
    path,
    content: fixed,
    message: buildCommitMessage(path, comments),
    branch,
    sha: file.sha,
  });
  console.log(`[Fix] Committed fix for ${path}`);
  return true;
}

// ========================================
// メイン関数
// ========================================

/**
 * 修正PRを作成（作れなければ null）
 */
export async function generateFixPullRequest(
  host: SourceControlHost,
  provider: CompletionProvider,
  pr: PullRequestInfo,
  comments: readonly ReviewComment[],
  options: FixPullRequestOptions
): Promise<FixPullRequest | null> {
  const fixable = comments.filter((comment) => isValidSuggestion(comment.suggestion));
  if (fixable.length === 0) {
    console.log("[Fix] No comments with suggestions, skipping fix PR");
    return null;
  }

  const targets = new Map([...groupByFile(fixable)].slice(0, options.maxFiles));
  const branch = `${options.branchPrefix}${pr.ref.number}`;

  try {
    await host.createBranch(pr.ref, branch, pr.headSha);
  } catch (error) {
    console.error(`[Fix] Failed to create branch ${branch}: ${getErrorMessage(error)}`);
    return null;
  }

  const fixed = new Map<string, ReviewComment[]>();
  for (const [path, fileComments] of targets) {
    if (options.signal?.aborted) break;
    try {
      if (await fixFile(host, provider, pr, branch, path, fileComments, options)) {
        fixed.set(path, fileComments);
      }
    } catch (error) {
      console.error(`[Fix] Failed to fix ${path}: ${getErrorMessage(error)}`);
    }
  }

  if (fixed.size === 0) {
    console.warn("[Fix] No fixes were committed, skipping PR creation");
    return null;
  }

  try {
    const url = await host.createPullRequest(pr.ref, {
      title: `AI Fix: Address review findings for PR #${pr.ref.number}`,
      body: buildPullRequestBody(pr, fixed),
      head: branch,
      base: pr.headRef,
      labels: options.labels,
    });
    console.log(`[Fix] Created fix PR ${url}`);
    return { url, branch, files: [...fixed.keys()] };
  } catch (error) {
    console.error(`[Fix] Failed to create fix PR: ${getErrorMessage(error)}`);
    return null;
  }
}
