/**
 * レビューサマリー
 * PRに投稿するMarkdownのサマリーコメントと、CLI向けのテキストサマリーを生成
 */

import { SEVERITIES, SEVERITY_EMOJI, type Severity } from "../ai/constants.js";
import type { CheckRunInfo } from "../github/types.js";
import type { ChunkOutcome, PublishResult, ReviewComment, RunSummary } from "./types.js";

export interface SummaryCommentInput {
  comments: readonly ReviewComment[];
  chunkOutcomes: readonly ChunkOutcome[];
  publish?: PublishResult;
  // モデルが返したチャンクごとの概要
  chunkSummaries?: readonly string[];
  issueUrls?: readonly string[];
  fixPullRequestUrl?: string;
  // 修正PRのCIチェック結果
  checkRuns?: readonly CheckRunInfo[];
}

const FOOTER = ["---", "*Reviewed by reviewloom*"];

// テーブルセル内で表を壊さないように
function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function severityBadge(severity: Severity): string {
  return `${SEVERITY_EMOJI[severity]} ${severity}`;
}

function countBySeverity(comments: readonly ReviewComment[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { info: 0, suggestion: 0, warning: 0, blocking: 0 };
  for (const comment of comments) counts[comment.severity]++;
  return counts;
}

function chunkCoverageLine(outcomes: readonly ChunkOutcome[]): string | null {
  const failed = outcomes.filter((outcome) => outcome.status === "failed").length;
  if (failed === 0) return null;
  return `⚠️ ${failed} of ${outcomes.length} chunk(s) could not be reviewed; findings for those files may be missing.`;
}

const CHECK_ICONS: Record<string, string> = {
  success: "✅",
  failure: "❌",
  neutral: "⚪",
  cancelled: "⛔",
  timed_out: "⏱️",
  in_progress: "🔄",
  queued: "⏳",
};

function followUpLines(input: SummaryCommentInput): string[] {
  const lines: string[] = [];

  const issueUrls = input.issueUrls ?? [];
  if (issueUrls.length > 0) {
    lines.push("### Created Issues", "", ...issueUrls.map((url, index) => `${index + 1}. ${url}`), "");
  }

  if (input.fixPullRequestUrl) {
    lines.push("### Fix PR", "", `A fix PR has been created: ${input.fixPullRequestUrl}`, "");
  }

  const checkRuns = input.checkRuns ?? [];
  if (checkRuns.length > 0) {
    lines.push("### CI Check Results (Fix PR)", "");
    for (const run of checkRuns) {
      const status = run.conclusion ?? run.status;
      lines.push(`- ${CHECK_ICONS[status] ?? "❓"} **${run.name}**: ${status}`);
    }
    lines.push("");
  }

  return lines;
}

function buildNoIssuesComment(input: SummaryCommentInput): string {
  const lines = ["## AI Review: No Issues Found", "", "The AI reviewer did not find any issues in this PR. Looking good!", ""];
  const coverage = chunkCoverageLine(input.chunkOutcomes);
  if (coverage) lines.push(coverage, "");
  lines.push(...FOOTER);
  return lines.join("\n");
}

/**
 * PRに投稿するサマリーコメントを生成
 */
export function buildSummaryComment(input: SummaryCommentInput): string {
  const { comments, chunkOutcomes, publish } = input;
  if (comments.length === 0) {
    return buildNoIssuesComment(input);
  }

  const counts = countBySeverity(comments);
  const breakdown = [...SEVERITIES]
    .reverse()
    .filter((severity) => counts[severity] > 0)
    .map((severity) => `${counts[severity]} ${severity}`)
    .join(", ");

  const lines = ["## AI Review Summary", "", `Found **${comments.length}** issue(s) (${breakdown}).`, ""];

  const summaries = (input.chunkSummaries ?? []).filter((summary) => summary.trim().length > 0);
  if (summaries.length > 0) {
    lines.push("### Overview", "", ...summaries.map((summary) => `- ${escapeCell(summary.trim())}`), "");
  }

  lines.push("### Findings", "", "| Severity | Category | File | Title |", "|----------|----------|------|-------|");
  for (const comment of comments) {
    lines.push(
      `| ${severityBadge(comment.severity)} | ${comment.category} | \`${comment.path}:${comment.line}\` | ${escapeCell(comment.title)} |`
    );
  }
  lines.push("");

  const succeeded = chunkOutcomes.filter((outcome) => outcome.status !== "failed").length;
  lines.push(`Reviewed ${succeeded}/${chunkOutcomes.length} chunk(s).`);
  if (publish) {
    lines.push(`Posted ${publish.posted} inline comment(s), ${publish.failed.length} could not be posted.`);
  }
  lines.push("");

  const coverage = chunkCoverageLine(chunkOutcomes);
  if (coverage) lines.push(coverage, "");

  // インラインで投稿できなかったコメントはここに記載
  if (publish && publish.failed.length > 0) {
    lines.push("### 📌 Comments that could not be posted inline", "");
    for (const failure of publish.failed) {
      lines.push(
        "<details>",
        `<summary><code>${failure.comment.path}</code> (line ${failure.comment.line}, ${failure.reason})</summary>`,
        "",
        failure.comment.body,
        "</details>",
        ""
      );
    }
  }

  lines.push(...followUpLines(input), ...FOOTER);
  return lines.join("\n");
}

/**
 * CLI向けのテキストサマリー
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines = [
    `outcome: ${summary.outcome}${summary.reason ? ` (${summary.reason})` : ""}`,
    `files: ${summary.filesReviewed} reviewed, ${summary.filesSkipped} skipped`,
    `chunks: ${summary.chunksAttempted} attempted, ${summary.chunksSucceeded} succeeded, ${summary.chunksPartial} partial, ${summary.chunksFailed} failed`,
    `findings: ${summary.findingsProduced} produced, ${summary.findingsDropped} dropped`,
    `comments: ${summary.commentsPublished} published, ${summary.commentsFailed} failed`,
    `summary comment: ${summary.summaryPosted ? "posted" : "not posted"}`,
    `issues: ${summary.issuesCreated} created`,
    `fix PR: ${summary.fixPullRequestUrl ?? "none"}`,
    `duration: ${(summary.durationMs / 1000).toFixed(1)}s`,
  ];
  return lines.join("\n");
}
