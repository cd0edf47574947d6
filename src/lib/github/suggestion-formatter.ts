/**
 * GitHub Comment Formatter
 * 指摘をGitHubのレビューコメント本文（ワンクリック適用可能な提案を含む）に変換
 */

import { SEVERITY_EMOJI, type Category, type Severity } from "../ai/constants.js";

/**
 * GitHubのsuggestion block形式でコード提案をフォーマット
 * https://docs.github.com/en/get-started/writing-on-github/working-with-advanced-formatting/creating-and-highlighting-code-blocks
 */
export function formatSuggestionBlock(suggestion: string): string {
  // ネストされたバッククォートの処理
  const fence = suggestion.includes("```") ? "````" : "```";
  return `${fence}suggestion\n${suggestion}\n${fence}`;
}

/**
 * 提案が有効かどうかチェック
 * 空文字列や空白のみの提案は無効
 */
export function isValidSuggestion(suggestion: string | undefined): suggestion is string {
  return suggestion !== undefined && suggestion.trim().length > 0;
}

export interface CommentBodyParams {
  severity: Severity;
  category: Category;
  title: string;
  // 近似重複をまとめた場合は複数の指摘本文
  points: readonly string[];
  suggestion?: string;
}

/**
 * レビューコメント本文を生成
 */
export function formatCommentBody(params: CommentBodyParams): string {
  const { severity, category, title, points, suggestion } = params;
  const heading = `${SEVERITY_EMOJI[severity]} **[${severity}]** ${title} _(${category})_`.trimEnd();

  const body =
    points.length === 1 ? points[0] : points.map((point) => `- ${point.replace(/\n/g, "\n  ")}`).join("\n");

  let comment = `${heading}\n\n${body}`;

  if (isValidSuggestion(suggestion)) {
    comment += `\n\n${formatSuggestionBlock(suggestion)}`;
  }

  return comment;
}
