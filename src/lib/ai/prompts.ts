import { MAX_CONTEXT_LINES, type Category } from "./constants.js";
import { renderOutputContract } from "./schemas.js";
import { detectLanguage } from "../diff/filter.js";
import type { DiffLine, Hunk } from "../diff/types.js";
import type { Chunk, ChunkFile, ModelRequest, ReviewComment } from "../review/types.js";

// ========================================
// システムプロンプト
// ========================================

export const REVIEW_SYSTEM_PROMPT = `You are a senior software engineer reviewing a pull request.

Review only the changed code you are shown. Report concrete problems a maintainer would want fixed before merging:
bugs and incorrect logic, security issues, performance problems, maintainability risks and clear style violations.

Rules:
- Every finding must point at one line number from the left column of the diff. Only added ("+") and unchanged lines carry a number; removed lines cannot be commented on.
- Do not report what the code already does correctly, and do not praise.
- Do not repeat the same point on several lines; report it once at the most relevant line.
- Prefer fewer, well-founded findings over many speculative ones.
- Never invent files or line numbers that are not in the diff.`;

export const FIX_SYSTEM_PROMPT = `You are a senior software engineer applying code review feedback.

Rewrite the given file so that it addresses the listed findings.
Keep every line that the findings do not concern exactly as it is, including formatting and comments.
Do not add features, refactor unrelated code or leave explanatory comments about the change.`;

// ========================================
// オプション
// ========================================

export interface PromptOptions {
  // 変更行の前後に表示する未変更行数（0〜10）
  contextLines: number;
  temperature: number;
  maxOutputTokens: number;
  categories: readonly Category[];
  maxFindingsPerFile: number;
  prTitle?: string;
  prBody?: string;
  // 同じ実行の全チャンク（他チャンクのファイル一覧に使用）
  allChunks?: readonly Chunk[];
  // path → head時点のファイル全体
  fileContents?: ReadonlyMap<string, string>;
  // 1ファイルあたりの上限文字数（超えた分は切り詰める）
  maxFileChars?: number;
}

export function clampContextLines(contextLines: number): number {
  if (!Number.isFinite(contextLines)) return 0;
  return Math.max(0, Math.min(MAX_CONTEXT_LINES, Math.floor(contextLines)));
}

// ========================================
// Diffのレンダリング
// ========================================

const LINE_NUMBER_WIDTH = 5;

function renderLine(line: DiffLine): string {
  if (line.type === "removed") {
    return `${"".padStart(LINE_NUMBER_WIDTH)} - ${line.content}`;
  }
  const marker = line.type === "added" ? "+" : " ";
  return `${String(line.newLineNumber ?? "").padStart(LINE_NUMBER_WIDTH)} ${marker} ${line.content}`;
}

/**
 * Hunkを行番号付きで描画
 * 変更行から contextLines 行以上離れた未変更行は省略する
 */
export function renderHunk(hunk: Hunk, contextLines: number): string {
  const context = clampContextLines(contextLines);
  const changeIndexes: number[] = [];
  hunk.lines.forEach((line, index) => {
    if (line.type !== "context") changeIndexes.push(index);
  });

  const isNearChange = (index: number) =>
    changeIndexes.some((changeIndex) => Math.abs(changeIndex - index) <= context);

  const rendered: string[] = [];
  const header = hunk.header ? ` ${hunk.header}` : "";
  rendered.push(`@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@${header}`);

  let skipped = false;
  hunk.lines.forEach((line, index) => {
    if (line.type === "context" && !isNearChange(index)) {
      skipped = true;
      return;
    }
    if (skipped) {
      rendered.push(`${"".padStart(LINE_NUMBER_WIDTH)}   ...`);
      skipped = false;
    }
    rendered.push(renderLine(line));
  });
  if (skipped) {
    rendered.push(`${"".padStart(LINE_NUMBER_WIDTH)}   ...`);
  }

  return rendered.join("\n");
}

function describeFile(file: ChunkFile): string {
  const { change } = file;
  const kind = change.kind === "renamed" ? `renamed from ${change.oldPath}` : change.kind;
  const part =
    file.hunks.length < change.hunks.length
      ? `, hunks ${file.hunkOffset + 1}-${file.hunkOffset + file.hunks.length} of ${change.hunks.length}`
      : "";
  return `${change.path} (${kind}: +${change.additions}/-${change.deletions}${part})`;
}

export function renderChunkFile(file: ChunkFile, contextLines: number): string {
  return [
    `### ${describeFile(file)}`,
    "",
    `Language: ${detectLanguage(file.change.path)}`,
    "",
    "```diff",
    ...file.hunks.map((hunk) => renderHunk(hunk, contextLines)),
    "```",
  ].join("\n");
}

// ========================================
// チャンクコンテキスト生成
// ========================================

/**
 * チャンク用のコンテキスト情報を生成
 * 他のチャンクで処理されるファイルの情報を含める
 */
export function buildChunkContext(chunk: Chunk, allChunks: readonly Chunk[]): string {
  if (allChunks.length <= 1) {
    return "";
  }

  const otherFiles = allChunks
    .filter((c) => c.id !== chunk.id)
    .flatMap((c) => c.files.map((f) => `- ${describeFile(f)}`));

  return [
    "## Chunk context",
    "",
    `This review covers part ${chunk.index + 1} of ${chunk.totalChunks} of a larger pull request.`,
    "Files reviewed separately in other parts:",
    ...otherFiles,
    "",
    "Do not comment on those files; take them into account only as context.",
  ].join("\n");
}

/**
 * チャンク内のファイル全体を参考情報として描画
 */
function buildFullFileContext(chunk: Chunk, contents: ReadonlyMap<string, string>, maxChars?: number): string {
  const files = chunk.files.flatMap((file) => {
    const content = contents.get(file.change.path);
    if (content === undefined) return [];

    const truncated = maxChars !== undefined && content.length > maxChars;
    const shown = truncated ? content.slice(0, maxChars) : content;
    const fence = shown.includes("```") ? "````" : "```";
    return [
      `### ${file.change.path}${truncated ? ` (first ${maxChars} of ${content.length} characters)` : ""}`,
      "",
      fence,
      shown.replace(/\n$/, ""),
      fence,
      "",
    ];
  });
  if (files.length === 0) return "";

  return [
    "## Full file contents",
    "",
    "The complete new version of each changed file, for context only. Comment only on lines shown under Changes.",
    "",
    ...files,
  ]
    .join("\n")
    .trimEnd();
}

// ========================================
// プロンプト構築
// ========================================

export function buildReviewPrompt(chunk: Chunk, options: PromptOptions): string {
  const sections: string[] = [];

  if (options.prTitle) {
    sections.push(`## Pull request\n\nTitle: ${options.prTitle}\n\n${options.prBody?.trim() || "(no description)"}`);
  }

  sections.push(
    [
      "## Review focus",
      "",
      `Categories: ${options.categories.join(", ")}`,
      `Report at most ${options.maxFindingsPerFile} findings per file.`,
    ].join("\n")
  );

  const chunkContext = options.allChunks ? buildChunkContext(chunk, options.allChunks) : "";
  if (chunkContext) {
    sections.push(chunkContext);
  }

  const fullFiles = options.fileContents
    ? buildFullFileContext(chunk, options.fileContents, options.maxFileChars)
    : "";
  if (fullFiles) {
    sections.push(fullFiles);
  }

  sections.push(
    [
      "## Changes",
      "",
      "Each line shows its new-file line number, a marker (+ added, - removed, blank unchanged) and the code.",
      "",
      ...chunk.files.map((file) => renderChunkFile(file, options.contextLines)),
    ].join("\n")
  );

  sections.push(renderOutputContract());

  return sections.join("\n\n");
}

/**
 * チャンクからモデルリクエストを作成
 */
export function buildModelRequest(chunk: Chunk, options: PromptOptions): ModelRequest {
  return {
    chunk,
    system: REVIEW_SYSTEM_PROMPT,
    prompt: buildReviewPrompt(chunk, options),
    parameters: {
      temperature: options.temperature,
      maxOutputTokens: options.maxOutputTokens,
    },
  };
}

// ========================================
// 修正プロンプト
// ========================================

/**
 * 1ファイル分の指摘をまとめて修正させるプロンプト
 */
export function buildFixPrompt(path: string, content: string, comments: readonly ReviewComment[]): string {
  const fence = content.includes("```") ? "````" : "```";
  const findings = comments.map((comment) => {
    const lines = [`- [${comment.severity}] ${comment.title} (line ${comment.line}): ${comment.description.replace(/\n/g, "\n  ")}`];
    if (comment.suggestion) {
      lines.push(`  Suggested replacement: ${comment.suggestion.replace(/\n/g, "\n  ")}`);
    }
    return lines.join("\n");
  });

  return [
    "## File",
    "",
    `Path: ${path}`,
    "",
    fence,
    content.replace(/\n$/, ""),
    fence,
    "",
    "## Findings to fix",
    "",
    ...findings,
    "",
    "## Output format",
    "",
    'Respond with a single JSON object {"fixed_content": "<the complete fixed file>"} and nothing else.',
  ].join("\n");
}
