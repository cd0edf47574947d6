import { minimatch } from "minimatch";
import type { Diff, FileChange } from "./types.js";

// レビュー対象から除外するファイルパターン（単一の正規表現に統合）
const EXCLUDED_PATTERN = new RegExp(
  [
    "(^|/)package-lock\\.json$",
    "(^|/)yarn\\.lock$",
    "(^|/)pnpm-lock\\.yaml$",
    "(^|/)bun\\.lockb$",
    "(^|/)poetry\\.lock$",
    "(^|/)Cargo\\.lock$",
    "(^|/)go\\.sum$",
    "^\\.next/",
    "^dist/",
    "^build/",
    "^out/",
    "(^|/)node_modules/",
    "^\\.git/",
    "\\.min\\.(js|css)$",
    "\\.map$",
    "^vendor/",
    "(^|/)\\.DS_Store$",
    "\\.pyc$",
    "(^|/)__pycache__/",
    "\\.class$",
  ].join("|")
);

// 言語マッピング（コードブロックの言語指定に使用）
const LANGUAGE_MAP: Record<string, string> = {
  ".ts": "typescript",
  ".tsx": "typescript",
  ".js": "javascript",
  ".jsx": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",
  ".py": "python",
  ".go": "go",
  ".rs": "rust",
  ".rb": "ruby",
  ".java": "java",
  ".kt": "kotlin",
  ".swift": "swift",
  ".c": "c",
  ".cpp": "cpp",
  ".h": "c",
  ".cs": "csharp",
  ".php": "php",
  ".css": "css",
  ".html": "html",
  ".vue": "vue",
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".md": "markdown",
  ".sql": "sql",
  ".sh": "bash",
};

export type SkipReason = "deleted" | "binary" | "generated" | "excluded";

export interface SkippedFile {
  path: string;
  reason: SkipReason;
}

export interface FilterResult {
  diff: Diff;
  skipped: SkippedFile[];
}

/**
 * ユーザー指定の除外パターン（minimatch glob）に一致するか
 * "*.lock" のようにスラッシュを含まないパターンはファイル名にも照合する
 */
export function isExcluded(filePath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) =>
    minimatch(filePath, pattern, { dot: true, matchBase: !pattern.includes("/") })
  );
}

/**
 * ファイルがレビュー対象外である理由を返す（対象なら null）
 */
export function getSkipReason(file: FileChange, excludePatterns: readonly string[] = []): SkipReason | null {
  if (file.kind === "deleted") return "deleted";
  if (file.binary || file.hunks.length === 0) return "binary";
  if (EXCLUDED_PATTERN.test(file.path)) return "generated";
  if (isExcluded(file.path, excludePatterns)) return "excluded";
  return null;
}

/**
 * レビュー対象のファイルのみを残したDiffを返す
 */
export function filterReviewableFiles(diff: Diff, excludePatterns: readonly string[] = []): FilterResult {
  const files: FileChange[] = [];
  const skipped: SkippedFile[] = [];

  for (const file of diff.files) {
    const reason = getSkipReason(file, excludePatterns);
    if (reason) {
      skipped.push({ path: file.path, reason });
    } else {
      files.push(file);
    }
  }

  if (skipped.length > 0) {
    console.log(
      `[Filter] Reviewing ${files.length}/${diff.files.length} files (skipped: ${skipped
        .map((s) => `${s.path} (${s.reason})`)
        .join(", ")})`
    );
  }

  return { diff: { headSha: diff.headSha, files }, skipped };
}

/**
 * ファイルの言語を推定
 */
export function detectLanguage(filePath: string): string {
  const ext = filePath.substring(filePath.lastIndexOf(".")).toLowerCase();
  return LANGUAGE_MAP[ext] || "plaintext";
}
