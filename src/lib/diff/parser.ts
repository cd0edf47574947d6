import type { Diff, DiffLine, FileChange, FileChangeKind, Hunk } from "./types.js";

// pr-agentの正規表現パターンを参考にしたDiffパーサー
// https://github.com/qodo-ai/pr-agent/blob/main/pr_agent/algo/git_patch_processing.py

// Hunkヘッダー: @@ -start,size +start,size @@ optional context
const HUNK_HEADER_REGEX = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@(.*)?$/;

// Diffヘッダー: diff --git a/path b/path
const DIFF_HEADER_REGEX = /^diff --git a\/(.*) b\/(.*)$/;

// ファイルモード: new file mode / deleted file mode
const NEW_FILE_REGEX = /^new file mode \d+$/;
const DELETED_FILE_REGEX = /^deleted file mode \d+$/;
const RENAME_FROM_REGEX = /^rename from (.*)$/;
const RENAME_TO_REGEX = /^rename to (.*)$/;

// Binary file
const BINARY_FILE_REGEX = /^Binary files .* differ$/;

interface HunkBuilder {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  header: string;
  lines: DiffLine[];
  // まだ読み込んでいない行数（ヘッダーの件数に到達したらhunk終了）
  oldRemaining: number;
  newRemaining: number;
  nextOld: number;
  nextNew: number;
}

interface FileBuilder {
  path: string;
  oldPath: string;
  kind: FileChangeKind;
  hunks: Hunk[];
  additions: number;
  deletions: number;
  binary: boolean;
}

/**
 * Hunkヘッダーをパース
 */
export function parseHunkHeader(line: string): {
  oldStart: number;
  oldSize: number;
  newStart: number;
  newSize: number;
  sectionHeader: string;
} | null {
  const match = HUNK_HEADER_REGEX.exec(line);
  if (!match) return null;

  return {
    oldStart: parseInt(match[1], 10),
    oldSize: match[2] !== undefined ? parseInt(match[2], 10) : 1,
    newStart: parseInt(match[3], 10),
    newSize: match[4] !== undefined ? parseInt(match[4], 10) : 1,
    sectionHeader: match[5]?.trim() || "",
  };
}

function finishHunk(hunk: HunkBuilder): Hunk {
  return {
    oldStart: hunk.oldStart,
    oldLines: hunk.oldLines,
    newStart: hunk.newStart,
    newLines: hunk.newLines,
    header: hunk.header,
    lines: hunk.lines,
  };
}

function finishFile(file: FileBuilder): FileChange {
  return { ...file };
}

/**
 * 生のDiffテキスト（unified diff）をパースして構造化
 */
export function parseDiff(rawDiff: string, headSha?: string): Diff {
  const lines = rawDiff.split("\n");
  const files: FileChange[] = [];

  let currentFile: FileBuilder | null = null;
  let currentHunk: HunkBuilder | null = null;
  let renameFrom = "";

  const flushHunk = () => {
    if (currentHunk && currentFile) {
      currentFile.hunks.push(finishHunk(currentHunk));
    }
    currentHunk = null;
  };

  const flushFile = () => {
    flushHunk();
    if (currentFile) {
      files.push(finishFile(currentFile));
    }
    currentFile = null;
  };

  for (const line of lines) {
    // hunk本体の行（ヘッダーの件数分だけ読む）
    if (currentHunk && currentFile) {
      const hunk: HunkBuilder = currentHunk;
      const file: FileBuilder = currentFile;
      if (hunk.oldRemaining > 0 || hunk.newRemaining > 0) {
        if (line.startsWith("+")) {
          hunk.lines.push({
            type: "added",
            content: line.substring(1),
            newLineNumber: hunk.nextNew++,
          });
          hunk.newRemaining--;
          file.additions++;
          continue;
        }
        if (line.startsWith("-")) {
          hunk.lines.push({
            type: "removed",
            content: line.substring(1),
            oldLineNumber: hunk.nextOld++,
          });
          hunk.oldRemaining--;
          file.deletions++;
          continue;
        }
        if (line.startsWith(" ") || line === "") {
          // コンテキスト行（変更なし）
          hunk.lines.push({
            type: "context",
            content: line.substring(1),
            oldLineNumber: hunk.nextOld++,
            newLineNumber: hunk.nextNew++,
          });
          hunk.oldRemaining--;
          hunk.newRemaining--;
          continue;
        }
      }
      // "\ No newline at end of file" はどの行にも属さない
      if (line.startsWith("\\")) {
        continue;
      }
    }

    // Diffヘッダー: diff --git a/path b/path
    const diffMatch = DIFF_HEADER_REGEX.exec(line);
    if (diffMatch) {
      flushFile();
      currentFile = {
        path: diffMatch[2],
        oldPath: diffMatch[1],
        kind: "modified",
        hunks: [],
        additions: 0,
        deletions: 0,
        binary: false,
      };
      renameFrom = "";
      continue;
    }

    if (!currentFile) {
      continue;
    }
    const file: FileBuilder = currentFile;

    // Hunkヘッダー: @@ -start,size +start,size @@
    const hunkHeader = parseHunkHeader(line);
    if (hunkHeader) {
      flushHunk();
      currentHunk = {
        oldStart: hunkHeader.oldStart,
        oldLines: hunkHeader.oldSize,
        newStart: hunkHeader.newStart,
        newLines: hunkHeader.newSize,
        header: hunkHeader.sectionHeader,
        lines: [],
        oldRemaining: hunkHeader.oldSize,
        newRemaining: hunkHeader.newSize,
        nextOld: hunkHeader.oldStart,
        nextNew: hunkHeader.newStart,
      };
      continue;
    }

    // ファイルモードの検出
    if (NEW_FILE_REGEX.test(line)) {
      file.kind = "added";
      continue;
    }
    if (DELETED_FILE_REGEX.test(line)) {
      file.kind = "deleted";
      continue;
    }
    const renameFromMatch = RENAME_FROM_REGEX.exec(line);
    if (renameFromMatch) {
      renameFrom = renameFromMatch[1];
      continue;
    }
    const renameToMatch = RENAME_TO_REGEX.exec(line);
    if (renameToMatch) {
      file.kind = "renamed";
      file.oldPath = renameFrom || file.oldPath;
      file.path = renameToMatch[1];
      continue;
    }

    if (BINARY_FILE_REGEX.test(line)) {
      file.binary = true;
      continue;
    }
    // --- / +++ / index 行などは無視
  }

  flushFile();

  return { headSha, files };
}

/**
 * Hunkを unified diff 形式の文字列に戻す
 */
export function reconstructHunk(hunk: Hunk): string {
  const lines: string[] = [];
  const header = hunk.header ? ` ${hunk.header}` : "";
  lines.push(
    `@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@${header}`
  );
  for (const line of hunk.lines) {
    const prefix =
      line.type === "added" ? "+" : line.type === "removed" ? "-" : " ";
    lines.push(`${prefix}${line.content}`);
  }
  return lines.join("\n");
}

/**
 * ファイルヘッダー部分（diff --git ～ +++）を生成
 */
export function reconstructFileHeader(file: FileChange): string {
  const lines: string[] = [];

  lines.push(`diff --git a/${file.oldPath} b/${file.path}`);

  if (file.kind === "added") {
    lines.push(`new file mode 100644`);
  } else if (file.kind === "deleted") {
    lines.push(`deleted file mode 100644`);
  } else if (file.kind === "renamed") {
    lines.push(`rename from ${file.oldPath}`);
    lines.push(`rename to ${file.path}`);
  }

  lines.push(`--- ${file.kind === "added" ? "/dev/null" : `a/${file.oldPath}`}`);
  lines.push(`+++ ${file.kind === "deleted" ? "/dev/null" : `b/${file.path}`}`);

  return lines.join("\n");
}

/**
 * FileChangeからDiff文字列を再構築
 */
export function reconstructDiff(file: FileChange, hunks: readonly Hunk[] = file.hunks): string {
  return [reconstructFileHeader(file), ...hunks.map(reconstructHunk)].join("\n");
}
