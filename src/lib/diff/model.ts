import { MalformedDiffError } from "../errors/errors.js";
import type { Diff, FileChange, Hunk, HunkRange } from "./types.js";

// ========================================
// 構築と検証
// ========================================

function freezeFile(file: FileChange): FileChange {
  return Object.freeze({
    ...file,
    hunks: Object.freeze(
      file.hunks.map((hunk) =>
        Object.freeze({
          ...hunk,
          lines: Object.freeze(hunk.lines.map((line) => Object.freeze({ ...line }))),
        })
      )
    ),
  });
}

/**
 * 検証済みのイミュータブルなDiffを作成
 */
export function createDiff(files: readonly FileChange[], headSha?: string): Diff {
  const diff: Diff = { headSha, files };
  validateDiff(diff);
  return Object.freeze({ headSha, files: Object.freeze(files.map(freezeFile)) });
}

/**
 * Hunkの新ファイル側の範囲を取得
 */
export function getHunkRange(hunk: Hunk): HunkRange {
  return {
    oldStart: hunk.oldStart,
    oldEnd: hunk.oldStart + Math.max(hunk.oldLines, 1) - 1,
    newStart: hunk.newStart,
    newEnd: hunk.newStart + Math.max(hunk.newLines, 1) - 1,
  };
}

/**
 * Diffの構造を検証
 * - ファイルパスが一意
 * - hunkが順序通りで重ならない
 * - hunk内の新ファイル行番号が狭義単調増加
 */
export function validateDiff(diff: Diff): void {
  const seen = new Set<string>();

  for (const file of diff.files) {
    if (seen.has(file.path)) {
      throw new MalformedDiffError("duplicate file path", file.path);
    }
    seen.add(file.path);

    let previousEnd = 0;
    file.hunks.forEach((hunk, index) => {
      // 新規作成/削除ファイルは片側が 0,0 になるため、新ファイル側が空のhunkは順序チェックから除外
      if (hunk.newLines > 0) {
        const range = getHunkRange(hunk);
        if (range.newStart <= previousEnd) {
          throw new MalformedDiffError(
            `hunk ${index + 1} (+${hunk.newStart},${hunk.newLines}) overlaps or precedes the previous hunk`,
            file.path
          );
        }
        previousEnd = range.newEnd;
      }

      let previousLine = 0;
      for (const line of hunk.lines) {
        if (line.newLineNumber === undefined) continue;
        if (line.newLineNumber <= previousLine) {
          throw new MalformedDiffError(
            `line numbers are not increasing in hunk ${index + 1} (${previousLine} -> ${line.newLineNumber})`,
            file.path
          );
        }
        previousLine = line.newLineNumber;
      }
    });
  }
}

// ========================================
// 走査
// ========================================

export function* iterateFiles(diff: Diff): Generator<FileChange> {
  yield* diff.files;
}

export function* iterateHunks(file: FileChange): Generator<Hunk> {
  yield* file.hunks;
}

/**
 * パスからファイルを取得
 */
export function getFileByPath(diff: Diff, path: string): FileChange | undefined {
  return diff.files.find((file) => file.path === path);
}

/**
 * 新ファイル側の行番号が属するHunkを探す
 */
export function findHunkForLine(hunks: readonly Hunk[], line: number): Hunk | undefined {
  return hunks.find((hunk) =>
    hunk.lines.some((diffLine) => diffLine.newLineNumber === line)
  );
}

/**
 * コメント可能な行番号（追加行とコンテキスト行）
 * 削除行は newLineNumber を持たないのでコメント不可
 */
export function getAddressableLines(hunks: readonly Hunk[]): Set<number> {
  const lines = new Set<number>();
  for (const hunk of hunks) {
    for (const line of hunk.lines) {
      if (line.newLineNumber !== undefined && line.type !== "removed") {
        lines.add(line.newLineNumber);
      }
    }
  }
  return lines;
}

/**
 * 新ファイル側の行内容（古いアンカー検出で使用）
 */
export function getLineContent(hunks: readonly Hunk[], line: number): string | undefined {
  for (const hunk of hunks) {
    for (const diffLine of hunk.lines) {
      if (diffLine.newLineNumber === line) return diffLine.content;
    }
  }
  return undefined;
}

/**
 * Diff全体の統計
 */
export function getDiffStats(diff: Diff): { files: number; hunks: number; additions: number; deletions: number } {
  let hunks = 0;
  let additions = 0;
  let deletions = 0;
  for (const file of diff.files) {
    hunks += file.hunks.length;
    additions += file.additions;
    deletions += file.deletions;
  }
  return { files: diff.files.length, hunks, additions, deletions };
}
