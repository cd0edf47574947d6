// Diff 型定義
// ホストAPIの形に依存しない、PRの変更行のイミュータブルな表現

export interface PullRequestRef {
  owner: string;
  repo: string;
  number: number;
}

export type FileChangeKind = "added" | "modified" | "deleted" | "renamed";

export type DiffLineType = "context" | "added" | "removed";

export interface DiffLine {
  type: DiffLineType;
  content: string;
  oldLineNumber?: number; // 元ファイルの行番号（context/removedで使用）
  newLineNumber?: number; // 新ファイルの行番号（context/addedで使用）
}

export interface Hunk {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  // @@ 行の後ろに付くセクション見出し（関数名など）
  header: string;
  lines: readonly DiffLine[];
}

export interface FileChange {
  path: string;
  // rename の場合のみ path と異なる
  oldPath: string;
  kind: FileChangeKind;
  hunks: readonly Hunk[];
  additions: number;
  deletions: number;
  binary: boolean;
}

export interface Diff {
  // 取得時点のヘッドコミット（公開時の古いアンカー検出に使用）
  headSha?: string;
  files: readonly FileChange[];
}

// Hunk範囲情報（検証用）
export interface HunkRange {
  oldStart: number;
  oldEnd: number;
  newStart: number;
  newEnd: number;
}
