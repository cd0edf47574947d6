/**
 * Chunk Processor
 *
 * 大規模PRをトークン上限内のレビュー単位に分割する
 * - ファイル単位で元の順序のまま詰め込む（greedy）
 * - 単独で上限を超えるファイルはhunk境界で分割する
 * - hunkは決して分割しない（単独で上限を超えるhunkは oversized として1チャンクにする）
 */

import type { Diff, FileChange, Hunk } from "../../diff/types.js";
import { reconstructFileHeader, reconstructHunk } from "../../diff/parser.js";
import { estimateTokens, type TokenEstimator } from "../../tokenizer/index.js";
import type { Chunk, ChunkFile } from "../../review/types.js";

// ========================================
// 内部型
// ========================================

interface PendingChunk {
  files: ChunkFile[];
  tokenCount: number;
  oversized: boolean;
}

interface FileEstimate {
  headerTokens: number;
  hunkTokens: number[];
  total: number;
}

function emptyPending(): PendingChunk {
  return { files: [], tokenCount: 0, oversized: false };
}

/**
 * ファイルのトークン数（ヘッダー + 各hunk）を見積もる
 */
function estimateFile(file: FileChange, estimator: TokenEstimator): FileEstimate {
  const headerTokens = estimator(reconstructFileHeader(file));
  const hunkTokens = file.hunks.map((hunk) => estimator(reconstructHunk(hunk)));
  const total = hunkTokens.reduce((sum, t) => sum + t, headerTokens);
  return { headerTokens, hunkTokens, total };
}

// ========================================
// メインチャンキング関数
// ========================================

/**
 * Diffをチャンクに分割（決定的）
 */
export function chunkDiff(
  diff: Diff,
  maxTokensPerChunk: number,
  estimator: TokenEstimator = estimateTokens
): Chunk[] {
  if (!Number.isFinite(maxTokensPerChunk) || maxTokensPerChunk <= 0) {
    throw new RangeError(`maxTokensPerChunk must be a positive number (got ${maxTokensPerChunk})`);
  }

  const groups: PendingChunk[] = [];
  let pending = emptyPending();

  const flush = () => {
    if (pending.files.length > 0) {
      groups.push(pending);
    }
    pending = emptyPending();
  };

  for (const file of diff.files) {
    const estimate = estimateFile(file, estimator);

    // ファイル全体が収まる場合
    if (estimate.total <= maxTokensPerChunk) {
      if (pending.tokenCount + estimate.total > maxTokensPerChunk && pending.files.length > 0) {
        flush();
      }
      pending.files.push({ change: file, hunks: file.hunks, hunkOffset: 0 });
      pending.tokenCount += estimate.total;
      continue;
    }

    // 単一ファイルが最大トークン数を超える場合: 現在のチャンクをフラッシュしてhunk単位で分割
    flush();
    console.warn(
      `[Chunking] Large file ${file.path} (${estimate.total} tokens) exceeds chunk limit, splitting at hunk boundaries`
    );

    let slice: Hunk[] = [];
    let sliceOffset = 0;
    let sliceTokens = estimate.headerTokens;

    const emitSlice = () => {
      if (slice.length === 0) return;
      groups.push({
        files: [{ change: file, hunks: slice, hunkOffset: sliceOffset }],
        tokenCount: sliceTokens,
        oversized: false,
      });
      slice = [];
      sliceTokens = estimate.headerTokens;
    };

    file.hunks.forEach((hunk, index) => {
      const hunkTokens = estimate.hunkTokens[index];

      // 単独で上限を超えるhunk
      if (estimate.headerTokens + hunkTokens > maxTokensPerChunk) {
        emitSlice();
        console.warn(
          `[Chunking] Hunk ${index + 1} of ${file.path} (${hunkTokens} tokens) exceeds chunk limit on its own, accepted as oversized`
        );
        groups.push({
          files: [{ change: file, hunks: [hunk], hunkOffset: index }],
          tokenCount: estimate.headerTokens + hunkTokens,
          oversized: true,
        });
        return;
      }

      if (sliceTokens + hunkTokens > maxTokensPerChunk) {
        emitSlice();
      }
      if (slice.length === 0) {
        sliceOffset = index;
      }
      slice.push(hunk);
      sliceTokens += hunkTokens;
    });

    // 最後の断片は後続ファイルと同じチャンクに入れられるよう保留
    if (slice.length > 0) {
      pending = {
        files: [{ change: file, hunks: slice, hunkOffset: sliceOffset }],
        tokenCount: sliceTokens,
        oversized: false,
      };
    }
  }

  flush();

  const chunks: Chunk[] = groups.map((group, index) => ({
    id: `chunk-${index}`,
    index,
    totalChunks: groups.length,
    files: group.files,
    tokenCount: group.tokenCount,
    oversized: group.oversized,
  }));

  if (chunks.length > 0) {
    console.log(`[Chunking] ${formatChunkingSummary(chunks)}`);
  }

  return chunks;
}

// ========================================
// ユーティリティ
// ========================================

/**
 * チャンク内のファイルパス一覧
 */
export function getChunkPaths(chunk: Chunk): string[] {
  return chunk.files.map((file) => file.change.path);
}

/**
 * チャンキング結果のサマリーを生成
 */
export function formatChunkingSummary(chunks: readonly Chunk[]): string {
  if (chunks.length === 0) {
    return "Chunking: nothing to review";
  }

  const tokenCounts = chunks.map((c) => c.tokenCount);
  const avgTokens = tokenCounts.reduce((a, b) => a + b, 0) / chunks.length;
  const files = new Set(chunks.flatMap(getChunkPaths)).size;
  const oversized = chunks.filter((c) => c.oversized).length;

  return (
    `Chunking: ${chunks.length} chunks, ${files} files, ` +
    `avg ${Math.round(avgTokens)} tokens/chunk (max: ${Math.max(...tokenCounts)})` +
    (oversized > 0 ? `, ${oversized} oversized` : "")
  );
}
