/**
 * Chunk Processor Tests
 *
 * - hunkを分割しない
 * - 全ての行がちょうど1回ずつ現れる
 * - 同じ入力から同じ結果
 */

import { describe, it, expect } from "vitest";
import { chunkDiff, formatChunkingSummary, getChunkPaths } from "../chunking/index.js";
import type { Diff, Hunk } from "../../diff/types.js";
import type { Chunk } from "../../review/types.js";
import { addedHunk, fileChange } from "../../__tests__/fixtures.js";

// 1行 = 1トークン（ファイルヘッダー3行、hunkは @@ 行 + 本文行）
const lineEstimator = (text: string) => text.split("\n").length;

function lines(count: number, prefix: string): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`);
}

function smallFile(path: string): ReturnType<typeof fileChange> {
  // 3 + (1 + 2) = 6 トークン
  return fileChange(path, [addedHunk(1, lines(2, path))]);
}

function bigFile(path: string): ReturnType<typeof fileChange> {
  // 3 + 5 + 5 + 5 = 18 トークン
  return fileChange(path, [addedHunk(1, lines(4, "a")), addedHunk(10, lines(4, "b")), addedHunk(20, lines(4, "c"))]);
}

function hunkKeys(chunks: readonly Chunk[]): string[] {
  return chunks.flatMap((chunk) =>
    chunk.files.flatMap((file) => file.hunks.map((hunk: Hunk) => `${file.change.path}@${hunk.newStart}`))
  );
}

describe("chunkDiff", () => {
  it("ファイルを順序通りに上限まで詰め込む", () => {
    const diff: Diff = { files: [smallFile("a.ts"), smallFile("b.ts"), smallFile("c.ts")] };

    const chunks = chunkDiff(diff, 12, lineEstimator);

    expect(chunks.map(getChunkPaths)).toEqual([["a.ts", "b.ts"], ["c.ts"]]);
    expect(chunks.map((chunk) => chunk.id)).toEqual(["chunk-0", "chunk-1"]);
    expect(chunks.map((chunk) => chunk.tokenCount)).toEqual([12, 6]);
    expect(chunks.every((chunk) => chunk.totalChunks === 2)).toBe(true);
  });

  it("大きなファイルはhunk境界で分割する", () => {
    const diff: Diff = { files: [bigFile("big.ts"), smallFile("x.ts")] };

    const chunks = chunkDiff(diff, 10, lineEstimator);

    expect(chunks).toHaveLength(4);
    expect(chunks.slice(0, 3).map((chunk) => chunk.files[0].hunkOffset)).toEqual([0, 1, 2]);
    expect(chunks.slice(0, 3).map((chunk) => chunk.tokenCount)).toEqual([8, 8, 8]);
    expect(getChunkPaths(chunks[3])).toEqual(["x.ts"]);
    expect(chunks.some((chunk) => chunk.oversized)).toBe(false);
  });

  it("分割したファイルの最後の断片は後続ファイルと同じチャンクに入る", () => {
    const diff: Diff = { files: [bigFile("big.ts"), smallFile("x.ts")] };

    const chunks = chunkDiff(diff, 14, lineEstimator);

    // [a, b] = 13, [c] = 8 → x (6) を足して 14
    expect(chunks.map(getChunkPaths)).toEqual([["big.ts"], ["big.ts", "x.ts"]]);
    expect(chunks[1].tokenCount).toBe(14);
  });

  it("単独で上限を超えるhunkは oversized として1チャンクにする", () => {
    const diff: Diff = { files: [fileChange("huge.ts", [addedHunk(1, lines(20, "h"))])] };

    const chunks = chunkDiff(diff, 10, lineEstimator);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].oversized).toBe(true);
    expect(chunks[0].tokenCount).toBe(24);
    expect(chunks[0].files[0].hunks[0].lines).toHaveLength(20);
  });

  it("全てのhunkがちょうど1回ずつ、分割されずに現れる", () => {
    const diff: Diff = {
      files: [smallFile("a.ts"), bigFile("big.ts"), fileChange("huge.ts", [addedHunk(1, lines(20, "h"))]), smallFile("z.ts")],
    };
    const expected = diff.files.flatMap((file) => file.hunks.map((hunk) => `${file.path}@${hunk.newStart}`));

    for (const limit of [7, 10, 14, 40, 1000]) {
      const chunks = chunkDiff(diff, limit, lineEstimator);
      expect(hunkKeys(chunks)).toEqual(expected);

      const totalLines = chunks.flatMap((chunk) => chunk.files.flatMap((file) => file.hunks.flatMap((hunk) => hunk.lines)));
      expect(totalLines).toHaveLength(2 + 12 + 20 + 2);
    }
  });

  it("同じ入力からは同じチャンクを作る", () => {
    const diff: Diff = { files: [smallFile("a.ts"), bigFile("big.ts"), smallFile("z.ts")] };

    expect(chunkDiff(diff, 10, lineEstimator)).toEqual(chunkDiff(diff, 10, lineEstimator));
  });

  it("空のDiffはチャンク0件", () => {
    expect(chunkDiff({ files: [] }, 100)).toEqual([]);
  });

  it("上限が正でなければ RangeError", () => {
    expect(() => chunkDiff({ files: [] }, 0)).toThrow(RangeError);
  });
});

describe("formatChunkingSummary", () => {
  it("チャンク数・ファイル数・トークン数を要約する", () => {
    const chunks = chunkDiff({ files: [smallFile("a.ts"), smallFile("b.ts"), smallFile("c.ts")] }, 12, lineEstimator);

    expect(formatChunkingSummary(chunks)).toBe("Chunking: 2 chunks, 3 files, avg 9 tokens/chunk (max: 12)");
    expect(formatChunkingSummary([])).toBe("Chunking: nothing to review");
  });
});
