/**
 * Prompt Builder Tests
 */

import { describe, it, expect } from "vitest";
import {
  REVIEW_SYSTEM_PROMPT,
  buildChunkContext,
  buildModelRequest,
  buildReviewPrompt,
  clampContextLines,
  renderHunk,
  type PromptOptions,
} from "../prompts.js";
import { renderOutputContract } from "../schemas.js";
import type { Hunk } from "../../diff/types.js";
import { addedHunk, chunkOf, fileChange } from "../../__tests__/fixtures.js";

// 10〜14行目が未変更、15行目を置き換え、16行目が未変更
const MIXED_HUNK: Hunk = {
  oldStart: 10,
  oldLines: 7,
  newStart: 10,
  newLines: 7,
  header: "",
  lines: [
    { type: "context", content: "a", oldLineNumber: 10, newLineNumber: 10 },
    { type: "context", content: "b", oldLineNumber: 11, newLineNumber: 11 },
    { type: "context", content: "c", oldLineNumber: 12, newLineNumber: 12 },
    { type: "context", content: "d", oldLineNumber: 13, newLineNumber: 13 },
    { type: "context", content: "e", oldLineNumber: 14, newLineNumber: 14 },
    { type: "removed", content: "old", oldLineNumber: 15 },
    { type: "added", content: "new", newLineNumber: 15 },
    { type: "context", content: "f", oldLineNumber: 16, newLineNumber: 16 },
  ],
};

const OPTIONS: PromptOptions = {
  contextLines: 3,
  temperature: 0.2,
  maxOutputTokens: 4096,
  categories: ["security", "correctness"],
  maxFindingsPerFile: 5,
};

describe("renderHunk", () => {
  it("行番号と記号を付け、離れた未変更行を省略する", () => {
    expect(renderHunk(MIXED_HUNK, 1).split("\n")).toEqual([
      "@@ -10,7 +10,7 @@",
      "        ...",
      "   14   e",
      "      - old",
      "   15 + new",
      "   16   f",
    ]);
  });

  it("contextLines が十分なら全ての行を表示する", () => {
    expect(renderHunk(MIXED_HUNK, 10).split("\n")).toHaveLength(9);
  });
});

describe("clampContextLines", () => {
  it("0〜10 に収める", () => {
    expect(clampContextLines(-2)).toBe(0);
    expect(clampContextLines(4.7)).toBe(4);
    expect(clampContextLines(99)).toBe(10);
    expect(clampContextLines(Number.NaN)).toBe(0);
  });
});

describe("buildReviewPrompt", () => {
  const chunk = chunkOf([fileChange("src/app.py", [MIXED_HUNK])]);

  it("PR情報・レビュー観点・差分・出力形式を含む", () => {
    const prompt = buildReviewPrompt(chunk, { ...OPTIONS, prTitle: "Add widgets", prBody: "" });

    expect(prompt).toContain("## Pull request\n\nTitle: Add widgets\n\n(no description)");
    expect(prompt).toContain("Categories: security, correctness");
    expect(prompt).toContain("Report at most 5 findings per file.");
    expect(prompt).toContain("### src/app.py (modified: +1/-1)\n\nLanguage: python");
    expect(prompt).toContain("   15 + new");
    expect(prompt.endsWith(renderOutputContract())).toBe(true);
  });

  it("PRタイトルがなければPR情報を省略する", () => {
    expect(buildReviewPrompt(chunk, OPTIONS)).not.toContain("## Pull request");
  });

  it("ファイル全体を差分の前に参考情報として含める", () => {
    const prompt = buildReviewPrompt(chunk, { ...OPTIONS, fileContents: new Map([["src/app.py", "a\nb\n"]]) });

    expect(prompt).toContain(
      [
        "## Full file contents",
        "",
        "The complete new version of each changed file, for context only. Comment only on lines shown under Changes.",
        "",
        "### src/app.py",
        "",
        "```",
        "a",
        "b",
        "```",
        "",
        "## Changes",
      ].join("\n")
    );
  });

  it("長いファイルは上限文字数で切り詰める", () => {
    const prompt = buildReviewPrompt(chunk, {
      ...OPTIONS,
      fileContents: new Map([["src/app.py", "abcdefghij"]]),
      maxFileChars: 4,
    });

    expect(prompt).toContain("### src/app.py (first 4 of 10 characters)\n\n```\nabcd\n```");
  });

  it("チャンク外のファイル内容は含めない", () => {
    const prompt = buildReviewPrompt(chunk, { ...OPTIONS, fileContents: new Map([["src/other.py", "x"]]) });

    expect(prompt).not.toContain("## Full file contents");
  });

  it("同じ入力からは同じプロンプトを作る", () => {
    expect(buildReviewPrompt(chunk, OPTIONS)).toBe(buildReviewPrompt(chunk, OPTIONS));
  });
});

describe("buildChunkContext", () => {
  it("他のチャンクのファイルを列挙する", () => {
    const first = chunkOf([fileChange("src/a.ts", [addedHunk(1, ["x"])])], 0, 2);
    const second = chunkOf([fileChange("src/b.ts", [addedHunk(1, ["y", "z"])])], 1, 2);

    const context = buildChunkContext(first, [first, second]);

    expect(context).toContain("This review covers part 1 of 2 of a larger pull request.");
    expect(context).toContain("- src/b.ts (modified: +2/-0)");
    expect(context).not.toContain("src/a.ts");
  });

  it("チャンクが1つなら空", () => {
    const only = chunkOf([fileChange("src/a.ts", [addedHunk(1, ["x"])])]);

    expect(buildChunkContext(only, [only])).toBe("");
  });
});

describe("buildModelRequest", () => {
  it("システムプロンプトとパラメーターを設定する", () => {
    const chunk = chunkOf([fileChange("src/a.ts", [addedHunk(1, ["x"])])]);

    const request = buildModelRequest(chunk, OPTIONS);

    expect(request.chunk).toBe(chunk);
    expect(request.system).toBe(REVIEW_SYSTEM_PROMPT);
    expect(request.parameters).toEqual({ temperature: 0.2, maxOutputTokens: 4096 });
  });
});

describe("renderOutputContract", () => {
  it("必須・任意のフィールドを説明する", () => {
    const contract = renderOutputContract();

    expect(contract).toContain("- `path` (required): file path exactly as shown in the diff header");
    expect(contract).toContain("- `line` (required):");
    expect(contract).toContain("- `suggestion` (optional):");
    expect(contract).toContain('"severity": "warning"');
  });
});
