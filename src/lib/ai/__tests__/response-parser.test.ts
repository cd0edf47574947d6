/**
 * Response Parser Tests
 *
 * - 例外を投げない
 * - パース不能な出力は指摘0件・警告1件
 * - コメントできない行への指摘は unanchored として落とす
 */

import { describe, it, expect } from "vitest";
import { parseModelResponse } from "../response-parser.js";
import { generateFingerprint } from "../fingerprint.js";
import { ProviderError } from "../../errors/errors.js";
import type { ModelResponse } from "../../review/types.js";
import { addedHunk, chunkOf, fileChange } from "../../__tests__/fixtures.js";

// src/a.py の 40〜44 行目が追加行
const chunk = chunkOf([fileChange("src/a.py", [addedHunk(40, ["a", "b", "c", "d", "e"])])]);

function ok(text: string): ModelResponse {
  return { chunkId: chunk.id, ok: true, text, attempts: 1 };
}

function json(value: unknown): string {
  return JSON.stringify(value);
}

describe("parseModelResponse", () => {
  it("コードブロック内のJSONから指摘を作る", () => {
    const text = [
      "Here is my review:",
      "```json",
      json({
        summary: "Adds a parser",
        findings: [
          { path: "b/src/a.py", line: 41, severity: "HIGH", category: "bug", body: "File handle is never closed" },
        ],
      }),
      "```",
    ].join("\n");

    const result = parseModelResponse(ok(text), chunk);

    expect(result.warnings).toEqual([]);
    expect(result.summary).toBe("Adds a parser");
    expect(result.findings).toEqual([
      {
        path: "src/a.py",
        line: 41,
        severity: "blocking",
        category: "correctness",
        title: "File handle is never closed",
        body: "File handle is never closed",
        suggestion: undefined,
        chunkId: "chunk-0",
        fingerprint: generateFingerprint("src/a.py", 41, "File handle is never closed"),
      },
    ]);
  });

  it("指摘だけの配列も受け付ける", () => {
    const text = json([{ path: "src/a.py", line: 40, severity: "warning", category: "style", title: "Naming", body: "Use snake_case" }]);

    const result = parseModelResponse(ok(text), chunk);

    expect(result.findings.map((f) => [f.line, f.severity, f.category, f.title])).toEqual([[40, "warning", "style", "Naming"]]);
    expect(result.summary).toBeUndefined();
  });

  it("パース不能な出力は指摘0件・警告1件", () => {
    const result = parseModelResponse(ok("I could not review this change."), chunk);

    expect(result.findings).toEqual([]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatchObject({ chunkId: "chunk-0", reason: "unparseable" });
  });

  it("不正な指摘だけを落とし、他は残す", () => {
    const text = json({
      findings: [
        { path: "src/a.py", line: 42 },
        { path: "src/a.py", line: 43, body: "Off-by-one in loop bound" },
      ],
    });

    const result = parseModelResponse(ok(text), chunk);

    expect(result.findings.map((f) => f.line)).toEqual([43]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatchObject({ reason: "invalid_finding", path: "src/a.py", line: 42 });
    expect(result.warnings[0].message).toMatch(/^finding #1 is invalid \(body: /);
  });

  it("コメントできない行・チャンク外のファイルは unanchored", () => {
    const text = json({
      findings: [
        { path: "src/a.py", line: 10, body: "Unused import" },
        { path: "src/other.py", line: 41, body: "Unused import" },
      ],
    });

    const result = parseModelResponse(ok(text), chunk);

    expect(result.findings).toEqual([]);
    expect(result.warnings.map((w) => [w.reason, w.message])).toEqual([
      ["unanchored", "line 10 is not a commentable line of src/a.py in this chunk"],
      ["unanchored", "src/other.py is not part of this chunk"],
    ]);
  });

  it("途中で切れた応答から完全な指摘を救出する", () => {
    const text =
      '{"findings": [{"path": "src/a.py", "line": 41, "body": "Unclosed file handle"}, {"path": "src/a.py", "li';

    const result = parseModelResponse(ok(text), chunk);

    expect(result.findings.map((f) => f.body)).toEqual(["Unclosed file handle"]);
    expect(result.warnings).toEqual([]);
  });

  it("前置きの文章に角括弧があってもJSONオブジェクトを読む", () => {
    const text = `Review of [src/a.py]:\n${json({ findings: [{ path: "src/a.py", line: 42, body: "Shadowed variable" }] })}`;

    const result = parseModelResponse(ok(text), chunk);

    expect(result.warnings).toEqual([]);
    expect(result.findings.map((f) => [f.path, f.line])).toEqual([["src/a.py", 42]]);
  });

  it("b/ で始まる実在のパスはそのまま使う", () => {
    const nested = chunkOf([fileChange("b/index.ts", [addedHunk(1, ["export {};"])])]);
    const text = json({ findings: [{ path: "b/index.ts", line: 1, body: "Empty module" }] });

    const result = parseModelResponse({ chunkId: nested.id, ok: true, text, attempts: 1 }, nested);

    expect(result.warnings).toEqual([]);
    expect(result.findings.map((f) => f.path)).toEqual(["b/index.ts"]);
  });

  it("空白だけの suggestion は捨てる", () => {
    const text = json({ findings: [{ path: "src/a.py", line: 44, body: "Magic number", suggestion: "   " }] });

    expect(parseModelResponse(ok(text), chunk).findings[0].suggestion).toBeUndefined();
  });

  it("失敗レスポンスは指摘・警告ともに0件", () => {
    const response: ModelResponse = {
      chunkId: chunk.id,
      ok: false,
      error: new ProviderError("permanent", "bad request"),
      attempts: 1,
    };

    expect(parseModelResponse(response, chunk)).toEqual({ findings: [], warnings: [] });
  });

  it.each(["", "null", "{}", "[1, 2]", '{"findings": 5}', "```json\n```", "{{{{"])(
    "どんな出力でも例外を投げない: %j",
    (text) => {
      expect(() => parseModelResponse(ok(text), chunk)).not.toThrow();
      expect(parseModelResponse(ok(text), chunk).findings).toEqual([]);
    }
  );
});
