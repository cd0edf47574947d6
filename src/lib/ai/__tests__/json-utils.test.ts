/**
 * JSON Utils Tests
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  escapeControlCharsInStrings,
  extractJsonCandidates,
  fixBadEscapeSequences,
  parseAndValidateJson,
  repairTruncatedJson,
} from "../json-utils.js";

describe("extractJsonCandidates", () => {
  it("```json コードブロックの中身を取り出す", () => {
    expect(extractJsonCandidates('Result:\n```json\n{"a": 1}\n```\nThanks')).toEqual(['{"a": 1}']);
  });

  it("閉じていないコードブロックも取り出す", () => {
    expect(extractJsonCandidates('```json\n{"a": [1')).toEqual(['{"a": [1']);
  });

  it("前後の文章からオブジェクトを取り出す", () => {
    expect(extractJsonCandidates('Sure! {"a": 1} Hope this helps')).toEqual(['{"a": 1}']);
  });

  it("配列とオブジェクトを出現順に返す", () => {
    expect(extractJsonCandidates('[{"a": 1}]')).toEqual(['[{"a": 1}]', '{"a": 1}']);
    expect(extractJsonCandidates('Review of [src/a.ts]:\n{"a": 1}')).toEqual([
      '[src/a.ts]',
      '{"a": 1}',
    ]);
  });

  it("括弧がなければ全体を返す", () => {
    expect(extractJsonCandidates("  no json here ")).toEqual(["no json here"]);
  });
});

describe("fixBadEscapeSequences", () => {
  it("無効なエスケープのバックスラッシュを二重にする", () => {
    expect(fixBadEscapeSequences('"C:\\x"')).toBe('"C:\\\\x"');
  });

  it("有効なエスケープはそのまま", () => {
    expect(fixBadEscapeSequences('"a\\nb\\u0041"')).toBe('"a\\nb\\u0041"');
  });
});

describe("escapeControlCharsInStrings", () => {
  it("文字列内の生の改行とタブをエスケープする", () => {
    expect(escapeControlCharsInStrings('{"a": "x\ny\tz"}')).toBe('{"a": "x\\ny\\tz"}');
  });

  it("文字列外の改行は残す", () => {
    expect(escapeControlCharsInStrings('{\n"a": 1\n}')).toBe('{\n"a": 1\n}');
  });
});

describe("repairTruncatedJson", () => {
  it("開いている括弧を閉じる", () => {
    expect(repairTruncatedJson('{"a": [1, 2')).toBe('{"a": [1, 2]}');
  });

  it("値のないキーを落とす", () => {
    expect(repairTruncatedJson('{"a": 1, "b":')).toBe('{"a": 1}');
  });

  it("閉じていない文字列を閉じる", () => {
    expect(JSON.parse(repairTruncatedJson('{"a": "hel'))).toEqual({ a: "hel" });
  });
});

describe("parseAndValidateJson", () => {
  const schema = z.object({ a: z.number() });

  it("スキーマに合うJSONはそのまま返す", () => {
    expect(parseAndValidateJson('```json\n{"a": 1}\n```', schema)).toEqual({
      success: true,
      data: { a: 1 },
      repaired: false,
    });
  });

  it("途中で切れたJSONを修復して返す", () => {
    const result = parseAndValidateJson('{"a": 1, "b": [2', z.object({ a: z.number(), b: z.array(z.number()) }));

    expect(result).toEqual({ success: true, data: { a: 1, b: [2] }, repaired: true });
  });

  it("スキーマに合わなければ失敗", () => {
    const result = parseAndValidateJson('{"a": "x"}', schema);

    expect(result.success).toBe(false);
  });

  it("前置きの文章に角括弧があってもオブジェクトを使う", () => {
    const result = parseAndValidateJson('Review of [src/a.ts]:\n{"a": 1}', schema);

    expect(result).toEqual({ success: true, data: { a: 1 }, repaired: false });
  });

  it("JSONでなければ失敗", () => {
    const result = parseAndValidateJson("I could not review this change.", schema);

    expect(result.success).toBe(false);
  });
});
