/**
 * JSON Parse Utilities
 *
 * AI出力からJSONを抽出・パースするユーティリティ
 * 途中で切れたJSONの修復機能を含む
 */

import type { z } from "zod";

/**
 * AI出力からJSONの候補を抽出（出現順）
 * 前置きの文章に [ や { が含まれることがあるため、配列とオブジェクトの両方を候補にする
 */
export function extractJsonCandidates(text: string): string[] {
  // ```json ... ``` パターンを抽出
  const jsonBlockMatch = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonBlockMatch) {
    return [jsonBlockMatch[1].trim()];
  }
  // 閉じていないコードブロック（出力が途中で切れた場合）
  const openBlockMatch = text.match(/```(?:json)?\s*([\s\S]*)$/);
  if (openBlockMatch) {
    return [openBlockMatch[1].trim()];
  }

  // JSONオブジェクト / 配列を直接検出（閉じ括弧がなければ末尾まで）
  const candidates: { start: number; json: string }[] = [];
  for (const [open, close] of [
    ["[", "]"],
    ["{", "}"],
  ] as const) {
    const start = text.indexOf(open);
    if (start === -1) continue;
    const end = text.lastIndexOf(close);
    candidates.push({ start, json: end > start ? text.slice(start, end + 1) : text.substring(start).trim() });
  }
  if (candidates.length === 0) {
    return [text.trim()];
  }

  return candidates.sort((a, b) => a.start - b.start).map((candidate) => candidate.json);
}

/**
 * JSON文字列内の不正なエスケープシーケンスを修復する
 */
export function fixBadEscapeSequences(jsonStr: string): string {
  let result = "";
  let i = 0;

  while (i < jsonStr.length) {
    const char = jsonStr[i];

    if (char !== "\\") {
      result += char;
      i++;
      continue;
    }

    const nextChar = jsonStr[i + 1];
    if (nextChar === undefined) {
      // 文字列の最後にバックスラッシュがある場合は削除
      i++;
      continue;
    }

    // 有効なJSONエスケープシーケンス: \" \\ \/ \b \f \n \r \t \uXXXX
    if (nextChar === "u") {
      const hex = jsonStr.substring(i + 2, i + 6);
      if (/^[0-9a-fA-F]{4}$/.test(hex)) {
        result += jsonStr.substring(i, i + 6);
        i += 6;
      } else {
        // 無効なUnicodeエスケープ - バックスラッシュをエスケープ
        result += "\\\\u";
        i += 2;
      }
      continue;
    }

    if (['"', "\\", "/", "b", "f", "n", "r", "t"].includes(nextChar)) {
      result += char + nextChar;
    } else {
      // \a, \x, \1 などは無効 - バックスラッシュを二重にしてエスケープ
      result += "\\\\" + nextChar;
    }
    i += 2;
  }

  return result;
}

/**
 * JSON文字列内のリテラル制御文字をエスケープする
 * （文字列リテラル内の生の改行やタブを修正）
 */
export function escapeControlCharsInStrings(jsonStr: string): string {
  let result = "";
  let inString = false;
  let escapeNext = false;

  for (const char of jsonStr) {
    if (escapeNext) {
      result += char;
      escapeNext = false;
      continue;
    }

    if (char === "\\") {
      result += char;
      escapeNext = true;
      continue;
    }

    if (char === '"') {
      inString = !inString;
      result += char;
      continue;
    }

    if (inString) {
      if (char === "\n") {
        result += "\\n";
        continue;
      }
      if (char === "\r") {
        result += "\\r";
        continue;
      }
      if (char === "\t") {
        result += "\\t";
        continue;
      }
    }

    result += char;
  }

  return result;
}

/**
 * 途中で切れたJSONを修復する
 * AIの応答がトークン制限で切れた場合に対応
 */
export function repairTruncatedJson(jsonStr: string): string {
  let repaired = escapeControlCharsInStrings(fixBadEscapeSequences(jsonStr.trim()));

  // 末尾の不完全な要素を削除
  // 例: {"key": で終わっている場合
  repaired = repaired.replace(/,\s*"[^"]*"?\s*:?\s*$/, "");
  repaired = repaired.replace(/,\s*$/, "");

  // 開いているブラケットをスタックで追跡（閉じる順序を保つ）
  const stack: string[] = [];
  let inString = false;
  let escapeNext = false;

  for (const char of repaired) {
    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (char === "\\") {
      escapeNext = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;
    if (char === "{") stack.push("}");
    if (char === "[") stack.push("]");
    if (char === "}" || char === "]") stack.pop();
  }

  // 文字列が閉じていない場合
  if (inString) {
    repaired += '"';
  }

  // 値の途中で切れた "key": を削除
  repaired = repaired.replace(/,?\s*"[^"]*"\s*:\s*$/, "");
  repaired = repaired.replace(/,\s*$/, "");

  while (stack.length > 0) {
    repaired += stack.pop();
  }

  return repaired;
}

/**
 * JSONパース結果の型
 */
export type ParseResult<T> =
  | { success: true; data: T; repaired: boolean }
  | { success: false; error: string };

function validate<T>(jsonStr: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParseResult<T> {
  const parsed: unknown = JSON.parse(jsonStr);
  const validated = schema.safeParse(parsed);
  if (validated.success) {
    return { success: true, data: validated.data, repaired: false };
  }
  return { success: false, error: validated.error.issues.map((i) => i.message).join("; ") };
}

/**
 * JSONをパースしてZodスキーマで検証
 * 候補を順に試し、最初に検証を通ったものを返す。全て失敗したら修復を試みる
 */
export function parseAndValidateJson<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): ParseResult<T> {
  const candidates = extractJsonCandidates(text);

  // 1. まず通常のパースを試みる
  let firstError: string | undefined;
  for (const rawJsonStr of candidates) {
    try {
      // 前処理: 不正なエスケープシーケンスと制御文字を修正
      const result = validate(escapeControlCharsInStrings(fixBadEscapeSequences(rawJsonStr)), schema);
      if (result.success) return result;
      firstError ??= result.error;
    } catch (error) {
      firstError ??= error instanceof Error ? error.message : String(error);
    }
  }

  // 2. 失敗した場合、修復を試みる
  console.log("[JSON] Initial parse failed, attempting repair...");
  for (const rawJsonStr of candidates) {
    try {
      const result = validate(repairTruncatedJson(rawJsonStr), schema);
      if (result.success) {
        console.log("[JSON] Repair successful!");
        return { ...result, repaired: true };
      }
    } catch (repairError) {
      console.warn("[JSON] Repair also failed:", repairError instanceof Error ? repairError.message : repairError);
    }
  }

  return { success: false, error: firstError ?? "no JSON found" };
}
