/**
 * Response Parser
 *
 * モデルの生出力を構造化された指摘に変換する
 * - 例外を投げない（パース不能な出力は指摘0件 + 警告1件）
 * - 指摘の (path, line) はチャンク内のコメント可能な行でなければならない
 */

import { getAddressableLines } from "../diff/model.js";
import { generateFingerprint } from "./fingerprint.js";
import { parseAndValidateJson } from "./json-utils.js";
import { FindingOutputSchema, ReviewOutputSchema } from "./schemas.js";
import type { Chunk, Finding, ModelResponse, ParseWarning } from "../review/types.js";
import { getErrorMessage } from "../errors/errors.js";

export interface ParsedResponse {
  findings: Finding[];
  warnings: ParseWarning[];
  // モデルが返したチャンクの概要（サマリーコメント用）
  summary?: string;
}

const MAX_TITLE_LENGTH = 80;

/**
 * チャンク内のファイルごとのコメント可能行
 */
function buildAnchorIndex(chunk: Chunk): Map<string, Set<number>> {
  const index = new Map<string, Set<number>>();
  for (const file of chunk.files) {
    const lines = getAddressableLines(file.hunks);
    const existing = index.get(file.change.path);
    if (existing) {
      for (const line of lines) existing.add(line);
    } else {
      index.set(file.change.path, lines);
    }
  }
  return index;
}

/**
 * 指摘のパスをチャンク内のファイルに合わせる
 * そのままで見つからず、diff表記の a/ b/ や ./ を外すと見つかる場合だけ外す
 */
function resolveFindingPath(path: string, anchors: ReadonlyMap<string, Set<number>>): string {
  if (anchors.has(path)) return path;
  const stripped = path.replace(/^(?:[ab]\/|\.\/)/, "");
  return anchors.has(stripped) ? stripped : path;
}

function deriveTitle(title: string, body: string): string {
  const source = title.trim() || body.trim().split("\n")[0] || "";
  const plain = source.replace(/^[#>*\-\s]+/, "").trim();
  return plain.length > MAX_TITLE_LENGTH ? `${plain.slice(0, MAX_TITLE_LENGTH - 1)}…` : plain;
}

function describeItem(item: unknown): { path?: string; line?: number } {
  if (typeof item !== "object" || item === null) return {};
  const path = "path" in item && typeof item.path === "string" ? item.path : undefined;
  const line = "line" in item && typeof item.line === "number" ? item.line : undefined;
  return { path, line };
}

function parseText(text: string, chunk: Chunk): ParsedResponse {
  const warnings: ParseWarning[] = [];
  const findings: Finding[] = [];

  const parsed = parseAndValidateJson(text, ReviewOutputSchema);
  if (!parsed.success) {
    console.warn(`[ResponseParser] ${chunk.id}: unparseable response (${parsed.error})`);
    return {
      findings,
      warnings: [{ chunkId: chunk.id, reason: "unparseable", message: parsed.error }],
    };
  }

  const anchors = buildAnchorIndex(chunk);

  parsed.data.findings.forEach((item, index) => {
    const result = FindingOutputSchema.safeParse(item);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      warnings.push({
        chunkId: chunk.id,
        reason: "invalid_finding",
        message: `finding #${index + 1} is invalid (${issues})`,
        ...describeItem(item),
      });
      return;
    }

    const output = result.data;
    const path = resolveFindingPath(output.path, anchors);
    const lines = anchors.get(path);
    if (!lines || !lines.has(output.line)) {
      warnings.push({
        chunkId: chunk.id,
        reason: "unanchored",
        message: lines
          ? `line ${output.line} is not a commentable line of ${path} in this chunk`
          : `${path} is not part of this chunk`,
        path,
        line: output.line,
      });
      return;
    }

    findings.push(
      Object.freeze({
        path,
        line: output.line,
        severity: output.severity,
        category: output.category,
        title: deriveTitle(output.title, output.body),
        body: output.body.trim(),
        suggestion: output.suggestion && output.suggestion.trim() ? output.suggestion : undefined,
        chunkId: chunk.id,
        fingerprint: generateFingerprint(path, output.line, output.body),
      })
    );
  });

  if (warnings.length > 0) {
    console.warn(`[ResponseParser] ${chunk.id}: dropped ${warnings.length} finding(s), kept ${findings.length}`);
  }

  return {
    findings,
    warnings,
    summary: parsed.data.summary?.trim() || undefined,
  };
}

/**
 * モデルレスポンスを指摘に変換（例外を投げない）
 * 失敗レスポンスは指摘・警告ともに0件（失敗はチャンクの結果として記録される）
 */
export function parseModelResponse(response: ModelResponse, chunk: Chunk): ParsedResponse {
  if (!response.ok) {
    return { findings: [], warnings: [] };
  }

  try {
    return parseText(response.text, chunk);
  } catch (error) {
    console.error(`[ResponseParser] ${chunk.id}: unexpected parse error`, error);
    return {
      findings: [],
      warnings: [{ chunkId: chunk.id, reason: "unparseable", message: getErrorMessage(error) }],
    };
  }
}
