/**
 * Finding Fingerprint
 *
 * 指摘本文を正規化し、位置と合わせた一意のフィンガープリントを生成する
 * 近似重複判定用のトークン化・類似度計算もここに置く
 */

import { createHash } from "node:crypto";

// ========================================
// 正規化関数
// ========================================

/**
 * 指摘本文を正規化する
 * - コードブロックを抽象化
 * - 小文字化
 * - 余分な空白を削除
 * - URL・行番号を抽象化
 */
export function normalizeContent(body: string): string {
  let normalized = body;

  // コードブロックを抽象化（内容は無視、存在のみ記録）
  normalized = normalized.replace(/```[\s\S]*?```/g, "[code_block]");

  // 小文字化
  normalized = normalized.toLowerCase();

  // 余分な空白を正規化
  normalized = normalized.replace(/\s+/g, " ").trim();

  // URLを抽象化
  normalized = normalized.replace(/https?:\/\/[^\s]+/g, "[url]");

  // 行番号を抽象化
  normalized = normalized.replace(/\bline\s*\d+/g, "[line]");

  // 末尾の句読点
  normalized = normalized.replace(/[.!。]+$/, "");

  return normalized;
}

// ========================================
// ハッシュ生成
// ========================================

/**
 * 指摘のフィンガープリント: sha256(path:line:正規化した本文)
 */
export function generateFingerprint(path: string, line: number, body: string): string {
  return createHash("sha256")
    .update(`${path}:${line}:${normalizeContent(body)}`)
    .digest("hex");
}

// ========================================
// 類似度計算
// ========================================

// 一般的なストップワード
const STOP_WORDS = new Set([
  "the", "a", "an", "is", "are", "was", "were", "be", "been", "being",
  "have", "has", "had", "do", "does", "did", "will", "would", "could",
  "should", "this", "that", "these", "those", "it", "its", "and", "or",
  "but", "if", "then", "for", "to", "of", "in", "on", "at", "by", "with",
  "from", "as", "into", "can", "may", "here", "there", "which",
  "です", "ます", "した", "する", "ある", "いる", "この", "その",
  "これ", "それ", "という", "として", "ため", "こと", "もの", "よう",
]);

/**
 * 本文をトークン化（正規化済み単語セット）
 */
export function tokenize(text: string): Set<string> {
  return new Set(
    normalizeContent(text)
      // マークダウンシンタックスを除去
      .replace(/[#*_~`>]/g, " ")
      .split(/[\s,.;:!?()[\]{}'"]+/)
      // 短すぎる単語を除外
      .filter((w) => w.length > 2)
      .filter((w) => !STOP_WORDS.has(w))
  );
}

/**
 * Jaccard類似度（単語単位）
 */
export function calculateJaccardSimilarity(words1: Set<string>, words2: Set<string>): number {
  if (words1.size === 0 && words2.size === 0) {
    return 1.0;
  }
  if (words1.size === 0 || words2.size === 0) {
    return 0.0;
  }

  let intersection = 0;
  for (const word of words1) {
    if (words2.has(word)) intersection++;
  }
  const union = words1.size + words2.size - intersection;

  return intersection / union;
}

/**
 * コサイン類似度（二値ベクトル）
 */
export function calculateCosineSimilarity(words1: Set<string>, words2: Set<string>): number {
  if (words1.size === 0 || words2.size === 0) {
    return 0.0;
  }

  let dotProduct = 0;
  for (const word of words1) {
    if (words2.has(word)) dotProduct++;
  }

  return dotProduct / (Math.sqrt(words1.size) * Math.sqrt(words2.size));
}

/**
 * 複合類似度（Jaccardを重視した重み付け平均）
 */
export function calculateCombinedSimilarity(text1: string, text2: string): number {
  const words1 = tokenize(text1);
  const words2 = tokenize(text2);
  return calculateJaccardSimilarity(words1, words2) * 0.6 + calculateCosineSimilarity(words1, words2) * 0.4;
}
