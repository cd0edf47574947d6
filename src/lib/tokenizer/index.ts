import { encoding_for_model, type Tiktoken } from "tiktoken";

// =====================================================
// トークン見積もりインターフェース
// =====================================================

/**
 * テキストのトークン数を返す関数
 * チャンク分割はこのインターフェース越しに見積もるため、差し替え可能
 */
export type TokenEstimator = (text: string) => number;

// =====================================================
// エンコーダー管理
// =====================================================

// シングルトンエンコーダー
let encoder: Tiktoken | null = null;

function getEncoder(): Tiktoken {
  if (!encoder) {
    // GPT-4oベースのエンコーディング（o200k_base）を使用
    encoder = encoding_for_model("gpt-4o");
  }
  return encoder;
}

/**
 * エンコーダーを解放（WASMメモリ）
 */
export function freeEncoder(): void {
  encoder?.free();
  encoder = null;
}

// =====================================================
// トークン計算関数
// =====================================================

/**
 * テキストのトークン数を計算（tiktoken）
 */
export const countTokens: TokenEstimator = (text) => {
  return getEncoder().encode(text).length;
};

/**
 * トークン数の見積もりを取得
 */
export const estimateTokens: TokenEstimator = (text) => {
  // 簡易見積もり（1トークン ≈ 4文字）
  // 正確な計算が必要な場合はcountTokensを使用
  return Math.ceil(text.length / 4);
};

/**
 * 設定値からエスティメーターを選択
 */
export function getTokenEstimator(kind: "heuristic" | "tiktoken"): TokenEstimator {
  return kind === "tiktoken" ? countTokens : estimateTokens;
}
