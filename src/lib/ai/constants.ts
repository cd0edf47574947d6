/**
 * AI Review Constants
 * 定数定義の一元化
 */

// ========================================
// 深刻度 (Severity) 定義
// ========================================

/** 深刻度の値（低い順） */
export const SEVERITIES = ["info", "suggestion", "warning", "blocking"] as const;
export type Severity = (typeof SEVERITIES)[number];

/** 深刻度の優先度順序（高い方が優先） */
export const SEVERITY_ORDER: Record<Severity, number> = {
  blocking: 4,
  warning: 3,
  suggestion: 2,
  info: 1,
};

/** 深刻度に対応する絵文字 */
export const SEVERITY_EMOJI: Record<Severity, string> = {
  blocking: "🔴",
  warning: "🟠",
  suggestion: "🔵",
  info: "⚪",
};

/** デフォルトの深刻度 */
export const DEFAULT_SEVERITY: Severity = "info";

/** モデルが別名で返した深刻度の読み替え */
export const SEVERITY_ALIASES: Record<string, Severity> = {
  critical: "blocking",
  high: "blocking",
  error: "blocking",
  important: "warning",
  medium: "warning",
  low: "suggestion",
  nitpick: "info",
  minor: "info",
};

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

// ========================================
// カテゴリ
// ========================================

export const CATEGORIES = [
  "security",
  "performance",
  "maintainability",
  "correctness",
  "style",
] as const;
export type Category = (typeof CATEGORIES)[number];

export const DEFAULT_CATEGORY: Category = "correctness";

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

// ========================================
// レビュー設定
// ========================================

/** チャンクあたりの最大トークン数 */
export const DEFAULT_MAX_TOKENS_PER_CHUNK = 6000;

/** 変更行の前後に含めるコンテキスト行数 */
export const DEFAULT_CONTEXT_LINES = 3;
export const MAX_CONTEXT_LINES = 10;

/** 予約トークン数（出力用） */
export const DEFAULT_MAX_OUTPUT_TOKENS = 4096;

export const DEFAULT_TEMPERATURE = 0.2;

/** 重複排除の類似度閾値 */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.6;

export const DEFAULT_MAX_FINDINGS_PER_FILE = 10;
export const DEFAULT_MAX_TOTAL_FINDINGS = 50;

