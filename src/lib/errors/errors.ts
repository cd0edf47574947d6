/**
 * レビューパイプラインのエラー型
 *
 * 実行単位の結果は値（RunResult）として返す。ここにあるクラスは
 * コンポーネント境界で投げられ、オーケストレーターで分類・記録される。
 */

// ========================================
// Diff
// ========================================

/**
 * Diffの構造が不正（パス重複、hunkの重なり、行番号の逆転など）
 * チャンク分割の前に検出され、実行は failed になる
 */
export class MalformedDiffError extends Error {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = "MalformedDiffError";
    this.path = path;
  }
}

// ========================================
// モデルプロバイダー
// ========================================

export type ProviderErrorKind = "transient" | "permanent" | "cancelled";

export interface ProviderErrorOptions {
  statusCode?: number;
  /** プロバイダーが retry-after を返した場合の待機時間 */
  retryAfterMs?: number;
  /** 429 もしくはレート制限メッセージ */
  rateLimited?: boolean;
  cause?: unknown;
}

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly statusCode?: number;
  readonly retryAfterMs?: number;
  readonly rateLimited: boolean;

  constructor(kind: ProviderErrorKind, message: string, options: ProviderErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
    this.rateLimited = options.rateLimited ?? false;
  }

  get retryable(): boolean {
    return this.kind === "transient";
  }
}

// ========================================
// ソースコントロールホスト
// ========================================

export type HostErrorKind = "not_found" | "unauthorized" | "transient" | "validation";

export class HostError extends Error {
  readonly kind: HostErrorKind;
  readonly statusCode?: number;

  constructor(kind: HostErrorKind, message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "HostError";
    this.kind = kind;
    this.statusCode = options.statusCode;
  }

  get retryable(): boolean {
    return this.kind === "transient";
  }
}

// ========================================
// 設定
// ========================================

export class ConfigError extends Error {
  /** 検証エラーの詳細（"path: message" 形式） */
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * unknown なエラーからメッセージを取り出す
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
