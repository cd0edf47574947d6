/**
 * Error Registry
 *
 * 既知のエラーパターンとリトライ可否を管理し、
 * モデルプロバイダー / GitHub のエラーを分類する
 */

import {
  HostError,
  ProviderError,
  getErrorMessage,
  type HostErrorKind,
} from "./errors.js";

// ========================================
// 型定義
// ========================================

export type ErrorType =
  | "GITHUB_API"
  | "AI_GENERATION"
  | "RATE_LIMIT"
  | "AUTHENTICATION"
  | "PERMISSION"
  | "NETWORK";

export interface ErrorPattern {
  /** パターン名 */
  name: string;
  /** エラータイプ */
  type: ErrorType;
  /** HTTPステータスコード（オプション） */
  code?: string;
  /** エラーメッセージのパターン（正規表現） */
  messagePattern: RegExp;
  /** 自動リトライ可能か */
  retryable: boolean;
}

// ========================================
// GitHub API エラーパターン
// ========================================

const GITHUB_API_PATTERNS: ErrorPattern[] = [
  {
    name: "rate_limit_exceeded",
    type: "RATE_LIMIT",
    code: "403",
    messagePattern: /API rate limit exceeded/i,
    retryable: true,
  },
  {
    name: "secondary_rate_limit",
    type: "RATE_LIMIT",
    code: "403",
    messagePattern: /secondary rate limit/i,
    retryable: true,
  },
  {
    name: "not_found",
    type: "GITHUB_API",
    code: "404",
    messagePattern: /Not Found/i,
    retryable: false,
  },
  {
    name: "unprocessable_entity",
    type: "GITHUB_API",
    code: "422",
    messagePattern: /Validation Failed|Unprocessable Entity/i,
    retryable: false,
  },
  {
    name: "bad_credentials",
    type: "AUTHENTICATION",
    code: "401",
    messagePattern: /Bad credentials/i,
    retryable: false,
  },
  {
    name: "resource_not_accessible",
    type: "PERMISSION",
    code: "403",
    messagePattern: /Resource not accessible by integration/i,
    retryable: false,
  },
  {
    name: "server_error",
    type: "GITHUB_API",
    code: "500",
    messagePattern: /Server Error|Internal Server Error/i,
    retryable: true,
  },
];

// ========================================
// AI生成エラーパターン
// ========================================

const AI_GENERATION_PATTERNS: ErrorPattern[] = [
  {
    name: "ai_rate_limit",
    type: "AI_GENERATION",
    messagePattern: /rate limit|quota exceeded|too many requests|resource.?exhausted/i,
    retryable: true,
  },
  {
    name: "ai_context_length",
    type: "AI_GENERATION",
    messagePattern: /context length|token limit|maximum.*tokens/i,
    retryable: false,
  },
  {
    name: "ai_content_filter",
    type: "AI_GENERATION",
    messagePattern: /content filter|safety|blocked/i,
    retryable: false,
  },
  {
    name: "ai_invalid_request",
    type: "AI_GENERATION",
    messagePattern: /invalid argument|malformed|bad request/i,
    retryable: false,
  },
  {
    name: "ai_timeout",
    type: "AI_GENERATION",
    messagePattern: /timeout|timed out|deadline exceeded/i,
    retryable: true,
  },
];

// ========================================
// ネットワークエラーパターン
// ========================================

const NETWORK_PATTERNS: ErrorPattern[] = [
  {
    name: "connection_reset",
    type: "NETWORK",
    messagePattern: /ECONNRESET|connection reset|socket hang up/i,
    retryable: true,
  },
  {
    name: "connection_refused",
    type: "NETWORK",
    messagePattern: /ECONNREFUSED|connection.*refused/i,
    retryable: true,
  },
  {
    name: "dns_error",
    type: "NETWORK",
    messagePattern: /ENOTFOUND|getaddrinfo|EAI_AGAIN/i,
    retryable: true,
  },
  {
    name: "network_timeout",
    type: "NETWORK",
    messagePattern: /ETIMEDOUT|socket.*timeout/i,
    retryable: true,
  },
  {
    name: "fetch_failed",
    type: "NETWORK",
    messagePattern: /fetch failed|network error/i,
    retryable: true,
  },
];

// ========================================
// 全パターンを統合
// ========================================

const ALL_PATTERNS: ErrorPattern[] = [
  ...GITHUB_API_PATTERNS,
  ...AI_GENERATION_PATTERNS,
  ...NETWORK_PATTERNS,
];

// ========================================
// パターン照合
// ========================================

/**
 * エラーメッセージからパターンをマッチング
 */
export function matchErrorPattern(
  errorMessage: string,
  errorCode?: string
): ErrorPattern | null {
  for (const pattern of ALL_PATTERNS) {
    // エラーコードが指定されている場合は先にチェック
    if (pattern.code && errorCode && pattern.code !== errorCode) {
      continue;
    }
    if (pattern.messagePattern.test(errorMessage)) {
      return pattern;
    }
  }
  return null;
}

// ========================================
// HTTPレスポンス情報の取り出し
// ========================================

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

/**
 * エラーオブジェクトからHTTPステータスコードを取得
 * AI SDK の APICallError は statusCode、Octokit の RequestError は status を持つ
 */
export function getStatusCode(error: unknown): number | undefined {
  if (!isObject(error)) return undefined;
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function readHeader(headers: unknown, name: string): string | undefined {
  if (!isObject(headers)) return undefined;
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) {
      if (typeof value === "string") return value;
      if (typeof value === "number") return String(value);
    }
  }
  return undefined;
}

/**
 * retry-after ヘッダー（秒数 or HTTP日付）をミリ秒に変換
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * エラーから retry-after を取得（responseHeaders / response.headers の両方を見る）
 */
export function getRetryAfterMs(error: unknown): number | undefined {
  if (!isObject(error)) return undefined;
  let header: string | undefined;
  if ("responseHeaders" in error) {
    header = readHeader(error.responseHeaders, "retry-after");
  }
  if (header === undefined && "response" in error && isObject(error.response) && "headers" in error.response) {
    header = readHeader(error.response.headers, "retry-after");
  }
  return parseRetryAfter(header);
}

function isAbortError(error: unknown): boolean {
  return isObject(error) && "name" in error && (error.name === "AbortError" || error.name === "TimeoutError");
}

// ========================================
// 分類
// ========================================

/**
 * モデル呼び出しのエラーを transient / permanent / cancelled に分類
 *
 * - 429, 408, 5xx, タイムアウト, ネットワーク → transient
 * - それ以外の 4xx, 不正なリクエスト → permanent
 * - ステータスもパターンも無い場合は transient（有限回のリトライに任せる）
 */
export function classifyProviderError(error: unknown, signal?: AbortSignal): ProviderError {
  if (error instanceof ProviderError) return error;

  const message = getErrorMessage(error);

  if (signal?.aborted || isAbortError(error)) {
    return new ProviderError("cancelled", message || "aborted", { cause: error });
  }

  const statusCode = getStatusCode(error);
  const retryAfterMs = getRetryAfterMs(error);

  if (statusCode !== undefined) {
    if (statusCode === 429) {
      return new ProviderError("transient", message, { statusCode, retryAfterMs, rateLimited: true, cause: error });
    }
    if (statusCode === 408 || statusCode >= 500) {
      return new ProviderError("transient", message, { statusCode, retryAfterMs, cause: error });
    }
    if (statusCode >= 400) {
      return new ProviderError("permanent", message, { statusCode, cause: error });
    }
  }

  const pattern = matchErrorPattern(message);
  if (pattern) {
    const rateLimited = pattern.name === "ai_rate_limit";
    return new ProviderError(pattern.retryable ? "transient" : "permanent", message, {
      statusCode,
      retryAfterMs,
      rateLimited,
      cause: error,
    });
  }

  return new ProviderError("transient", message, { statusCode, cause: error });
}

/**
 * GitHub API のエラーを HostError に分類
 */
export function classifyHostError(error: unknown): HostError {
  if (error instanceof HostError) return error;

  const message = getErrorMessage(error);
  const statusCode = getStatusCode(error);
  const pattern = matchErrorPattern(message, statusCode !== undefined ? String(statusCode) : undefined);

  let kind: HostErrorKind;
  if (pattern?.type === "RATE_LIMIT") {
    kind = "transient";
  } else if (statusCode === 404) {
    kind = "not_found";
  } else if (statusCode === 401 || statusCode === 403) {
    kind = "unauthorized";
  } else if (statusCode === 422) {
    kind = "validation";
  } else if (statusCode === undefined || statusCode === 408 || statusCode === 429 || statusCode >= 500) {
    kind = "transient";
  } else {
    kind = "validation";
  }

  return new HostError(kind, message, { statusCode, cause: error });
}
