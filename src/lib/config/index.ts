/**
 * Review Configuration
 *
 * 3層でマージする: 組み込みデフォルト → リポジトリの .ai-reviewer.yml → AI_REVIEWER_* 環境変数
 * 実行開始時に1回だけ読み込み、実行中は再読み込みしない
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
  CATEGORIES,
  DEFAULT_CONTEXT_LINES,
  DEFAULT_MAX_FINDINGS_PER_FILE,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_MAX_TOKENS_PER_CHUNK,
  DEFAULT_MAX_TOTAL_FINDINGS,
  DEFAULT_SIMILARITY_THRESHOLD,
  DEFAULT_TEMPERATURE,
  MAX_CONTEXT_LINES,
} from "../ai/constants.js";
import { CategorySchema, SeveritySchema } from "../ai/schemas.js";
import { ConfigError, getErrorMessage } from "../errors/errors.js";

export const REPO_CONFIG_FILENAME = ".ai-reviewer.yml";
export const ENV_PREFIX = "AI_REVIEWER_";
export const DEFAULT_MODEL_ID = "gemini-2.0-flash";

// ========================================
// スキーマ（ファイル・環境変数は snake_case）
// ========================================

const positiveInt = z.number().int().positive();

const ReviewSectionSchema = z
  .object({
    min_severity: SeveritySchema.default("info"),
    max_findings_per_file: positiveInt.default(DEFAULT_MAX_FINDINGS_PER_FILE),
    max_total_findings: positiveInt.default(DEFAULT_MAX_TOTAL_FINDINGS),
    similarity_threshold: z.number().min(0).max(1).default(DEFAULT_SIMILARITY_THRESHOLD),
  })
  .default({});

const ChunkingSectionSchema = z
  .object({
    max_tokens_per_chunk: positiveInt.default(DEFAULT_MAX_TOKENS_PER_CHUNK),
    context_lines: z.number().int().min(0).max(MAX_CONTEXT_LINES).default(DEFAULT_CONTEXT_LINES),
    tokenizer: z.enum(["heuristic", "tiktoken"]).default("tiktoken"),
  })
  .default({});

const ModelSectionSchema = z
  .object({
    id: z.string().min(1).default(DEFAULT_MODEL_ID),
    temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
    max_output_tokens: positiveInt.default(DEFAULT_MAX_OUTPUT_TOKENS),
  })
  .default({});

const InvokerSectionSchema = z
  .object({
    concurrency: positiveInt.default(3),
    max_attempts: positiveInt.default(4),
    min_backoff_ms: z.number().int().min(0).default(1000),
    max_backoff_ms: z.number().int().min(0).default(30000),
    rate_limit_cooldown_ms: z.number().int().min(0).default(20000),
  })
  .default({})
  .refine((section) => section.min_backoff_ms <= section.max_backoff_ms, {
    message: "min_backoff_ms must not exceed max_backoff_ms",
    path: ["min_backoff_ms"],
  });

// 差分に加えてファイル全体をプロンプトに含める
const ContextSectionSchema = z
  .object({
    full_files: z.boolean().default(true),
    max_file_chars: positiveInt.default(20000),
  })
  .default({});

const LabelsSectionSchema = z
  .object({
    // このラベルの付いたPRはレビューしない（修正PRにも付ける）
    skip: z.string().min(1).default("ai-fix"),
    review: z.string().min(1).default("ai-review"),
    automated: z.string().min(1).default("automated"),
  })
  .default({});

const FixSectionSchema = z
  .object({
    enabled: z.boolean().default(false),
    branch_prefix: z.string().min(1).default("ai-fix/"),
    max_files_per_pr: positiveInt.default(10),
  })
  .default({});

// 修正PRのCIチェック待ち
const ChecksSectionSchema = z
  .object({
    enabled: z.boolean().default(true),
    timeout_ms: z.number().int().min(0).default(300000),
    poll_interval_ms: positiveInt.default(30000),
  })
  .default({});

const PublishSectionSchema = z
  .object({
    summary: z.boolean().default(true),
    partial_on_cancel: z.boolean().default(false),
  })
  .default({});

export const ReviewConfigSchema = z
  .object({
    review: ReviewSectionSchema,
    chunking: ChunkingSectionSchema,
    model: ModelSectionSchema,
    invoker: InvokerSectionSchema,
    exclude_patterns: z.array(z.string().min(1)).default([]),
    categories: z.array(CategorySchema).min(1).default([...CATEGORIES]),
    context: ContextSectionSchema,
    labels: LabelsSectionSchema,
    issues: z.object({ enabled: z.boolean().default(false) }).default({}),
    fix: FixSectionSchema,
    checks: ChecksSectionSchema,
    publish: PublishSectionSchema,
  })
  .transform((raw) => ({
    minSeverity: raw.review.min_severity,
    maxFindingsPerFile: raw.review.max_findings_per_file,
    maxTotalFindings: raw.review.max_total_findings,
    similarityThreshold: raw.review.similarity_threshold,
    maxTokensPerChunk: raw.chunking.max_tokens_per_chunk,
    contextLines: raw.chunking.context_lines,
    tokenizer: raw.chunking.tokenizer,
    modelId: raw.model.id,
    temperature: raw.model.temperature,
    maxOutputTokens: raw.model.max_output_tokens,
    concurrency: raw.invoker.concurrency,
    maxAttempts: raw.invoker.max_attempts,
    minBackoffMs: raw.invoker.min_backoff_ms,
    maxBackoffMs: raw.invoker.max_backoff_ms,
    rateLimitCooldownMs: raw.invoker.rate_limit_cooldown_ms,
    excludePatterns: [...new Set(raw.exclude_patterns)],
    categories: [...new Set(raw.categories)],
    includeFullFiles: raw.context.full_files,
    maxFileChars: raw.context.max_file_chars,
    skipLabel: raw.labels.skip,
    reviewLabel: raw.labels.review,
    automatedLabel: raw.labels.automated,
    createIssues: raw.issues.enabled,
    fixEnabled: raw.fix.enabled,
    fixBranchPrefix: raw.fix.branch_prefix,
    fixMaxFiles: raw.fix.max_files_per_pr,
    waitForChecks: raw.checks.enabled,
    checkTimeoutMs: raw.checks.timeout_ms,
    checkPollIntervalMs: raw.checks.poll_interval_ms,
    postSummary: raw.publish.summary,
    publishPartialOnCancel: raw.publish.partial_on_cancel,
  }));

export type ReviewConfig = z.output<typeof ReviewConfigSchema>;

// ========================================
// 環境変数
// ========================================

type RawConfig = Record<string, unknown>;

type EnvConverter = (value: string) => unknown;

const asNumber: EnvConverter = (value) => (value.trim() === "" ? Number.NaN : Number(value));
const asBoolean: EnvConverter = (value) => ["true", "1", "yes"].includes(value.trim().toLowerCase());
const asList: EnvConverter = (value) =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
const asString: EnvConverter = (value) => value.trim();

// 環境変数名（プレフィックス除く） → 設定ファイル上のパス
const ENV_OVERRIDES: Record<string, { path: [string, string?]; convert: EnvConverter }> = {
  MIN_SEVERITY: { path: ["review", "min_severity"], convert: asString },
  MAX_FINDINGS_PER_FILE: { path: ["review", "max_findings_per_file"], convert: asNumber },
  MAX_TOTAL_FINDINGS: { path: ["review", "max_total_findings"], convert: asNumber },
  SIMILARITY_THRESHOLD: { path: ["review", "similarity_threshold"], convert: asNumber },
  MAX_TOKENS_PER_CHUNK: { path: ["chunking", "max_tokens_per_chunk"], convert: asNumber },
  CONTEXT_LINES: { path: ["chunking", "context_lines"], convert: asNumber },
  TOKENIZER: { path: ["chunking", "tokenizer"], convert: asString },
  MODEL: { path: ["model", "id"], convert: asString },
  TEMPERATURE: { path: ["model", "temperature"], convert: asNumber },
  MAX_OUTPUT_TOKENS: { path: ["model", "max_output_tokens"], convert: asNumber },
  CONCURRENCY: { path: ["invoker", "concurrency"], convert: asNumber },
  MAX_ATTEMPTS: { path: ["invoker", "max_attempts"], convert: asNumber },
  MIN_BACKOFF_MS: { path: ["invoker", "min_backoff_ms"], convert: asNumber },
  MAX_BACKOFF_MS: { path: ["invoker", "max_backoff_ms"], convert: asNumber },
  RATE_LIMIT_COOLDOWN_MS: { path: ["invoker", "rate_limit_cooldown_ms"], convert: asNumber },
  EXCLUDE_PATTERNS: { path: ["exclude_patterns"], convert: asList },
  CATEGORIES: { path: ["categories"], convert: asList },
  FULL_FILE_CONTEXT: { path: ["context", "full_files"], convert: asBoolean },
  MAX_FILE_CHARS: { path: ["context", "max_file_chars"], convert: asNumber },
  SKIP_LABEL: { path: ["labels", "skip"], convert: asString },
  REVIEW_LABEL: { path: ["labels", "review"], convert: asString },
  AUTOMATED_LABEL: { path: ["labels", "automated"], convert: asString },
  CREATE_ISSUES: { path: ["issues", "enabled"], convert: asBoolean },
  FIX_ENABLED: { path: ["fix", "enabled"], convert: asBoolean },
  FIX_BRANCH_PREFIX: { path: ["fix", "branch_prefix"], convert: asString },
  FIX_MAX_FILES: { path: ["fix", "max_files_per_pr"], convert: asNumber },
  CHECKS_ENABLED: { path: ["checks", "enabled"], convert: asBoolean },
  CHECK_TIMEOUT_MS: { path: ["checks", "timeout_ms"], convert: asNumber },
  CHECK_POLL_INTERVAL_MS: { path: ["checks", "poll_interval_ms"], convert: asNumber },
  POST_SUMMARY: { path: ["publish", "summary"], convert: asBoolean },
  PUBLISH_PARTIAL_ON_CANCEL: { path: ["publish", "partial_on_cancel"], convert: asBoolean },
};

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * override を base に再帰的にマージした新しいオブジェクトを返す
 */
export function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

/**
 * AI_REVIEWER_* 環境変数を設定ファイルと同じ形のオブジェクトに変換
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): RawConfig {
  let overrides: RawConfig = {};
  for (const [name, { path, convert }] of Object.entries(ENV_OVERRIDES)) {
    const value = env[`${ENV_PREFIX}${name}`];
    if (value === undefined) continue;

    const [section, key] = path;
    const converted = convert(value);
    overrides = deepMerge(overrides, key === undefined ? { [section]: converted } : { [section]: { [key]: converted } });
  }
  return overrides;
}

/**
 * YAML テキストを設定オブジェクトとして読む（空ファイルは {}）
 */
export function parseConfigYaml(content: string, source: string): RawConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${source}: ${getErrorMessage(error)}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`${source} must contain a mapping at the top level`);
  }
  return parsed;
}

// ========================================
// 読み込み
// ========================================

export interface LoadConfigOptions {
  // リポジトリの .ai-reviewer.yml、または --config で渡されたファイルの内容
  fileContent?: string | null;
  fileSource?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * 3層をマージして検証済みの設定を返す
 * 不正な値は ConfigError
 */
export function loadConfig(options: LoadConfigOptions = {}): ReviewConfig {
  const source = options.fileSource ?? REPO_CONFIG_FILENAME;

  let raw: RawConfig = {};
  if (options.fileContent) {
    raw = deepMerge(raw, parseConfigYaml(options.fileContent, source));
    console.log(`[Config] Merged ${source}`);
  }

  const envOverrides = readEnvOverrides(options.env ?? {});
  if (Object.keys(envOverrides).length > 0) {
    raw = deepMerge(raw, envOverrides);
    console.log(`[Config] Applied environment overrides: ${Object.keys(envOverrides).join(", ")}`);
  }

  const result = ReviewConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError("Invalid configuration", issues);
  }

  return result.data;
}
