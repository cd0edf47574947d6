import { z } from "zod";
import {
  CATEGORIES,
  DEFAULT_CATEGORY,
  DEFAULT_SEVERITY,
  SEVERITIES,
  SEVERITY_ALIASES,
  isCategory,
  isSeverity,
  type Category,
  type Severity,
} from "./constants.js";

// ========================================
// pr-agent方式: 柔軟なスキーマ定義
// - null/undefined/欠落を適切に処理
// - デフォルト値でグレースフルデグレード
//
// プロンプトの出力形式（renderOutputContract）とレスポンスの検証は
// どちらもこのファイルのスキーマを使う
// ========================================

export type { Severity, Category };

export const SeveritySchema = z.enum(SEVERITIES);
export const CategorySchema = z.enum(CATEGORIES);

// モデルが返しがちなカテゴリの別名
const CATEGORY_ALIASES: Record<string, Category> = {
  bug: "correctness",
  logic: "correctness",
  error: "correctness",
  readability: "maintainability",
  design: "maintainability",
  naming: "style",
  formatting: "style",
  perf: "performance",
  vulnerability: "security",
};

/**
 * 深刻度: 大文字小文字・別名を吸収、不明ならデフォルト値
 */
const severityWithDefault = z.preprocess((val) => {
  if (typeof val !== "string") return DEFAULT_SEVERITY;
  const lower = val.trim().toLowerCase();
  if (isSeverity(lower)) return lower;
  return SEVERITY_ALIASES[lower] ?? DEFAULT_SEVERITY;
}, SeveritySchema);

/**
 * カテゴリ: 大文字小文字・別名を吸収、不明ならデフォルト値
 */
const categoryWithDefault = z.preprocess((val) => {
  if (typeof val !== "string") return DEFAULT_CATEGORY;
  const lower = val.trim().toLowerCase();
  if (isCategory(lower)) return lower;
  return CATEGORY_ALIASES[lower] ?? DEFAULT_CATEGORY;
}, CategorySchema);

/**
 * 文字列フィールド: null/undefined → 空文字列
 */
const stringWithEmptyDefault = z.preprocess(
  (val) => (val === null || val === undefined ? "" : val),
  z.string()
);

// パス: 前後の空白だけ除去（a/ b/ の扱いはチャンクのファイルと照合して決める）
const pathSchema = z.string().trim().min(1);

// 1件の指摘
export const FindingOutputSchema = z.object({
  path: pathSchema.describe("file path exactly as shown in the diff header"),
  line: z.coerce
    .number()
    .int()
    .positive()
    .describe("new-file line number shown in the left column; must be an added or context line of this diff"),
  severity: severityWithDefault.describe(`one of ${SEVERITIES.map((s) => `"${s}"`).join(" | ")}`),
  category: categoryWithDefault.describe(`one of ${CATEGORIES.map((c) => `"${c}"`).join(" | ")}`),
  title: stringWithEmptyDefault.describe("short headline of the problem (under 80 characters)"),
  body: z.string().min(1).describe("explanation in Markdown: what is wrong and why it matters"),
  suggestion: z
    .string()
    .nullish()
    .describe("optional replacement code for the commented line, code only, no line numbers"),
});
export type FindingOutput = z.infer<typeof FindingOutputSchema>;

// レビュー結果全体（配列のみの応答も受け付ける）
export const ReviewOutputSchema = z.preprocess(
  (val) => (Array.isArray(val) ? { findings: val } : val),
  z.object({
    summary: z.string().nullish(),
    // 各要素は FindingOutputSchema で個別に検証する（不正な要素だけを落とすため）
    findings: z.array(z.unknown()),
  })
);
export type ReviewOutput = z.infer<typeof ReviewOutputSchema>;

// 修正PR用: 修正後のファイル全体
export const FixOutputSchema = z.object({
  fixed_content: z.string(),
});

// ========================================
// プロンプト用の出力形式
// ========================================

/**
 * FindingOutputSchema から出力形式の説明を生成
 */
export function renderOutputContract(): string {
  const fields = Object.entries(FindingOutputSchema.shape).map(([name, field]) => {
    const required = field.isOptional() ? "optional" : "required";
    return `- \`${name}\` (${required}): ${field.description ?? ""}`;
  });

  const example = {
    summary: "one-paragraph overview of the reviewed changes",
    findings: [
      {
        path: "src/example.ts",
        line: 42,
        severity: "warning",
        category: "correctness",
        title: "Possible null dereference",
        body: "`user` can be undefined here when the lookup fails.",
        suggestion: "if (!user) return null;",
      },
    ],
  };

  return [
    "## Output format",
    "",
    "Respond with a single JSON object and nothing else. Return an empty `findings` array when there is nothing worth reporting.",
    "",
    "```json",
    JSON.stringify(example, null, 2),
    "```",
    "",
    "Fields of each finding:",
    ...fields,
  ].join("\n");
}
