/**
 * Review Configuration Tests
 */

import { describe, it, expect } from "vitest";
import { deepMerge, loadConfig, parseConfigYaml, readEnvOverrides } from "../index.js";
import { ConfigError } from "../../errors/errors.js";

describe("loadConfig", () => {
  it("何も指定しなければ組み込みデフォルト", () => {
    expect(loadConfig()).toEqual({
      minSeverity: "info",
      maxFindingsPerFile: 10,
      maxTotalFindings: 50,
      similarityThreshold: 0.6,
      maxTokensPerChunk: 6000,
      contextLines: 3,
      tokenizer: "tiktoken",
      modelId: "gemini-2.0-flash",
      temperature: 0.2,
      maxOutputTokens: 4096,
      concurrency: 3,
      maxAttempts: 4,
      minBackoffMs: 1000,
      maxBackoffMs: 30000,
      rateLimitCooldownMs: 20000,
      excludePatterns: [],
      categories: ["security", "performance", "maintainability", "correctness", "style"],
      includeFullFiles: true,
      maxFileChars: 20000,
      skipLabel: "ai-fix",
      reviewLabel: "ai-review",
      automatedLabel: "automated",
      createIssues: false,
      fixEnabled: false,
      fixBranchPrefix: "ai-fix/",
      fixMaxFiles: 10,
      waitForChecks: true,
      checkTimeoutMs: 300000,
      checkPollIntervalMs: 30000,
      postSummary: true,
      publishPartialOnCancel: false,
    });
  });

  it("YAMLの値でデフォルトを上書きする", () => {
    const config = loadConfig({
      fileContent: [
        "review:",
        "  min_severity: warning",
        "chunking:",
        "  max_tokens_per_chunk: 2000",
        "exclude_patterns:",
        '  - "*.snap"',
        "  - docs/**",
        "categories: [security, correctness]",
      ].join("\n"),
    });

    expect(config.minSeverity).toBe("warning");
    expect(config.maxFindingsPerFile).toBe(10);
    expect(config.maxTokensPerChunk).toBe(2000);
    expect(config.excludePatterns).toEqual(["*.snap", "docs/**"]);
    expect(config.categories).toEqual(["security", "correctness"]);
  });

  it("環境変数はファイルより優先される", () => {
    const config = loadConfig({
      fileContent: "review:\n  min_severity: warning\n",
      env: {
        AI_REVIEWER_MIN_SEVERITY: "blocking",
        AI_REVIEWER_CONCURRENCY: "5",
        AI_REVIEWER_EXCLUDE_PATTERNS: "a/**, b/**",
        AI_REVIEWER_POST_SUMMARY: "no",
      },
    });

    expect(config.minSeverity).toBe("blocking");
    expect(config.concurrency).toBe(5);
    expect(config.excludePatterns).toEqual(["a/**", "b/**"]);
    expect(config.postSummary).toBe(false);
  });

  it("バックオフとクールダウンも環境変数で上書きできる", () => {
    const config = loadConfig({
      env: {
        AI_REVIEWER_MIN_BACKOFF_MS: "50",
        AI_REVIEWER_MAX_BACKOFF_MS: "500",
        AI_REVIEWER_RATE_LIMIT_COOLDOWN_MS: "2500",
      },
    });

    expect(config.minBackoffMs).toBe(50);
    expect(config.maxBackoffMs).toBe(500);
    expect(config.rateLimitCooldownMs).toBe(2500);
  });

  it("Issue作成・修正PR・チェック待ちを設定できる", () => {
    const config = loadConfig({
      fileContent: ["issues:", "  enabled: true", "fix:", "  enabled: true", "  max_files_per_pr: 3", "checks:", "  timeout_ms: 60000"].join("\n"),
      env: { AI_REVIEWER_CHECKS_ENABLED: "false", AI_REVIEWER_FULL_FILE_CONTEXT: "0" },
    });

    expect(config.createIssues).toBe(true);
    expect(config.fixEnabled).toBe(true);
    expect(config.fixMaxFiles).toBe(3);
    expect(config.checkTimeoutMs).toBe(60000);
    expect(config.waitForChecks).toBe(false);
    expect(config.includeFullFiles).toBe(false);
  });

  it("空のファイルはデフォルトのまま", () => {
    expect(loadConfig({ fileContent: "# nothing here\n" })).toEqual(loadConfig());
  });

  it("不正な値は ConfigError で項目を列挙する", () => {
    try {
      loadConfig({ fileContent: "review:\n  min_severity: urgent\nchunking:\n  context_lines: 20\n" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toMatch(/^review\.min_severity: /);
        expect(error.issues[1]).toMatch(/^chunking\.context_lines: /);
      }
    }
  });

  it("バックオフの最小値が最大値を超えたらエラー", () => {
    expect(() =>
      loadConfig({ fileContent: "invoker:\n  min_backoff_ms: 5000\n  max_backoff_ms: 100\n" })
    ).toThrow("invoker.min_backoff_ms: min_backoff_ms must not exceed max_backoff_ms");
  });

  it("数値でない環境変数はエラー", () => {
    expect(() => loadConfig({ env: { AI_REVIEWER_MAX_TOTAL_FINDINGS: "" } })).toThrow(ConfigError);
    expect(() => loadConfig({ env: { AI_REVIEWER_CONCURRENCY: "many" } })).toThrow(ConfigError);
  });
});

describe("parseConfigYaml", () => {
  it("YAMLとして読めなければ ConfigError", () => {
    expect(() => parseConfigYaml("review: [unclosed", "custom.yml")).toThrow(/^Failed to parse custom\.yml: /);
  });

  it("トップレベルがマッピングでなければ ConfigError", () => {
    expect(() => parseConfigYaml("- a\n- b\n", "custom.yml")).toThrow("custom.yml must contain a mapping at the top level");
  });
});

describe("readEnvOverrides", () => {
  it("AI_REVIEWER_* だけを設定の形に変換する", () => {
    expect(
      readEnvOverrides({
        AI_REVIEWER_MODEL: " gemini-2.5-pro ",
        AI_REVIEWER_SIMILARITY_THRESHOLD: "0.8",
        AI_REVIEWER_PUBLISH_PARTIAL_ON_CANCEL: "TRUE",
        GITHUB_TOKEN: "test-secret",
      })
    ).toEqual({
      review: { similarity_threshold: 0.8 },
      model: { id: "gemini-2.5-pro" },
      publish: { partial_on_cancel: true },
    });
  });
});

describe("deepMerge", () => {
  it("ネストしたオブジェクトをマージし、配列は置き換える", () => {
    expect(deepMerge({ a: { x: 1, y: 2 }, list: [1, 2] }, { a: { y: 3 }, list: [9] })).toEqual({
      a: { x: 1, y: 3 },
      list: [9],
    });
  });
});
