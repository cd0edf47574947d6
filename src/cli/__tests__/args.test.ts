/**
 * CLI Argument Tests
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import {
  EXIT_CODES,
  exitCodeForOutcome,
  parsePullNumber,
  parseRepo,
  parseTimeout,
  readCredentials,
  toPullRequestRef,
} from "../args.js";
import { ConfigError } from "../../lib/errors/errors.js";

describe("parseRepo", () => {
  it("owner/name を分解する", () => {
    expect(parseRepo("acme/widgets")).toEqual({ owner: "acme", repo: "widgets" });
    expect(parseRepo(" my-org/repo.js ")).toEqual({ owner: "my-org", repo: "repo.js" });
  });

  it.each(["acme", "acme/widgets/extra", "/widgets", "acme/"])("不正な形式 %s は拒否する", (value) => {
    expect(() => parseRepo(value)).toThrow(InvalidArgumentError);
  });
});

describe("parsePullNumber / parseTimeout", () => {
  it("正の整数だけを受け付ける", () => {
    expect(parsePullNumber("42")).toBe(42);
    expect(() => parsePullNumber("0")).toThrow(InvalidArgumentError);
    expect(() => parsePullNumber("1.5")).toThrow(InvalidArgumentError);
    expect(parseTimeout("60000")).toBe(60000);
    expect(() => parseTimeout("soon")).toThrow(InvalidArgumentError);
  });
});

describe("toPullRequestRef", () => {
  it("リポジトリとPR番号からPR参照を作る", () => {
    expect(toPullRequestRef({ owner: "acme", repo: "widgets" }, 7)).toEqual({ owner: "acme", repo: "widgets", number: 7 });
  });
});

describe("exitCodeForOutcome", () => {
  it("実行結果ごとの終了コード", () => {
    expect(exitCodeForOutcome("done")).toBe(0);
    expect(exitCodeForOutcome("failed")).toBe(1);
    expect(exitCodeForOutcome("cancelled")).toBe(2);
    expect(EXIT_CODES.usage).toBe(3);
  });
});

describe("readCredentials", () => {
  it("両方のトークンを読む", () => {
    expect(readCredentials({ GITHUB_TOKEN: "test-token", GOOGLE_GENERATIVE_AI_API_KEY: "test-key" })).toEqual({
      githubToken: "test-token",
      googleApiKey: "test-key",
    });
  });

  it("不足している変数を列挙する", () => {
    expect(() => readCredentials({ GITHUB_TOKEN: "  " })).toThrow(
      new ConfigError("Missing credentials: set GITHUB_TOKEN and GOOGLE_GENERATIVE_AI_API_KEY")
    );
  });
});
