import { InvalidArgumentError } from "commander";
import type { PullRequestRef } from "../lib/diff/types.js";
import { ConfigError } from "../lib/errors/errors.js";
import type { RunOutcome } from "../lib/review/types.js";

// 0: done / 1: failed / 2: cancelled / 3: 引数・設定エラー
export const EXIT_CODES = {
  done: 0,
  failed: 1,
  cancelled: 2,
  usage: 3,
} as const;

export function exitCodeForOutcome(outcome: RunOutcome): number {
  return EXIT_CODES[outcome];
}

/**
 * "owner/name" 形式のリポジトリ指定をパース
 */
export function parseRepo(value: string): { owner: string; repo: string } {
  const match = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError(`Expected owner/name, got "${value}".`);
  }
  return { owner: match[1], repo: match[2] };
}

export function parsePullNumber(value: string): number {
  const number = Number(value);
  if (!Number.isInteger(number) || number <= 0) {
    throw new InvalidArgumentError(`Expected a positive pull request number, got "${value}".`);
  }
  return number;
}

export function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError(`Expected a timeout in milliseconds, got "${value}".`);
  }
  return ms;
}

export function toPullRequestRef(repo: { owner: string; repo: string }, number: number): PullRequestRef {
  return { owner: repo.owner, repo: repo.repo, number };
}

export interface Credentials {
  githubToken: string;
  googleApiKey: string;
}

/**
 * 環境変数から認証情報を読む（不足は ConfigError）
 */
export function readCredentials(env: NodeJS.ProcessEnv): Credentials {
  const githubToken = env.GITHUB_TOKEN?.trim() ?? "";
  const googleApiKey = env.GOOGLE_GENERATIVE_AI_API_KEY?.trim() ?? "";

  const missing = [
    ...(githubToken ? [] : ["GITHUB_TOKEN"]),
    ...(googleApiKey ? [] : ["GOOGLE_GENERATIVE_AI_API_KEY"]),
  ];
  if (missing.length > 0) {
    throw new ConfigError(`Missing credentials: set ${missing.join(" and ")}`);
  }

  return { githubToken, googleApiKey };
}
