#!/usr/bin/env node

import { Command, CommanderError } from "commander";
import chalk from "chalk";
import ora, { type Ora } from "ora";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { createGoogleProvider } from "../lib/ai/client.js";
import { REPO_CONFIG_FILENAME, loadConfig, type ReviewConfig } from "../lib/config/index.js";
import type { PullRequestRef } from "../lib/diff/types.js";
import { ConfigError, getErrorMessage } from "../lib/errors/errors.js";
import { GitHubHost, createOctokit, createOctokitApi, formatRef } from "../lib/github/client.js";
import type { SourceControlHost } from "../lib/github/types.js";
import { runReviewPipeline, type PipelineEvent } from "../lib/review/pipeline.js";
import { formatRunSummary } from "../lib/review/summary.js";
import type { RunResult } from "../lib/review/types.js";
import { freeEncoder } from "../lib/tokenizer/index.js";
import {
  EXIT_CODES,
  exitCodeForOutcome,
  parsePullNumber,
  parseRepo,
  parseTimeout,
  readCredentials,
  toPullRequestRef,
} from "./args.js";

interface ReviewCommandOptions {
  repo: { owner: string; repo: string };
  pr: number;
  timeout?: number;
  config?: string;
  dryRun?: boolean;
}

/**
 * 設定を読み込む
 * --config 指定時はそのファイル、なければPRのheadにある .ai-reviewer.yml
 */
async function resolveConfig(
  host: SourceControlHost,
  ref: PullRequestRef,
  configPath: string | undefined,
  signal: AbortSignal
): Promise<ReviewConfig> {
  if (configPath) {
    const absolutePath = resolve(configPath);
    let content: string;
    try {
      content = await readFile(absolutePath, { encoding: "utf-8", signal });
    } catch (error) {
      throw new ConfigError(`Could not read config file ${absolutePath}: ${getErrorMessage(error)}`);
    }
    return loadConfig({ fileContent: content, fileSource: absolutePath, env: process.env });
  }

  const pr = await host.getPullRequest(ref, signal);
  const file = await host.getFile(ref, REPO_CONFIG_FILENAME, pr.headSha, signal);
  return loadConfig({ fileContent: file?.content, env: process.env });
}

function describeEvent(event: PipelineEvent): string {
  switch (event.type) {
    case "state":
      return `${event.state}...`;
    case "chunks":
      return `Split diff into ${event.total} chunk(s)`;
    case "chunk":
      return `Reviewed ${event.completed}/${event.total} chunks`;
  }
}

function printResult(result: RunResult, dryRun: boolean): void {
  const color = result.outcome === "done" ? chalk.green : result.outcome === "failed" ? chalk.red : chalk.yellow;
  console.log("\n" + chalk.cyan("━".repeat(60)));
  console.log(color(formatRunSummary(result.summary)));

  const failedChunks = result.chunkOutcomes.filter((outcome) => outcome.status === "failed");
  for (const chunk of failedChunks) {
    console.log(chalk.red(`  ✗ ${chunk.chunkId}: ${chunk.error ?? "failed"}`));
  }

  if (dryRun && result.comments.length > 0) {
    console.log(chalk.bold("\nComments (not posted):"));
    for (const comment of result.comments) {
      console.log(`  ${comment.path}:${comment.line} ${chalk.bold(`[${comment.severity}]`)} ${comment.title}`);
    }
  }
  console.log(chalk.cyan("━".repeat(60)));
}

function finishSpinner(spinner: Ora, result: RunResult, ref: PullRequestRef): void {
  const label = `${formatRef(ref)}: ${result.outcome}${result.summary.reason ? ` (${result.summary.reason})` : ""}`;
  if (result.outcome === "done") spinner.succeed(label);
  else if (result.outcome === "failed") spinner.fail(label);
  else spinner.warn(label);
}

/**
 * review コマンド
 */
async function reviewCommand(options: ReviewCommandOptions): Promise<number> {
  const ref = toPullRequestRef(options.repo, options.pr);
  const spinner = ora(`Reviewing ${formatRef(ref)}...`).start();

  const controller = new AbortController();
  const timer =
    options.timeout !== undefined
      ? setTimeout(() => controller.abort(new Error(`Timed out after ${options.timeout}ms`)), options.timeout)
      : undefined;
  const onSigint = () => controller.abort(new Error("Interrupted"));
  process.once("SIGINT", onSigint);

  try {
    const credentials = readCredentials(process.env);
    const host = new GitHubHost(createOctokitApi(createOctokit(credentials.githubToken)));

    spinner.text = "Loading configuration...";
    const config = await resolveConfig(host, ref, options.config, controller.signal);
    const provider = createGoogleProvider({ apiKey: credentials.googleApiKey, modelId: config.modelId });

    const result = await runReviewPipeline(
      ref,
      { host, provider },
      {
        config,
        signal: controller.signal,
        dryRun: options.dryRun,
        onEvent: (event) => {
          spinner.text = describeEvent(event);
        },
      }
    );

    finishSpinner(spinner, result, ref);
    printResult(result, options.dryRun ?? false);
    return exitCodeForOutcome(result.outcome);
  } catch (error) {
    // 設定の読み込み中に中断された
    if (controller.signal.aborted) {
      spinner.warn(chalk.yellow(`${formatRef(ref)}: cancelled (${getErrorMessage(controller.signal.reason)})`));
      return EXIT_CODES.cancelled;
    }
    if (error instanceof ConfigError) {
      spinner.fail(chalk.red(`Configuration error: ${error.message}`));
      return EXIT_CODES.usage;
    }
    spinner.fail(chalk.red(`Error: ${getErrorMessage(error)}`));
    return EXIT_CODES.failed;
  } finally {
    if (timer) clearTimeout(timer);
    process.removeListener("SIGINT", onSigint);
    freeEncoder();
  }
}

// CLI Commands
const program = new Command();

program
  .name("reviewloom")
  .description("Review a GitHub pull request with a language model and post the findings as review comments")
  .version("0.1.0")
  .exitOverride();

program
  .command("review")
  .description("Review a pull request")
  .requiredOption("--repo <owner/name>", "repository", parseRepo)
  .requiredOption("--pr <number>", "pull request number", parsePullNumber)
  .option("--timeout <ms>", "cancel the run after this many milliseconds", parseTimeout)
  .option("--config <path>", `config file (defaults to ${REPO_CONFIG_FILENAME} at the PR head)`)
  .option("--dry-run", "review without posting comments")
  .action(async (options: ReviewCommandOptions) => {
    process.exitCode = await reviewCommand(options);
  });

try {
  await program.parseAsync();
} catch (error) {
  if (error instanceof CommanderError) {
    // --help / --version は正常終了
    process.exitCode = error.exitCode === 0 ? EXIT_CODES.done : EXIT_CODES.usage;
  } else {
    console.error(chalk.red(`Error: ${getErrorMessage(error)}`));
    process.exitCode = EXIT_CODES.failed;
  }
}

// 中断後に破棄したモデル呼び出しを待たない
process.exit(process.exitCode ?? EXIT_CODES.done);
