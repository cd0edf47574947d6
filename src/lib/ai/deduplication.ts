/**
 * Aggregation / Deduplication Module
 *
 * 全チャンクの指摘を統合し、重複除去・上限適用・並べ替えを行って
 * 最終的なレビューコメント集合を作る
 * pr-agentの重複除去戦略を参考に実装
 *
 * 入力順に依存せず、同じ入力を重複させても結果は変わらない
 */

import {
  CATEGORIES,
  DEFAULT_MAX_FINDINGS_PER_FILE,
  DEFAULT_MAX_TOTAL_FINDINGS,
  DEFAULT_SIMILARITY_THRESHOLD,
  SEVERITY_ORDER,
  type Category,
  type Severity,
} from "./constants.js";
import { calculateCombinedSimilarity, normalizeContent } from "./fingerprint.js";
import { formatCommentBody, isValidSuggestion } from "../github/suggestion-formatter.js";
import type { Finding, ReviewComment } from "../review/types.js";

// ========================================
// 設定
// ========================================

export interface AggregateOptions {
  minSeverity: Severity;
  categories: readonly Category[];
  // 同じ行の指摘を1つにまとめる類似度閾値（0.0-1.0）
  similarityThreshold: number;
  maxFindingsPerFile: number;
  maxTotalFindings: number;
}

export const DEFAULT_AGGREGATE_OPTIONS: AggregateOptions = {
  minSeverity: "info",
  categories: CATEGORIES,
  similarityThreshold: DEFAULT_SIMILARITY_THRESHOLD,
  maxFindingsPerFile: DEFAULT_MAX_FINDINGS_PER_FILE,
  maxTotalFindings: DEFAULT_MAX_TOTAL_FINDINGS,
};

// まとめた指摘のうち、これ以上似ている本文は同じ論点として1つだけ残す
const DISTINCT_POINT_THRESHOLD = 0.9;

// ========================================
// 型定義
// ========================================

export interface AggregateStats {
  input: number;
  belowMinSeverity: number;
  excludedCategory: number;
  exactDuplicates: number;
  nearDuplicates: number;
  cappedPerFile: number;
  cappedTotal: number;
  output: number;
}

export interface AggregateResult {
  comments: ReviewComment[];
  stats: AggregateStats;
}

interface Cluster {
  leader: Finding;
  members: Finding[];
}

// ========================================
// 並べ替え
// ========================================

// ロケールに依存しないコードポイント順の比較
function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareFindings(a: Finding, b: Finding): number {
  return (
    compareStrings(a.path, b.path) ||
    a.line - b.line ||
    SEVERITY_ORDER[b.severity] - SEVERITY_ORDER[a.severity] ||
    compareStrings(a.fingerprint, b.fingerprint) ||
    compareStrings(a.chunkId, b.chunkId)
  );
}

export function compareComments(a: ReviewComment, b: ReviewComment): number {
  return (
    compareStrings(a.path, b.path) ||
    a.line - b.line ||
    SEVERITY_ORDER[b.severity] - SEVERITY_ORDER[a.severity] ||
    compareStrings(a.body, b.body)
  );
}

// 上限適用時の優先順位（深刻度が高いものを残す）
function comparePriority(a: ReviewComment, b: ReviewComment): number {
  return SEVERITY_ORDER[b.severity] - SEVERITY_ORDER[a.severity] || compareComments(a, b);
}

// ========================================
// 各ステップ
// ========================================

/**
 * フィンガープリントでグループ化し、最も深刻度の高いものを代表として残す
 * 入力は compareFindings 順に並んでいること
 */
function groupByFingerprint(sorted: readonly Finding[]): Finding[] {
  const byFingerprint = new Map<string, Finding>();
  for (const finding of sorted) {
    const existing = byFingerprint.get(finding.fingerprint);
    if (!existing || SEVERITY_ORDER[finding.severity] > SEVERITY_ORDER[existing.severity]) {
      byFingerprint.set(finding.fingerprint, finding);
    }
  }
  return [...byFingerprint.values()].sort(compareFindings);
}

/**
 * 同じ (path, line) で本文が類似する指摘をクラスタにまとめる
 */
function clusterNearDuplicates(findings: readonly Finding[], threshold: number): Cluster[] {
  const clusters: Cluster[] = [];
  const byLocation = new Map<string, Cluster[]>();

  for (const finding of findings) {
    const key = `${finding.path}\u0000${finding.line}`;
    const candidates = byLocation.get(key) ?? [];
    const match = candidates.find(
      (cluster) => calculateCombinedSimilarity(cluster.leader.body, finding.body) >= threshold
    );

    if (match) {
      match.members.push(finding);
      continue;
    }

    const cluster: Cluster = { leader: finding, members: [finding] };
    candidates.push(cluster);
    byLocation.set(key, candidates);
    clusters.push(cluster);
  }

  return clusters;
}

function distinctPoints(members: readonly Finding[]): string[] {
  const points: string[] = [];
  const seen = new Set<string>();
  for (const member of members) {
    const normalized = normalizeContent(member.body);
    if (seen.has(normalized)) continue;
    if (points.some((point) => calculateCombinedSimilarity(point, member.body) >= DISTINCT_POINT_THRESHOLD)) {
      continue;
    }
    seen.add(normalized);
    points.push(member.body);
  }
  return points;
}

function toComment(cluster: Cluster): ReviewComment {
  const { leader, members } = cluster;
  const suggestion = members.find((member) => isValidSuggestion(member.suggestion))?.suggestion;
  const points = distinctPoints(members);

  return {
    path: leader.path,
    line: leader.line,
    severity: leader.severity,
    category: leader.category,
    title: leader.title,
    body: formatCommentBody({
      severity: leader.severity,
      category: leader.category,
      title: leader.title,
      points,
      suggestion,
    }),
    description: points.join("\n\n"),
    suggestion,
    fingerprints: [...new Set(members.map((member) => member.fingerprint))].sort(compareStrings),
  };
}

/**
 * ファイルごと・全体の上限を適用（深刻度の高いものを残す）
 */
function applyCaps(
  comments: readonly ReviewComment[],
  maxPerFile: number,
  maxTotal: number
): { kept: ReviewComment[]; cappedPerFile: number; cappedTotal: number } {
  const byFile = new Map<string, ReviewComment[]>();
  for (const comment of comments) {
    const list = byFile.get(comment.path) ?? [];
    list.push(comment);
    byFile.set(comment.path, list);
  }

  let cappedPerFile = 0;
  const perFile: ReviewComment[] = [];
  for (const list of byFile.values()) {
    const sorted = [...list].sort(comparePriority);
    perFile.push(...sorted.slice(0, maxPerFile));
    cappedPerFile += Math.max(0, sorted.length - maxPerFile);
  }

  const prioritized = perFile.sort(comparePriority);
  const kept = prioritized.slice(0, maxTotal);

  return { kept, cappedPerFile, cappedTotal: prioritized.length - kept.length };
}

// ========================================
// メイン関数
// ========================================

/**
 * 全チャンクの指摘を最終的なコメント集合に統合
 */
export function aggregateFindings(
  findings: readonly Finding[],
  options: Partial<AggregateOptions> = {}
): AggregateResult {
  const opts: AggregateOptions = { ...DEFAULT_AGGREGATE_OPTIONS, ...options };
  const minRank = SEVERITY_ORDER[opts.minSeverity];
  const allowedCategories = new Set<Category>(opts.categories);

  // 1. 深刻度・カテゴリでフィルタ
  let belowMinSeverity = 0;
  let excludedCategory = 0;
  const filtered = findings.filter((finding) => {
    if (SEVERITY_ORDER[finding.severity] < minRank) {
      belowMinSeverity++;
      return false;
    }
    if (!allowedCategories.has(finding.category)) {
      excludedCategory++;
      return false;
    }
    return true;
  });

  // 2. 完全一致（フィンガープリント）の重複を除去
  const sorted = [...filtered].sort(compareFindings);
  const unique = groupByFingerprint(sorted);

  // 3. 同じ行の近似重複をまとめる
  const clusters = clusterNearDuplicates(unique, opts.similarityThreshold);
  const merged = clusters.map(toComment);

  // 4. 上限
  const { kept, cappedPerFile, cappedTotal } = applyCaps(merged, opts.maxFindingsPerFile, opts.maxTotalFindings);

  // 5. path → line 順
  const comments = kept.sort(compareComments);

  const stats: AggregateStats = {
    input: findings.length,
    belowMinSeverity,
    excludedCategory,
    exactDuplicates: filtered.length - unique.length,
    nearDuplicates: unique.length - clusters.length,
    cappedPerFile,
    cappedTotal,
    output: comments.length,
  };

  console.log(`[Dedup] ${formatAggregationSummary(stats)}`);

  return { comments, stats };
}

/**
 * 統合結果のサマリーを生成
 */
export function formatAggregationSummary(stats: AggregateStats): string {
  const removed: string[] = [];
  if (stats.belowMinSeverity > 0) removed.push(`below min severity: ${stats.belowMinSeverity}`);
  if (stats.excludedCategory > 0) removed.push(`excluded category: ${stats.excludedCategory}`);
  if (stats.exactDuplicates > 0) removed.push(`exact duplicates: ${stats.exactDuplicates}`);
  if (stats.nearDuplicates > 0) removed.push(`merged near-duplicates: ${stats.nearDuplicates}`);
  if (stats.cappedPerFile > 0) removed.push(`per-file cap: ${stats.cappedPerFile}`);
  if (stats.cappedTotal > 0) removed.push(`total cap: ${stats.cappedTotal}`);

  return `${stats.input} findings -> ${stats.output} comments` + (removed.length > 0 ? ` (${removed.join(", ")})` : "");
}
