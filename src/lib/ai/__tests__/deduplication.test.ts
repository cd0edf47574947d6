/**
 * Aggregation / Deduplication Tests
 *
 * - 同じ入力を重複させても、順序を変えても結果は同じ
 * - 結果は path → line 順
 * - 同じ行の近似重複は1件にまとめる
 */

import { describe, it, expect } from "vitest";
import { aggregateFindings, formatAggregationSummary } from "../deduplication.js";
import { makeFinding } from "../../__tests__/fixtures.js";

const SQL_A = makeFinding({
  path: "app/a.py",
  line: 42,
  severity: "blocking",
  category: "security",
  title: "SQL injection",
  body: "Possible SQL injection: user input is concatenated into the query",
  chunkId: "chunk-0",
});
const SQL_B = makeFinding({
  path: "app/a.py",
  line: 42,
  severity: "warning",
  category: "security",
  title: "Unsafe query",
  body: "SQL injection risk: user input concatenated into query string",
  chunkId: "chunk-1",
});
const NAMING = makeFinding({
  path: "app/a.py",
  line: 42,
  severity: "info",
  category: "style",
  title: "Naming",
  body: "Variable name cursor2 is unclear",
});

describe("aggregateFindings", () => {
  it("1件の指摘をコメントに変換する", () => {
    const { comments } = aggregateFindings([makeFinding()]);

    expect(comments).toEqual([
      {
        path: "src/a.ts",
        line: 1,
        severity: "warning",
        category: "correctness",
        title: "Null dereference",
        body: "🟠 **[warning]** Null dereference _(correctness)_\n\nPossible null dereference here",
        description: "Possible null dereference here",
        fingerprints: ["src/a.ts:1:Possible null dereference here"],
      },
    ]);
  });

  it("同じ行の近似重複をまとめ、別の論点は残す", () => {
    const { comments, stats } = aggregateFindings([NAMING, SQL_B, SQL_A]);

    expect(comments).toHaveLength(2);
    const [sql, naming] = comments;
    expect(sql.severity).toBe("blocking");
    expect(sql.title).toBe("SQL injection");
    expect(sql.body).toBe(
      [
        "🔴 **[blocking]** SQL injection _(security)_",
        "",
        `- ${SQL_A.body}`,
        `- ${SQL_B.body}`,
      ].join("\n")
    );
    expect(sql.fingerprints).toEqual([SQL_A.fingerprint, SQL_B.fingerprint].sort());
    expect(naming.title).toBe("Naming");
    expect(stats.nearDuplicates).toBe(1);
  });

  it("別チャンクの完全一致は1件にする", () => {
    const first = makeFinding({ chunkId: "chunk-0" });
    const second = makeFinding({ chunkId: "chunk-1" });

    const { comments, stats } = aggregateFindings([first, second]);

    expect(comments).toHaveLength(1);
    expect(comments[0].fingerprints).toHaveLength(1);
    expect(stats.exactDuplicates).toBe(1);
  });

  it("入力を重複させても順序を変えても結果は同じ", () => {
    const findings = [SQL_A, SQL_B, NAMING, makeFinding(), makeFinding({ path: "src/b.ts", line: 3 })];
    const expected = aggregateFindings(findings).comments;

    expect(aggregateFindings([...findings, ...findings]).comments).toEqual(expected);
    expect(aggregateFindings([...findings].reverse()).comments).toEqual(expected);
  });

  it("path → line 順に並べる", () => {
    const { comments } = aggregateFindings([
      makeFinding({ path: "src/b.ts", line: 1 }),
      makeFinding({ path: "src/a.ts", line: 5 }),
      makeFinding({ path: "src/a.ts", line: 2 }),
    ]);

    expect(comments.map((c) => `${c.path}:${c.line}`)).toEqual(["src/a.ts:2", "src/a.ts:5", "src/b.ts:1"]);
  });

  it("最小深刻度と対象カテゴリでフィルタする", () => {
    const { comments, stats } = aggregateFindings(
      [
        makeFinding({ line: 1, severity: "info" }),
        makeFinding({ line: 2, severity: "warning", category: "style" }),
        makeFinding({ line: 3, severity: "blocking" }),
      ],
      { minSeverity: "warning", categories: ["correctness", "security"] }
    );

    expect(comments.map((c) => c.line)).toEqual([3]);
    expect(stats.belowMinSeverity).toBe(1);
    expect(stats.excludedCategory).toBe(1);
  });

  it("ファイルごとの上限では深刻度の高いものを残す", () => {
    const { comments, stats } = aggregateFindings(
      [
        makeFinding({ line: 1, severity: "info" }),
        makeFinding({ line: 2, severity: "blocking" }),
        makeFinding({ line: 3, severity: "warning" }),
      ],
      { maxFindingsPerFile: 2 }
    );

    expect(comments.map((c) => [c.line, c.severity])).toEqual([
      [2, "blocking"],
      [3, "warning"],
    ]);
    expect(stats.cappedPerFile).toBe(1);
  });

  it("全体の上限を適用する", () => {
    const { comments, stats } = aggregateFindings(
      [makeFinding({ path: "src/a.ts", severity: "suggestion" }), makeFinding({ path: "src/b.ts", severity: "blocking" })],
      { maxTotalFindings: 1 }
    );

    expect(comments.map((c) => c.path)).toEqual(["src/b.ts"]);
    expect(stats.cappedTotal).toBe(1);
  });

  it("まとめた指摘の提案をsuggestion blockで付ける", () => {
    const { comments } = aggregateFindings([makeFinding({ suggestion: "if (user) {" })]);

    expect(comments[0].body.endsWith("\n\n```suggestion\nif (user) {\n```")).toBe(true);
  });

  it("指摘がなければコメントも0件", () => {
    expect(aggregateFindings([]).comments).toEqual([]);
  });
});

describe("formatAggregationSummary", () => {
  it("除外した件数を列挙する", () => {
    expect(
      formatAggregationSummary({
        input: 5,
        belowMinSeverity: 1,
        excludedCategory: 0,
        exactDuplicates: 2,
        nearDuplicates: 0,
        cappedPerFile: 0,
        cappedTotal: 0,
        output: 2,
      })
    ).toBe("5 findings -> 2 comments (below min severity: 1, exact duplicates: 2)");
  });
});
