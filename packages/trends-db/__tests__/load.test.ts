import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { sql } from "drizzle-orm";
import { openDatabase, type TrendsDatabase } from "../src/db";
import { LoadError } from "../src/errors";
import * as queries from "../src/tasks/github/github.queries";
import { load } from "../src/tasks/github/load";
import { scoreAll } from "../src/tasks/github/scoring";
import type { StagedRepository } from "../src/types";
import { stagedRepo } from "./fixtures";

const DAY_ONE = new Date("2024-06-01T00:00:00Z");
const DAY_TWO = new Date("2024-06-02T00:00:00Z");

let database: TrendsDatabase;

function baseline(): StagedRepository[] {
  return [
    stagedRepo("a/alpha", { stars: 100 }),
    stagedRepo("b/beta", { stars: 50 }),
    stagedRepo("c/gamma", { stars: 10, category: "Go", language: "Go" }),
  ];
}

async function loadDay(staged: StagedRepository[], date: Date) {
  return load(database, staged, scoreAll(staged, { asOf: date }), date);
}

function countRows(table: "dim_repository" | "fact_repo_snapshot"): number {
  const [row] = database
    .getDB()
    .all<{ total: number }>(sql.raw(`SELECT COUNT(*) AS total FROM ${table}`));
  return row.total;
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  database = openDatabase(":memory:");
});

afterEach(async () => {
  vi.restoreAllMocks();
  await database.shutdown();
});

describe("load", () => {
  it("inserts dimensions and ranked facts", async () => {
    const result = await loadDay(baseline(), DAY_ONE);

    expect(result).toEqual({
      inserted: 3,
      versioned: 0,
      unchanged: 0,
      factsWritten: 3,
      factsRemoved: 0,
    });

    const facts = await queries.getFactsForDate(database.getDB(), DAY_ONE);
    // alpha and gamma tie on momentum 0.5; alpha has more stars
    expect(
      facts.map((f) => [f.repoFullName, f.rankOverall, f.rankInLanguage])
    ).toEqual([
      ["a/alpha", 1, 1],
      ["c/gamma", 2, 1],
      ["b/beta", 3, 2],
    ]);
    expect(facts[2].momentumScore).toBe(0.25);
    expect(facts[0].snapshotDate).toEqual(DAY_ONE);
  });

  it("leaves the tables unchanged when rerun with the same input", async () => {
    await loadDay(baseline(), DAY_ONE);
    const before = await queries.getFactsForDate(database.getDB(), DAY_ONE);

    const result = await loadDay(baseline(), DAY_ONE);

    expect(result.inserted).toBe(0);
    expect(result.unchanged).toBe(3);
    expect(result.factsRemoved).toBe(0);
    expect(countRows("dim_repository")).toBe(3);
    expect(countRows("fact_repo_snapshot")).toBe(3);

    const after = await queries.getFactsForDate(database.getDB(), DAY_ONE);
    expect(after.map(({ createdAt, ...fact }) => fact)).toEqual(
      before.map(({ createdAt, ...fact }) => fact)
    );
  });

  it("opens a new version when a tracked attribute changes", async () => {
    await loadDay(baseline(), DAY_ONE);

    const changed = baseline().map((repo) =>
      repo.fullName === "b/beta" ? { ...repo, description: "rewritten" } : repo
    );
    const result = await loadDay(changed, DAY_TWO);

    expect(result.versioned).toBe(1);
    expect(result.unchanged).toBe(2);

    const history = await queries.getDimensionHistory(
      database.getDB(),
      "b/beta"
    );
    expect(history).toHaveLength(2);
    expect(history[0]).toMatchObject({
      description: "b/beta description",
      validFrom: DAY_ONE,
      validTo: DAY_TWO,
      isCurrent: false,
    });
    expect(history[1]).toMatchObject({
      description: "rewritten",
      validFrom: DAY_TWO,
      validTo: null,
      isCurrent: true,
    });

    const [betaFact] = (
      await queries.getFactsForDate(database.getDB(), DAY_TWO)
    ).filter((fact) => fact.repoFullName === "b/beta");
    expect(betaFact.repoKey).toBe(history[1].repoKey);
    expect(countRows("fact_repo_snapshot")).toBe(6);
  });

  it("opens a new version when Render usage changes", async () => {
    await loadDay(baseline(), DAY_ONE);

    const detected = baseline().map((repo) =>
      repo.fullName === "b/beta"
        ? { ...repo, renderCategory: "community" as const, usesRender: true }
        : repo
    );
    const result = await loadDay(detected, DAY_TWO);

    expect(result.versioned).toBe(1);
    const history = await queries.getDimensionHistory(
      database.getDB(),
      "b/beta"
    );
    expect(
      history.map((v) => [v.renderCategory, v.usesRender, v.isCurrent])
    ).toEqual([
      [null, false, false],
      ["community", true, true],
    ]);
  });

  it("does not version on star changes", async () => {
    await loadDay(baseline(), DAY_ONE);

    const moreStars = baseline().map((repo) => ({
      ...repo,
      stars: repo.stars + 5,
    }));
    const result = await loadDay(moreStars, DAY_TWO);

    expect(result.versioned).toBe(0);
    expect(countRows("dim_repository")).toBe(3);
  });

  it("removes facts for repositories no longer in the snapshot", async () => {
    await loadDay(baseline(), DAY_ONE);

    const result = await loadDay(
      baseline().filter((repo) => repo.fullName !== "c/gamma"),
      DAY_ONE
    );

    expect(result.factsRemoved).toBe(1);
    const facts = await queries.getFactsForDate(database.getDB(), DAY_ONE);
    expect(facts.map((f) => f.repoFullName)).toEqual(["a/alpha", "b/beta"]);
  });

  it("rolls back every write when one fails", async () => {
    database.exec(`
      CREATE TRIGGER fail_gamma_fact BEFORE INSERT ON fact_repo_snapshot
      WHEN NEW.repo_full_name = 'c/gamma'
      BEGIN SELECT RAISE(ABORT, 'boom'); END;
    `);

    const attempt = loadDay(baseline(), DAY_ONE);

    await expect(attempt).rejects.toBeInstanceOf(LoadError);
    await expect(attempt).rejects.toThrow(/boom/);
    expect(countRows("dim_repository")).toBe(0);
    expect(countRows("fact_repo_snapshot")).toBe(0);
  });

  it("rejects a repository without a score before writing", async () => {
    await expect(
      load(database, baseline(), new Map(), DAY_ONE)
    ).rejects.toBeInstanceOf(LoadError);
    expect(countRows("dim_repository")).toBe(0);
  });

  it("refuses an empty snapshot and keeps the date's facts", async () => {
    await loadDay(baseline(), DAY_ONE);

    const attempt = load(database, [], new Map(), DAY_ONE);

    await expect(attempt).rejects.toBeInstanceOf(LoadError);
    await expect(attempt).rejects.toThrow("Nothing to load for 2024-06-01");
    expect(countRows("fact_repo_snapshot")).toBe(3);
  });

  it("keeps one current version per repository", async () => {
    await loadDay(baseline(), DAY_ONE);
    await loadDay(
      baseline().map((repo) => ({ ...repo, language: "Rust" })),
      DAY_TWO
    );

    const rows = database
      .getDB()
      .all<{ repo_full_name: string; current: number }>(
        sql`SELECT repo_full_name, SUM(is_current) AS current FROM dim_repository GROUP BY repo_full_name ORDER BY repo_full_name`
      );
    expect(rows).toEqual([
      { repo_full_name: "a/alpha", current: 1 },
      { repo_full_name: "b/beta", current: 1 },
      { repo_full_name: "c/gamma", current: 1 },
    ]);
  });
});
