import { describe, expect, it } from "vitest";
import {
  recencyScore,
  score,
  scoreAll,
  starScore,
} from "../src/tasks/github/scoring";
import { stagedRepo } from "./fixtures";

const asOf = new Date("2024-06-30T00:00:00Z");

describe("starScore", () => {
  it("divides by the largest star count in the population", () => {
    const population = [{ stars: 100 }, { stars: 50 }, { stars: 0 }];
    expect(starScore({ stars: 50 }, population)).toBe(0.5);
    expect(starScore({ stars: 100 }, population)).toBe(1);
    expect(starScore({ stars: 0 }, population)).toBe(0);
  });

  it("gives a lone repository full marks", () => {
    expect(starScore({ stars: 3 }, [{ stars: 3 }])).toBe(1);
    expect(starScore({ stars: 0 }, [{ stars: 0 }])).toBe(1);
  });

  it("scores zero when nobody has stars", () => {
    expect(starScore({ stars: 0 }, [{ stars: 0 }, { stars: 0 }])).toBe(0);
  });
});

describe("recencyScore", () => {
  it.each([
    ["2024-06-01T00:00:00Z", 1],
    ["2024-05-31T00:00:00Z", 1],
    ["2024-05-30T00:00:00Z", 0.75],
    ["2024-05-01T00:00:00Z", 0.75],
    ["2024-04-30T00:00:00Z", 0.5],
    ["2024-04-01T00:00:00Z", 0.5],
    ["2024-03-31T00:00:00Z", 0],
    ["2024-07-05T00:00:00Z", 1],
  ])("scores a repository created %s as %s", (createdAt, expected) => {
    expect(recencyScore(new Date(createdAt), asOf)).toBe(expected);
  });
});

describe("score", () => {
  it("blends star and recency scores with equal weights", () => {
    const repo = stagedRepo("a/half", {
      stars: 50,
      createdAt: new Date("2024-06-20T00:00:00Z"),
    });
    const population = [repo, stagedRepo("a/top", { stars: 100 })];

    expect(score(repo, population, { asOf })).toEqual({
      starScore: 0.5,
      recencyScore: 1,
      momentum: 0.75,
    });
  });

  it("applies custom weights", () => {
    const repo = stagedRepo("a/half", {
      stars: 50,
      createdAt: new Date("2024-06-20T00:00:00Z"),
    });
    const population = [repo, stagedRepo("a/top", { stars: 100 })];

    const result = score(repo, population, {
      asOf,
      weights: { stars: 1, recency: 0 },
    });
    expect(result.momentum).toBe(0.5);
  });

  it("rejects negative weights", () => {
    const repo = stagedRepo("a/one");
    expect(() =>
      score(repo, [repo], { asOf, weights: { stars: -1, recency: 1 } })
    ).toThrow(RangeError);
  });
});

describe("scoreAll", () => {
  it("scores each repository against its own category", () => {
    const staged = [
      stagedRepo("p/top", { stars: 100 }),
      stagedRepo("p/half", { stars: 50 }),
      stagedRepo("g/solo", { stars: 10, category: "Go", language: "Go" }),
    ];

    const scores = scoreAll(staged, { asOf });

    expect(scores.get("p/top")?.starScore).toBe(1);
    expect(scores.get("p/half")?.starScore).toBe(0.5);
    expect(scores.get("g/solo")?.starScore).toBe(1);
    // created 2023-01-01, far outside the recency window
    expect(scores.get("p/half")?.momentum).toBe(0.25);
  });
});
