import { describe, expect, it } from "vitest";
import {
  calculateDataQualityScore,
  freshnessScore,
} from "../src/tasks/github/data-quality";
import { transform, type RenderUsage } from "../src/tasks/github/transform";
import { rawRow } from "./fixtures";

const fetchedAt = new Date("2024-06-10T00:00:00Z");

function daysBefore(days: number): Date {
  return new Date(fetchedAt.getTime() - days * 24 * 60 * 60 * 1000);
}

describe("transform", () => {
  it("stages a complete row", () => {
    const [staged] = transform([rawRow("acme/rocket")]);

    expect(staged).toEqual({
      fullName: "acme/rocket",
      url: "https://github.com/acme/rocket",
      category: "Python",
      sourceType: "language",
      language: "Python",
      description: "A tool",
      stars: 120,
      createdAt: new Date("2024-05-01T00:00:00Z"),
      updatedAt: new Date("2024-06-08T00:00:00Z"),
      readme: null,
      fetchedAt,
      renderCategory: null,
      usesRender: false,
      dataQualityScore: 0.97,
    });
  });

  it("floors fractional star counts", () => {
    const [staged] = transform([rawRow("acme/fraction", { stars: 3.7 })]);

    expect(staged.stars).toBe(3);
  });

  it("scores freshness against the reference date, not the fetch time", () => {
    const asOf = new Date("2024-06-10T00:00:00Z");
    const fetchedAround = (time: string) =>
      rawRow("acme/rerun", {
        updatedAt: "2024-06-09T12:00:00Z",
        fetchedAt: new Date(time),
      });

    const [noon] = transform([fetchedAround("2024-06-10T12:00:00Z")], { asOf });
    const [later] = transform([fetchedAround("2024-06-10T13:00:00Z")], {
      asOf,
    });
    // half a day before the reference: fully fresh
    expect(noon.dataQualityScore).toBe(1);
    expect(later.dataQualityScore).toBe(1);

    // 25 hours before the fetch: 0.9 fresh
    const [unpinned] = transform([fetchedAround("2024-06-10T13:00:00Z")]);
    expect(unpinned.dataQualityScore).toBe(0.97);
  });

  it("carries stored Render usage onto the staged row", () => {
    const staged = transform([rawRow("r/eco"), rawRow("p/plain")], {
      renderUsage: new Map<string, RenderUsage>([
        ["r/eco", { renderCategory: "community", usesRender: true }],
      ]),
    });

    expect(
      staged.map((r) => [r.fullName, r.renderCategory, r.usesRender])
    ).toEqual([
      ["p/plain", null, false],
      ["r/eco", "community", true],
    ]);
  });

  it("fills defaults for missing fields", () => {
    const [staged] = transform([
      rawRow("acme/bare", {
        url: null,
        language: null,
        description: null,
        stars: null,
        createdAt: "not a date",
        updatedAt: null,
      }),
    ]);

    expect(staged.url).toBe("https://github.com/acme/bare");
    expect(staged.language).toBe("Unknown");
    expect(staged.description).toBe("");
    expect(staged.stars).toBe(0);
    expect(staged.createdAt).toEqual(new Date(0));
    expect(staged.updatedAt).toBeNull();
    // completeness 0, freshness 0, consistency 0.5 (invalid stars)
    expect(staged.dataQualityScore).toBe(0.15);
  });

  it("drops an update time earlier than the creation time", () => {
    const [staged] = transform([
      rawRow("acme/skewed", {
        createdAt: "2024-05-10T00:00:00Z",
        updatedAt: "2024-05-01T00:00:00Z",
      }),
    ]);

    expect(staged.updatedAt).toBeNull();
    // completeness 1, freshness 0, consistency 0.5
    expect(staged.dataQualityScore).toBe(0.55);
  });

  it("treats a blank description as missing", () => {
    const [staged] = transform([rawRow("acme/blank", { description: "   " })]);

    expect(staged.description).toBe("");
    // completeness 0.75, freshness 0.9, consistency 1
    expect(staged.dataQualityScore).toBe(0.87);
  });

  it("keeps the latest fetch per repository and orders by identity", () => {
    const staged = transform([
      rawRow("b/second", { stars: 5 }),
      rawRow("a/first", { stars: 1, fetchedAt: daysBefore(1) }),
      rawRow("a/first", { stars: 2 }),
    ]);

    expect(staged.map((r) => [r.fullName, r.stars])).toEqual([
      ["a/first", 2],
      ["b/second", 5],
    ]);
  });

  it("returns an empty list for no rows", () => {
    expect(transform([])).toEqual([]);
  });
});

describe("data quality", () => {
  it.each([
    [0.5, 1.0],
    [1, 1.0],
    [3, 0.9],
    [10, 0.7],
    [60, 0.5],
    [120, 0.3],
    [365, 0.3],
  ])("scores an update %s days old as %s fresh", (days, expected) => {
    expect(freshnessScore(daysBefore(days), fetchedAt)).toBe(expected);
  });

  it("scores a missing update time as not fresh", () => {
    expect(freshnessScore(null, fetchedAt)).toBe(0);
  });

  it("stays within [0, 1]", () => {
    const best = calculateDataQualityScore({
      hasDescription: true,
      hasKnownLanguage: true,
      hasUrl: true,
      hasCreatedAt: true,
      updatedAt: fetchedAt,
      asOf: fetchedAt,
      validStarCount: true,
      consistentTimestamps: true,
    });
    const worst = calculateDataQualityScore({
      hasDescription: false,
      hasKnownLanguage: false,
      hasUrl: false,
      hasCreatedAt: false,
      updatedAt: null,
      asOf: fetchedAt,
      validStarCount: false,
      consistentTimestamps: false,
    });

    expect(best).toBe(1);
    expect(worst).toBe(0);
  });
});
