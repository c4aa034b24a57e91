import { asc, desc, eq, lte, and } from "drizzle-orm";
import type { TrendsDb } from "../../db";
import {
  analyticsCategoryRankings,
  analyticsPipelineRuns,
  analyticsRenderShowcase,
  analyticsRepoHistory,
  analyticsTrendingReposCurrent,
} from "../../schema";
import type { RenderCategory } from "../../schema";
import { CATEGORY_RANKING_TOP_N } from "./data-config";

// Readers over the analytics views. Every reader returns [] on an empty
// database.

export async function getTrendingRepositories(
  db: TrendsDb,
  limit = 100
) {
  return db
    .select()
    .from(analyticsTrendingReposCurrent)
    .orderBy(
      desc(analyticsTrendingReposCurrent.momentumScore),
      asc(analyticsTrendingReposCurrent.rankOverall)
    )
    .limit(limit);
}

/**
 * Per-category ranks up to `limit`. The view itself stops at
 * CATEGORY_RANKING_TOP_N, so larger limits are clamped to it.
 */
export async function getCategoryRankings(
  db: TrendsDb,
  category?: string,
  limit = CATEGORY_RANKING_TOP_N
) {
  const view = analyticsCategoryRankings;
  const topN = Math.min(limit, CATEGORY_RANKING_TOP_N);
  return db
    .select()
    .from(view)
    .where(
      and(
        category === undefined ? undefined : eq(view.category, category),
        lte(view.rankInLanguage, topN)
      )
    )
    .orderBy(asc(view.category), asc(view.rankInLanguage));
}

export async function getCategories(db: TrendsDb): Promise<string[]> {
  const rows = await db
    .selectDistinct({ category: analyticsTrendingReposCurrent.category })
    .from(analyticsTrendingReposCurrent)
    .orderBy(asc(analyticsTrendingReposCurrent.category));
  return rows.map((row) => row.category);
}

export async function getRenderShowcase(
  db: TrendsDb,
  renderCategory?: RenderCategory,
  limit = 100
) {
  const view = analyticsRenderShowcase;
  return db
    .select()
    .from(view)
    .where(
      renderCategory === undefined
        ? undefined
        : eq(view.renderCategory, renderCategory)
    )
    .orderBy(desc(view.momentumScore), asc(view.repoFullName))
    .limit(limit);
}

export async function getRepositoryHistory(
  db: TrendsDb,
  repoFullName: string
) {
  return db
    .select()
    .from(analyticsRepoHistory)
    .where(eq(analyticsRepoHistory.repoFullName, repoFullName))
    .orderBy(desc(analyticsRepoHistory.snapshotDate));
}

export async function getRecentPipelineRuns(
  db: TrendsDb,
  limit = 10
) {
  return db
    .select()
    .from(analyticsPipelineRuns)
    .orderBy(
      desc(analyticsPipelineRuns.startedAt),
      desc(analyticsPipelineRuns.executionId)
    )
    .limit(limit);
}

export type TrendingRepository = Awaited<
  ReturnType<typeof getTrendingRepositories>
>[number];
export type RenderShowcaseEntry = Awaited<
  ReturnType<typeof getRenderShowcase>
>[number];
export type RepositoryHistoryEntry = Awaited<
  ReturnType<typeof getRepositoryHistory>
>[number];
export type PipelineRun = Awaited<
  ReturnType<typeof getRecentPipelineRuns>
>[number];
