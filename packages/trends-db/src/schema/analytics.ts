import { sqliteView, text, integer, real } from "drizzle-orm/sqlite-core";
import type { PipelineStatus, RenderCategory } from "./github";

// Views are created by sql/schema.sql; these declarations only type the reads.

const snapshotColumns = () => ({
  repoFullName: text("repo_full_name").notNull(),
  repoUrl: text("repo_url").notNull(),
  language: text("language").notNull(),
  category: text("category").notNull(),
  description: text("description").notNull(),
  stars: integer("stars").notNull(),
  starScore: real("star_score").notNull(),
  recencyScore: real("recency_score").notNull(),
  momentumScore: real("momentum_score").notNull(),
  dataQualityScore: real("data_quality_score").notNull(),
  rankOverall: integer("rank_overall").notNull(),
  rankInLanguage: integer("rank_in_language").notNull(),
  snapshotDate: integer("snapshot_date", { mode: "timestamp" }).notNull(),
});

export const analyticsTrendingReposCurrent = sqliteView(
  "analytics_trending_repos_current",
  snapshotColumns()
).existing();

export const analyticsCategoryRankings = sqliteView(
  "analytics_category_rankings",
  snapshotColumns()
).existing();

export const analyticsRenderShowcase = sqliteView("analytics_render_showcase", {
  repoFullName: text("repo_full_name").notNull(),
  repoUrl: text("repo_url").notNull(),
  language: text("language").notNull(),
  description: text("description").notNull(),
  renderCategory: text("render_category").$type<RenderCategory>(),
  stars: integer("stars").notNull(),
  momentumScore: real("momentum_score").notNull(),
  rankOverall: integer("rank_overall").notNull(),
  // Null when the repository has no stored enrichment row.
  services: text("services", { mode: "json" }).$type<string[]>(),
  databases: text("databases", { mode: "json" }).$type<string[]>(),
  serviceCount: integer("service_count"),
  complexityScore: integer("complexity_score"),
  hasDeployButton: integer("has_deploy_button", { mode: "boolean" }),
  snapshotDate: integer("snapshot_date", { mode: "timestamp" }).notNull(),
}).existing();

export const analyticsRepoHistory = sqliteView("analytics_repo_history", {
  repoFullName: text("repo_full_name").notNull(),
  category: text("category").notNull(),
  language: text("language").notNull(),
  snapshotDate: integer("snapshot_date", { mode: "timestamp" }).notNull(),
  stars: integer("stars").notNull(),
  momentumScore: real("momentum_score").notNull(),
  rankOverall: integer("rank_overall").notNull(),
  rankInLanguage: integer("rank_in_language").notNull(),
}).existing();

export const analyticsPipelineRuns = sqliteView("analytics_pipeline_runs", {
  executionId: integer("execution_id").notNull(),
  snapshotDate: integer("snapshot_date", { mode: "timestamp" }).notNull(),
  startedAt: integer("started_at", { mode: "timestamp" }).notNull(),
  durationMs: integer("duration_ms").notNull(),
  status: text("status").$type<PipelineStatus>().notNull(),
  succeededCategories: text("succeeded_categories", { mode: "json" })
    .$type<string[]>()
    .notNull(),
  failedCategories: text("failed_categories", { mode: "json" })
    .$type<string[]>()
    .notNull(),
  repositoriesProcessed: integer("repositories_processed").notNull(),
  errorMessage: text("error_message"),
}).existing();
