import {
  sqliteTable,
  text,
  integer,
  real,
  uniqueIndex,
  index,
} from "drizzle-orm/sqlite-core";
import { relations } from "drizzle-orm";

export type SourceType = "language" | "ecosystem";

export type PipelineStatus = "succeeded" | "partial" | "failed";

export type RenderCategory = "official" | "employee" | "blueprint" | "community";

// Raw layer: latest payload per repository, overwritten on every sighting.
export const rawGithubRepo = sqliteTable(
  "raw_github_repo",
  {
    repoFullName: text("repo_full_name").primaryKey(),
    category: text("category").notNull(),
    sourceType: text("source_type").$type<SourceType>().notNull(),
    url: text("url"),
    language: text("language"),
    stars: real("stars"),
    description: text("description"),
    createdAt: text("created_at"),
    updatedAt: text("updated_at"),
    readmeContent: text("readme_content"),
    apiResponse: text("api_response", { mode: "json" }).$type<unknown>(),
    fetchedAt: integer("fetched_at", { mode: "timestamp" }).notNull(),
  },
  (table) => {
    return {
      fetchedAtIdx: index("idx_raw_repo_fetched_at").on(table.fetchedAt),
    };
  }
);

// Staging layer: validated, defaulted, quality-scored.
export const stgRepoValidated = sqliteTable(
  "stg_repo_validated",
  {
    repoFullName: text("repo_full_name").primaryKey(),
    repoUrl: text("repo_url").notNull(),
    category: text("category").notNull(),
    sourceType: text("source_type").$type<SourceType>().notNull(),
    language: text("language").notNull(),
    description: text("description").notNull().default(""),
    stars: integer("stars").notNull().default(0),
    createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp" }),
    readmeContent: text("readme_content"),
    dataQualityScore: real("data_quality_score").notNull(),
    renderCategory: text("render_category").$type<RenderCategory>(),
    usesRender: integer("uses_render", { mode: "boolean" })
      .notNull()
      .default(false),
    fetchedAt: integer("fetched_at", { mode: "timestamp" }).notNull(),
    loadedAt: integer("loaded_at", { mode: "timestamp" })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (table) => {
    return {
      categoryIdx: index("idx_stg_repo_category").on(table.category),
    };
  }
);

// Staging layer: Render usage detected for ecosystem repositories. Rows
// outlive the run that wrote them; a later detection overwrites.
export const stgRenderEnrichment = sqliteTable("stg_render_enrichment", {
  repoFullName: text("repo_full_name").primaryKey(),
  renderCategory: text("render_category").$type<RenderCategory>().notNull(),
  usesRender: integer("uses_render", { mode: "boolean" }).notNull(),
  services: text("services", { mode: "json" }).$type<string[]>().notNull(),
  databases: text("databases", { mode: "json" }).$type<string[]>().notNull(),
  serviceCount: integer("service_count").notNull(),
  complexityScore: integer("complexity_score").notNull(),
  hasDeployButton: integer("has_deploy_button", { mode: "boolean" }).notNull(),
  loadedAt: integer("loaded_at", { mode: "timestamp" })
    .notNull()
    .$defaultFn(() => new Date()),
});

// Analytics layer: SCD Type 2 repository dimension.
export const dimRepository = sqliteTable(
  "dim_repository",
  {
    repoKey: integer("repo_key").primaryKey({ autoIncrement: true }),
    repoFullName: text("repo_full_name").notNull(),
    repoUrl: text("repo_url").notNull(),
    description: text("description").notNull(),
    language: text("language").notNull(),
    category: text("category").notNull(),
    renderCategory: text("render_category").$type<RenderCategory>(),
    usesRender: integer("uses_render", { mode: "boolean" })
      .notNull()
      .default(false),
    createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
    validFrom: integer("valid_from", { mode: "timestamp" }).notNull(),
    validTo: integer("valid_to", { mode: "timestamp" }),
    isCurrent: integer("is_current", { mode: "boolean" })
      .notNull()
      .default(true),
  },
  (table) => {
    return {
      nameCurrentIdx: index("idx_dim_repo_name_current").on(
        table.repoFullName,
        table.isCurrent
      ),
    };
  }
);

// Analytics layer: one row per repository per snapshot date.
export const factRepoSnapshot = sqliteTable(
  "fact_repo_snapshot",
  {
    snapshotId: integer("snapshot_id").primaryKey({ autoIncrement: true }),
    repoKey: integer("repo_key")
      .notNull()
      .references(() => dimRepository.repoKey),
    repoFullName: text("repo_full_name").notNull(),
    category: text("category").notNull(),
    snapshotDate: integer("snapshot_date", { mode: "timestamp" }).notNull(),
    stars: integer("stars").notNull(),
    starScore: real("star_score").notNull(),
    recencyScore: real("recency_score").notNull(),
    momentumScore: real("momentum_score").notNull(),
    dataQualityScore: real("data_quality_score").notNull(),
    rankOverall: integer("rank_overall").notNull(),
    rankInLanguage: integer("rank_in_language").notNull(),
    createdAt: integer("created_at", { mode: "timestamp" })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (table) => {
    return {
      repoDateUnique: uniqueIndex("ux_fact_repo_snapshot_repo_date").on(
        table.repoFullName,
        table.snapshotDate
      ),
    };
  }
);

export const pipelineExecution = sqliteTable("pipeline_execution", {
  executionId: integer("execution_id").primaryKey({ autoIncrement: true }),
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
});

export const dimRepositoryRelations = relations(dimRepository, ({ many }) => ({
  snapshots: many(factRepoSnapshot),
}));

export const factRepoSnapshotRelations = relations(
  factRepoSnapshot,
  ({ one }) => ({
    repository: one(dimRepository, {
      fields: [factRepoSnapshot.repoKey],
      references: [dimRepository.repoKey],
    }),
  })
);

export type RawRepository = typeof rawGithubRepo.$inferSelect;
export type DimensionRepository = typeof dimRepository.$inferSelect;
export type RenderEnrichmentRow = typeof stgRenderEnrichment.$inferSelect;
