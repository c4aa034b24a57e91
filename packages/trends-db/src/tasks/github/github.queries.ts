import { and, eq, gte, notInArray, sql } from "drizzle-orm";
import type { TrendsDatabase, TrendsDb } from "../../db";
import {
  dimRepository,
  factRepoSnapshot,
  pipelineExecution,
  rawGithubRepo,
  stgRenderEnrichment,
  stgRepoValidated,
  type DimensionRepository,
  type RawRepository,
  type RenderEnrichmentRow,
} from "../../schema";
import type {
  PipelineResult,
  RankedRepository,
  RenderEnrichment,
  RepositoryRecord,
  StagedRepository,
} from "../../types";

const INSERT_BATCH_SIZE = 500;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// Raw layer

/**
 * Upserts the latest sighting of each repository into the raw layer.
 */
export async function saveRaw(
  database: TrendsDatabase,
  records: readonly RepositoryRecord[],
  fetchedAt: Date
): Promise<number> {
  if (records.length === 0) return 0;

  const rows = records.map((record) => ({
    repoFullName: record.fullName,
    category: record.category,
    sourceType: record.sourceType,
    url: record.url,
    language: record.language,
    stars: record.stars,
    description: record.description,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    readmeContent: record.readme,
    apiResponse: record.payload,
    fetchedAt,
  }));

  await database.withTransaction(async (db) => {
    for (const batch of chunk(rows, INSERT_BATCH_SIZE)) {
      await db
        .insert(rawGithubRepo)
        .values(batch)
        .onConflictDoUpdate({
          target: rawGithubRepo.repoFullName,
          set: {
            category: sql`excluded.category`,
            sourceType: sql`excluded.source_type`,
            url: sql`excluded.url`,
            language: sql`excluded.language`,
            stars: sql`excluded.stars`,
            description: sql`excluded.description`,
            createdAt: sql`excluded.created_at`,
            updatedAt: sql`excluded.updated_at`,
            readmeContent: sql`excluded.readme_content`,
            apiResponse: sql`excluded.api_response`,
            fetchedAt: sql`excluded.fetched_at`,
          },
        });
    }
  });

  return rows.length;
}

export async function listRecentRaw(
  db: TrendsDb,
  since: Date
): Promise<RawRepository[]> {
  return db
    .select()
    .from(rawGithubRepo)
    .where(gte(rawGithubRepo.fetchedAt, since))
    .orderBy(rawGithubRepo.repoFullName);
}

// Staging layer

export async function saveStaging(
  database: TrendsDatabase,
  staged: readonly StagedRepository[]
): Promise<number> {
  if (staged.length === 0) return 0;

  const loadedAt = new Date();
  const rows = staged.map((repository) => ({
    repoFullName: repository.fullName,
    repoUrl: repository.url,
    category: repository.category,
    sourceType: repository.sourceType,
    language: repository.language,
    description: repository.description,
    stars: repository.stars,
    createdAt: repository.createdAt,
    updatedAt: repository.updatedAt,
    readmeContent: repository.readme,
    dataQualityScore: repository.dataQualityScore,
    renderCategory: repository.renderCategory,
    usesRender: repository.usesRender,
    fetchedAt: repository.fetchedAt,
    loadedAt,
  }));

  await database.withTransaction(async (db) => {
    for (const batch of chunk(rows, INSERT_BATCH_SIZE)) {
      await db
        .insert(stgRepoValidated)
        .values(batch)
        .onConflictDoUpdate({
          target: stgRepoValidated.repoFullName,
          set: {
            repoUrl: sql`excluded.repo_url`,
            category: sql`excluded.category`,
            sourceType: sql`excluded.source_type`,
            language: sql`excluded.language`,
            description: sql`excluded.description`,
            stars: sql`excluded.stars`,
            createdAt: sql`excluded.created_at`,
            updatedAt: sql`excluded.updated_at`,
            readmeContent: sql`excluded.readme_content`,
            dataQualityScore: sql`excluded.data_quality_score`,
            renderCategory: sql`excluded.render_category`,
            usesRender: sql`excluded.uses_render`,
            fetchedAt: sql`excluded.fetched_at`,
            loadedAt: sql`excluded.loaded_at`,
          },
        });
    }
  });

  return rows.length;
}

export async function saveRenderEnrichment(
  database: TrendsDatabase,
  enrichment: readonly RenderEnrichment[]
): Promise<number> {
  if (enrichment.length === 0) return 0;

  const loadedAt = new Date();
  const rows = enrichment.map((entry) => ({
    repoFullName: entry.fullName,
    renderCategory: entry.renderCategory,
    usesRender: entry.usesRender,
    services: entry.services,
    databases: entry.databases,
    serviceCount: entry.serviceCount,
    complexityScore: entry.complexityScore,
    hasDeployButton: entry.hasDeployButton,
    loadedAt,
  }));

  await database.withTransaction(async (db) => {
    for (const batch of chunk(rows, INSERT_BATCH_SIZE)) {
      await db
        .insert(stgRenderEnrichment)
        .values(batch)
        .onConflictDoUpdate({
          target: stgRenderEnrichment.repoFullName,
          set: {
            renderCategory: sql`excluded.render_category`,
            usesRender: sql`excluded.uses_render`,
            services: sql`excluded.services`,
            databases: sql`excluded.databases`,
            serviceCount: sql`excluded.service_count`,
            complexityScore: sql`excluded.complexity_score`,
            hasDeployButton: sql`excluded.has_deploy_button`,
            loadedAt: sql`excluded.loaded_at`,
          },
        });
    }
  });

  return rows.length;
}

export async function listRenderEnrichment(
  db: TrendsDb
): Promise<RenderEnrichmentRow[]> {
  return db
    .select()
    .from(stgRenderEnrichment)
    .orderBy(stgRenderEnrichment.repoFullName);
}

// Dimension

export async function getCurrentDimension(
  db: TrendsDb,
  repoFullName: string
): Promise<DimensionRepository | undefined> {
  const [current] = await db
    .select()
    .from(dimRepository)
    .where(
      and(
        eq(dimRepository.repoFullName, repoFullName),
        eq(dimRepository.isCurrent, true)
      )
    )
    .limit(1);
  return current;
}

export async function closeDimension(
  db: TrendsDb,
  repoKey: number,
  validTo: Date
): Promise<void> {
  await db
    .update(dimRepository)
    .set({ validTo, isCurrent: false })
    .where(eq(dimRepository.repoKey, repoKey));
}

export async function insertDimension(
  db: TrendsDb,
  repository: StagedRepository,
  validFrom: Date
): Promise<number> {
  const [inserted] = await db
    .insert(dimRepository)
    .values({
      repoFullName: repository.fullName,
      repoUrl: repository.url,
      description: repository.description,
      language: repository.language,
      category: repository.category,
      renderCategory: repository.renderCategory,
      usesRender: repository.usesRender,
      createdAt: repository.createdAt,
      validFrom,
      validTo: null,
      isCurrent: true,
    })
    .returning({ repoKey: dimRepository.repoKey });
  return inserted.repoKey;
}

export async function getDimensionHistory(
  db: TrendsDb,
  repoFullName: string
): Promise<DimensionRepository[]> {
  return db
    .select()
    .from(dimRepository)
    .where(eq(dimRepository.repoFullName, repoFullName))
    .orderBy(dimRepository.repoKey);
}

// Facts

export async function upsertFactSnapshot(
  db: TrendsDb,
  entry: RankedRepository,
  repoKey: number,
  snapshotDate: Date
): Promise<void> {
  const { repository, score } = entry;
  await db
    .insert(factRepoSnapshot)
    .values({
      repoKey,
      repoFullName: repository.fullName,
      category: repository.category,
      snapshotDate,
      stars: repository.stars,
      starScore: score.starScore,
      recencyScore: score.recencyScore,
      momentumScore: score.momentum,
      dataQualityScore: repository.dataQualityScore,
      rankOverall: entry.rankOverall,
      rankInLanguage: entry.rankInLanguage,
    })
    .onConflictDoUpdate({
      target: [factRepoSnapshot.repoFullName, factRepoSnapshot.snapshotDate],
      set: {
        repoKey: sql`excluded.repo_key`,
        category: sql`excluded.category`,
        stars: sql`excluded.stars`,
        starScore: sql`excluded.star_score`,
        recencyScore: sql`excluded.recency_score`,
        momentumScore: sql`excluded.momentum_score`,
        dataQualityScore: sql`excluded.data_quality_score`,
        rankOverall: sql`excluded.rank_overall`,
        rankInLanguage: sql`excluded.rank_in_language`,
      },
    });
}

/**
 * Deletes the facts of `snapshotDate` whose repository is not in `keep`, so
 * a rerun leaves exactly the ranked set behind.
 */
export function removeStaleFacts(
  db: TrendsDb,
  snapshotDate: Date,
  keep: readonly string[]
): number {
  const sameDate = eq(factRepoSnapshot.snapshotDate, snapshotDate);
  const result = db
    .delete(factRepoSnapshot)
    .where(
      keep.length > 0
        ? and(sameDate, notInArray(factRepoSnapshot.repoFullName, [...keep]))
        : sameDate
    )
    .run();
  return result.changes;
}

export async function getFactsForDate(db: TrendsDb, snapshotDate: Date) {
  return db
    .select()
    .from(factRepoSnapshot)
    .where(eq(factRepoSnapshot.snapshotDate, snapshotDate))
    .orderBy(factRepoSnapshot.rankOverall);
}

// Execution log

export async function recordPipelineExecution(
  database: TrendsDatabase,
  startedAt: Date,
  result: PipelineResult
): Promise<void> {
  await database.withTransaction(async (db) => {
    await db.insert(pipelineExecution).values({
      snapshotDate: result.snapshotDate,
      startedAt,
      durationMs: Math.round(result.durationMs),
      status: result.status,
      succeededCategories: result.succeededCategories,
      failedCategories: result.failedCategories,
      repositoriesProcessed: result.repositoriesProcessed,
      errorMessage: result.error ?? null,
    });
  });
}
