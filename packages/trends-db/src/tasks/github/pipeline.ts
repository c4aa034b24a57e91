import type { TrendsDatabase } from "../../db";
import type {
  RepositoryFetcher,
  RepositoryFileReader,
} from "../../github-client/types";
import { errorMessage } from "../../errors";
import type { MomentumWeights, PipelineResult } from "../../types";
import { formatDate, normalizeDate, subtractDays } from "../../utils";
import { collect } from "./collect";
import {
  DEFAULT_TARGET_LANGUAGES,
  FETCH_CONFIG,
  STALE_AFTER_DAYS,
  pipelineCategories,
} from "./data-config";
import * as queries from "./github.queries";
import { load } from "./load";
import {
  DEFAULT_RENDER_CATEGORY_OPTIONS,
  enrichEcosystem,
} from "./render-detection";
import { DEFAULT_MOMENTUM_WEIGHTS, scoreAll } from "./scoring";
import { transform, type RenderUsage } from "./transform";

export interface PipelineDependencies {
  database: TrendsDatabase;
  fetcher: RepositoryFetcher;
  /** Enables Render detection for ecosystem repositories. */
  files?: RepositoryFileReader;
  now?: () => Date;
}

export interface PipelineOptions {
  categories: string[];
  lookbackDays: number;
  timeoutMs: number;
  maxAttempts: number;
  initialRetryDelayMs: number;
  staleAfterDays: number;
  minQualityScore: number;
  weights: MomentumWeights;
  renderOfficialOrgs: string[];
  renderEmployeeOrgs: string[];
  /** Defaults to the UTC date the run starts. */
  snapshotDate?: Date;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  categories: pipelineCategories(DEFAULT_TARGET_LANGUAGES),
  lookbackDays: FETCH_CONFIG.LOOKBACK_DAYS,
  timeoutMs: FETCH_CONFIG.CATEGORY_TIMEOUT_MS,
  maxAttempts: FETCH_CONFIG.MAX_ATTEMPTS,
  initialRetryDelayMs: FETCH_CONFIG.INITIAL_RETRY_DELAY_MS,
  staleAfterDays: STALE_AFTER_DAYS,
  minQualityScore: 0,
  weights: DEFAULT_MOMENTUM_WEIGHTS,
  renderOfficialOrgs: [...DEFAULT_RENDER_CATEGORY_OPTIONS.officialOrgs],
  renderEmployeeOrgs: [...DEFAULT_RENDER_CATEGORY_OPTIONS.employeeOrgs],
};

async function recordExecution(
  database: TrendsDatabase,
  startedAt: Date,
  result: PipelineResult
): Promise<void> {
  try {
    await queries.recordPipelineExecution(database, startedAt, result);
  } catch (error) {
    // The run's outcome stands even when its log entry cannot be written.
    console.error(
      `❌ Failed to record pipeline execution: ${errorMessage(error)}`
    );
  }
}

/**
 * Collect, stage, score and load one snapshot.
 *
 * Categories that cannot be fetched are reported and the run continues
 * with the rest ("partial"). The run fails, leaving the analytics layer
 * untouched, when no category could be fetched, nothing is left to load or
 * a write fails.
 */
export async function runPipeline(
  deps: PipelineDependencies,
  overrides: Partial<PipelineOptions> = {}
): Promise<PipelineResult> {
  const options = { ...DEFAULT_PIPELINE_OPTIONS, ...overrides };
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const snapshotDate = normalizeDate(options.snapshotDate ?? startedAt);

  console.log(`\n🚀 Starting pipeline for ${formatDate(snapshotDate)}`);

  const collected = await collect(deps.fetcher, options.categories, {
    since: subtractDays(startedAt, options.lookbackDays),
    timeoutMs: options.timeoutMs,
    maxAttempts: options.maxAttempts,
    initialRetryDelayMs: options.initialRetryDelayMs,
  });

  const categoryErrors: Record<string, string> = {};
  for (const failure of collected.failed) {
    categoryErrors[failure.category] = failure.error.message;
  }

  const result: PipelineResult = {
    status: "succeeded",
    snapshotDate,
    succeededCategories: collected.succeeded,
    failedCategories: collected.failed.map((failure) => failure.category),
    categoryErrors,
    repositoriesProcessed: 0,
    durationMs: 0,
  };

  if (collected.succeeded.length === 0) {
    result.status = "failed";
    result.error = "No category could be collected";
  } else {
    try {
      await queries.saveRaw(deps.database, collected.records, startedAt);

      if (deps.files) {
        const enrichment = await enrichEcosystem(
          deps.files,
          collected.records,
          {
            officialOrgs: options.renderOfficialOrgs,
            employeeOrgs: options.renderEmployeeOrgs,
          }
        );
        await queries.saveRenderEnrichment(deps.database, enrichment);
      }

      const db = deps.database.getDB();
      const raw = await queries.listRecentRaw(
        db,
        subtractDays(snapshotDate, options.staleAfterDays)
      );
      const renderUsage = new Map<string, RenderUsage>();
      for (const row of await queries.listRenderEnrichment(db)) {
        renderUsage.set(row.repoFullName, row);
      }
      const staged = transform(raw, { asOf: snapshotDate, renderUsage });
      await queries.saveStaging(deps.database, staged);

      const eligible = staged.filter(
        (repository) => repository.dataQualityScore >= options.minQualityScore
      );
      if (eligible.length < staged.length) {
        console.log(
          `🔎 ${staged.length - eligible.length} repositories below quality ${options.minQualityScore} left out`
        );
      }

      if (eligible.length === 0) {
        result.status = "failed";
        result.error = `No repositories to load for ${formatDate(snapshotDate)}`;
      } else {
        const scores = scoreAll(eligible, {
          asOf: snapshotDate,
          weights: options.weights,
        });
        result.load = await load(deps.database, eligible, scores, snapshotDate);
        result.repositoriesProcessed = eligible.length;
        result.status = collected.failed.length > 0 ? "partial" : "succeeded";
      }
    } catch (error) {
      console.error(`❌ Pipeline failed: ${errorMessage(error)}`);
      result.status = "failed";
      result.error = errorMessage(error);
    }
  }

  result.durationMs = now().getTime() - startedAt.getTime();
  await recordExecution(deps.database, startedAt, result);

  const icon = { succeeded: "✅", partial: "⚠️", failed: "❌" }[result.status];
  console.log(
    `${icon} Pipeline ${result.status}: ${result.repositoriesProcessed} repositories, ` +
      `${result.succeededCategories.length} categories ok, ${result.failedCategories.length} failed`
  );

  return result;
}
