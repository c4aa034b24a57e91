import type { RawRepository, RenderCategory } from "../../schema";
import type { StagedRepository } from "../../types";
import { compareIdentity } from "../../utils";
import { calculateDataQualityScore } from "./data-quality";

export const UNKNOWN_LANGUAGE = "Unknown";
const EPOCH = new Date(0);

function parseTimestamp(value: string | null): Date | null {
  if (!value) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time);
}

function latestPerRepository(raw: readonly RawRepository[]): RawRepository[] {
  const latest = new Map<string, RawRepository>();
  for (const row of raw) {
    const current = latest.get(row.repoFullName);
    if (!current || row.fetchedAt.getTime() >= current.fetchedAt.getTime()) {
      latest.set(row.repoFullName, row);
    }
  }
  return [...latest.values()];
}

export interface RenderUsage {
  renderCategory: RenderCategory;
  usesRender: boolean;
}

export interface TransformOptions {
  /**
   * Instant freshness is measured against; the pipeline passes its snapshot
   * date. Defaults to each row's fetch time.
   */
  asOf?: Date;
  /** Stored Render enrichment by repository identity. */
  renderUsage?: ReadonlyMap<string, RenderUsage>;
}

export function toStagedRepository(
  row: RawRepository,
  options: TransformOptions = {}
): StagedRepository {
  const createdAt = parseTimestamp(row.createdAt);
  const parsedUpdatedAt = parseTimestamp(row.updatedAt);
  const consistentTimestamps = !(
    createdAt &&
    parsedUpdatedAt &&
    parsedUpdatedAt.getTime() < createdAt.getTime()
  );
  const updatedAt = consistentTimestamps ? parsedUpdatedAt : null;

  const description = row.description?.trim() ?? "";
  const language = row.language?.trim() || UNKNOWN_LANGUAGE;
  const url = row.url?.trim() || null;
  const validStarCount =
    row.stars !== null && Number.isFinite(row.stars) && row.stars >= 0;
  const render = options.renderUsage?.get(row.repoFullName);

  return {
    fullName: row.repoFullName,
    url: url ?? `https://github.com/${row.repoFullName}`,
    category: row.category,
    sourceType: row.sourceType,
    language,
    description,
    stars: validStarCount && row.stars !== null ? Math.floor(row.stars) : 0,
    createdAt: createdAt ?? EPOCH,
    updatedAt,
    readme: row.readmeContent,
    fetchedAt: row.fetchedAt,
    renderCategory: render?.renderCategory ?? null,
    usesRender: render?.usesRender ?? false,
    dataQualityScore: calculateDataQualityScore({
      hasDescription: description !== "",
      hasKnownLanguage: language !== UNKNOWN_LANGUAGE,
      hasUrl: url !== null,
      hasCreatedAt: createdAt !== null,
      updatedAt,
      asOf: options.asOf ?? row.fetchedAt,
      validStarCount,
      consistentTimestamps,
    }),
  };
}

/**
 * Raw rows to staged repositories: one per identity (latest fetch wins),
 * defaulted, quality-scored, ordered by identity.
 */
export function transform(
  raw: readonly RawRepository[],
  options: TransformOptions = {}
): StagedRepository[] {
  return latestPerRepository(raw)
    .map((row) => toStagedRepository(row, options))
    .sort((a, b) => compareIdentity(a.fullName, b.fullName));
}
