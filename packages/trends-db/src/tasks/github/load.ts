import type { TrendsDatabase, TrendsDb } from "../../db";
import type { DimensionRepository } from "../../schema";
import { LoadError, errorMessage } from "../../errors";
import type {
  LoadResult,
  MomentumScore,
  StagedRepository,
} from "../../types";
import { formatDate, normalizeDate } from "../../utils";
import * as queries from "./github.queries";
import { rankRepositories } from "./ranking";

type DimensionChange = "inserted" | "versioned" | "unchanged";

// Attributes whose change opens a new dimension version. Stars and scores
// live on the fact table.
export function hasTrackedChanges(
  current: DimensionRepository,
  repository: StagedRepository
): boolean {
  return (
    current.description !== repository.description ||
    current.language !== repository.language ||
    current.category !== repository.category ||
    current.repoUrl !== repository.url ||
    current.renderCategory !== repository.renderCategory ||
    current.usesRender !== repository.usesRender
  );
}

async function upsertDimension(
  db: TrendsDb,
  repository: StagedRepository,
  snapshotDate: Date
): Promise<{ change: DimensionChange; repoKey: number }> {
  const current = await queries.getCurrentDimension(db, repository.fullName);

  if (!current) {
    const repoKey = await queries.insertDimension(db, repository, snapshotDate);
    return { change: "inserted", repoKey };
  }
  if (!hasTrackedChanges(current, repository)) {
    return { change: "unchanged", repoKey: current.repoKey };
  }

  // Close before insert: the partial unique index allows one current row.
  await queries.closeDimension(db, current.repoKey, snapshotDate);
  const repoKey = await queries.insertDimension(db, repository, snapshotDate);
  return { change: "versioned", repoKey };
}

/**
 * Ranks the staged repositories and writes the dimension versions and the
 * facts for `snapshotDate` in one transaction. Rerunning with the same input
 * leaves the tables as they were. An empty input is refused: it would delete
 * every fact of the date.
 */
export async function load(
  database: TrendsDatabase,
  staged: readonly StagedRepository[],
  scores: ReadonlyMap<string, MomentumScore>,
  snapshotDate: Date
): Promise<LoadResult> {
  const date = normalizeDate(snapshotDate);
  if (staged.length === 0) {
    throw new LoadError(`Nothing to load for ${formatDate(date)}`);
  }
  const ranked = rankRepositories(staged, scores);

  console.log(
    `\n📦 Loading ${ranked.length} repositories for ${formatDate(date)}`
  );

  try {
    const result = await database.withTransaction(async (db) => {
      const counts: LoadResult = {
        inserted: 0,
        versioned: 0,
        unchanged: 0,
        factsWritten: 0,
        factsRemoved: 0,
      };

      for (const entry of ranked) {
        const { change, repoKey } = await upsertDimension(
          db,
          entry.repository,
          date
        );
        counts[change]++;
        await queries.upsertFactSnapshot(db, entry, repoKey, date);
        counts.factsWritten++;
      }

      counts.factsRemoved = queries.removeStaleFacts(
        db,
        date,
        ranked.map((entry) => entry.repository.fullName)
      );
      return counts;
    });

    console.log(
      `✅ Loaded: ${result.inserted} new, ${result.versioned} versioned, ${result.unchanged} unchanged, ${result.factsWritten} facts (${result.factsRemoved} removed)`
    );
    return result;
  } catch (error) {
    throw new LoadError(
      `Load for ${formatDate(date)} rolled back: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}
