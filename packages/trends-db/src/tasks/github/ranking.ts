import { LoadError } from "../../errors";
import type {
  MomentumScore,
  RankedRepository,
  StagedRepository,
} from "../../types";
import { compareIdentity } from "../../utils";

interface Scored {
  repository: StagedRepository;
  score: MomentumScore;
}

// Momentum, then stars, then identity: no two repositories tie.
export function compareForRanking(a: Scored, b: Scored): number {
  return (
    b.score.momentum - a.score.momentum ||
    b.repository.stars - a.repository.stars ||
    compareIdentity(a.repository.fullName, b.repository.fullName)
  );
}

/**
 * Assigns the overall rank and the rank within the repository's category,
 * both starting at 1. Throws LoadError when a repository has no score or
 * appears twice.
 */
export function rankRepositories(
  staged: readonly StagedRepository[],
  scores: ReadonlyMap<string, MomentumScore>
): RankedRepository[] {
  const seen = new Set<string>();
  const scored: Scored[] = staged.map((repository) => {
    if (seen.has(repository.fullName)) {
      throw new LoadError(`Repository ${repository.fullName} is staged twice`);
    }
    seen.add(repository.fullName);
    const score = scores.get(repository.fullName);
    if (!score) {
      throw new LoadError(`No momentum score for ${repository.fullName}`);
    }
    return { repository, score };
  });

  const categoryCounters = new Map<string, number>();
  return scored.sort(compareForRanking).map((entry, index) => {
    const rankInLanguage =
      (categoryCounters.get(entry.repository.category) ?? 0) + 1;
    categoryCounters.set(entry.repository.category, rankInLanguage);
    return { ...entry, rankOverall: index + 1, rankInLanguage };
  });
}
