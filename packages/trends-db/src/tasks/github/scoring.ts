import type {
  MomentumScore,
  MomentumWeights,
  StagedRepository,
} from "../../types";
import { daysBetween } from "../../utils";

export const DEFAULT_MOMENTUM_WEIGHTS: MomentumWeights = {
  stars: 0.5,
  recency: 0.5,
};

// Repository age in whole days, and the recency score it earns.
const RECENCY_STEPS: ReadonlyArray<[maxAgeDays: number, score: number]> = [
  [30, 1.0],
  [60, 0.75],
  [90, 0.5],
];

export interface ScoreOptions {
  asOf: Date;
  weights?: MomentumWeights;
}

export function starScore(
  repository: Pick<StagedRepository, "stars">,
  population: ReadonlyArray<Pick<StagedRepository, "stars">>
): number {
  if (population.length <= 1) return 1;
  const maxStars = Math.max(...population.map((r) => r.stars));
  if (maxStars <= 0) return 0;
  return Math.min(repository.stars / maxStars, 1);
}

export function recencyScore(createdAt: Date, asOf: Date): number {
  const ageDays = daysBetween(createdAt, asOf);
  for (const [maxAgeDays, score] of RECENCY_STEPS) {
    if (ageDays <= maxAgeDays) return score;
  }
  return 0;
}

function assertWeights(weights: MomentumWeights): void {
  for (const [name, value] of Object.entries(weights)) {
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`Momentum weight ${name} must be a non-negative number, got ${value}`);
    }
  }
}

/**
 * Momentum of a repository relative to the population it is ranked in.
 */
export function score(
  repository: StagedRepository,
  population: readonly StagedRepository[],
  options: ScoreOptions
): MomentumScore {
  const weights = options.weights ?? DEFAULT_MOMENTUM_WEIGHTS;
  assertWeights(weights);
  const stars = starScore(repository, population);
  const recency = recencyScore(repository.createdAt, options.asOf);
  return {
    starScore: stars,
    recencyScore: recency,
    momentum: weights.stars * stars + weights.recency * recency,
  };
}

/**
 * Scores every repository against the others in its category.
 */
export function scoreAll(
  staged: readonly StagedRepository[],
  options: ScoreOptions
): Map<string, MomentumScore> {
  const byCategory = new Map<string, StagedRepository[]>();
  for (const repository of staged) {
    const population = byCategory.get(repository.category) ?? [];
    population.push(repository);
    byCategory.set(repository.category, population);
  }

  const scores = new Map<string, MomentumScore>();
  for (const population of byCategory.values()) {
    for (const repository of population) {
      scores.set(repository.fullName, score(repository, population, options));
    }
  }
  return scores;
}
