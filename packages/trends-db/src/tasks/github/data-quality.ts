import { DAY_MS } from "../../utils";

export const QUALITY_WEIGHTS = {
  completeness: 0.4,
  freshness: 0.3,
  consistency: 0.3,
};

// Upper bound in days since the last update, and the score it earns.
const FRESHNESS_STEPS: ReadonlyArray<[maxDays: number, score: number]> = [
  [1, 1.0],
  [7, 0.9],
  [30, 0.7],
  [90, 0.5],
];
const STALE_SCORE = 0.3;

export interface QualitySignals {
  hasDescription: boolean;
  hasKnownLanguage: boolean;
  hasUrl: boolean;
  hasCreatedAt: boolean;
  updatedAt: Date | null;
  /** Reference instant freshness is measured against. */
  asOf: Date;
  validStarCount: boolean;
  consistentTimestamps: boolean;
}

export function completenessScore(signals: QualitySignals): number {
  const present = [
    signals.hasDescription,
    signals.hasKnownLanguage,
    signals.hasUrl,
    signals.hasCreatedAt,
  ].filter(Boolean).length;
  return present / 4;
}

export function freshnessScore(updatedAt: Date | null, asOf: Date): number {
  if (!updatedAt) return 0;
  const days = (asOf.getTime() - updatedAt.getTime()) / DAY_MS;
  for (const [maxDays, score] of FRESHNESS_STEPS) {
    if (days <= maxDays) return score;
  }
  return STALE_SCORE;
}

export function consistencyScore(signals: QualitySignals): number {
  let score = 1;
  if (!signals.validStarCount) score -= 0.5;
  if (!signals.consistentTimestamps) score -= 0.5;
  return Math.max(score, 0);
}

/**
 * Weighted blend of completeness, freshness and consistency, rounded to two
 * decimals and bounded to [0, 1].
 */
export function calculateDataQualityScore(signals: QualitySignals): number {
  const total =
    QUALITY_WEIGHTS.completeness * completenessScore(signals) +
    QUALITY_WEIGHTS.freshness *
      freshnessScore(signals.updatedAt, signals.asOf) +
    QUALITY_WEIGHTS.consistency * consistencyScore(signals);
  const rounded = Math.round(total * 100) / 100;
  return Math.min(Math.max(rounded, 0), 1);
}
