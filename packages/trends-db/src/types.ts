import type { PipelineStatus, RenderCategory, SourceType } from "./schema";

/** One validated sighting of a repository, as written to the raw layer. */
export interface RepositoryRecord {
  fullName: string;
  category: string;
  sourceType: SourceType;
  url: string | null;
  language: string | null;
  stars: number | null;
  description: string | null;
  createdAt: string | null;
  updatedAt: string | null;
  readme: string | null;
  payload: unknown;
}

export interface StagedRepository {
  fullName: string;
  url: string;
  category: string;
  sourceType: SourceType;
  language: string;
  description: string;
  stars: number;
  createdAt: Date;
  updatedAt: Date | null;
  readme: string | null;
  dataQualityScore: number;
  /** Null for repositories never seen through the ecosystem category. */
  renderCategory: RenderCategory | null;
  usesRender: boolean;
  fetchedAt: Date;
}

/** What an ecosystem repository's files say about its Render usage. */
export interface RenderEnrichment {
  fullName: string;
  renderCategory: RenderCategory;
  /** A render.yaml exists at the repository root. */
  usesRender: boolean;
  services: string[];
  databases: string[];
  serviceCount: number;
  complexityScore: number;
  hasDeployButton: boolean;
}

export interface MomentumWeights {
  stars: number;
  recency: number;
}

export interface MomentumScore {
  starScore: number;
  recencyScore: number;
  momentum: number;
}

export interface RankedRepository {
  repository: StagedRepository;
  score: MomentumScore;
  rankOverall: number;
  rankInLanguage: number;
}

export interface CategoryFailure {
  category: string;
  error: Error;
}

export interface CollectResult {
  records: RepositoryRecord[];
  succeeded: string[];
  failed: CategoryFailure[];
  /** Payloads dropped because they carried no usable identity. */
  skipped: number;
}

export interface LoadResult {
  inserted: number;
  versioned: number;
  unchanged: number;
  factsWritten: number;
  factsRemoved: number;
}

export interface PipelineResult {
  status: PipelineStatus;
  snapshotDate: Date;
  succeededCategories: string[];
  failedCategories: string[];
  categoryErrors: Record<string, string>;
  repositoriesProcessed: number;
  durationMs: number;
  load?: LoadResult;
  error?: string;
}
