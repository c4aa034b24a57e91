export * from "./schema";
export * from "./types";
export * from "./errors";
export { openDatabase, SCHEMA_PATH } from "./db";
export type { TrendsDatabase, TrendsDb, TrendsSchema } from "./db";
export { GitHubClient, toFetchError } from "./github-client/client/api";
export type {
  FetchOptions,
  GitHubClientOptions,
  RepositoryFetcher,
  RepositoryFileReader,
  EcosystemSources,
} from "./github-client/types";
export * from "./tasks/github/data-config";
export { normalizeRepository } from "./tasks/github/normalize";
export { collect, type CollectOptions } from "./tasks/github/collect";
export { transform, UNKNOWN_LANGUAGE } from "./tasks/github/transform";
export { calculateDataQualityScore } from "./tasks/github/data-quality";
export {
  score,
  scoreAll,
  starScore,
  recencyScore,
  DEFAULT_MOMENTUM_WEIGHTS,
} from "./tasks/github/scoring";
export { rankRepositories } from "./tasks/github/ranking";
export {
  categorizeRender,
  detectRenderUsage,
  enrichEcosystem,
  parseBlueprint,
  renderComplexity,
  type RenderCategoryOptions,
} from "./tasks/github/render-detection";
export { load } from "./tasks/github/load";
export {
  saveRaw,
  listRecentRaw,
  saveStaging,
  saveRenderEnrichment,
  listRenderEnrichment,
} from "./tasks/github/github.queries";
export {
  runPipeline,
  DEFAULT_PIPELINE_OPTIONS,
  type PipelineDependencies,
  type PipelineOptions,
} from "./tasks/github/pipeline";
export * from "./tasks/github/github.views";
export { generateReport } from "./tasks/github/github.reports";
