import type { SourceType } from "../../schema";

export const ECOSYSTEM_CATEGORY = "ecosystem";

export const DEFAULT_TARGET_LANGUAGES = ["Python", "TypeScript", "Go"];

// Repositories owned by these organizations are categorized "official"
export const RENDER_OFFICIAL_ORGS = ["render-examples", "render"];

// Topics marking a repository as a Render blueprint
export const RENDER_BLUEPRINT_TOPICS = ["render-blueprints", "render-blueprint"];

// Sources searched for the ecosystem category
export const DEFAULT_ECOSYSTEM_SOURCES = {
  orgs: RENDER_OFFICIAL_ORGS,
  topics: ["render", "render-deploy", "render-blueprints"],
  readmeMentions: ["render.com"],
};

// Fetch Configuration
export const FETCH_CONFIG = {
  PER_PAGE: 100,
  MAX_PAGES: 1,
  LOOKBACK_DAYS: 30, // language search only returns repos pushed within this window
  CATEGORY_TIMEOUT_MS: 60_000,
  MAX_ATTEMPTS: 3,
  INITIAL_RETRY_DELAY_MS: 1000,
};

// Raw rows not refreshed within this window drop out of staging and ranking
export const STALE_AFTER_DAYS = 7;

// Top-N per category exposed by analytics_category_rankings
export const CATEGORY_RANKING_TOP_N = 50;

export function sourceTypeOf(category: string): SourceType {
  return category === ECOSYSTEM_CATEGORY ? "ecosystem" : "language";
}

export function pipelineCategories(languages: string[]): string[] {
  return [...languages, ECOSYSTEM_CATEGORY];
}
