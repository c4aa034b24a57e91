import { bool, cleanEnv, num, str } from "envalid";
import {
  DEFAULT_ECOSYSTEM_SOURCES,
  DEFAULT_TARGET_LANGUAGES,
  FETCH_CONFIG,
  STALE_AFTER_DAYS,
} from "./tasks/github/data-config";

const env = cleanEnv(process.env, {
  GITHUB_TOKEN: str({ default: "" }),
  DB_PATH: str({ default: "trends.db" }),
  TARGET_LANGUAGES: str({ default: DEFAULT_TARGET_LANGUAGES.join(",") }),
  ECOSYSTEM_ORGS: str({ default: DEFAULT_ECOSYSTEM_SOURCES.orgs.join(",") }),
  ECOSYSTEM_TOPICS: str({
    default: DEFAULT_ECOSYSTEM_SOURCES.topics.join(","),
  }),
  ECOSYSTEM_README_MENTIONS: str({
    default: DEFAULT_ECOSYSTEM_SOURCES.readmeMentions.join(","),
  }),
  RENDER_EMPLOYEE_ORGS: str({ default: "" }),
  FETCH_PER_PAGE: num({ default: FETCH_CONFIG.PER_PAGE }),
  FETCH_MAX_PAGES: num({ default: FETCH_CONFIG.MAX_PAGES }),
  FETCH_READMES: bool({ default: false }),
  FETCH_LOOKBACK_DAYS: num({ default: FETCH_CONFIG.LOOKBACK_DAYS }),
  CATEGORY_TIMEOUT_MS: num({ default: FETCH_CONFIG.CATEGORY_TIMEOUT_MS }),
  FETCH_MAX_ATTEMPTS: num({ default: FETCH_CONFIG.MAX_ATTEMPTS }),
  FETCH_RETRY_DELAY_MS: num({ default: FETCH_CONFIG.INITIAL_RETRY_DELAY_MS }),
  STALE_AFTER_DAYS: num({ default: STALE_AFTER_DAYS }),
  MIN_QUALITY_SCORE: num({ default: 0 }),
  MOMENTUM_STAR_WEIGHT: num({ default: 0.5 }),
  MOMENTUM_RECENCY_WEIGHT: num({ default: 0.5 }),
});

export default env;
