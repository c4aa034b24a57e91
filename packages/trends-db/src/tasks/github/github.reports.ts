import type { TrendsDb } from "../../db";
import { formatDate } from "../../utils";
import {
  getCategoryRankings,
  getRecentPipelineRuns,
  getRenderShowcase,
  getTrendingRepositories,
  type PipelineRun,
  type RenderShowcaseEntry,
  type TrendingRepository,
} from "./github.views";

export interface ReportOptions {
  topOverall?: number;
  topPerCategory?: number;
  topRender?: number;
  recentRuns?: number;
}

function formatNumber(num: number): string {
  return num.toLocaleString("en-US");
}

function formatScore(score: number): string {
  return score.toFixed(3);
}

function repositoryLink(repo: { repoFullName: string; repoUrl: string }): string {
  return `[${repo.repoFullName}](${repo.repoUrl})`;
}

function generateOverallSection(repos: TrendingRepository[]): string {
  const lines = [
    `## Top ${repos.length} overall\n`,
    "| Rank | Repository | Category | Stars | Momentum |",
    "| ---- | ---------- | -------- | ----- | -------- |",
  ];
  for (const repo of repos) {
    lines.push(
      `| ${repo.rankOverall} | ${repositoryLink(repo)} | ${repo.category} | ${formatNumber(repo.stars)} | ${formatScore(repo.momentumScore)} |`
    );
  }
  return lines.join("\n") + "\n";
}

function generateCategorySection(
  category: string,
  repos: TrendingRepository[]
): string {
  const lines = [
    `### ${category}\n`,
    "| Rank | Repository | Stars | Momentum | Quality |",
    "| ---- | ---------- | ----- | -------- | ------- |",
  ];
  for (const repo of repos) {
    lines.push(
      `| ${repo.rankInLanguage} | ${repositoryLink(repo)} | ${formatNumber(repo.stars)} | ${formatScore(repo.momentumScore)} | ${repo.dataQualityScore.toFixed(2)} |`
    );
  }
  return lines.join("\n") + "\n";
}

function generateRenderSection(repos: RenderShowcaseEntry[]): string {
  const lines = [
    "## Render showcase\n",
    "| Repository | Render category | Stars | Momentum | Services |",
    "| ---------- | --------------- | ----- | -------- | -------- |",
  ];
  for (const repo of repos) {
    const services = repo.services?.length ? repo.services.join(", ") : "-";
    lines.push(
      `| ${repositoryLink(repo)} | ${repo.renderCategory ?? "-"} | ${formatNumber(repo.stars)} | ${formatScore(repo.momentumScore)} | ${services} |`
    );
  }
  return lines.join("\n") + "\n";
}

function generateRunsSection(runs: PipelineRun[]): string {
  const lines = [
    "## Recent pipeline runs\n",
    "| Started | Status | Repositories | Failed categories |",
    "| ------- | ------ | ------------ | ----------------- |",
  ];
  for (const run of runs) {
    const failed =
      run.failedCategories.length > 0 ? run.failedCategories.join(", ") : "-";
    lines.push(
      `| ${run.startedAt.toISOString()} | ${run.status} | ${run.repositoriesProcessed} | ${failed} |`
    );
  }
  return lines.join("\n") + "\n";
}

/**
 * Markdown summary of the latest snapshot and the recent runs.
 */
export async function generateReport(
  db: TrendsDb,
  options: ReportOptions = {}
): Promise<string> {
  const {
    topOverall = 10,
    topPerCategory = 10,
    topRender = 10,
    recentRuns = 5,
  } = options;

  const trending = await getTrendingRepositories(db, topOverall);
  const sections = ["# Trending repositories\n"];

  if (trending.length === 0) {
    sections.push("_No snapshot has been loaded yet._\n");
  } else {
    sections.push(`Snapshot: ${formatDate(trending[0].snapshotDate)}\n`);
    sections.push(generateOverallSection(trending));
    sections.push("## By category\n");

    const rankings = await getCategoryRankings(db, undefined, topPerCategory);
    const byCategory = new Map<string, TrendingRepository[]>();
    for (const repo of rankings) {
      const repos = byCategory.get(repo.category) ?? [];
      repos.push(repo);
      byCategory.set(repo.category, repos);
    }
    for (const [category, repos] of byCategory) {
      sections.push(generateCategorySection(category, repos));
    }

    const showcase = await getRenderShowcase(db, undefined, topRender);
    if (showcase.length > 0) {
      sections.push(generateRenderSection(showcase));
    }
  }

  const runs = await getRecentPipelineRuns(db, recentRuns);
  if (runs.length > 0) {
    sections.push(generateRunsSection(runs));
  }

  return sections.join("\n");
}
