import { Octokit } from "@octokit/rest";
import { z } from "zod";
import { FatalFetchError, TransientFetchError, errorMessage } from "../../errors";
import {
  DEFAULT_ECOSYSTEM_SOURCES,
  ECOSYSTEM_CATEGORY,
  FETCH_CONFIG,
} from "../../tasks/github/data-config";
import { formatDate } from "../../utils";
import type {
  EcosystemSources,
  FetchOptions,
  GitHubClientOptions,
  RepositoryFetcher,
  RepositoryFileReader,
} from "../types";

const MAX_PER_PAGE = 100; // GitHub's max page size

const repositoryIdentitySchema = z
  .object({ full_name: z.string() })
  .passthrough();

function statusOf(error: unknown): number | undefined {
  if (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return error.status;
  }
  return undefined;
}

/**
 * Rate limiting, server errors and network failures (no status) are worth
 * retrying; any other HTTP error is not.
 */
export function toFetchError(
  error: unknown,
  context: string
): TransientFetchError | FatalFetchError {
  if (error instanceof TransientFetchError || error instanceof FatalFetchError) {
    return error;
  }
  const status = statusOf(error);
  const message = `${context}: ${errorMessage(error)}`;
  if (
    status === undefined ||
    status === 403 ||
    status === 429 ||
    status >= 500
  ) {
    return new TransientFetchError(message, { status, cause: error });
  }
  return new FatalFetchError(message, { status, cause: error });
}

export function languageQuery(language: string, since?: Date): string {
  const qualifier = /\s/.test(language) ? `"${language}"` : language;
  const parts = [`language:${qualifier}`];
  if (since) {
    parts.push(`pushed:>=${formatDate(since)}`);
  }
  return parts.join(" ");
}

export class GitHubClient implements RepositoryFetcher, RepositoryFileReader {
  private readonly octokit: Octokit;
  private readonly perPage: number;
  private readonly maxPages: number;
  private readonly fetchReadmes: boolean;
  private readonly ecosystem: EcosystemSources;

  constructor(authToken: string, options: GitHubClientOptions = {}) {
    this.octokit = new Octokit({
      auth: authToken || undefined,
      userAgent: "repo-momentum v0.1.0",
      log: console,
      request: options.fetch ? { fetch: options.fetch } : undefined,
    });
    this.perPage = Math.min(options.perPage ?? FETCH_CONFIG.PER_PAGE, MAX_PER_PAGE);
    this.maxPages = Math.max(options.maxPages ?? FETCH_CONFIG.MAX_PAGES, 1);
    this.fetchReadmes = options.fetchReadmes ?? false;
    this.ecosystem = options.ecosystem ?? DEFAULT_ECOSYSTEM_SOURCES;
  }

  public async fetch(
    category: string,
    options: FetchOptions = {}
  ): Promise<unknown[]> {
    const items =
      category === ECOSYSTEM_CATEGORY
        ? await this.fetchEcosystem(options.signal)
        : await this.searchByLanguage(category, options);

    if (!this.fetchReadmes) {
      return items;
    }
    const enriched: unknown[] = [];
    for (const item of items) {
      enriched.push(await this.attachReadme(item, options.signal));
    }
    return enriched;
  }

  public async searchByLanguage(
    language: string,
    options: FetchOptions = {}
  ): Promise<unknown[]> {
    const q = languageQuery(language, options.since);
    const items: unknown[] = [];

    for (let page = 1; page <= this.maxPages; page++) {
      const { data } = await this.call(`search ${q} (page ${page})`, () =>
        this.octokit.rest.search.repos({
          q,
          sort: "stars",
          order: "desc",
          per_page: this.perPage,
          page,
          request: { signal: options.signal },
        })
      );
      items.push(...data.items);
      if (data.items.length < this.perPage) break;
    }

    return items;
  }

  /**
   * Repositories of the configured organizations, then those carrying the
   * configured topics, then those whose README mentions a configured term.
   * One failing source is logged and skipped; the category only fails when
   * every source does.
   */
  public async fetchEcosystem(signal?: AbortSignal): Promise<unknown[]> {
    const sources: Array<{ label: string; load: () => Promise<unknown[]> }> = [
      ...this.ecosystem.orgs.map((org) => ({
        label: `org ${org}`,
        load: async (): Promise<unknown[]> => {
          const { data } = await this.call(`list repos of ${org}`, () =>
            this.octokit.rest.repos.listForOrg({
              org,
              type: "public",
              sort: "updated",
              per_page: this.perPage,
              request: { signal },
            })
          );
          return data;
        },
      })),
      ...this.ecosystem.topics.map((topic) => ({
        label: `topic ${topic}`,
        load: async (): Promise<unknown[]> => {
          const { data } = await this.call(`search topic ${topic}`, () =>
            this.octokit.rest.search.repos({
              q: `topic:${topic}`,
              sort: "stars",
              order: "desc",
              per_page: this.perPage,
              request: { signal },
            })
          );
          return data.items;
        },
      })),
      ...this.ecosystem.readmeMentions.map((term) => ({
        label: `readme mentions of ${term}`,
        load: async (): Promise<unknown[]> => {
          const q = `${term} in:readme`;
          const { data } = await this.call(`search ${q}`, () =>
            this.octokit.rest.search.repos({
              q,
              sort: "stars",
              order: "desc",
              per_page: this.perPage,
              request: { signal },
            })
          );
          return data.items;
        },
      })),
    ];

    if (sources.length === 0) {
      return [];
    }

    const results = await Promise.allSettled(sources.map((s) => s.load()));
    const items: unknown[] = [];
    const errors: unknown[] = [];

    results.forEach((result, index) => {
      if (result.status === "fulfilled") {
        items.push(...result.value);
      } else {
        errors.push(result.reason);
        console.warn(
          `⚠️ Ecosystem source ${sources[index].label} failed: ${errorMessage(result.reason)}`
        );
      }
    });

    if (errors.length === sources.length) {
      throw toFetchError(errors[0], "every ecosystem source failed");
    }
    return items;
  }

  public async readFile(
    fullName: string,
    path: string
  ): Promise<string | null> {
    const [owner, repo] = fullName.split("/");
    if (!owner || !repo) {
      throw new FatalFetchError(`Not a repository name: ${fullName}`);
    }

    try {
      const { data } = await this.octokit.rest.repos.getContent({
        owner,
        repo,
        path,
      });
      // Directories come back as arrays, symlinks and submodules without content
      if (Array.isArray(data) || !("content" in data)) {
        return null;
      }
      return Buffer.from(data.content, "base64").toString("utf8");
    } catch (error) {
      if (statusOf(error) === 404) {
        return null;
      }
      throw toFetchError(error, `${path} of ${fullName}`);
    }
  }

  private async attachReadme(
    item: unknown,
    signal?: AbortSignal
  ): Promise<unknown> {
    const parsed = repositoryIdentitySchema.safeParse(item);
    if (!parsed.success) {
      return item;
    }
    const [owner, repo] = parsed.data.full_name.split("/");
    if (!owner || !repo) {
      return item;
    }

    try {
      const { data } = await this.octokit.rest.repos.getReadme({
        owner,
        repo,
        request: { signal },
      });
      const readme = Buffer.from(data.content, "base64").toString("utf8");
      return { ...parsed.data, readme };
    } catch (error) {
      if (signal?.aborted) {
        throw toFetchError(error, `readme of ${parsed.data.full_name}`);
      }
      if (statusOf(error) !== 404) {
        console.warn(
          `⚠️ Could not fetch README for ${parsed.data.full_name}: ${errorMessage(error)}`
        );
      }
      return item;
    }
  }

  private async call<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toFetchError(error, context);
    }
  }
}
