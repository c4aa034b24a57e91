export interface FetchOptions {
  /** Only repositories pushed since this instant (language search). */
  since?: Date;
  signal?: AbortSignal;
}

/**
 * Source of repository payloads for a category. Payloads are returned as
 * received; validation happens in the collector.
 */
export interface RepositoryFetcher {
  fetch(category: string, options?: FetchOptions): Promise<unknown[]>;
}

/** Reads one file of a repository's default branch. */
export interface RepositoryFileReader {
  /** Resolves to null when the file does not exist. */
  readFile(fullName: string, path: string): Promise<string | null>;
}

export interface EcosystemSources {
  orgs: string[];
  topics: string[];
  /** Terms searched for in READMEs. */
  readmeMentions: string[];
}

export interface GitHubClientOptions {
  perPage?: number;
  maxPages?: number;
  fetchReadmes?: boolean;
  ecosystem?: EcosystemSources;
  /** Replaces the global fetch used by Octokit. */
  fetch?: typeof fetch;
}
