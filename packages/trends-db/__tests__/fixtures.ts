import type {
  FetchOptions,
  RepositoryFetcher,
  RepositoryFileReader,
} from "../src/github-client/types";
import type { RawRepository } from "../src/schema";
import type { StagedRepository } from "../src/types";

export function repoPayload(
  fullName: string,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    full_name: fullName,
    html_url: `https://github.com/${fullName}`,
    language: "Python",
    stargazers_count: 10,
    description: `${fullName} description`,
    created_at: "2024-06-01T00:00:00Z",
    updated_at: "2024-06-09T12:00:00Z",
    ...overrides,
  };
}

export function rawRow(
  fullName: string,
  overrides: Partial<RawRepository> = {}
): RawRepository {
  return {
    repoFullName: fullName,
    category: "Python",
    sourceType: "language",
    url: `https://github.com/${fullName}`,
    language: "Python",
    stars: 120,
    description: "A tool",
    createdAt: "2024-05-01T00:00:00Z",
    updatedAt: "2024-06-08T00:00:00Z",
    readmeContent: null,
    apiResponse: {},
    fetchedAt: new Date("2024-06-10T00:00:00Z"),
    ...overrides,
  };
}

export function stagedRepo(
  fullName: string,
  overrides: Partial<StagedRepository> = {}
): StagedRepository {
  return {
    fullName,
    url: `https://github.com/${fullName}`,
    category: "Python",
    sourceType: "language",
    language: "Python",
    description: `${fullName} description`,
    stars: 10,
    createdAt: new Date("2023-01-01T00:00:00Z"),
    updatedAt: new Date("2024-05-30T00:00:00Z"),
    readme: null,
    dataQualityScore: 0.97,
    renderCategory: null,
    usesRender: false,
    fetchedAt: new Date("2024-06-01T00:00:00Z"),
    ...overrides,
  };
}

type CategoryHandler = (options: FetchOptions) => Promise<unknown[]>;

/**
 * In-process fetcher; each category answers from its handler and every call
 * is counted.
 */
export class FakeFetcher implements RepositoryFetcher {
  readonly calls = new Map<string, number>();

  constructor(private readonly handlers: Record<string, CategoryHandler>) {}

  async fetch(category: string, options: FetchOptions = {}): Promise<unknown[]> {
    this.calls.set(category, (this.calls.get(category) ?? 0) + 1);
    const handler = this.handlers[category];
    if (!handler) {
      throw new Error(`No handler for ${category}`);
    }
    return handler(options);
  }

  callsFor(category: string): number {
    return this.calls.get(category) ?? 0;
  }
}

/**
 * In-process file reader keyed by "owner/name:path"; a function value is
 * called instead, so a read can fail.
 */
export class FakeFiles implements RepositoryFileReader {
  readonly reads: string[] = [];

  constructor(
    private readonly files: Record<string, string | (() => Promise<string>)>
  ) {}

  async readFile(fullName: string, path: string): Promise<string | null> {
    const key = `${fullName}:${path}`;
    this.reads.push(key);
    const file = this.files[key];
    if (file === undefined) return null;
    return typeof file === "string" ? file : file();
  }
}

/** Never settles unless the signal aborts. */
export function hangUntilAborted(options: FetchOptions): Promise<unknown[]> {
  return new Promise((_, reject) => {
    options.signal?.addEventListener("abort", () =>
      reject(new Error("aborted"))
    );
  });
}
