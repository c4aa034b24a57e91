import type { RepositoryFetcher } from "../../github-client/types";
import {
  FetchTimeoutError,
  TransientFetchError,
  errorMessage,
} from "../../errors";
import type {
  CategoryFailure,
  CollectResult,
  RepositoryRecord,
} from "../../types";
import { delay } from "../../utils";
import { FETCH_CONFIG } from "./data-config";
import { normalizeRepository } from "./normalize";

export interface CollectOptions {
  since?: Date;
  timeoutMs?: number;
  maxAttempts?: number;
  initialRetryDelayMs?: number;
}

type ResolvedCollectOptions = Required<Omit<CollectOptions, "since">> &
  Pick<CollectOptions, "since">;

async function fetchWithRetries(
  fetcher: RepositoryFetcher,
  category: string,
  options: ResolvedCollectOptions,
  signal: AbortSignal
): Promise<unknown[]> {
  const { maxAttempts, initialRetryDelayMs } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      if (attempt > 1) {
        console.log(
          `  🔄 Retry attempt ${attempt}/${maxAttempts} for ${category}`
        );
      }
      return await fetcher.fetch(category, { since: options.since, signal });
    } catch (error) {
      lastError = error;
      if (!(error instanceof TransientFetchError) || signal.aborted) {
        throw error;
      }
      if (attempt < maxAttempts) {
        const backoff = initialRetryDelayMs * Math.pow(2, attempt - 1);
        console.error(
          `  ⚠️ Attempt ${attempt}/${maxAttempts} for ${category} failed: ${errorMessage(error)}. Retrying in ${backoff / 1000}s...`
        );
        await delay(backoff, signal);
      }
    }
  }

  console.error(`  ❌ All ${maxAttempts} attempts failed for ${category}`);
  throw lastError;
}

/**
 * Fetches one category, retrying transient failures, within a deadline that
 * covers every attempt and backoff.
 */
async function fetchCategory(
  fetcher: RepositoryFetcher,
  category: string,
  options: ResolvedCollectOptions
): Promise<unknown[]> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new FetchTimeoutError(category, options.timeoutMs);
      controller.abort(error);
      reject(error);
    }, options.timeoutMs);
  });

  try {
    return await Promise.race([
      fetchWithRetries(fetcher, category, options, controller.signal),
      deadline,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

/**
 * Fetches every category concurrently. A failing category is reported and
 * the rest continue. Records come back deduplicated by identity, first
 * sighting wins, in category order then fetch order.
 */
export async function collect(
  fetcher: RepositoryFetcher,
  categories: string[],
  options: CollectOptions = {}
): Promise<CollectResult> {
  const resolved: ResolvedCollectOptions = {
    since: options.since,
    timeoutMs: options.timeoutMs ?? FETCH_CONFIG.CATEGORY_TIMEOUT_MS,
    maxAttempts: Math.max(options.maxAttempts ?? FETCH_CONFIG.MAX_ATTEMPTS, 1),
    initialRetryDelayMs:
      options.initialRetryDelayMs ?? FETCH_CONFIG.INITIAL_RETRY_DELAY_MS,
  };

  console.log(
    `\n📥 Collecting ${categories.length} categories: ${categories.join(", ")}`
  );

  const results = await Promise.allSettled(
    categories.map((category) => fetchCategory(fetcher, category, resolved))
  );

  const succeeded: string[] = [];
  const failed: CategoryFailure[] = [];
  const records: RepositoryRecord[] = [];
  const seen = new Set<string>();
  let skipped = 0;

  results.forEach((result, index) => {
    const category = categories[index];
    if (result.status === "rejected") {
      const error = toError(result.reason);
      console.error(`❌ Category ${category} failed: ${error.message}`);
      failed.push({ category, error });
      return;
    }

    succeeded.push(category);
    let added = 0;
    for (const payload of result.value) {
      const record = normalizeRepository(payload, category);
      if (!record) {
        skipped++;
        continue;
      }
      if (seen.has(record.fullName)) continue;
      seen.add(record.fullName);
      records.push(record);
      added++;
    }
    console.log(
      `✅ ${category}: ${result.value.length} fetched, ${added} new repositories`
    );
  });

  if (skipped > 0) {
    console.warn(`⚠️ Skipped ${skipped} payloads without a repository name`);
  }

  return { records, succeeded, failed, skipped };
}
