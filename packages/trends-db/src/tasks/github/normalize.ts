import { z } from "zod";
import type { RepositoryRecord } from "../../types";
import { sourceTypeOf } from "./data-config";

// Only the identity is required; the rest is mapped leniently and judged by
// the staging layer.
const repositoryPayloadSchema = z
  .object({
    full_name: z.string().regex(/^[^/\s]+\/[^/\s]+$/),
  })
  .passthrough();

function optionalString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function optionalNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Maps a GitHub repository payload to a raw record, or returns null when the
 * payload has no `owner/name` identity.
 */
export function normalizeRepository(
  payload: unknown,
  category: string
): RepositoryRecord | null {
  const parsed = repositoryPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  const item = parsed.data;

  return {
    fullName: item.full_name,
    category,
    sourceType: sourceTypeOf(category),
    url: optionalString(item.html_url),
    language: optionalString(item.language),
    stars: optionalNumber(item.stargazers_count ?? item.stars),
    description: optionalString(item.description),
    createdAt: optionalString(item.created_at),
    updatedAt: optionalString(item.updated_at),
    readme: optionalString(item.readme),
    payload,
  };
}
