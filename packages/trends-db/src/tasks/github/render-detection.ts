import { parse } from "yaml";
import { z } from "zod";
import { errorMessage } from "../../errors";
import type { RepositoryFileReader } from "../../github-client/types";
import type { RenderCategory } from "../../schema";
import type { RenderEnrichment, RepositoryRecord } from "../../types";
import { RENDER_BLUEPRINT_TOPICS, RENDER_OFFICIAL_ORGS } from "./data-config";

export const BLUEPRINT_FILE = "render.yaml";
const DOCKERFILE = "Dockerfile";
const DEPLOY_BUTTON_URL = "render.com/deploy";
const DOCKERFILE_PATTERNS = [/render\.com/i, /RENDER_/i, /onrender\.com/i];

const MAX_COMPLEXITY = 10;

const blueprintEntrySchema = z
  .object({ type: z.string().optional() })
  .passthrough();

const blueprintSchema = z
  .object({
    services: z.array(blueprintEntrySchema).optional(),
    databases: z.array(blueprintEntrySchema).optional(),
  })
  .passthrough();

const topicsSchema = z.object({ topics: z.array(z.string()) }).passthrough();

export interface RenderBlueprint {
  services: string[];
  databases: string[];
}

export interface DockerfileSignals {
  usesRenderEnv: boolean;
  renderPatterns: number;
}

export interface RenderCategoryOptions {
  officialOrgs: readonly string[];
  employeeOrgs: readonly string[];
}

export const DEFAULT_RENDER_CATEGORY_OPTIONS: RenderCategoryOptions = {
  officialOrgs: RENDER_OFFICIAL_ORGS,
  employeeOrgs: [],
};

/**
 * Service and database types declared in a render.yaml. Services without a
 * type count as "unknown", databases as "postgres". Null when the content is
 * not YAML or not a blueprint document.
 */
export function parseBlueprint(content: string): RenderBlueprint | null {
  let document: unknown;
  try {
    document = parse(content);
  } catch {
    return null;
  }
  if (document === null || document === undefined) {
    return { services: [], databases: [] };
  }

  const parsed = blueprintSchema.safeParse(document);
  if (!parsed.success) {
    return null;
  }
  return {
    services: (parsed.data.services ?? []).map((s) => s.type ?? "unknown"),
    databases: (parsed.data.databases ?? []).map((d) => d.type ?? "postgres"),
  };
}

export function scanDockerfile(content: string): DockerfileSignals {
  return {
    usesRenderEnv: content.includes("RENDER"),
    renderPatterns: DOCKERFILE_PATTERNS.filter((pattern) =>
      pattern.test(content)
    ).length,
  };
}

/**
 * 0-10: up to 5 for the number of services and databases, up to 3 for
 * distinct service types, one each for a Dockerfile reading RENDER variables
 * and one naming Render hosts.
 */
export function renderComplexity(
  blueprint: RenderBlueprint,
  dockerfile: DockerfileSignals | null
): number {
  const declared = blueprint.services.length + blueprint.databases.length;
  let score =
    Math.min(declared, 5) + Math.min(new Set(blueprint.services).size, 3);
  if (dockerfile?.usesRenderEnv) score++;
  if (dockerfile && dockerfile.renderPatterns > 0) score++;
  return Math.min(score, MAX_COMPLEXITY);
}

export function topicsOf(payload: unknown): string[] {
  const parsed = topicsSchema.safeParse(payload);
  return parsed.success ? parsed.data.topics : [];
}

/** Official organization first, then blueprint topics, then employee orgs. */
export function categorizeRender(
  fullName: string,
  topics: readonly string[],
  options: RenderCategoryOptions = DEFAULT_RENDER_CATEGORY_OPTIONS
): RenderCategory {
  const owner = fullName.split("/")[0].toLowerCase();
  const ownedBy = (orgs: readonly string[]) =>
    orgs.some((org) => org.trim().toLowerCase() === owner);

  if (ownedBy(options.officialOrgs)) return "official";
  if (topics.some((topic) => RENDER_BLUEPRINT_TOPICS.includes(topic))) {
    return "blueprint";
  }
  if (ownedBy(options.employeeOrgs)) return "employee";
  return "community";
}

export function hasDeployButton(readme: string | null): boolean {
  return readme?.toLowerCase().includes(DEPLOY_BUTTON_URL) ?? false;
}

export async function detectRenderUsage(
  reader: RepositoryFileReader,
  record: RepositoryRecord,
  options: RenderCategoryOptions = DEFAULT_RENDER_CATEGORY_OPTIONS
): Promise<RenderEnrichment> {
  const detected: RenderEnrichment = {
    fullName: record.fullName,
    renderCategory: categorizeRender(
      record.fullName,
      topicsOf(record.payload),
      options
    ),
    usesRender: false,
    services: [],
    databases: [],
    serviceCount: 0,
    complexityScore: 0,
    hasDeployButton: hasDeployButton(record.readme),
  };

  const content = await reader.readFile(record.fullName, BLUEPRINT_FILE);
  if (content === null) {
    return detected;
  }

  let blueprint = parseBlueprint(content);
  if (!blueprint) {
    console.warn(
      `⚠️ ${record.fullName}: ${BLUEPRINT_FILE} is not a readable blueprint`
    );
    blueprint = { services: [], databases: [] };
  }
  const dockerfile = await reader.readFile(record.fullName, DOCKERFILE);

  return {
    ...detected,
    usesRender: true,
    services: blueprint.services,
    databases: blueprint.databases,
    serviceCount: blueprint.services.length + blueprint.databases.length,
    complexityScore: renderComplexity(
      blueprint,
      dockerfile === null ? null : scanDockerfile(dockerfile)
    ),
  };
}

/**
 * Detects Render usage for the ecosystem records, one repository at a time.
 * A repository whose files cannot be read is logged and left out, so the
 * enrichment stored by an earlier run stands.
 */
export async function enrichEcosystem(
  reader: RepositoryFileReader,
  records: readonly RepositoryRecord[],
  options: RenderCategoryOptions = DEFAULT_RENDER_CATEGORY_OPTIONS
): Promise<RenderEnrichment[]> {
  const ecosystem = records.filter(
    (record) => record.sourceType === "ecosystem"
  );
  if (ecosystem.length === 0) {
    return [];
  }

  console.log(
    `\n🔍 Detecting Render usage in ${ecosystem.length} ecosystem repositories`
  );

  const enriched: RenderEnrichment[] = [];
  let failed = 0;
  for (const record of ecosystem) {
    try {
      enriched.push(await detectRenderUsage(reader, record, options));
    } catch (error) {
      failed++;
      console.warn(
        `⚠️ Render detection failed for ${record.fullName}: ${errorMessage(error)}`
      );
    }
  }

  const usingRender = enriched.filter((e) => e.usesRender).length;
  console.log(
    `✅ ${usingRender} of ${enriched.length} repositories have a ${BLUEPRINT_FILE}` +
      (failed > 0 ? `, ${failed} could not be checked` : "")
  );
  return enriched;
}
