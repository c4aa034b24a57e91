import "../../setup-env";
import * as fs from "fs";
import * as path from "path";
import { openDatabase } from "../../db";
import env from "../../env";
import { GitHubClient } from "../../github-client/client/api";
import { splitList } from "../../utils";
import { pipelineCategories } from "./data-config";
import { generateReport } from "./github.reports";
import { runPipeline, type PipelineOptions } from "./pipeline";

function pipelineOptionsFromEnv(): Partial<PipelineOptions> {
  return {
    categories: pipelineCategories(splitList(env.TARGET_LANGUAGES)),
    lookbackDays: env.FETCH_LOOKBACK_DAYS,
    timeoutMs: env.CATEGORY_TIMEOUT_MS,
    maxAttempts: env.FETCH_MAX_ATTEMPTS,
    initialRetryDelayMs: env.FETCH_RETRY_DELAY_MS,
    staleAfterDays: env.STALE_AFTER_DAYS,
    minQualityScore: env.MIN_QUALITY_SCORE,
    weights: {
      stars: env.MOMENTUM_STAR_WEIGHT,
      recency: env.MOMENTUM_RECENCY_WEIGHT,
    },
    renderOfficialOrgs: splitList(env.ECOSYSTEM_ORGS),
    renderEmployeeOrgs: splitList(env.RENDER_EMPLOYEE_ORGS),
  };
}

async function runCommand(command: string): Promise<void> {
  console.log(`Executing GitHub task: ${command}`);

  const database = openDatabase(env.DB_PATH);
  try {
    switch (command) {
      case "run": {
        if (!env.GITHUB_TOKEN) {
          throw new Error("GITHUB_TOKEN environment variable is required");
        }
        const fetcher = new GitHubClient(env.GITHUB_TOKEN, {
          perPage: env.FETCH_PER_PAGE,
          maxPages: env.FETCH_MAX_PAGES,
          fetchReadmes: env.FETCH_READMES,
          ecosystem: {
            orgs: splitList(env.ECOSYSTEM_ORGS),
            topics: splitList(env.ECOSYSTEM_TOPICS),
            readmeMentions: splitList(env.ECOSYSTEM_README_MENTIONS),
          },
        });
        const result = await runPipeline(
          { database, fetcher, files: fetcher },
          pipelineOptionsFromEnv()
        );
        if (result.status === "failed") {
          throw new Error(result.error ?? "Pipeline failed");
        }
        break;
      }

      case "report": {
        const report = await generateReport(database.getDB());
        const reportPath = path.join(
          __dirname,
          "../../../exports/trending-report.md"
        );
        fs.mkdirSync(path.dirname(reportPath), { recursive: true });
        fs.writeFileSync(reportPath, report);
        console.log(`Report generated at: ${reportPath}`);
        break;
      }

      default:
        throw new Error(`Unknown command: ${command}`);
    }
  } finally {
    await database.shutdown();
  }
}

if (require.main === module) {
  const command = process.argv[2];
  if (!command) {
    console.error("Please provide a command: run or report");
    process.exit(1);
  }

  runCommand(command)
    .then(() => {
      console.log("Command completed successfully!");
      process.exit(0);
    })
    .catch((error) => {
      console.error("Command failed:", error);
      process.exit(1);
    });
}

export { runCommand };
