import "dotenv/config";
import { pathToFileURL } from "url";
import { collectPolyRatings, POLYRATINGS_CHECKS, POLYRATINGS_DATASETS } from "./adapters/polyratings.ingest.js";
import { loadHarvestConfig, type HarvestConfig } from "./config.js";
import { SafePublisher, type PublishResult } from "./utils/publisher.js";
import type { Logger } from "./adapter.types.js";

export type Runner = (cfg: HarvestConfig) => Promise<PublishResult>;

export const adapters: Record<string, Runner> = {
  polyratings: cfg =>
    new SafePublisher({
      mainDir: cfg.mainDir,
      trackingDir: cfg.trackingDir,
      datasets: POLYRATINGS_DATASETS,
      checks: POLYRATINGS_CHECKS,
    }).publish(collectPolyRatings({
      apiBase: cfg.apiBase,
      http: cfg.http,
      reviewFailureTolerance: cfg.reviewFailureTolerance,
      maxProfessors: cfg.maxProfessors,
    })),
};

export function exitCodeFor(result: PublishResult): number {
  return result.status === "published" ? 0 : 1;
}

/** Runs one target and returns the process exit code; never throws. */
export async function main(
  target = "polyratings",
  env: NodeJS.ProcessEnv = process.env,
  log: Logger = console,
  registry: Record<string, Runner> = adapters,
): Promise<number> {
  const run = registry[target];
  if (!run) {
    log.error(`Usage: npm run ingest [${Object.keys(registry).join("|")}]`);
    return 1;
  }

  let result: PublishResult;
  try {
    result = await run(loadHarvestConfig(env));
  } catch (err) {
    log.error(err instanceof Error ? err.message : String(err));
    return 1;
  }

  if (result.status === "failed") {
    log.error(`${target} failed: ${result.error.message}`);
    if (result.trackingFiles.length) log.error(`Partial snapshot kept in: ${result.trackingFiles.join(", ")}`);
  } else {
    for (const f of result.mainFiles) log.log(`  ${f}`);
    log.log(`${target} done (${result.stamp})`);
  }
  return exitCodeFor(result);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv[2]).then(code => {
    process.exitCode = code;
  }).catch(err => {
    console.error(err);
    process.exit(1);
  });
}
