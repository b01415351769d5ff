import { aggregateStats } from "../transform/stats.js";
import { loadTable } from "../warehouse/loader.js";
import type { LoadResult } from "../warehouse/loader.js";
import type { JobContext } from "./context.js";
import { isEntryPoint, runJobFromCli } from "./runJob.js";
import type { JobDefinition } from "./runJob.js";

export const PLAYER_STATS_TARGET = { schema: "bronze", table: "player_stats" };

export async function runPlayerStatsJob(context: JobContext): Promise<LoadResult> {
  const fixtures = await context.api.fetchFixtures({ finishedOnly: true });
  const table = aggregateStats(fixtures, context.config.statCatalogue);
  // Early in a season no fixture carries stats yet; that is not a failure.
  return loadTable(context.connectWarehouse, PLAYER_STATS_TARGET, table, {
    mode: "replace",
    onEmpty: "skip",
    batchSize: context.config.batchSize
  });
}

export const playerStatsJob: JobDefinition = {
  name: "player_stats",
  stores: ["warehouse"],
  run: runPlayerStatsJob
};

if (isEntryPoint(import.meta.url)) {
  runJobFromCli(playerStatsJob);
}
