import { buildGamesTable } from "../transform/games.js";
import { loadTable } from "../warehouse/loader.js";
import type { LoadResult } from "../warehouse/loader.js";
import type { JobContext } from "./context.js";
import { isEntryPoint, runJobFromCli } from "./runJob.js";
import type { JobDefinition } from "./runJob.js";

export const GAMES_TARGET = { schema: "bronze", table: "games_info" };

export async function runGamesInfoJob(context: JobContext): Promise<LoadResult> {
  const fixtures = await context.api.fetchFixtures();
  const table = buildGamesTable(fixtures);
  return loadTable(context.connectWarehouse, GAMES_TARGET, table, {
    mode: "replace",
    batchSize: context.config.batchSize
  });
}

export const gamesInfoJob: JobDefinition = {
  name: "games_info",
  stores: ["warehouse"],
  run: runGamesInfoJob
};

if (isEntryPoint(import.meta.url)) {
  runJobFromCli(gamesInfoJob);
}
