import { buildPlayersTable } from "../transform/players.js";
import { loadTable } from "../warehouse/loader.js";
import type { LoadResult } from "../warehouse/loader.js";
import type { JobContext } from "./context.js";
import { isEntryPoint, runJobFromCli } from "./runJob.js";
import type { JobDefinition } from "./runJob.js";

export const PLAYERS_TARGET = { schema: "bronze", table: "players_info" };

export async function runPlayersInfoJob(context: JobContext): Promise<LoadResult> {
  const { data, bounds } = await context.api.fetchBootstrap();
  const table = buildPlayersTable(data, bounds);
  return loadTable(context.connectWarehouse, PLAYERS_TARGET, table, {
    mode: "replace",
    batchSize: context.config.batchSize
  });
}

export const playersInfoJob: JobDefinition = {
  name: "players_info",
  stores: ["warehouse"],
  run: runPlayersInfoJob
};

if (isEntryPoint(import.meta.url)) {
  runJobFromCli(playersInfoJob);
}
