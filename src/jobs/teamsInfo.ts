import { buildTeamsTable } from "../transform/teams.js";
import { loadTable } from "../warehouse/loader.js";
import type { LoadResult } from "../warehouse/loader.js";
import type { JobContext } from "./context.js";
import { isEntryPoint, runJobFromCli } from "./runJob.js";
import type { JobDefinition } from "./runJob.js";

export const TEAMS_TARGET = { schema: "bronze", table: "teams_info" };

export async function runTeamsInfoJob(context: JobContext): Promise<LoadResult> {
  const { data, bounds } = await context.api.fetchBootstrap();
  const table = buildTeamsTable(data, bounds);
  return loadTable(context.connectWarehouse, TEAMS_TARGET, table, {
    mode: "replace",
    batchSize: context.config.batchSize
  });
}

export const teamsInfoJob: JobDefinition = {
  name: "teams_info",
  stores: ["warehouse"],
  run: runTeamsInfoJob
};

if (isEntryPoint(import.meta.url)) {
  runJobFromCli(teamsInfoJob);
}
