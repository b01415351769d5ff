import { PipelineError, QueryError, describeError } from "../errors.js";
import { logger } from "../log.js";
import type { Table } from "../types.js";
import { loadTable } from "../warehouse/loader.js";
import type { LoadResult } from "../warehouse/loader.js";
import { withStore } from "../warehouse/store.js";
import type { StoreConnector } from "../warehouse/store.js";
import type { JobContext } from "./context.js";
import { isEntryPoint, runJobFromCli } from "./runJob.js";
import type { JobDefinition } from "./runJob.js";

export const TEAM_HISTORY_QUERY = "SELECT * FROM gold.v_fct_team_history";
export const TEAM_HISTORY_TARGET = { table: "FctTeamHistory" };

export async function fetchFromWarehouse(connect: StoreConnector, query: string): Promise<Table> {
  try {
    const table = await withStore(connect, (store) => store.select(query));
    logger.info(`Data fetched from warehouse: ${table.rows.length} rows`);
    return table;
  } catch (error) {
    if (error instanceof PipelineError) throw error;
    logger.error(`Failed to fetch data from warehouse: ${describeError(error)}`);
    throw new QueryError(`Failed to fetch data from warehouse: ${describeError(error)}`, { cause: error });
  }
}

export async function runTeamHistoryJob(context: JobContext): Promise<LoadResult> {
  const table = await fetchFromWarehouse(context.connectWarehouse, TEAM_HISTORY_QUERY);
  return loadTable(context.connectReplica, TEAM_HISTORY_TARGET, table, {
    mode: "truncate-append",
    onEmpty: context.config.replicaRequireRows ? "fail" : "write",
    batchSize: context.config.batchSize
  });
}

export const teamHistoryJob: JobDefinition = {
  name: "team_history",
  stores: ["warehouse", "replica"],
  run: runTeamHistoryJob
};

if (isEntryPoint(import.meta.url)) {
  runJobFromCli(teamHistoryJob);
}
