import { requireStore } from "../config.js";
import type { PipelineConfig } from "../config.js";
import { createFplClient } from "../fpl/fplClient.js";
import type { FplClient } from "../fpl/fplClient.js";
import { connectMySql } from "../warehouse/mysql.js";
import { connectPostgres } from "../warehouse/postgres.js";
import type { StoreConnector } from "../warehouse/store.js";

export interface JobContext {
  config: PipelineConfig;
  api: FplClient;
  connectWarehouse: StoreConnector;
  connectReplica: StoreConnector;
}

export function createJobContext(config: PipelineConfig): JobContext {
  return {
    config,
    api: createFplClient(config.api),
    connectWarehouse: () => connectPostgres(requireStore(config, "warehouse")),
    connectReplica: () => connectMySql(requireStore(config, "replica"))
  };
}
