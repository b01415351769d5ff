import { DataError, LoadError, PipelineError, describeError } from "../errors.js";
import { logger } from "../log.js";
import type { Table, TableRow, TableTarget } from "../types.js";
import { describeTarget } from "./dialects.js";
import { withStore } from "./store.js";
import type { RelationalStore, StoreConnector } from "./store.js";

export type WriteMode = "replace" | "truncate-append";

/** What to do with a table that has no rows: raise, skip the load, or write it anyway. */
export type EmptyPolicy = "fail" | "skip" | "write";

export interface LoadOptions {
  mode: WriteMode;
  onEmpty?: EmptyPolicy;
  batchSize?: number;
}

export interface LoadResult {
  target: string;
  mode: WriteMode;
  rows: number;
  skipped: boolean;
}

export const DEFAULT_BATCH_SIZE = 500;

function defaultEmptyPolicy(mode: WriteMode): EmptyPolicy {
  return mode === "replace" ? "fail" : "write";
}

async function openStore(connect: StoreConnector, name: string): Promise<RelationalStore> {
  try {
    const store = await connect();
    logger.info(`Database connection established for '${name}'`);
    return store;
  } catch (error) {
    if (error instanceof PipelineError) throw error;
    logger.error(`Failed to connect to database for '${name}': ${describeError(error)}`);
    throw new LoadError(`Failed to connect to database for '${name}': ${describeError(error)}`, { cause: error });
  }
}

export async function loadTable<Row extends TableRow>(
  connect: StoreConnector,
  target: TableTarget,
  table: Table<Row>,
  options: LoadOptions
): Promise<LoadResult> {
  const name = describeTarget(target);
  const onEmpty = options.onEmpty ?? defaultEmptyPolicy(options.mode);
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;

  if (table.rows.length === 0) {
    if (onEmpty === "fail") {
      logger.error(`Table for '${name}' is empty, cannot upload.`);
      throw new DataError(`Table for '${name}' is empty, cannot upload.`);
    }
    if (onEmpty === "skip") {
      logger.warn(`Table for '${name}' is empty, skipping upload.`);
      return { target: name, mode: options.mode, rows: 0, skipped: true };
    }
  }

  return withStore(
    () => openStore(connect, name),
    async (store) => {
      try {
        const rows =
          options.mode === "replace"
            ? await store.replaceTable(target, table, batchSize)
            : await store.truncateAndAppend(target, table, batchSize);
        logger.info(`Data loaded into '${name}' successfully (${rows} rows, ${options.mode}).`);
        return { target: name, mode: options.mode, rows, skipped: false };
      } catch (error) {
        logger.error(`Failed to load data into '${name}': ${describeError(error)}`);
        throw new LoadError(`Failed to load data into '${name}': ${describeError(error)}`, { cause: error });
      }
    }
  );
}
