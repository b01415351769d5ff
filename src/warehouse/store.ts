import { describeError } from "../errors.js";
import { logger } from "../log.js";
import type { CellValue, Column, ColumnType, Table, TableRow, TableTarget } from "../types.js";
import type { Dialect, SqlValue } from "./dialects.js";
import {
  buildCreateTable,
  buildDropTable,
  buildInsert,
  qualifiedName
} from "./dialects.js";

/** Postgres rejects statements with more bind parameters than this. */
export const MAX_BIND_PARAMETERS = 65535;

export interface QueryRows {
  columns: string[];
  rows: Record<string, unknown>[];
}

/** The driver-specific surface a store needs; one per open database connection. */
export interface SqlConnection {
  run(sql: string, params?: SqlValue[]): Promise<void>;
  all(sql: string): Promise<QueryRows>;
  close(): Promise<void>;
}

export interface RelationalStore {
  readonly dialect: Dialect;
  replaceTable<Row extends TableRow>(target: TableTarget, table: Table<Row>, batchSize: number): Promise<number>;
  truncateAndAppend<Row extends TableRow>(target: TableTarget, table: Table<Row>, batchSize: number): Promise<number>;
  select(sql: string): Promise<Table>;
  close(): Promise<void>;
}

export type StoreConnector = () => Promise<RelationalStore>;

export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (value instanceof Date) return value;
  if (typeof value === "bigint") return value.toString();
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  return JSON.stringify(value);
}

export function inferColumnType(values: CellValue[]): ColumnType {
  const sample = values.find((value) => value !== null);
  if (sample === undefined) return "text";
  if (typeof sample === "boolean") return "boolean";
  if (sample instanceof Date) return "timestamp";
  if (typeof sample === "number") {
    return values.every((value) => value === null || Number.isInteger(value)) ? "integer" : "real";
  }
  return "text";
}

export class SqlStore implements RelationalStore {
  readonly dialect: Dialect;
  private readonly connection: SqlConnection;

  constructor(dialect: Dialect, connection: SqlConnection) {
    this.dialect = dialect;
    this.connection = connection;
  }

  async replaceTable<Row extends TableRow>(target: TableTarget, table: Table<Row>, batchSize: number): Promise<number> {
    return this.transaction(async () => {
      await this.connection.run(buildDropTable(this.dialect, target));
      await this.connection.run(buildCreateTable(this.dialect, target, table.columns));
      return this.insertRows(target, table, batchSize);
    });
  }

  async truncateAndAppend<Row extends TableRow>(target: TableTarget, table: Table<Row>, batchSize: number): Promise<number> {
    await this.connection.run(this.dialect.truncate(qualifiedName(this.dialect, target)));
    return this.insertRows(target, table, batchSize);
  }

  async select(sql: string): Promise<Table> {
    const result = await this.connection.all(sql);
    const rows = result.rows.map((raw) => {
      const row: Record<string, CellValue> = {};
      for (const name of result.columns) {
        row[name] = toCellValue(raw[name]);
      }
      return row;
    });
    const columns: Column[] = result.columns.map((name) => ({
      name,
      type: inferColumnType(rows.map((row) => row[name] ?? null))
    }));
    return { columns, rows };
  }

  close(): Promise<void> {
    return this.connection.close();
  }

  private async insertRows<Row extends TableRow>(target: TableTarget, table: Table<Row>, batchSize: number): Promise<number> {
    const rowsPerStatement = Math.floor(MAX_BIND_PARAMETERS / Math.max(1, table.columns.length));
    const size = Math.max(1, Math.min(Math.floor(batchSize), rowsPerStatement));
    for (let start = 0; start < table.rows.length; start += size) {
      const batch = table.rows.slice(start, start + size);
      const statement = buildInsert(this.dialect, target, table.columns, batch);
      await this.connection.run(statement.sql, statement.params);
    }
    return table.rows.length;
  }

  private async transaction<T>(work: () => Promise<T>): Promise<T> {
    await this.connection.run("BEGIN");
    try {
      const result = await work();
      await this.connection.run("COMMIT");
      return result;
    } catch (error) {
      try {
        await this.connection.run("ROLLBACK");
      } catch (rollbackError) {
        logger.warn(`Rollback failed: ${describeError(rollbackError)}`);
      }
      throw error;
    }
  }
}

/** Opens a store, hands it to `work`, and closes it on every exit path. */
export async function withStore<T>(connect: StoreConnector, work: (store: RelationalStore) => Promise<T>): Promise<T> {
  const store = await connect();
  try {
    return await work(store);
  } finally {
    try {
      await store.close();
    } catch (error) {
      logger.warn(`Failed to close ${store.dialect.name} connection: ${describeError(error)}`);
    }
  }
}
