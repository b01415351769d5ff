import pg from "pg";
import type { StoreSettings } from "../config.js";
import { describeError } from "../errors.js";
import { logger } from "../log.js";
import { postgresDialect } from "./dialects.js";
import { SqlStore } from "./store.js";
import type { SqlConnection } from "./store.js";

export async function connectPostgres(settings: StoreSettings): Promise<SqlStore> {
  const client = new pg.Client({
    host: settings.host,
    port: settings.port,
    database: settings.database,
    user: settings.user,
    password: settings.password
  });
  try {
    await client.connect();
  } catch (error) {
    await client.end().catch((endError: unknown) => {
      logger.warn(`Closing the failed Postgres client raised: ${describeError(endError)}`);
    });
    throw error;
  }

  const connection: SqlConnection = {
    async run(sql, params = []) {
      await client.query(sql, params);
    },
    async all(sql) {
      const result = await client.query(sql);
      return { columns: result.fields.map((field) => field.name), rows: result.rows };
    },
    close: () => client.end()
  };
  return new SqlStore(postgresDialect, connection);
}
