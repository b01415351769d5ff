import mysql from "mysql2/promise";
import type { RowDataPacket } from "mysql2/promise";
import type { StoreSettings } from "../config.js";
import { mysqlDialect } from "./dialects.js";
import { SqlStore } from "./store.js";
import type { SqlConnection } from "./store.js";

export async function connectMySql(settings: StoreSettings): Promise<SqlStore> {
  const client = await mysql.createConnection({
    host: settings.host,
    port: settings.port,
    database: settings.database,
    user: settings.user,
    password: settings.password
  });

  const connection: SqlConnection = {
    async run(sql, params = []) {
      await client.query(sql, params);
    },
    async all(sql) {
      const [rows, fields] = await client.query<RowDataPacket[]>(sql);
      return { columns: fields.map((field) => field.name), rows };
    },
    close: () => client.end()
  };
  return new SqlStore(mysqlDialect, connection);
}
