import Database from "better-sqlite3";
import { sqliteDialect } from "./dialects.js";
import { SqlStore } from "./store.js";
import type { SqlConnection } from "./store.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function createSqliteConnection(db: Database.Database): SqlConnection {
  return {
    async run(sql, params = []) {
      db.prepare(sql).run(...params);
    },
    async all(sql) {
      const statement = db.prepare(sql);
      const rows = statement.all().filter(isRecord);
      return { columns: statement.columns().map((column) => column.name), rows };
    },
    async close() {
      db.close();
    }
  };
}

/**
 * Opens a SQLite database with each schema attached as its own in-memory
 * database, so `schema.table` names resolve the way they do on a server.
 */
export function openSqliteDatabase(filename = ":memory:", schemas: string[] = []): Database.Database {
  const db = new Database(filename);
  for (const schema of schemas) {
    db.exec(`ATTACH DATABASE ':memory:' AS ${sqliteDialect.quote(schema)}`);
  }
  return db;
}

export function openSqliteStore(filename = ":memory:", schemas: string[] = []): SqlStore {
  return new SqlStore(sqliteDialect, createSqliteConnection(openSqliteDatabase(filename, schemas)));
}
