import { before, test } from "node:test";
import assert from "node:assert/strict";
import { configureLogging } from "../log.js";
import type { Table } from "../types.js";
import { mysqlDialect, postgresDialect } from "./dialects.js";
import { MAX_BIND_PARAMETERS, SqlStore, inferColumnType, toCellValue, withStore } from "./store.js";
import type { QueryRows, SqlConnection } from "./store.js";

before(() => {
  configureLogging({ sink: () => {} });
});

function recordingConnection(options: { failOn?: string; result?: QueryRows } = {}) {
  const statements: string[] = [];
  let closed = 0;
  const connection: SqlConnection = {
    async run(sql) {
      statements.push(sql);
      if (options.failOn && sql.startsWith(options.failOn)) {
        throw new Error(`${options.failOn} failed`);
      }
    },
    async all(sql) {
      statements.push(sql);
      return options.result ?? { columns: [], rows: [] };
    },
    async close() {
      closed += 1;
    }
  };
  return { connection, statements, closedCount: () => closed };
}

const ids: Table = {
  columns: [{ name: "id", type: "integer" }],
  rows: [{ id: 1 }, { id: 2 }, { id: 3 }]
};

test("replace drops, creates and inserts in batches inside a transaction", async () => {
  const { connection, statements } = recordingConnection();
  const store = new SqlStore(postgresDialect, connection);
  const count = await store.replaceTable({ schema: "bronze", table: "t" }, ids, 2);

  assert.equal(count, 3);
  assert.deepEqual(statements, [
    "BEGIN",
    'DROP TABLE IF EXISTS "bronze"."t"',
    'CREATE TABLE "bronze"."t" ("id" BIGINT)',
    'INSERT INTO "bronze"."t" ("id") VALUES ($1), ($2)',
    'INSERT INTO "bronze"."t" ("id") VALUES ($1)',
    "COMMIT"
  ]);
});

test("a failed insert rolls the replace back", async () => {
  const { connection, statements } = recordingConnection({ failOn: "INSERT" });
  const store = new SqlStore(postgresDialect, connection);
  await assert.rejects(store.replaceTable({ schema: "bronze", table: "t" }, ids, 500), /INSERT failed/);
  assert.equal(statements[statements.length - 1], "ROLLBACK");
  assert.equal(statements.includes("COMMIT"), false);
});

test("truncate-append empties the table then inserts without a transaction", async () => {
  const { connection, statements } = recordingConnection();
  const store = new SqlStore(mysqlDialect, connection);
  assert.equal(await store.truncateAndAppend({ table: "FctTeamHistory" }, ids, 500), 3);
  assert.deepEqual(statements, [
    "TRUNCATE TABLE `FctTeamHistory`",
    "INSERT INTO `FctTeamHistory` (`id`) VALUES (?), (?), (?)"
  ]);
});

test("truncate-append of no rows only truncates", async () => {
  const { connection, statements } = recordingConnection();
  const store = new SqlStore(mysqlDialect, connection);
  assert.equal(await store.truncateAndAppend({ table: "FctTeamHistory" }, { columns: [], rows: [] }, 500), 0);
  assert.deepEqual(statements, ["TRUNCATE TABLE `FctTeamHistory`"]);
});

test("select converts driver values and infers column types", async () => {
  const kickoff = new Date("2024-08-16T19:00:00Z");
  const { connection } = recordingConnection({
    result: {
      columns: ["team", "points", "ratio", "kickoff", "active", "note"],
      rows: [{ team: "ARS", points: 3, ratio: 1.5, kickoff, active: true, note: null, ignored: "x" }]
    }
  });
  const table = await new SqlStore(postgresDialect, connection).select("SELECT * FROM gold.v");
  assert.deepEqual(
    table.columns.map((column) => `${column.name}:${column.type}`),
    ["team:text", "points:integer", "ratio:real", "kickoff:timestamp", "active:boolean", "note:text"]
  );
  assert.deepEqual(table.rows, [{ team: "ARS", points: 3, ratio: 1.5, kickoff, active: true, note: null }]);
});

test("unusual driver values are flattened to cells", () => {
  assert.equal(toCellValue(12n), "12");
  assert.equal(toCellValue(undefined), null);
  assert.equal(toCellValue({ a: 1 }), '{"a":1}');
  assert.equal(toCellValue(Buffer.from("abc")), "abc");
  assert.equal(inferColumnType([null, 2, 3.25]), "real");
  assert.equal(inferColumnType([null, null]), "text");
});

test("withStore closes the connection when the work fails", async () => {
  const { connection, closedCount } = recordingConnection();
  await assert.rejects(
    withStore(
      async () => new SqlStore(postgresDialect, connection),
      async () => {
        throw new Error("work failed");
      }
    ),
    /work failed/
  );
  assert.equal(closedCount(), 1);
});

test("insert batches stay under the bind parameter limit", async () => {
  const { connection, statements } = recordingConnection();
  const names = ["a", "b", "c", "d", "e", "f", "g"];
  const wide: Table = {
    columns: names.map((name) => ({ name, type: "integer" as const })),
    rows: Array.from({ length: 10000 }, (_, index) => Object.fromEntries(names.map((name) => [name, index])))
  };

  const rows = await new SqlStore(postgresDialect, connection).truncateAndAppend({ table: "wide" }, wide, 10000);

  assert.equal(rows, 10000);
  assert.equal(Math.floor(MAX_BIND_PARAMETERS / 7), 9362);
  assert.equal(statements.filter((sql) => sql.startsWith("INSERT")).length, 2);
});
