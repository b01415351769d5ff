import type { CellValue, Column, ColumnType, TableRow, TableTarget } from "../types.js";

export type SqlValue = string | number | boolean | Date | null;

export interface Dialect {
  name: "postgres" | "mysql" | "sqlite";
  quote(identifier: string): string;
  placeholder(index: number): string;
  columnType(type: ColumnType): string;
  truncate(target: string): string;
  toParam(value: CellValue): SqlValue;
}

export interface SqlStatement {
  sql: string;
  params: SqlValue[];
}

export const postgresDialect: Dialect = {
  name: "postgres",
  quote: (identifier) => `"${identifier.replace(/"/g, '""')}"`,
  placeholder: (index) => `$${index}`,
  columnType: (type) =>
    ({
      integer: "BIGINT",
      real: "DOUBLE PRECISION",
      text: "TEXT",
      boolean: "BOOLEAN",
      timestamp: "TIMESTAMPTZ"
    })[type],
  truncate: (target) => `TRUNCATE TABLE ${target}`,
  toParam: (value) => value
};

export const mysqlDialect: Dialect = {
  name: "mysql",
  quote: (identifier) => `\`${identifier.replace(/`/g, "``")}\``,
  placeholder: () => "?",
  columnType: (type) =>
    ({
      integer: "BIGINT",
      real: "DOUBLE",
      text: "TEXT",
      boolean: "BOOLEAN",
      timestamp: "DATETIME"
    })[type],
  truncate: (target) => `TRUNCATE TABLE ${target}`,
  toParam: (value) => value
};

// better-sqlite3 binds neither booleans nor dates.
export const sqliteDialect: Dialect = {
  name: "sqlite",
  quote: (identifier) => `"${identifier.replace(/"/g, '""')}"`,
  placeholder: () => "?",
  columnType: (type) =>
    ({
      integer: "INTEGER",
      real: "REAL",
      text: "TEXT",
      boolean: "INTEGER",
      timestamp: "TEXT"
    })[type],
  truncate: (target) => `DELETE FROM ${target}`,
  toParam: (value) => {
    if (typeof value === "boolean") return value ? 1 : 0;
    if (value instanceof Date) return value.toISOString();
    return value;
  }
};

export function qualifiedName(dialect: Dialect, target: TableTarget): string {
  const table = dialect.quote(target.table);
  return target.schema ? `${dialect.quote(target.schema)}.${table}` : table;
}

export function describeTarget(target: TableTarget): string {
  return target.schema ? `${target.schema}.${target.table}` : target.table;
}

export function buildDropTable(dialect: Dialect, target: TableTarget): string {
  return `DROP TABLE IF EXISTS ${qualifiedName(dialect, target)}`;
}

export function buildCreateTable<Row extends TableRow>(
  dialect: Dialect,
  target: TableTarget,
  columns: Column<Row>[]
): string {
  const definitions = columns.map((column) => `${dialect.quote(column.name)} ${dialect.columnType(column.type)}`);
  return `CREATE TABLE ${qualifiedName(dialect, target)} (${definitions.join(", ")})`;
}

export function buildInsert<Row extends TableRow>(
  dialect: Dialect,
  target: TableTarget,
  columns: Column<Row>[],
  rows: Row[]
): SqlStatement {
  const params: SqlValue[] = [];
  const tuples = rows.map((row) => {
    const slots = columns.map((column) => {
      params.push(dialect.toParam(row[column.name] ?? null));
      return dialect.placeholder(params.length);
    });
    return `(${slots.join(", ")})`;
  });
  const names = columns.map((column) => dialect.quote(column.name)).join(", ");
  return {
    sql: `INSERT INTO ${qualifiedName(dialect, target)} (${names}) VALUES ${tuples.join(", ")}`,
    params
  };
}
