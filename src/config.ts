import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./log.js";
import { STAT_CATALOGUE, isStatName } from "./transform/stats.js";
import type { StatName } from "./transform/stats.js";

export type StoreName = "warehouse" | "replica";

export interface StoreSettings {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface PipelineConfig {
  api: {
    baseUrl: string;
    timeoutMs: number;
  };
  logLevel: LogLevel;
  batchSize: number;
  statCatalogue: StatName[];
  replicaRequireRows: boolean;
  stores: Partial<Record<StoreName, StoreSettings>>;
}

type Env = Record<string, string | undefined>;

const STORE_NAMES: StoreName[] = ["warehouse", "replica"];

export const STORE_ENV: Record<StoreName, Record<keyof StoreSettings, string>> = {
  warehouse: {
    host: "WAREHOUSE_HOST",
    port: "WAREHOUSE_PORT",
    database: "WAREHOUSE_DB",
    user: "WAREHOUSE_USER",
    password: "WAREHOUSE_PASSWORD"
  },
  replica: {
    host: "REPLICA_HOST",
    port: "REPLICA_PORT",
    database: "REPLICA_DB",
    user: "REPLICA_USER",
    password: "REPLICA_PASSWORD"
  }
};

const settingsSchema = z.object({
  FPL_API_BASE_URL: z.string().url().default("https://fantasy.premierleague.com/api"),
  FPL_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  INSERT_BATCH_SIZE: z.coerce.number().int().positive().default(500),
  STAT_CATALOGUE: z.string().optional(),
  REPLICA_REQUIRE_ROWS: z.enum(["true", "false"]).default("false")
});

const portSchema = z.coerce.number().int().min(1).max(65_535);

function readValue(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/** Drops blank values so schema defaults apply to `FOO=` lines in an env file. */
function presentValues(env: Env, keys: string[]): Record<string, string> {
  const values: Record<string, string> = {};
  for (const key of keys) {
    const value = readValue(env, key);
    if (value !== undefined) values[key] = value;
  }
  return values;
}

function parseStore(env: Env, store: StoreName, required: boolean): StoreSettings | undefined {
  const keys = STORE_ENV[store];
  const missing = Object.values(keys).filter((key) => readValue(env, key) === undefined);
  if (missing.length > 0) {
    if (required) {
      throw new ConfigError(`Missing ${store} connection parameters: ${missing.join(", ")}`);
    }
    return undefined;
  }

  const port = portSchema.safeParse(readValue(env, keys.port));
  if (!port.success) {
    if (required) throw new ConfigError(`${keys.port} must be a port number.`);
    return undefined;
  }
  return {
    host: readValue(env, keys.host) ?? "",
    port: port.data,
    database: readValue(env, keys.database) ?? "",
    user: readValue(env, keys.user) ?? "",
    password: readValue(env, keys.password) ?? ""
  };
}

function parseCatalogue(value: string | undefined): StatName[] {
  if (!value) return [...STAT_CATALOGUE];
  const names = value
    .split(",")
    .map((name) => name.trim())
    .filter(Boolean);
  const unknown = names.filter((name) => !isStatName(name));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown statistics in STAT_CATALOGUE: ${unknown.join(", ")}`);
  }
  const catalogue = names.filter(isStatName);
  if (catalogue.length === 0) {
    throw new ConfigError("STAT_CATALOGUE must name at least one statistic.");
  }
  return catalogue;
}

/**
 * Loads the env file named by ENV_FILE (or `.env` in the working directory)
 * into process.env. Values already set in the environment win.
 */
export function loadEnvFile(env: Env = process.env): void {
  const path = readValue(env, "ENV_FILE");
  dotenv.config(path ? { path } : {});
}

export function loadConfig(env: Env, requiredStores: readonly StoreName[]): PipelineConfig {
  const parsed = settingsSchema.safeParse(presentValues(env, Object.keys(settingsSchema.shape)));
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const settings = parsed.data;

  const stores: Partial<Record<StoreName, StoreSettings>> = {};
  for (const store of STORE_NAMES) {
    const parsedStore = parseStore(env, store, requiredStores.includes(store));
    if (parsedStore) stores[store] = parsedStore;
  }

  return {
    api: {
      baseUrl: settings.FPL_API_BASE_URL,
      timeoutMs: settings.FPL_API_TIMEOUT_MS
    },
    logLevel: settings.LOG_LEVEL,
    batchSize: settings.INSERT_BATCH_SIZE,
    statCatalogue: parseCatalogue(settings.STAT_CATALOGUE),
    replicaRequireRows: settings.REPLICA_REQUIRE_ROWS === "true",
    stores
  };
}

export function requireStore(config: PipelineConfig, store: StoreName): StoreSettings {
  const settings = config.stores[store];
  if (!settings) {
    const keys = Object.values(STORE_ENV[store]).join(", ");
    throw new ConfigError(`Missing ${store} connection parameters: ${keys}`);
  }
  return settings;
}
