import { pathToFileURL } from "url";
import { loadConfig, loadEnvFile } from "../config.js";
import type { StoreName } from "../config.js";
import { describeError } from "../errors.js";
import { configureLogging, logger } from "../log.js";
import type { LoadResult } from "../warehouse/loader.js";
import { createJobContext } from "./context.js";
import type { JobContext } from "./context.js";

export interface JobDefinition {
  name: string;
  stores: readonly StoreName[];
  run: (context: JobContext) => Promise<LoadResult>;
}

export async function runJob(job: JobDefinition, env: Record<string, string | undefined> = process.env): Promise<LoadResult> {
  const config = loadConfig(env, job.stores);
  configureLogging({ level: config.logLevel });
  logger.info(`Starting job ${job.name}`);
  const result = await job.run(createJobContext(config));
  logger.info(
    result.skipped
      ? `Job ${job.name} finished without loading ${result.target}`
      : `Job ${job.name} finished: ${result.rows} rows in ${result.target}`
  );
  return result;
}

export function isEntryPoint(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (!script) return false;
  return moduleUrl === pathToFileURL(script).href;
}

export function runJobFromCli(job: JobDefinition): void {
  loadEnvFile();
  runJob(job).catch((error) => {
    logger.error(`Job ${job.name} failed: ${describeError(error)}`);
    process.exit(1);
  });
}
