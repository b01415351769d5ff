import { DataError, RequestError, describeError } from "../errors.js";
import { logger } from "../log.js";
import type { SeasonBounds } from "../types.js";
import { parseBootstrap, parseFixtures } from "./schemas.js";
import type { Bootstrap, Fixture } from "./schemas.js";
import { deriveSeasonBounds } from "./seasonBounds.js";

export type FetchLike = (url: string, init: { headers: Record<string, string>; signal: AbortSignal }) => Promise<Response>;

export interface FplClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export interface BootstrapResult {
  data: Bootstrap;
  bounds: SeasonBounds;
}

export interface FplClient {
  fetchBootstrap(): Promise<BootstrapResult>;
  fetchFixtures(options?: { finishedOnly?: boolean }): Promise<Fixture[]>;
}

export function buildUrl(baseUrl: string, path: string, query: Record<string, string> = {}): string {
  const base = baseUrl.replace(/\/+$/, "");
  const url = new URL(`${base}/${path.replace(/^\/+/, "")}`);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

async function fetchJson(options: FplClientOptions, url: string): Promise<unknown> {
  const fetchImpl = options.fetchImpl ?? fetch;
  let response: Response;
  try {
    response = await fetchImpl(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(options.timeoutMs)
    });
  } catch (error) {
    logger.error(`Error fetching data from API: ${describeError(error)}`);
    throw new RequestError(`Request to ${url} failed: ${describeError(error)}`, null, { cause: error });
  }

  // The timeout signal also covers reading the body.
  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    logger.error(`Error fetching data from API: ${describeError(error)}`);
    throw new RequestError(`Reading the response from ${url} failed: ${describeError(error)}`, response.status, {
      cause: error
    });
  }

  if (!response.ok) {
    const snippet = text.slice(0, 120).replace(/\s+/g, " ");
    logger.error(`Error fetching data from API: ${response.status} ${response.statusText}`);
    throw new RequestError(`FPL API error ${response.status} for ${url}: ${snippet}`, response.status);
  }

  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    logger.error(`API response from ${url} was not valid JSON.`);
    throw new DataError(`API response from ${url} was not valid JSON.`, { cause: error });
  }
}

function logParseFailure(label: string, error: unknown): void {
  logger.error(`${label} data rejected: ${describeError(error)}`);
}

export function createFplClient(options: FplClientOptions): FplClient {
  return {
    async fetchBootstrap() {
      const raw = await fetchJson(options, buildUrl(options.baseUrl, "bootstrap-static/"));
      try {
        const data = parseBootstrap(raw);
        const bounds = deriveSeasonBounds(data.events);
        logger.info("Bootstrap data fetched successfully");
        return { data, bounds };
      } catch (error) {
        logParseFailure("Bootstrap", error);
        throw error;
      }
    },

    async fetchFixtures(fixtureOptions = {}) {
      const query: Record<string, string> = fixtureOptions.finishedOnly ? { future: "0" } : {};
      const raw = await fetchJson(options, buildUrl(options.baseUrl, "fixtures/", query));
      try {
        const fixtures = parseFixtures(raw);
        logger.info(`Fixtures data fetched successfully (${fixtures.length} fixtures)`);
        return fixtures;
      } catch (error) {
        logParseFailure("Fixtures", error);
        throw error;
      }
    }
  };
}
